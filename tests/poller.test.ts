import { ConfirmationPoller } from '../src/confirmation/poller';
import { MutationGateway } from '../src/ledger/gateway';
import { InMemoryVersionedStore } from '../src/ledger/storage.stub';
import { decodeLedger, encodeLedger } from '../src/ledger/codec';
import { confirmed, FakeMarketData, makeTx, noSleep, retry } from './fixtures';

const NOW = new Date('2025-10-10T02:00:00Z');

const setup = (marketData: FakeMarketData) => {
  const store = new InMemoryVersionedStore(
    encodeLedger([
      makeTx({ id: 'tx-1', instrumentCode: '018043', date: '2025-09-30', amount: 1000, confirmDate: '2025-10-10' }),
      makeTx({ id: 'tx-2', instrumentCode: '110020', date: '2025-09-30', amount: 500, confirmDate: '2025-10-09' }),
      makeTx({ id: 'tx-3', instrumentCode: '161119', date: '2025-10-09', amount: 300, confirmDate: '2025-10-13' }),
      makeTx({
        id: 'tx-4',
        instrumentCode: '161119',
        date: '2025-09-30',
        amount: -300,
        kind: 'sell',
        confirmDate: '2025-10-09'
      }),
      confirmed('tx-0', '161119', 450, 300)
    ])
  );
  const gateway = new MutationGateway(store, { retry, now: () => NOW, sleep: noSleep });
  const poller = new ConfirmationPoller({ store, gateway, marketData, timezone: 'Asia/Shanghai' });
  return { store, poller };
};

describe('ConfirmationPoller', () => {
  const market = () => {
    const data = new FakeMarketData();
    data.navs['018043'] = { value: 2, date: '2025-09-30' };
    // trade-date NAV not out yet
    data.navs['110020'] = { value: 1.25, date: '2025-09-29' };
    data.navs['161119'] = { value: 1.5, date: '2025-09-30' };
    return data;
  };

  it('confirms due rows once the trade-date NAV is published', async () => {
    const { store, poller } = setup(market());
    const summary = await poller.poll(NOW);
    expect(summary).toEqual({
      today: '2025-10-10',
      confirmed: ['tx-1', 'tx-4'],
      waiting: ['tx-2'],
      conflicts: [],
      rejected: []
    });
    const rows = decodeLedger(store.snapshot());
    expect(rows[0]).toMatchObject({ status: 'confirmed', shares: 500, nav: 2, confirmDate: '2025-10-10' });
    expect(rows[1].status).toBe('pending');
    expect(rows[2].status).toBe('pending');
    expect(rows[3]).toMatchObject({ status: 'confirmed', shares: -200, confirmDate: '2025-10-09' });
  });

  it('keeps the calendar confirmation date when the poll runs late', async () => {
    const data = market();
    data.navs['110020'] = { value: 1.25, date: '2025-09-30' };
    const { store, poller } = setup(data);
    const late = new Date('2025-10-20T02:00:00Z');
    const summary = await poller.poll(late);
    expect(summary.today).toBe('2025-10-20');
    const rows = decodeLedger(store.snapshot());
    expect(rows[1]).toMatchObject({ id: 'tx-2', status: 'confirmed', shares: 400, confirmDate: '2025-10-09' });
  });

  it('is idempotent across runs', async () => {
    const { store, poller } = setup(market());
    await poller.poll(NOW);
    const writes = store.writes;
    const second = await poller.poll(NOW);
    expect(second.confirmed).toEqual([]);
    expect(second.waiting).toEqual(['tx-2']);
    expect(store.writes).toBe(writes);
  });

  it('leaves rows pending when the provider fails for their instrument', async () => {
    const data = market();
    data.failing.add('018043');
    const { poller } = setup(data);
    const summary = await poller.poll(NOW);
    expect(summary.waiting).toEqual(['tx-1', 'tx-2']);
    expect(summary.confirmed).toEqual(['tx-4']);
  });
});
