import { MutationGateway } from '../src/ledger/gateway';
import { decodeLedger, encodeLedger } from '../src/ledger/codec';
import { InMemoryVersionedStore } from '../src/ledger/storage.stub';
import { ConditionalWriteResult, VersionedContent } from '../src/ledger/storage';
import { backoffDelay } from '../src/core/conditionalWrite';
import { StoreUnavailableError, VersionConflictError } from '../src/core/errors';
import { LedgerOperation } from '../src/ledger/operations';
import { makeTx, noSleep, retry } from './fixtures';

const NOW = new Date('2025-09-30T06:00:00Z');

const makeGateway = (store: InMemoryVersionedStore, sleep: (ms: number) => Promise<void> = noSleep) =>
  new MutationGateway(store, { retry, now: () => NOW, sleep });

const append = (instrumentCode = '018043', amount = 1000): LedgerOperation => ({
  type: 'append',
  transaction: { date: '2025-09-30', instrumentCode, amount, kind: 'buy', confirmDate: '2025-10-10' }
});

const confirm = (transactionId: string): Extract<LedgerOperation, { type: 'confirm' }> => ({
  type: 'confirm',
  transactionId,
  shares: 566.73,
  nav: 1.7645,
  confirmDate: '2025-10-10'
});

class AlwaysConflictingStore extends InMemoryVersionedStore {
  async conditionalWrite(_content: string, expectedVersion: string): Promise<ConditionalWriteResult> {
    this.conflicts += 1;
    return { ok: false, conflict: new VersionConflictError(expectedVersion) };
  }
}

class FlakyReadStore extends InMemoryVersionedStore {
  failuresLeft = 1;

  async read(): Promise<VersionedContent> {
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new StoreUnavailableError(this.label, 'HTTP 502');
    }
    return super.read();
  }
}

describe('MutationGateway', () => {
  it('appends once per idempotency key', async () => {
    const store = new InMemoryVersionedStore();
    const gateway = makeGateway(store);
    const first = await gateway.applyMutation('tx-1', append());
    expect(first.status).toBe('applied');
    if (first.status !== 'applied') return;
    expect(first.transaction).toMatchObject({
      id: 'tx-1',
      status: 'pending',
      shares: null,
      createdAt: '2025-09-30T06:00:00.000Z'
    });

    const again = await gateway.applyMutation('tx-1', append());
    expect(again.status).toBe('no_op');
    expect(store.writes).toBe(1);
    expect(decodeLedger(store.snapshot())).toHaveLength(1);
  });

  it('confirms a pending row and treats a repeat as a no-op', async () => {
    const store = new InMemoryVersionedStore(encodeLedger([makeTx({ id: 'tx-1' })]));
    const gateway = makeGateway(store);
    const first = await gateway.applyMutation('tx-1:confirm', confirm('tx-1'));
    expect(first.status).toBe('applied');
    const second = await gateway.applyMutation('tx-1:confirm-again', confirm('tx-1'));
    expect(second.status).toBe('no_op');
    const [row] = decodeLedger(store.snapshot());
    expect(row).toMatchObject({ status: 'confirmed', shares: 566.73, nav: 1.7645, confirmDate: '2025-10-10' });
    expect(store.writes).toBe(1);
  });

  it('rejects moves out of a terminal status with the blocking reason', async () => {
    const store = new InMemoryVersionedStore(
      encodeLedger([makeTx({ id: 'tx-1', status: 'confirmed', shares: 566.73, nav: 1.7645 })])
    );
    const gateway = makeGateway(store);
    const result = await gateway.applyMutation('tx-1:skip', { type: 'skip', transactionId: 'tx-1' });
    expect(result).toEqual({
      status: 'rejected',
      key: 'tx-1:skip',
      reason: 'transaction tx-1 is already confirmed, cannot skip',
      attempts: 1
    });
    expect(store.writes).toBe(0);
  });

  it('soft-deletes by voiding the row', async () => {
    const store = new InMemoryVersionedStore(encodeLedger([makeTx({ id: 'tx-1' })]));
    const result = await makeGateway(store).applyMutation('tx-1:void', { type: 'void', transactionId: 'tx-1' });
    expect(result.status).toBe('applied');
    const rows = decodeLedger(store.snapshot());
    expect(rows).toHaveLength(1);
    expect(rows[0].status).toBe('void');
  });

  it('rejects unknown ids, empty keys and shares against the amount direction', async () => {
    const store = new InMemoryVersionedStore(encodeLedger([makeTx({ id: 'tx-1' })]));
    const gateway = makeGateway(store);
    const missing = await gateway.applyMutation('nope:void', { type: 'void', transactionId: 'nope' });
    expect(missing).toMatchObject({ status: 'rejected', reason: 'transaction nope not found' });
    const blank = await gateway.applyMutation('  ', append());
    expect(blank).toMatchObject({ status: 'rejected', reason: 'idempotency key is required', attempts: 0 });
    const wrongSign = await gateway.applyMutation('tx-1:confirm', { ...confirm('tx-1'), shares: -5 });
    expect(wrongSign).toMatchObject({
      status: 'rejected',
      reason: 'shares -5 do not match the direction of amount 1000'
    });
  });

  it('rejects a sell confirmation larger than the confirmed holding', async () => {
    const store = new InMemoryVersionedStore(
      encodeLedger([
        makeTx({ id: 'tx-0', status: 'confirmed', shares: 100, nav: 10 }),
        makeTx({ id: 'tx-1', amount: -2000, kind: 'sell' })
      ])
    );
    const gateway = makeGateway(store);
    const result = await gateway.applyMutation('tx-1:confirm', { ...confirm('tx-1'), shares: -150 });
    expect(result).toMatchObject({
      status: 'rejected',
      reason: 'selling 150 shares of 018043 exceeds the 100 held'
    });
    const exact = await gateway.applyMutation('tx-1:confirm', { ...confirm('tx-1'), shares: -100 });
    expect(exact.status).toBe('applied');
  });

  it('re-plans on the new base when another writer got there first', async () => {
    const store = new InMemoryVersionedStore();
    const gateway = makeGateway(store);
    const results = await Promise.all([
      gateway.applyMutation('tx-a', append('018043', 1000)),
      gateway.applyMutation('tx-b', append('110020', 500))
    ]);
    expect(results.map((r) => r.status)).toEqual(['applied', 'applied']);
    expect(results.map((r) => r.attempts)).toEqual([1, 2]);
    expect(store.conflicts).toBe(1);
    expect(decodeLedger(store.snapshot()).map((r) => r.id)).toEqual(['tx-a', 'tx-b']);
  });

  it('sees an out-of-band void before applying a skip', async () => {
    const store = new InMemoryVersionedStore(encodeLedger([makeTx({ id: 'tx-1' })]));
    store.forceWrite(encodeLedger([makeTx({ id: 'tx-1', status: 'void' })]));
    const result = await makeGateway(store).applyMutation('tx-1:skip', { type: 'skip', transactionId: 'tx-1' });
    expect(result).toMatchObject({ status: 'rejected', reason: 'transaction tx-1 is already void, cannot skip' });
  });

  it('gives up after the retry budget with exponential backoff between attempts', async () => {
    const store = new AlwaysConflictingStore();
    const sleep = jest.fn(async (_ms: number) => {});
    const gateway = new MutationGateway(store, {
      retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 150 },
      now: () => NOW,
      sleep
    });
    const result = await gateway.applyMutation('tx-1', append());
    expect(result).toEqual({
      status: 'conflict_exhausted',
      key: 'tx-1',
      reason: 'Gave up after 3 conflicting write attempts.',
      attempts: 3
    });
    expect(sleep.mock.calls).toEqual([[100], [150]]);
    expect(store.conflicts).toBe(3);
  });

  it('retries a transient store failure within the same budget', async () => {
    const store = new FlakyReadStore();
    const result = await makeGateway(store).applyMutation('tx-1', append());
    expect(result).toMatchObject({ status: 'applied', attempts: 2 });
  });

  it('caps the backoff delay', () => {
    const policy = { maxAttempts: 5, baseDelayMs: 200, maxDelayMs: 500 };
    expect(backoffDelay(policy, 1)).toBe(200);
    expect(backoffDelay(policy, 2)).toBe(400);
    expect(backoffDelay(policy, 3)).toBe(500);
  });
});
