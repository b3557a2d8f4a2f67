import { EastMoneyMarketDataProvider } from '../src/data/marketData.eastmoney';
import { CachedMarketDataProvider } from '../src/data/priceCache';
import { StubMarketDataProvider } from '../src/data/marketData.stub';
import { PriceUnavailableError } from '../src/core/errors';
import { FakeMarketData } from './fixtures';

const navPage = (rows: Array<{ FSRQ: string; DWJZ: string }>, total: number) =>
  new Response(JSON.stringify({ ErrCode: 0, ErrMsg: null, TotalCount: total, Data: { LSJZList: rows } }), {
    status: 200
  });

describe('EastMoneyMarketDataProvider', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns the latest published NAV on or before asOf', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(navPage([{ FSRQ: '2025-09-30', DWJZ: '1.7645' }], 120));
    const provider = new EastMoneyMarketDataProvider();
    expect(await provider.getLatestNav('018043', '2025-09-30')).toEqual({ value: 1.7645, date: '2025-09-30' });
    const url = new URL(String(fetchSpy.mock.calls[0][0]));
    expect(url.searchParams.get('fundCode')).toBe('018043');
    expect(url.searchParams.get('pageSize')).toBe('1');
    expect(url.searchParams.get('endDate')).toBe('2025-09-30');
  });

  it('parses the JSONP intraday estimate in Shanghai time', async () => {
    const body =
      'jsonpgz({"fundcode":"018043","name":"sample","jzrq":"2025-09-29","dwjz":"1.7500","gsz":"1.7712","gszzl":"1.21","gztime":"2025-09-30 14:30"});';
    jest.spyOn(global, 'fetch').mockResolvedValueOnce(new Response(body, { status: 200 }));
    const provider = new EastMoneyMarketDataProvider({ timezone: 'Asia/Shanghai' });
    expect(await provider.getIntradayEstimate('018043')).toEqual({
      value: 1.7712,
      asOf: '2025-09-30T06:30:00.000Z'
    });
  });

  it('treats an empty estimate payload as no estimate', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValueOnce(new Response('jsonpgz();', { status: 200 }));
    const provider = new EastMoneyMarketDataProvider();
    expect(await provider.getIntradayEstimate('161119')).toBeNull();
  });

  it('pages through history and returns it oldest first', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(
        navPage(
          [
            { FSRQ: '2025-09-30', DWJZ: '1.20' },
            { FSRQ: '2025-09-29', DWJZ: '1.10' }
          ],
          25
        )
      )
      .mockResolvedValueOnce(navPage([{ FSRQ: '2025-09-26', DWJZ: '1.00' }], 25));
    const provider = new EastMoneyMarketDataProvider();
    const bars = await provider.getHistoricalSeries('110020', '2025-09-01', '2025-09-30');
    expect(bars).toEqual([
      { date: '2025-09-26', close: 1 },
      { date: '2025-09-29', close: 1.1 },
      { date: '2025-09-30', close: 1.2 }
    ]);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('wraps upstream failures as PriceUnavailableError', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(new Response('oops', { status: 500 }))
      .mockResolvedValueOnce(
        new Response(JSON.stringify({ ErrCode: -999, ErrMsg: 'fund not found', Data: null }), { status: 200 })
      );
    const provider = new EastMoneyMarketDataProvider();
    await expect(provider.getLatestNav('018043', '2025-09-30')).rejects.toBeInstanceOf(PriceUnavailableError);
    await expect(provider.getLatestNav('999999', '2025-09-30')).rejects.toThrow(
      'Price unavailable for 999999: fund not found'
    );
  });
});

describe('CachedMarketDataProvider', () => {
  it('serves repeats from cache until the TTL passes', async () => {
    const inner = new FakeMarketData();
    inner.navs['018043'] = { value: 1.7645, date: '2025-09-29' };
    let clock = 1000;
    const cached = new CachedMarketDataProvider(inner, 300000, () => clock);

    await cached.getLatestNav('018043', '2025-09-30');
    await cached.getLatestNav('018043', '2025-09-30');
    expect(inner.navCalls).toHaveLength(1);

    await cached.getLatestNav('018043', '2025-09-29');
    expect(inner.navCalls).toHaveLength(2);

    clock += 300000;
    await cached.getLatestNav('018043', '2025-09-30');
    expect(inner.navCalls).toHaveLength(3);

    cached.clear();
    await cached.getLatestNav('018043', '2025-09-30');
    expect(inner.navCalls).toHaveLength(4);
  });

  it('drops expired entries instead of keeping one per past date', async () => {
    const inner = new FakeMarketData();
    inner.navs['018043'] = { value: 1.7645, date: '2025-09-29' };
    let clock = 1000;
    const cached = new CachedMarketDataProvider(inner, 300000, () => clock);
    await cached.getLatestNav('018043', '2025-09-29');
    await cached.getLatestNav('018043', '2025-09-30');
    expect(cached.size).toBe(2);

    clock += 300000;
    await cached.getLatestNav('018043', '2025-10-01');
    expect(cached.size).toBe(1);
  });
});

describe('StubMarketDataProvider', () => {
  it('never reports a NAV for today or a weekend', async () => {
    const provider = new StubMarketDataProvider(() => new Date('2025-10-06T04:00:00Z'));
    const nav = await provider.getLatestNav('018043', '2025-10-06');
    expect(nav?.date).toBe('2025-10-03');
    expect(await provider.getIntradayEstimate('018043')).not.toBeNull();
    const bars = await provider.getHistoricalSeries('018043', '2025-10-04', '2025-10-06');
    expect(bars.map((b) => b.date)).toEqual(['2025-10-06']);
  });
});
