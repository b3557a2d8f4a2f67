import path from 'path';
import { EstimatePoint, InstrumentConfig, NavPoint, PriceBar, TargetPolicy, Transaction } from '../src/core/types';
import { PriceUnavailableError } from '../src/core/errors';
import { MarketDataProvider } from '../src/data/marketData.types';
import { loadHolidayTable } from '../src/calendar/holidays';
import { TradingCalendar } from '../src/calendar/tradingCalendar';

export const HOLIDAY_FILE = path.resolve(__dirname, '../data/holidays.json');
export const CONFIG_FILE = path.resolve(__dirname, '../src/config/default.json');

export const makeCalendar = () => new TradingCalendar(loadHolidayTable(HOLIDAY_FILE), { timezone: 'Asia/Shanghai', cutoff: '15:00' });

export const instruments: Record<string, InstrumentConfig> = {
  '018043': { assetClass: 'US_EQUITY', instrumentClass: 'qdii' },
  '110020': { assetClass: 'CN_EQUITY', instrumentClass: 'domestic' },
  '161119': { assetClass: 'CN_BOND', instrumentClass: 'domestic' }
};

export const makePolicy = (targets: Record<string, number>): TargetPolicy => ({
  targets,
  weightTolerance: 0.001,
  thresholds: { forcedRelative: 0.2, lightAbsolute: 0.05 },
  cooldownDays: { rebalance_forced: 90, rebalance_light: 60, tactical_buy: 30, tactical_sell: 30 },
  tactical: { lookbackDays: 90, buyDrawdown: 0.1, sellReturn: 0.15, amountHint: 200 }
});

export const retry = { maxAttempts: 5, baseDelayMs: 1, maxDelayMs: 10 };
export const noSleep = async () => {};

const STAMP = '2025-09-01T00:00:00.000Z';

export const makeTx = (overrides: Partial<Transaction> & Pick<Transaction, 'id'>): Transaction => ({
  date: '2025-09-01',
  instrumentCode: '018043',
  amount: 1000,
  shares: null,
  kind: 'buy',
  status: 'pending',
  confirmDate: '2025-09-03',
  nav: null,
  submittedAt: null,
  createdAt: STAMP,
  updatedAt: STAMP,
  ...overrides
});

export const confirmed = (id: string, instrumentCode: string, amount: number, shares: number): Transaction =>
  makeTx({ id, instrumentCode, amount, shares, kind: amount < 0 ? 'sell' : 'buy', status: 'confirmed', nav: Math.abs(amount / shares) });

/** Canned prices; codes in `failing` throw like an upstream outage. */
export class FakeMarketData implements MarketDataProvider {
  navs: Record<string, NavPoint | null> = {};
  estimates: Record<string, EstimatePoint | null> = {};
  series: Record<string, PriceBar[]> = {};
  failing = new Set<string>();
  navCalls: string[] = [];

  private guard(code: string) {
    if (this.failing.has(code)) throw new PriceUnavailableError(code, 'upstream timeout');
  }

  async getLatestNav(instrumentCode: string): Promise<NavPoint | null> {
    this.navCalls.push(instrumentCode);
    this.guard(instrumentCode);
    return this.navs[instrumentCode] ?? null;
  }

  async getIntradayEstimate(instrumentCode: string): Promise<EstimatePoint | null> {
    this.guard(instrumentCode);
    return this.estimates[instrumentCode] ?? null;
  }

  async getHistoricalSeries(instrumentCode: string): Promise<PriceBar[]> {
    this.guard(instrumentCode);
    return this.series[instrumentCode] ?? [];
  }
}
