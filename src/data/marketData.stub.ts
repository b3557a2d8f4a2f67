import { MarketDataProvider, PriceBar } from './marketData.types';
import { EstimatePoint, NavPoint } from '../core/types';
import { hashString, mulberry32, roundTo } from '../core/utils';
import { addDays, formatISODate, isWeekend } from '../core/time';

// Static anchors for the sample instruments so stub runs look plausible and repeat.
const navOverrides: Record<string, number> = {
  '018043': 1.76,
  '110020': 1.62,
  '161119': 1.08
};

const baseNav = (code: string): number => {
  if (navOverrides[code] !== undefined) return navOverrides[code];
  const rng = mulberry32(hashString(code));
  return 0.8 + rng() * 2.2;
};

const drift = (code: string): number => {
  const rng = mulberry32(hashString(code + 'drift'));
  return rng() * 0.06 - 0.03;
};

const navForDate = (code: string, date: string): number => {
  const rng = mulberry32(hashString(`${code}-${date}`));
  const noise = (rng() - 0.5) * 0.02;
  return roundTo(Math.max(0.1, baseNav(code) * (1 + drift(code) + noise)), 4);
};

const lastWeekdayOnOrBefore = (date: string): string => {
  let current = date;
  while (isWeekend(current)) current = addDays(current, -1);
  return current;
};

/** Deterministic synthetic NAVs on weekdays; no network. */
export class StubMarketDataProvider implements MarketDataProvider {
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async getLatestNav(instrumentCode: string, asOf: string): Promise<NavPoint | null> {
    // Today's NAV is published in the evening; treat it as not yet out.
    const today = formatISODate(this.now());
    const ceiling = asOf < today ? asOf : addDays(today, -1);
    const date = lastWeekdayOnOrBefore(ceiling);
    return { value: navForDate(instrumentCode, date), date };
  }

  async getIntradayEstimate(instrumentCode: string): Promise<EstimatePoint | null> {
    const now = this.now();
    const today = formatISODate(now);
    if (isWeekend(today)) return null;
    return { value: navForDate(instrumentCode, today), asOf: now.toISOString() };
  }

  async getHistoricalSeries(instrumentCode: string, from: string, to: string): Promise<PriceBar[]> {
    const bars: PriceBar[] = [];
    for (let date = from; date <= to; date = addDays(date, 1)) {
      if (!isWeekend(date)) bars.push({ date, close: navForDate(instrumentCode, date) });
    }
    return bars;
  }
}
