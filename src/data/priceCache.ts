import { MarketDataProvider, PriceBar } from './marketData.types';
import { EstimatePoint, NavPoint } from '../core/types';

interface CacheEntry<T> {
  storedAt: number;
  value: T;
}

/**
 * Short-lived read-through cache in front of a provider, for report and signal
 * runs. The confirmation poller talks to the inner provider directly so a cached
 * value never stands in for a settlement NAV.
 */
export class CachedMarketDataProvider implements MarketDataProvider {
  private readonly inner: MarketDataProvider;
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private readonly navs = new Map<string, CacheEntry<NavPoint | null>>();
  private readonly estimates = new Map<string, CacheEntry<EstimatePoint | null>>();
  private readonly series = new Map<string, CacheEntry<PriceBar[]>>();

  constructor(inner: MarketDataProvider, ttlMs: number, clock: () => number = Date.now) {
    this.inner = inner;
    this.ttlMs = ttlMs;
    this.clock = clock;
  }

  private async remember<T>(store: Map<string, CacheEntry<T>>, key: string, load: () => Promise<T>): Promise<T> {
    const hit = store.get(key);
    const now = this.clock();
    if (hit && now - hit.storedAt < this.ttlMs) {
      return hit.value;
    }
    const value = await load();
    this.sweep(store, now);
    store.set(key, { storedAt: now, value });
    return value;
  }

  // keys carry dates, so entries for past days would otherwise pile up in a long-lived server
  private sweep<T>(store: Map<string, CacheEntry<T>>, now: number) {
    for (const [key, entry] of store) {
      if (now - entry.storedAt >= this.ttlMs) store.delete(key);
    }
  }

  get size() {
    return this.navs.size + this.estimates.size + this.series.size;
  }

  getLatestNav(instrumentCode: string, asOf: string): Promise<NavPoint | null> {
    return this.remember(this.navs, `${instrumentCode}:${asOf}`, () => this.inner.getLatestNav(instrumentCode, asOf));
  }

  getIntradayEstimate(instrumentCode: string): Promise<EstimatePoint | null> {
    return this.remember(this.estimates, instrumentCode, () => this.inner.getIntradayEstimate(instrumentCode));
  }

  getHistoricalSeries(instrumentCode: string, from: string, to: string): Promise<PriceBar[]> {
    return this.remember(this.series, `${instrumentCode}:${from}:${to}`, () =>
      this.inner.getHistoricalSeries(instrumentCode, from, to)
    );
  }

  clear() {
    this.navs.clear();
    this.estimates.clear();
    this.series.clear();
  }
}
