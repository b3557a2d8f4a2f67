import {
  DataQualityFlag,
  EstimatePoint,
  InstrumentConfig,
  NavPoint,
  PortfolioSnapshot,
  Position,
  Transaction
} from '../core/types';
import { PriceUnavailableError } from '../core/errors';
import { localDateInZone } from '../core/time';
import { MarketDataProvider } from '../data/marketData.types';
import { readTransactions } from '../ledger/ledger';
import { VersionedStore } from '../ledger/storage';
import { SHARE_EPSILON } from '../ledger/transactions';

export const UNCLASSIFIED = 'UNCLASSIFIED';

interface Holding {
  instrumentCode: string;
  sharesHeld: number;
  costBasis: number;
  pendingCount: number;
  pendingAmount: number;
}

/** Confirmed rows make up holdings; pending rows are tracked but carry no shares. */
export const foldLedger = (rows: Transaction[]): Holding[] => {
  const byCode = new Map<string, Holding>();
  const holding = (code: string) => {
    let h = byCode.get(code);
    if (!h) {
      h = { instrumentCode: code, sharesHeld: 0, costBasis: 0, pendingCount: 0, pendingAmount: 0 };
      byCode.set(code, h);
    }
    return h;
  };
  for (const tx of rows) {
    if (tx.kind === 'skip') continue;
    if (tx.status === 'confirmed' && tx.shares !== null) {
      const h = holding(tx.instrumentCode);
      h.sharesHeld += tx.shares;
      h.costBasis += tx.amount;
    } else if (tx.status === 'pending') {
      const h = holding(tx.instrumentCode);
      h.pendingCount += 1;
      h.pendingAmount += tx.amount;
    }
  }
  return Array.from(byCode.values())
    .map((h) => (Math.abs(h.sharesHeld) < SHARE_EPSILON ? { ...h, sharesHeld: 0 } : h))
    .sort((a, b) => (a.instrumentCode < b.instrumentCode ? -1 : 1));
};

const addTo = (acc: Record<string, number>, key: string, value: number) => {
  acc[key] = (acc[key] || 0) + value;
};

const toWeights = (values: Record<string, number>, total: number): Record<string, number> => {
  const weights: Record<string, number> = {};
  if (total <= 0) return weights;
  for (const [assetClass, value] of Object.entries(values)) {
    if (value > 0) weights[assetClass] = value / total;
  }
  return weights;
};

/** Totals and weights over priced positions only; unpriced ones stay out of the denominator. */
export const summarizePositions = (asOf: string, positions: Position[], warnings: DataQualityFlag[]): PortfolioSnapshot => {
  const valueByAssetClassNet: Record<string, number> = {};
  const valueByAssetClassEstimated: Record<string, number> = {};
  for (const p of positions) {
    if (p.marketValueNet === null || p.marketValueEstimated === null) continue;
    addTo(valueByAssetClassNet, p.assetClass, p.marketValueNet);
    addTo(valueByAssetClassEstimated, p.assetClass, p.marketValueEstimated);
  }
  const totalValueNet = Object.values(valueByAssetClassNet).reduce((a, b) => a + b, 0);
  const totalValueEstimated = Object.values(valueByAssetClassEstimated).reduce((a, b) => a + b, 0);
  return {
    asOf,
    positions,
    totalValueNet,
    totalValueEstimated,
    valueByAssetClassNet,
    valueByAssetClassEstimated,
    weightsNet: toWeights(valueByAssetClassNet, totalValueNet),
    weightsEstimated: toWeights(valueByAssetClassEstimated, totalValueEstimated),
    warnings
  };
};

export interface AggregatorDeps {
  store: VersionedStore;
  marketData: MarketDataProvider;
  instruments: Record<string, InstrumentConfig>;
  timezone: string;
}

/**
 * Ledger plus prices into positions with two valuations: `net` on the last
 * published NAV and `estimated` on the intraday estimate when it is newer.
 */
export class PositionAggregator {
  private readonly deps: AggregatorDeps;

  constructor(deps: AggregatorDeps) {
    this.deps = deps;
  }

  async getPositions(asOf: string): Promise<PortfolioSnapshot> {
    const rows = await readTransactions(this.deps.store);
    return this.aggregate(rows, asOf);
  }

  async aggregate(rows: Transaction[], asOf: string): Promise<PortfolioSnapshot> {
    const warnings: DataQualityFlag[] = [];
    const holdings = foldLedger(rows);
    const positions = await Promise.all(holdings.map((h) => this.price(h, asOf, warnings)));
    const unpriced = positions.filter((p) => p.priceStatus === 'unavailable').map((p) => p.instrumentCode);
    if (unpriced.length) {
      warnings.push({
        code: 'PRICE_UNAVAILABLE',
        severity: 'warn',
        message: `No published NAV for ${unpriced.join(', ')}; excluded from totals and weights.`,
        symbols: unpriced
      });
    }
    return summarizePositions(asOf, positions, warnings);
  }

  private async fetchOrFlag<T>(
    load: () => Promise<T | null>,
    code: string,
    what: string,
    warnings: DataQualityFlag[]
  ): Promise<T | null> {
    try {
      return await load();
    } catch (err) {
      if (!(err instanceof PriceUnavailableError)) throw err;
      warnings.push({ code: 'PRICE_FETCH_FAILED', severity: 'warn', message: `${what}: ${err.message}`, symbols: [code] });
      return null;
    }
  }

  private async price(h: Holding, asOf: string, warnings: DataQualityFlag[]): Promise<Position> {
    const config = this.deps.instruments[h.instrumentCode];
    if (!config) {
      warnings.push({
        code: 'UNKNOWN_INSTRUMENT',
        severity: 'warn',
        message: `${h.instrumentCode} has no asset class configured; grouped under ${UNCLASSIFIED}.`,
        symbols: [h.instrumentCode]
      });
    }
    const base: Omit<Position, 'nav' | 'estimate' | 'marketValueNet' | 'marketValueEstimated' | 'priceStatus'> = {
      ...h,
      assetClass: config?.assetClass ?? UNCLASSIFIED,
      instrumentClass: config?.instrumentClass ?? 'domestic'
    };
    if (h.sharesHeld === 0) {
      return { ...base, nav: null, estimate: null, marketValueNet: 0, marketValueEstimated: 0, priceStatus: 'ok' };
    }
    if (h.sharesHeld < 0) {
      warnings.push({
        code: 'NEGATIVE_HOLDING',
        severity: 'warn',
        message: `${h.instrumentCode} holds ${h.sharesHeld} shares after confirmed sells; excluded from totals and weights.`,
        symbols: [h.instrumentCode]
      });
      return { ...base, nav: null, estimate: null, marketValueNet: null, marketValueEstimated: null, priceStatus: 'oversold' };
    }

    const { marketData } = this.deps;
    const [nav, estimate] = await Promise.all([
      this.fetchOrFlag<NavPoint>(() => marketData.getLatestNav(h.instrumentCode, asOf), h.instrumentCode, 'NAV', warnings),
      this.fetchOrFlag<EstimatePoint>(
        () => marketData.getIntradayEstimate(h.instrumentCode),
        h.instrumentCode,
        'estimate',
        warnings
      )
    ]);
    if (!nav) {
      return { ...base, nav: null, estimate, marketValueNet: null, marketValueEstimated: null, priceStatus: 'unavailable' };
    }
    const estimateIsFresher = estimate !== null && localDateInZone(new Date(estimate.asOf), this.deps.timezone) > nav.date;
    const estimatedPrice = estimate && estimateIsFresher ? estimate.value : nav.value;
    return {
      ...base,
      nav,
      estimate,
      marketValueNet: h.sharesHeld * nav.value,
      marketValueEstimated: h.sharesHeld * estimatedPrice,
      priceStatus: 'ok'
    };
  }
}
