export type { PriceBar } from '../data/marketData.types';

export type Market = 'domestic' | 'offshore';
export type InstrumentClass = 'domestic' | 'qdii';

export type TransactionKind = 'buy' | 'sell' | 'skip';
export type TransactionStatus = 'pending' | 'confirmed' | 'skipped' | 'void';

export interface Transaction {
  id: string;
  date: string; // effective trade date, ISO
  instrumentCode: string;
  amount: number; // buy > 0, sell < 0, skip = 0
  shares: number | null;
  kind: TransactionKind;
  status: TransactionStatus;
  confirmDate: string | null;
  nav: number | null;
  submittedAt: string | null;
  note?: string;
  createdAt: string;
  updatedAt: string;
}

export type DataQualitySeverity = 'info' | 'warn' | 'error';

export interface DataQualityFlag {
  code: string;
  severity: DataQualitySeverity;
  message: string;
  symbols?: string[];
  observed?: Record<string, unknown> | string | number | string[];
}

export interface NavPoint {
  value: number;
  date: string; // publication (valuation) date
}

export interface EstimatePoint {
  value: number;
  asOf: string; // ISO instant
}

// oversold: confirmed sells exceed buys; left out of totals until the ledger is corrected
export type PriceStatus = 'ok' | 'unavailable' | 'oversold';

export interface Position {
  instrumentCode: string;
  assetClass: string;
  instrumentClass: InstrumentClass;
  sharesHeld: number;
  costBasis: number;
  nav: NavPoint | null;
  estimate: EstimatePoint | null;
  marketValueNet: number | null;
  marketValueEstimated: number | null;
  priceStatus: PriceStatus;
  pendingCount: number;
  pendingAmount: number;
}

export interface PortfolioSnapshot {
  asOf: string;
  positions: Position[];
  totalValueNet: number;
  totalValueEstimated: number;
  valueByAssetClassNet: Record<string, number>;
  valueByAssetClassEstimated: Record<string, number>;
  weightsNet: Record<string, number>;
  weightsEstimated: Record<string, number>;
  warnings: DataQualityFlag[];
}

export interface AssetClassDeviation {
  assetClass: string;
  targetWeight: number;
  actualWeightNet: number;
  actualWeightEstimated: number;
  absoluteDeviationNet: number;
  relativeDeviationNet: number | null;
  absoluteDeviationEstimated: number;
  relativeDeviationEstimated: number | null;
}

export type SignalType = 'rebalance_forced' | 'rebalance_light' | 'tactical_buy' | 'tactical_sell';
export type SignalAction = 'buy' | 'sell';
export type Urgency = 'low' | 'medium' | 'high';

export interface Signal {
  signalType: SignalType;
  assetClass: string;
  action: SignalAction;
  amountHint: number;
  reason: string;
  urgency: Urgency;
  absoluteDeviation: number;
  riskNote?: string;
}

export interface InstrumentConfig {
  name?: string;
  assetClass: string;
  instrumentClass: InstrumentClass;
}

export interface CooldownDays {
  rebalance_forced: number;
  rebalance_light: number;
  tactical_buy: number;
  tactical_sell: number;
}

export interface TargetPolicy {
  targets: Record<string, number>;
  weightTolerance: number;
  thresholds: {
    forcedRelative: number;
    lightAbsolute: number;
  };
  cooldownDays: CooldownDays;
  tactical: {
    lookbackDays: number;
    buyDrawdown: number;
    sellReturn: number;
    amountHint: number;
    // instrument whose NAV history stands in for the asset class
    benchmarks?: Record<string, string>;
  };
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  timezone: string;
  cutoff: string; // HH:mm
  holidayFile: string;
  instruments: Record<string, InstrumentConfig>;
  policy: TargetPolicy;
  retry: RetryPolicy;
  priceCacheTtlMs: number;
  httpTimeoutMs: number;
  uiPort?: number;
  uiBind?: string;
}
