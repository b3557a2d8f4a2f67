import { EstimatePoint, NavPoint } from '../core/types';

export interface PriceBar {
  date: string;
  close: number;
}

/**
 * Fund price source. `null` means the value is not published (yet); transport
 * failures are raised as `PriceUnavailableError`.
 */
export interface MarketDataProvider {
  /** Latest NAV whose valuation date is on or before `asOf`. */
  getLatestNav(instrumentCode: string, asOf: string): Promise<NavPoint | null>;
  getIntradayEstimate(instrumentCode: string): Promise<EstimatePoint | null>;
  /** NAV history between `from` and `to` inclusive, oldest first. */
  getHistoricalSeries(instrumentCode: string, from: string, to: string): Promise<PriceBar[]>;
}
