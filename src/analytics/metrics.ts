import { PriceBar } from '../core/types';

export interface TrailingMetrics {
  // peak-to-last decline, 0 when the last close is the peak
  drawdown: number;
  // last / first - 1
  trailingReturn: number;
  observations: number;
}

const sortedCloses = (bars: PriceBar[]): PriceBar[] =>
  bars.filter((b) => Number.isFinite(b.close) && b.close > 0).sort((a, b) => (a.date < b.date ? -1 : 1));

export const computeTrailingDrawdown = (bars: PriceBar[]): number => {
  const series = sortedCloses(bars);
  if (!series.length) return 0;
  const peak = Math.max(...series.map((b) => b.close));
  const last = series[series.length - 1].close;
  return peak > 0 ? (peak - last) / peak : 0;
};

export const computeTrailingReturn = (bars: PriceBar[]): number => {
  const series = sortedCloses(bars);
  if (series.length < 2) return 0;
  return series[series.length - 1].close / series[0].close - 1;
};

export const computeTrailingMetrics = (bars: PriceBar[]): TrailingMetrics => ({
  drawdown: computeTrailingDrawdown(bars),
  trailingReturn: computeTrailingReturn(bars),
  observations: sortedCloses(bars).length
});
