import { AssetClassDeviation, Signal, SignalAction, SignalType, TargetPolicy } from '../core/types';
import { formatPct, roundTo } from '../core/utils';
import { TrailingMetrics } from '../analytics/metrics';

// Float slack so a weight that lands exactly on a band edge still counts as reaching it.
const EDGE_EPSILON = 1e-9;

export const SIGNAL_PRIORITY: Record<SignalType, number> = {
  rebalance_forced: 0,
  rebalance_light: 1,
  tactical_buy: 2,
  tactical_sell: 2
};

const rebalanceAmount = (deviation: AssetClassDeviation, totalValueNet: number) =>
  roundTo(Math.abs(deviation.absoluteDeviationNet) * totalValueNet, 2);

const directionOf = (deviation: AssetClassDeviation): SignalAction => (deviation.absoluteDeviationNet > 0 ? 'sell' : 'buy');

const signedPct = (value: number) => `${value >= 0 ? '+' : ''}${formatPct(value)}`;

export const forcedRule = (
  deviation: AssetClassDeviation,
  policy: TargetPolicy,
  totalValueNet: number
): Signal | null => {
  const rel = deviation.relativeDeviationNet;
  if (rel === null || Math.abs(rel) < policy.thresholds.forcedRelative - EDGE_EPSILON) return null;
  return {
    signalType: 'rebalance_forced',
    assetClass: deviation.assetClass,
    action: directionOf(deviation),
    amountHint: rebalanceAmount(deviation, totalValueNet),
    reason:
      `${deviation.assetClass} at ${formatPct(deviation.actualWeightNet)} vs target ${formatPct(deviation.targetWeight)} ` +
      `(${signedPct(rel)} relative, band ±${formatPct(policy.thresholds.forcedRelative)})`,
    urgency: 'high',
    absoluteDeviation: deviation.absoluteDeviationNet
  };
};

export const lightRule = (deviation: AssetClassDeviation, policy: TargetPolicy, totalValueNet: number): Signal | null => {
  const abs = deviation.absoluteDeviationNet;
  if (Math.abs(abs) < policy.thresholds.lightAbsolute - EDGE_EPSILON) return null;
  return {
    signalType: 'rebalance_light',
    assetClass: deviation.assetClass,
    action: directionOf(deviation),
    amountHint: rebalanceAmount(deviation, totalValueNet),
    reason:
      `${deviation.assetClass} at ${formatPct(deviation.actualWeightNet)} vs target ${formatPct(deviation.targetWeight)} ` +
      `(${signedPct(abs)} absolute, band ±${formatPct(policy.thresholds.lightAbsolute)})`,
    urgency: 'medium',
    absoluteDeviation: abs
  };
};

export const tacticalBuyRule = (
  deviation: AssetClassDeviation,
  metrics: TrailingMetrics,
  policy: TargetPolicy
): Signal | null => {
  const { buyDrawdown, lookbackDays, amountHint } = policy.tactical;
  if (deviation.absoluteDeviationNet > 0) return null;
  if (metrics.drawdown < buyDrawdown - EDGE_EPSILON) return null;
  return {
    signalType: 'tactical_buy',
    assetClass: deviation.assetClass,
    action: 'buy',
    amountHint,
    reason: `${deviation.assetClass} is ${formatPct(metrics.drawdown)} below its ${lookbackDays}-day high and not overweight`,
    urgency: 'medium',
    absoluteDeviation: deviation.absoluteDeviationNet
  };
};

export const tacticalSellRule = (
  deviation: AssetClassDeviation,
  metrics: TrailingMetrics,
  policy: TargetPolicy
): Signal | null => {
  const { sellReturn, lookbackDays, amountHint } = policy.tactical;
  if (deviation.absoluteDeviationNet <= 0) return null;
  if (!(metrics.trailingReturn > sellReturn)) return null;
  return {
    signalType: 'tactical_sell',
    assetClass: deviation.assetClass,
    action: 'sell',
    amountHint,
    reason: `${deviation.assetClass} returned ${formatPct(metrics.trailingReturn)} over ${lookbackDays} days while overweight`,
    urgency: 'low',
    absoluteDeviation: deviation.absoluteDeviationNet
  };
};

/** Forced > light > tactical, then the larger absolute deviation first. */
export const compareSignals = (a: Signal, b: Signal) =>
  SIGNAL_PRIORITY[a.signalType] - SIGNAL_PRIORITY[b.signalType] ||
  Math.abs(b.absoluteDeviation) - Math.abs(a.absoluteDeviation) ||
  (a.assetClass < b.assetClass ? -1 : a.assetClass > b.assetClass ? 1 : 0);
