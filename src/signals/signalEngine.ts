import {
  AssetClassDeviation,
  DataQualityFlag,
  InstrumentConfig,
  PortfolioSnapshot,
  Signal,
  TargetPolicy
} from '../core/types';
import { PriceUnavailableError } from '../core/errors';
import { addDays, localDateInZone } from '../core/time';
import { MarketDataProvider } from '../data/marketData.types';
import { computeTrailingMetrics, TrailingMetrics } from '../analytics/metrics';
import { analyzeDeviation } from '../portfolio/deviation';
import { PositionAggregator } from '../portfolio/aggregator';
import { compareSignals, forcedRule, lightRule, tacticalBuyRule, tacticalSellRule } from './rules';
import { CooldownRegistry, isCoolingDown } from './cooldownState';

export type SuppressionReason =
  | 'superseded_by_forced'
  | 'superseded_by_rebalance'
  | 'cooling_down'
  | 'fired_concurrently'
  | 'not_recorded';

export interface SuppressedSignal {
  signal: Signal;
  reason: SuppressionReason;
}

export interface SignalEvaluation {
  today: string;
  snapshot: PortfolioSnapshot;
  deviations: AssetClassDeviation[];
  signals: Signal[];
  suppressed: SuppressedSignal[];
  warnings: DataQualityFlag[];
}

export interface SignalEngineDeps {
  aggregator: PositionAggregator;
  marketData: MarketDataProvider;
  cooldowns: CooldownRegistry;
  policy: TargetPolicy;
  instruments: Record<string, InstrumentConfig>;
  timezone: string;
}

const isRebalance = (signal: Signal) =>
  signal.signalType === 'rebalance_forced' || signal.signalType === 'rebalance_light';

const QDII_RISK_NOTE =
  'Tracks offshore markets: overnight moves are not in today\'s estimate and confirmation takes two joint trading days.';

export class SignalEngine {
  private readonly deps: SignalEngineDeps;

  constructor(deps: SignalEngineDeps) {
    this.deps = deps;
  }

  async evaluateSignals(now: Date): Promise<Signal[]> {
    const result = await this.evaluate(now);
    return result.signals;
  }

  async evaluate(now: Date): Promise<SignalEvaluation> {
    const { aggregator, policy, cooldowns, timezone } = this.deps;
    const today = localDateInZone(now, timezone);
    const snapshot = await aggregator.getPositions(today);
    const deviations = analyzeDeviation(snapshot, policy);
    const warnings: DataQualityFlag[] = [...snapshot.warnings];
    const suppressed: SuppressedSignal[] = [];
    const candidates: Signal[] = [];

    const canRebalance = snapshot.totalValueNet > 0;
    if (!canRebalance) {
      warnings.push({
        code: 'EMPTY_PORTFOLIO',
        severity: 'info',
        message: 'No priced holdings; rebalance rules skipped.'
      });
    }

    const metrics = await this.loadMetrics(deviations, snapshot, today, warnings);

    for (const deviation of deviations) {
      if (canRebalance) {
        const forced = forcedRule(deviation, policy, snapshot.totalValueNet);
        const light = lightRule(deviation, policy, snapshot.totalValueNet);
        if (forced) candidates.push(forced);
        if (light && forced) suppressed.push({ signal: light, reason: 'superseded_by_forced' });
        else if (light) candidates.push(light);
      }

      const trailing = metrics.get(deviation.assetClass);
      if (!trailing) continue;
      const buy = tacticalBuyRule(deviation, trailing, policy);
      const sell = tacticalSellRule(deviation, trailing, policy);
      if (buy) candidates.push(buy);
      if (sell) candidates.push(sell);
    }

    const state = await cooldowns.load();
    const eligible: Signal[] = [];
    for (const signal of candidates) {
      if (isCoolingDown(state, signal.signalType, signal.assetClass, today, policy.cooldownDays)) {
        suppressed.push({ signal, reason: 'cooling_down' });
      } else {
        eligible.push(signal);
      }
    }

    // One recommendation per class: a rebalance that fires covers any tactical move there.
    const rebalanced = new Set(eligible.filter(isRebalance).map((s) => s.assetClass));
    const ready: Signal[] = [];
    for (const signal of eligible) {
      if (!isRebalance(signal) && rebalanced.has(signal.assetClass)) {
        suppressed.push({ signal, reason: 'superseded_by_rebalance' });
      } else {
        ready.push(this.withRiskNote(signal));
      }
    }
    ready.sort(compareSignals);

    const stamp = await cooldowns.stamp(ready, today, policy.cooldownDays);
    let signals: Signal[];
    if (stamp.status === 'conflict_exhausted') {
      // An unrecorded signal could fire again next run, so none goes out.
      warnings.push({ code: 'COOLDOWN_NOT_RECORDED', severity: 'warn', message: stamp.reason });
      for (const signal of ready) suppressed.push({ signal, reason: 'not_recorded' });
      signals = [];
    } else {
      for (const signal of stamp.dropped) suppressed.push({ signal, reason: 'fired_concurrently' });
      signals = stamp.stamped;
    }

    console.log(`Signals for ${today}: ${signals.length} fired, ${suppressed.length} suppressed`);
    return { today, snapshot, deviations, signals, suppressed, warnings };
  }

  private withRiskNote(signal: Signal): Signal {
    const offshore = Object.values(this.deps.instruments).some(
      (i) => i.assetClass === signal.assetClass && i.instrumentClass === 'qdii'
    );
    return offshore ? { ...signal, riskNote: QDII_RISK_NOTE } : signal;
  }

  /** Configured benchmark for the class, else its largest priced holding. */
  private representative(assetClass: string, snapshot: PortfolioSnapshot): string | null {
    const benchmark = this.deps.policy.tactical.benchmarks?.[assetClass];
    if (benchmark) return benchmark;
    let best: { code: string; value: number } | null = null;
    for (const p of snapshot.positions) {
      if (p.assetClass !== assetClass || p.marketValueNet === null || p.marketValueNet <= 0) continue;
      if (!best || p.marketValueNet > best.value) best = { code: p.instrumentCode, value: p.marketValueNet };
    }
    return best ? best.code : null;
  }

  private async loadMetrics(
    deviations: AssetClassDeviation[],
    snapshot: PortfolioSnapshot,
    today: string,
    warnings: DataQualityFlag[]
  ): Promise<Map<string, TrailingMetrics>> {
    const { marketData, policy } = this.deps;
    const from = addDays(today, -policy.tactical.lookbackDays);
    const entries = await Promise.all(
      deviations.map(async (deviation): Promise<[string, TrailingMetrics] | null> => {
        const code = this.representative(deviation.assetClass, snapshot);
        if (!code) return null;
        try {
          const bars = await marketData.getHistoricalSeries(code, from, today);
          if (bars.length < 2) return null;
          return [deviation.assetClass, computeTrailingMetrics(bars)];
        } catch (err) {
          if (!(err instanceof PriceUnavailableError)) throw err;
          warnings.push({
            code: 'HISTORY_UNAVAILABLE',
            severity: 'warn',
            message: `Tactical rules skipped for ${deviation.assetClass}: ${err.message}`,
            symbols: [code]
          });
          return null;
        }
      })
    );
    const metrics = new Map<string, TrailingMetrics>();
    for (const entry of entries) {
      if (entry) metrics.set(entry[0], entry[1]);
    }
    return metrics;
  }
}
