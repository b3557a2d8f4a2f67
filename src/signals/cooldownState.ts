import { z } from 'zod';
import { CooldownDays, RetryPolicy, Signal, SignalType } from '../core/types';
import { conditionalUpdate, DocumentCodec } from '../core/conditionalWrite';
import { isoDateSchema } from '../core/schema';
import { addDays } from '../core/time';
import { VersionedStore } from '../ledger/storage';

const entrySchema = z.object({ lastFiredAt: isoDateSchema }).strict();
const stateSchema = z.record(entrySchema);

export type CooldownEntry = z.infer<typeof entrySchema>;
// `${signalType}:${assetClass}` -> last date the pair fired
export type CooldownState = Record<string, CooldownEntry>;

export const cooldownKey = (signalType: SignalType, assetClass: string) => `${signalType}:${assetClass}`;

export const cooldownCodec: DocumentCodec<CooldownState> = {
  decode: (content) => {
    if (!content.trim()) return {};
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new Error(`Cooldown state is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = stateSchema.safeParse(raw);
    if (!parsed.success) {
      const errors = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new Error(`Invalid cooldown state:\n${errors.join('\n')}`);
    }
    return parsed.data;
  },
  encode: (state) => {
    const sorted: CooldownState = {};
    for (const key of Object.keys(state).sort()) sorted[key] = state[key];
    return `${JSON.stringify(sorted, null, 2)}\n`;
  }
};

/** True while `today` is before `lastFiredAt + days`. */
export const isCoolingDown = (
  state: CooldownState,
  signalType: SignalType,
  assetClass: string,
  today: string,
  cooldownDays: CooldownDays
): boolean => {
  const entry = state[cooldownKey(signalType, assetClass)];
  if (!entry) return false;
  return today < addDays(entry.lastFiredAt, cooldownDays[signalType]);
};

export type StampOutcome =
  | { status: 'stamped'; stamped: Signal[]; dropped: Signal[]; attempts: number }
  | { status: 'conflict_exhausted'; stamped: Signal[]; dropped: Signal[]; attempts: number; reason: string };

interface StampPlan {
  stamped: Signal[];
  dropped: Signal[];
}

export interface CooldownRegistryOptions {
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Persisted (signalType, assetClass) -> lastFiredAt registry. Shares the
 * ledger's check-and-set loop so that two overlapping evaluation runs cannot
 * both fire the same pair.
 */
export class CooldownRegistry {
  private readonly store: VersionedStore;
  private readonly options: CooldownRegistryOptions;

  constructor(store: VersionedStore, options: CooldownRegistryOptions) {
    this.store = store;
    this.options = options;
  }

  async load(): Promise<CooldownState> {
    const { content } = await this.store.read();
    return cooldownCodec.decode(content);
  }

  /**
   * Records `today` for every signal. A pair another run stamped within its
   * cooldown since this run read the state is dropped instead.
   */
  async stamp(signals: Signal[], today: string, cooldownDays: CooldownDays): Promise<StampOutcome> {
    if (!signals.length) return { status: 'stamped', stamped: [], dropped: [], attempts: 0 };

    const outcome = await conditionalUpdate<CooldownState, StampPlan>(
      this.store,
      cooldownCodec,
      (base) => {
        const next: CooldownState = { ...base };
        const stamped: Signal[] = [];
        const dropped: Signal[] = [];
        for (const signal of signals) {
          if (isCoolingDown(base, signal.signalType, signal.assetClass, today, cooldownDays)) {
            dropped.push(signal);
            continue;
          }
          next[cooldownKey(signal.signalType, signal.assetClass)] = { lastFiredAt: today };
          stamped.push(signal);
        }
        if (!stamped.length) return { kind: 'done', value: { stamped, dropped } };
        return {
          kind: 'write',
          document: next,
          value: { stamped, dropped },
          message: `[cooldown] ${stamped.map((s) => cooldownKey(s.signalType, s.assetClass)).join(', ')} @ ${today}`
        };
      },
      { retry: this.options.retry, sleep: this.options.sleep }
    );

    if (outcome.status === 'conflict_exhausted') {
      return {
        status: 'conflict_exhausted',
        stamped: [],
        dropped: [],
        attempts: outcome.attempts,
        reason: outcome.error.message
      };
    }
    return { status: 'stamped', ...outcome.value, attempts: outcome.attempts };
  }
}
