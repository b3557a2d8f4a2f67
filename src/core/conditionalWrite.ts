import { RetryPolicy } from './types';
import { ConflictExhaustedError, StoreUnavailableError } from './errors';
import { sleep } from './utils';
import { VersionedStore } from '../ledger/storage';

export interface DocumentCodec<D> {
  decode(content: string): D;
  encode(document: D): string;
}

/** What one attempt decided after looking at the freshly read base document. */
export type UpdatePlan<D, R> = { kind: 'write'; document: D; value: R; message?: string } | { kind: 'done'; value: R };

export type ConditionalUpdateOutcome<R> =
  | { status: 'written'; value: R; attempts: number; version: string }
  | { status: 'unchanged'; value: R; attempts: number }
  | { status: 'conflict_exhausted'; attempts: number; error: ConflictExhaustedError };

export interface ConditionalUpdateOptions {
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));

/**
 * Read, plan, check-and-set. A version conflict or a transient store failure
 * re-reads and re-plans the same logical change on the new base, up to
 * `retry.maxAttempts`. `plan` must be a pure function of the document it is given.
 */
export const conditionalUpdate = async <D, R>(
  store: VersionedStore,
  codec: DocumentCodec<D>,
  plan: (document: D, attempt: number) => UpdatePlan<D, R>,
  options: ConditionalUpdateOptions
): Promise<ConditionalUpdateOutcome<R>> => {
  const { maxAttempts } = options.retry;
  const wait = options.sleep ?? sleep;
  let lastUnavailable: StoreUnavailableError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    lastUnavailable = undefined;
    try {
      const base = await store.read();
      const decision = plan(codec.decode(base.content), attempt);
      if (decision.kind === 'done') {
        return { status: 'unchanged', value: decision.value, attempts: attempt };
      }
      const result = await store.conditionalWrite(codec.encode(decision.document), base.version, decision.message);
      if (result.ok) {
        return { status: 'written', value: decision.value, attempts: attempt, version: result.version };
      }
      console.warn(`${store.label}: ${result.conflict.message} (attempt ${attempt}/${maxAttempts})`);
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      lastUnavailable = err;
      console.warn(`${err.message} (attempt ${attempt}/${maxAttempts})`);
    }
    if (attempt < maxAttempts) {
      await wait(backoffDelay(options.retry, attempt));
    }
  }

  if (lastUnavailable) throw lastUnavailable;
  return { status: 'conflict_exhausted', attempts: maxAttempts, error: new ConflictExhaustedError(maxAttempts) };
};
