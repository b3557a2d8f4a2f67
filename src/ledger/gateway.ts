import { RetryPolicy, Transaction } from '../core/types';
import { conditionalUpdate } from '../core/conditionalWrite';
import { ledgerCodec } from './ledger';
import { describeOperation, LedgerOperation, OperationPlan, planOperation } from './operations';
import { VersionedStore } from './storage';

export type MutationStatus = 'applied' | 'no_op' | 'rejected' | 'conflict_exhausted';

export type MutationResult =
  | { status: 'applied'; key: string; transaction: Transaction; attempts: number }
  | { status: 'no_op'; key: string; transaction: Transaction; attempts: number }
  | { status: 'rejected'; key: string; reason: string; attempts: number }
  | { status: 'conflict_exhausted'; key: string; reason: string; attempts: number };

export interface GatewayOptions {
  retry: RetryPolicy;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * The only writer of the transaction ledger. Every change is keyed by an
 * idempotency key so that a retried chat command or a replayed poll applies at
 * most once, and every write is a check-and-set against the version read.
 */
export class MutationGateway {
  private readonly store: VersionedStore;
  private readonly options: GatewayOptions;

  constructor(store: VersionedStore, options: GatewayOptions) {
    this.store = store;
    this.options = options;
  }

  async applyMutation(idempotencyKey: string, operation: LedgerOperation): Promise<MutationResult> {
    const key = idempotencyKey.trim();
    if (!key) {
      return { status: 'rejected', key, reason: 'idempotency key is required', attempts: 0 };
    }
    const now = (this.options.now ?? (() => new Date()))();
    const outcome = await conditionalUpdate<Transaction[], OperationPlan>(
      this.store,
      ledgerCodec,
      (rows) => {
        const plan = planOperation(rows, key, operation, now);
        if (plan.kind === 'apply') {
          return { kind: 'write', document: plan.rows, value: plan, message: describeOperation(key, operation) };
        }
        return { kind: 'done', value: plan };
      },
      { retry: this.options.retry, sleep: this.options.sleep }
    );

    if (outcome.status === 'conflict_exhausted') {
      console.warn(`Mutation ${key} abandoned: ${outcome.error.message}`);
      return { status: 'conflict_exhausted', key, reason: outcome.error.message, attempts: outcome.attempts };
    }
    const plan = outcome.value;
    switch (plan.kind) {
      case 'apply':
        console.log(`Mutation ${key} applied to ${plan.transaction.id} (${plan.transaction.status}) after ${outcome.attempts} attempt(s)`);
        return { status: 'applied', key, transaction: plan.transaction, attempts: outcome.attempts };
      case 'no_op':
        return { status: 'no_op', key, transaction: plan.transaction, attempts: outcome.attempts };
      case 'rejected':
        console.warn(`Mutation ${key} rejected: ${plan.reason}`);
        return { status: 'rejected', key, reason: plan.reason, attempts: outcome.attempts };
    }
  }
}
