import { Transaction } from '../core/types';
import { validateTransaction } from '../core/schema';
import { InvalidTransitionError } from '../core/errors';
import { roundTo } from '../core/utils';
import {
  buildTransaction,
  canTransition,
  confirmedShares,
  findTransaction,
  NewTransaction,
  SHARE_EPSILON
} from './transactions';

export type LedgerOperation =
  | { type: 'append'; transaction: NewTransaction }
  | { type: 'confirm'; transactionId: string; shares: number; nav: number | null; confirmDate: string }
  | { type: 'skip'; transactionId: string }
  | { type: 'void'; transactionId: string };

export type OperationPlan =
  | { kind: 'apply'; rows: Transaction[]; transaction: Transaction }
  | { kind: 'no_op'; transaction: Transaction }
  | { kind: 'rejected'; reason: string };

const targetStatus = {
  confirm: 'confirmed',
  skip: 'skipped',
  void: 'void'
} as const;

const replaceRow = (rows: Transaction[], next: Transaction) => rows.map((row) => (row.id === next.id ? next : row));

const validated = (candidate: Transaction): { ok: true; row: Transaction } | { ok: false; reason: string } => {
  const result = validateTransaction(candidate);
  return result.success ? { ok: true, row: result.value } : { ok: false, reason: result.errors.join('; ') };
};

/**
 * Decides what `operation` does to `rows`. Pure: the gateway calls it again on
 * every re-read base after a conflicting write, so it must not depend on
 * anything but its arguments.
 */
export const planOperation = (
  rows: Transaction[],
  idempotencyKey: string,
  operation: LedgerOperation,
  now: Date
): OperationPlan => {
  if (operation.type === 'append') {
    // The key is the new row's id; ids are never reused, voided rows included.
    const existing = findTransaction(rows, idempotencyKey);
    if (existing) return { kind: 'no_op', transaction: existing };
    const check = validated(buildTransaction(idempotencyKey, operation.transaction, now));
    if (!check.ok) return { kind: 'rejected', reason: `invalid transaction: ${check.reason}` };
    return { kind: 'apply', rows: [...rows, check.row], transaction: check.row };
  }

  const current = findTransaction(rows, operation.transactionId);
  if (!current) {
    return { kind: 'rejected', reason: `transaction ${operation.transactionId} not found` };
  }
  const to = targetStatus[operation.type];
  if (current.status === to) {
    return { kind: 'no_op', transaction: current };
  }
  if (!canTransition(current.status, to)) {
    return { kind: 'rejected', reason: new InvalidTransitionError(current.id, current.status, to).message };
  }

  const updatedAt = now.toISOString();
  let next: Transaction;
  if (operation.type === 'confirm') {
    if (current.kind === 'skip') {
      return { kind: 'rejected', reason: `transaction ${current.id} is a skip entry, nothing to confirm` };
    }
    if (Math.sign(operation.shares) !== Math.sign(current.amount)) {
      return {
        kind: 'rejected',
        reason: `shares ${operation.shares} do not match the direction of amount ${current.amount}`
      };
    }
    if (operation.shares < 0) {
      const held = confirmedShares(rows, current.instrumentCode);
      if (held + operation.shares < -SHARE_EPSILON) {
        return {
          kind: 'rejected',
          reason: `selling ${-operation.shares} shares of ${current.instrumentCode} exceeds the ${roundTo(held, 4)} held`
        };
      }
    }
    next = {
      ...current,
      status: 'confirmed',
      shares: operation.shares,
      nav: operation.nav,
      confirmDate: operation.confirmDate,
      updatedAt
    };
  } else {
    next = { ...current, status: to, updatedAt };
  }
  const check = validated(next);
  if (!check.ok) return { kind: 'rejected', reason: `invalid transaction: ${check.reason}` };
  return { kind: 'apply', rows: replaceRow(rows, check.row), transaction: check.row };
};

export const describeOperation = (key: string, operation: LedgerOperation) => {
  if (operation.type === 'append') {
    const tx = operation.transaction;
    return `[ledger] ${tx.kind} ${tx.instrumentCode} ${tx.amount} ${tx.date} [key:${key}]`;
  }
  return `[ledger] ${operation.type} ${operation.transactionId} [key:${key}]`;
};
