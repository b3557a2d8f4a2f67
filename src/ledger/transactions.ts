import { Transaction, TransactionKind, TransactionStatus } from '../core/types';

const transitions: Record<TransactionStatus, TransactionStatus[]> = {
  pending: ['confirmed', 'skipped', 'void'],
  confirmed: [],
  skipped: [],
  void: []
};

export const canTransition = (from: TransactionStatus, to: TransactionStatus) => transitions[from].includes(to);

export interface NewTransaction {
  date: string;
  instrumentCode: string;
  amount: number;
  kind: TransactionKind;
  status?: Extract<TransactionStatus, 'pending' | 'skipped'>;
  confirmDate: string | null;
  submittedAt?: string | null;
  note?: string;
}

export const buildTransaction = (id: string, input: NewTransaction, now: Date): Transaction => {
  const stamp = now.toISOString();
  const tx: Transaction = {
    id,
    date: input.date,
    instrumentCode: input.instrumentCode,
    amount: input.amount,
    shares: null,
    kind: input.kind,
    status: input.status ?? 'pending',
    confirmDate: input.confirmDate,
    nav: null,
    submittedAt: input.submittedAt ?? null,
    createdAt: stamp,
    updatedAt: stamp
  };
  if (input.note !== undefined) tx.note = input.note;
  return tx;
};

export const kindForAmount = (amount: number): TransactionKind => (amount > 0 ? 'buy' : amount < 0 ? 'sell' : 'skip');

export const findTransaction = (rows: Transaction[], id: string) => rows.find((row) => row.id === id);

export const SHARE_EPSILON = 1e-6;

/** Shares held in `instrumentCode` across confirmed rows. */
export const confirmedShares = (rows: Transaction[], instrumentCode: string) =>
  rows.reduce(
    (acc, row) =>
      row.instrumentCode === instrumentCode && row.status === 'confirmed' && row.shares !== null ? acc + row.shares : acc,
    0
  );
