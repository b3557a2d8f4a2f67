import { Transaction } from '../core/types';
import { DocumentCodec } from '../core/conditionalWrite';
import { decodeLedger, encodeLedger } from './codec';
import { VersionedStore } from './storage';

export const ledgerCodec: DocumentCodec<Transaction[]> = {
  decode: decodeLedger,
  encode: encodeLedger
};

/** Read-only view of the ledger for aggregation, polling and reports. */
export const readTransactions = async (store: VersionedStore): Promise<Transaction[]> => {
  const { content } = await store.read();
  return decodeLedger(content);
};

export const pendingDueForConfirmation = (rows: Transaction[], today: string): Transaction[] =>
  rows.filter((tx) => tx.status === 'pending' && tx.kind !== 'skip' && tx.confirmDate !== null && tx.confirmDate <= today);
