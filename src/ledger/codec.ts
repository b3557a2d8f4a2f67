import { Transaction } from '../core/types';
import { LedgerFormatError } from '../core/errors';
import { validateTransaction } from '../core/schema';

// Stable key order keeps diffs of the stored file readable.
const FIELD_ORDER: Array<keyof Transaction> = [
  'id',
  'date',
  'instrumentCode',
  'amount',
  'shares',
  'kind',
  'status',
  'confirmDate',
  'nav',
  'submittedAt',
  'note',
  'createdAt',
  'updatedAt'
];

/**
 * Parses the JSON Lines ledger. Every row must validate and ids must be unique;
 * a single bad row fails the whole read rather than being dropped.
 */
export const decodeLedger = (content: string): Transaction[] => {
  const rows: Transaction[] = [];
  const seen = new Set<string>();
  const lines = content.split('\n');
  lines.forEach((line, idx) => {
    if (!line.trim()) return;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw new LedgerFormatError(idx + 1, 'not valid JSON');
    }
    const result = validateTransaction(raw);
    if (!result.success) {
      throw new LedgerFormatError(idx + 1, result.errors.join('; '));
    }
    if (seen.has(result.value.id)) {
      throw new LedgerFormatError(idx + 1, `duplicate transaction id ${result.value.id}`);
    }
    seen.add(result.value.id);
    rows.push(result.value);
  });
  return rows;
};

export const encodeTransaction = (tx: Transaction): string => JSON.stringify(tx, FIELD_ORDER);

export const encodeLedger = (rows: Transaction[]): string =>
  rows.length ? `${rows.map(encodeTransaction).join('\n')}\n` : '';
