import { Market, TransactionStatus } from './types';

export type DomainErrorCode =
  | 'CALENDAR_DATA_MISSING'
  | 'PRICE_UNAVAILABLE'
  | 'VERSION_CONFLICT'
  | 'CONFLICT_EXHAUSTED'
  | 'INVALID_TRANSITION'
  | 'LEDGER_FORMAT'
  | 'STORE_UNAVAILABLE';

export class DomainError extends Error {
  readonly code: DomainErrorCode;
  constructor(code: DomainErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

export class CalendarDataMissingError extends DomainError {
  constructor(readonly market: Market, readonly year: number) {
    super('CALENDAR_DATA_MISSING', `No ${market} holiday table for ${year}; refusing to guess trading days.`);
  }
}

export class PriceUnavailableError extends DomainError {
  constructor(readonly instrumentCode: string, detail: string) {
    super('PRICE_UNAVAILABLE', `Price unavailable for ${instrumentCode}: ${detail}`);
  }
}

export class VersionConflictError extends DomainError {
  constructor(readonly expectedVersion: string) {
    super('VERSION_CONFLICT', `Store version changed since ${expectedVersion || '(empty)'} was read.`);
  }
}

export class ConflictExhaustedError extends DomainError {
  constructor(readonly attempts: number) {
    super('CONFLICT_EXHAUSTED', `Gave up after ${attempts} conflicting write attempts.`);
  }
}

const verbFor = (to: TransactionStatus) => {
  switch (to) {
    case 'confirmed':
      return 'confirm';
    case 'skipped':
      return 'skip';
    case 'void':
      return 'delete';
    default:
      return `move to ${to}`;
  }
};

export class InvalidTransitionError extends DomainError {
  constructor(readonly transactionId: string, readonly from: TransactionStatus, readonly to: TransactionStatus) {
    super('INVALID_TRANSITION', `transaction ${transactionId} is already ${from}, cannot ${verbFor(to)}`);
  }
}

export class LedgerFormatError extends DomainError {
  constructor(readonly line: number, detail: string) {
    super('LEDGER_FORMAT', `Ledger line ${line}: ${detail}`);
  }
}

// Transient backend failure (timeout, 5xx); the write loop retries it within its budget.
export class StoreUnavailableError extends DomainError {
  constructor(readonly store: string, detail: string) {
    super('STORE_UNAVAILABLE', `${store} unavailable: ${detail}`);
  }
}
