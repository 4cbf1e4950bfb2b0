/**
 * Ledger Domain Errors
 *
 * Raised by the store and its tables; the ledger service turns them into results.
 */

export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LedgerError';
  }
}

/**
 * The storage medium could not be read or written. An append that fails
 * with this error did not happen.
 */
export class PersistenceError extends LedgerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export class InvalidLedgerHeaderError extends PersistenceError {
  constructor(missingColumns: string[]) {
    super(`Ledger table header is missing columns: ${missingColumns.join(', ')}`);
    this.name = 'InvalidLedgerHeaderError';
  }
}
