/**
 * Ledger Domain
 *
 * Append-only storage of committed entries.
 */

export { LedgerStore } from './ledger-store.js';
export type { LedgerStoreOptions, InvalidRowIssue } from './ledger-store.js';

export { MemoryLedgerTable } from './ledger-table.js';
export type { LedgerTable, LedgerTableSnapshot } from './ledger-table.js';
export { CsvLedgerTable } from './csv-ledger-table.js';
export { parseCsv, encodeCsvRecord } from './csv.js';

export { ENTRY_TYPES, LEDGER_COLUMNS, isEntryType } from './ledger-types.js';
export type { EntryType, LedgerEntry, LedgerEntryDraft, LedgerColumn } from './ledger-types.js';

export { formatMinor, toMajor, parseDecimalToMinor } from './money.js';
export { parseTimestamp } from './ledger-rows.js';

export { LedgerError, PersistenceError, InvalidLedgerHeaderError } from './ledger-errors.js';
