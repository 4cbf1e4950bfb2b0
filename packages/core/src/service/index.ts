export { LedgerService } from './ledger-service.js';
export { DEFAULT_EXTRACTION_TIMEOUT_MS } from './ledger-service-types.js';
export type {
  LedgerServiceOptions,
  ListEntriesParams,
  LogEntryResult,
  PersistenceFailure,
} from './ledger-service-types.js';
