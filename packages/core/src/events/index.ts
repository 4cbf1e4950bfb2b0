export { LedgerEventEmitter, ledgerEvents } from './ledger-events.js';
export type {
  LedgerEvent,
  LedgerEventInput,
  LedgerEventType,
  LedgerEventHandler,
  LedgerEventHandlerErrorReporter,
  EntryCommittedEvent,
  EntryRejectedEvent,
  ExtractionFailedEvent,
  PersistenceFailedEvent,
  TaxonomyExtendedEvent,
} from './ledger-events.js';
