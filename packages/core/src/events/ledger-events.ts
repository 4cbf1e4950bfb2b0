/**
 * Ledger event emitter for audit logging and monitoring
 * Events are fire-and-forget so handlers never block or fail an append
 */

import type { ExtractionFailureKind } from '../extraction/extraction-types.js';
import type { EntryType } from '../ledger/ledger-types.js';
import type { NormalizationWarning, RejectionCode } from '../normalization/normalization-types.js';

/**
 * Shared fields of every ledger event
 */
interface LedgerEventBase {
  timestamp: Date;
}

export interface EntryCommittedEvent extends LedgerEventBase {
  type: 'entry.committed';
  metadata: {
    entryId: number;
    entryType: EntryType;
    category: string;
    amount: number;
    warnings: readonly NormalizationWarning[];
  };
}

export interface EntryRejectedEvent extends LedgerEventBase {
  type: 'entry.rejected';
  metadata: {
    code: RejectionCode;
    message: string;
  };
}

export interface ExtractionFailedEvent extends LedgerEventBase {
  type: 'extraction.failed';
  metadata: {
    kind: ExtractionFailureKind;
    message: string;
    status?: number;
  };
}

export interface PersistenceFailedEvent extends LedgerEventBase {
  type: 'persistence.failed';
  metadata: {
    message: string;
  };
}

export interface TaxonomyExtendedEvent extends LedgerEventBase {
  type: 'taxonomy.extended';
  metadata: {
    version: number;
    labelCount: number;
  };
}

export type LedgerEvent =
  | EntryCommittedEvent
  | EntryRejectedEvent
  | ExtractionFailedEvent
  | PersistenceFailedEvent
  | TaxonomyExtendedEvent;

export type LedgerEventType = LedgerEvent['type'];

/**
 * What callers pass to `emit`; the emitter stamps the time
 */
export type LedgerEventInput = {
  [K in LedgerEventType]: Omit<Extract<LedgerEvent, { type: K }>, 'timestamp'>;
}[LedgerEventType];

export type LedgerEventHandler = (event: LedgerEvent) => void | Promise<void>;

export type LedgerEventHandlerErrorReporter = (error: unknown, event: LedgerEvent) => void;

export class LedgerEventEmitter {
  private handlers: LedgerEventHandler[] = [];

  constructor(
    private onHandlerError: LedgerEventHandlerErrorReporter = (error) => {
      console.error('Ledger event handler error:', error);
    }
  ) {}

  on(handler: LedgerEventHandler) {
    this.handlers.push(handler);
  }

  emit(event: LedgerEventInput): void {
    const fullEvent: LedgerEvent = {
      ...event,
      timestamp: new Date(),
    };

    for (const handler of this.handlers) {
      // Fire and forget - each handler failure is reported on its own
      Promise.resolve()
        .then(() => handler(fullEvent))
        .catch((error: unknown) => this.onHandlerError(error, fullEvent));
    }
  }

  /**
   * Route handler failures somewhere other than the console
   */
  setErrorReporter(reporter: LedgerEventHandlerErrorReporter) {
    this.onHandlerError = reporter;
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}

export const ledgerEvents = new LedgerEventEmitter();
