/**
 * Ledger Service Types
 */

import type { ExtractionFailure } from '../extraction/extraction-types.js';
import type { LedgerEntry } from '../ledger/ledger-types.js';
import type { NormalizationWarning, RejectionReason } from '../normalization/normalization-types.js';

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 10_000;

export interface PersistenceFailure {
  message: string;
}

/**
 * Outcome of logging one message. Only `committed` changes the ledger.
 */
export type LogEntryResult =
  | { status: 'committed'; entry: LedgerEntry; warnings: NormalizationWarning[] }
  | { status: 'rejected'; reason: RejectionReason }
  | { status: 'extraction_failed'; failure: ExtractionFailure }
  | { status: 'persistence_failed'; error: PersistenceFailure };

export interface ListEntriesParams {
  from?: Date;
  to?: Date;
}

export interface LedgerServiceOptions {
  /**
   * Abort the extractor call after this many milliseconds
   */
  extractionTimeoutMs?: number;
  maxDescriptionLength?: number;
  clock?: () => Date;
}
