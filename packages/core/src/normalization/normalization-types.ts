/**
 * Normalization Types
 */

import type { CategoryTaxonomy } from '../taxonomy/taxonomy-types.js';
import type { LedgerEntryDraft } from '../ledger/ledger-types.js';

export const DEFAULT_MAX_DESCRIPTION_LENGTH = 256;

export type RejectionCode = 'InvalidAmount' | 'ZeroAmount' | 'EmptyDescription';

/**
 * User-level reason a candidate cannot become a ledger entry
 */
export interface RejectionReason {
  code: RejectionCode;
  message: string;
}

/**
 * Repairs applied to an accepted candidate
 */
export type NormalizationWarning =
  | 'description_truncated'
  | 'description_from_message'
  | 'category_unresolved'
  | 'type_inferred_from_sign'
  | 'type_defaulted';

export interface NormalizeContext {
  /**
   * Commit time; becomes the entry timestamp
   */
  now: Date;
  /**
   * Original message, used when the candidate has no description
   */
  rawText: string;
  taxonomy: CategoryTaxonomy;
  maxDescriptionLength?: number;
}

export type NormalizeResult =
  | { ok: true; entry: LedgerEntryDraft; warnings: NormalizationWarning[] }
  | { ok: false; reason: RejectionReason };

export type AmountResolution =
  | { ok: true; amountMinor: number; negative: boolean }
  | { ok: false; reason: RejectionReason };
