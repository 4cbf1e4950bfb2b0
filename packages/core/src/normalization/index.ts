/**
 * Normalization
 *
 * Exports the validation gate for candidate records.
 */

export { normalize, resolveType } from './normalizer.js';
export { resolveAmount } from './amount.js';
export { DEFAULT_MAX_DESCRIPTION_LENGTH } from './normalization-types.js';
export type {
  AmountResolution,
  NormalizationWarning,
  NormalizeContext,
  NormalizeResult,
  RejectionCode,
  RejectionReason,
} from './normalization-types.js';
