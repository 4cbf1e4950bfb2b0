/**
 * Validator/Normalizer
 *
 * The single gate between untrusted extractor output and the ledger. A
 * candidate either becomes a fully-typed draft entry or is rejected with a
 * reason; nothing in between is committed.
 */

import type { CandidateRecord } from '../extraction/extraction-types.js';
import type { EntryType } from '../ledger/ledger-types.js';
import { resolveCategory } from '../taxonomy/category-taxonomy.js';
import { resolveAmount } from './amount.js';
import {
  DEFAULT_MAX_DESCRIPTION_LENGTH,
  type NormalizationWarning,
  type NormalizeContext,
  type NormalizeResult,
} from './normalization-types.js';

/**
 * Type cues the oracle may put in the `type` field
 */
const INCOME_CUES = new Set(['income', 'credit', 'received', 'salary', 'deposit']);
const EXPENSE_CUES = new Set(['expense', 'debit', 'spent', 'paid', 'payment', 'purchase']);

/**
 * Normalize a candidate record into a ledger entry draft
 *
 * Steps, in order: amount, type, category, description, timestamp. Amount
 * and description problems reject the record; category and type problems
 * are repaired and reported as warnings.
 */
export function normalize(candidate: CandidateRecord, context: NormalizeContext): NormalizeResult {
  const warnings: NormalizationWarning[] = [];

  const amount = resolveAmount(candidate.amount);
  if (!amount.ok) {
    return { ok: false, reason: amount.reason };
  }

  let type = resolveType(candidate.type);
  if (!type) {
    type = 'expense';
    warnings.push(amount.negative ? 'type_inferred_from_sign' : 'type_defaulted');
  }

  const category = resolveCategory(context.taxonomy, candidate.category);
  if (!category.resolved && typeof candidate.category === 'string' && candidate.category.trim()) {
    warnings.push('category_unresolved');
  }

  const limit = context.maxDescriptionLength ?? DEFAULT_MAX_DESCRIPTION_LENGTH;
  const candidateDescription =
    typeof candidate.description === 'string' ? candidate.description.trim() : '';
  if (!candidateDescription) {
    warnings.push('description_from_message');
  }

  const description = truncate(candidateDescription || context.rawText.trim(), limit);
  if (!description.value) {
    return {
      ok: false,
      reason: { code: 'EmptyDescription', message: 'Description is empty' },
    };
  }
  if (description.truncated) {
    warnings.push('description_truncated');
  }

  return {
    ok: true,
    entry: {
      timestamp: new Date(context.now.getTime()),
      description: description.value,
      category: category.category,
      amountMinor: amount.amountMinor,
      type,
    },
    warnings,
  };
}

/**
 * Read an explicit entry type from the candidate, if it carries one
 */
export function resolveType(raw: unknown): EntryType | null {
  if (typeof raw !== 'string') {
    return null;
  }
  const cue = raw.trim().toLowerCase();
  if (INCOME_CUES.has(cue)) {
    return 'income';
  }
  if (EXPENSE_CUES.has(cue)) {
    return 'expense';
  }
  return null;
}

function truncate(text: string, limit: number): { value: string; truncated: boolean } {
  const codePoints = Array.from(text);
  if (codePoints.length <= limit) {
    return { value: text, truncated: false };
  }
  return { value: codePoints.slice(0, limit).join('').trimEnd(), truncated: true };
}
