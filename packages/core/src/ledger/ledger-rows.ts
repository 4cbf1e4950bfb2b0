/**
 * Mapping between ledger entries and table rows
 */

import { UNCATEGORIZED } from '../taxonomy/taxonomy-types.js';
import { InvalidLedgerHeaderError } from './ledger-errors.js';
import { LEDGER_COLUMNS, isEntryType, type LedgerColumn, type LedgerEntryDraft } from './ledger-types.js';
import { formatMinor, parseDecimalToMinor } from './money.js';

export type ColumnIndex = Record<LedgerColumn, number>;

export type DecodedRow = { ok: true; draft: LedgerEntryDraft } | { ok: false; reason: string };

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/;
const LEGACY_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/**
 * Locate each ledger column in a header row (case-insensitive)
 *
 * @throws InvalidLedgerHeaderError when a column is absent
 */
export function indexColumns(header: readonly string[]): ColumnIndex {
  const normalized = header.map((column) => column.trim().toLowerCase());
  const position = (column: LedgerColumn) => normalized.indexOf(column);

  const index: ColumnIndex = {
    timestamp: position('timestamp'),
    description: position('description'),
    category: position('category'),
    amount: position('amount'),
    type: position('type'),
  };

  const missing = LEDGER_COLUMNS.filter((column) => index[column] === -1);
  if (missing.length > 0) {
    throw new InvalidLedgerHeaderError(missing);
  }

  return index;
}

/**
 * Render an entry as a row laid out by the table's header. Columns the
 * ledger does not know about are left blank.
 */
export function encodeRow(
  draft: LedgerEntryDraft,
  columns: ColumnIndex,
  width: number
): string[] {
  const values: string[] = new Array<string>(width).fill('');
  values[columns.timestamp] = draft.timestamp.toISOString();
  values[columns.description] = draft.description;
  values[columns.category] = draft.category;
  values[columns.amount] = formatMinor(draft.amountMinor);
  values[columns.type] = draft.type;
  return values;
}

export function decodeRow(values: readonly string[], columns: ColumnIndex): DecodedRow {
  const timestamp = parseTimestamp(values[columns.timestamp] ?? '');
  if (!timestamp) {
    return { ok: false, reason: 'invalid timestamp' };
  }

  const amountMinor = parseDecimalToMinor((values[columns.amount] ?? '').trim());
  if (amountMinor === null || amountMinor <= 0) {
    return { ok: false, reason: 'invalid or non-positive amount' };
  }

  const type = (values[columns.type] ?? '').trim().toLowerCase();
  if (!isEntryType(type)) {
    return { ok: false, reason: 'unknown entry type' };
  }

  const description = (values[columns.description] ?? '').trim();
  if (!description) {
    return { ok: false, reason: 'empty description' };
  }

  const category = (values[columns.category] ?? '').trim() || UNCATEGORIZED;

  return {
    ok: true,
    draft: { timestamp, description, category, amountMinor, type },
  };
}

/**
 * Accepts ISO 8601 and the `YYYY-MM-DD HH:MM:SS` layout (read as UTC)
 */
export function parseTimestamp(raw: string): Date | null {
  const value = raw.trim();

  if (ISO_TIMESTAMP.test(value)) {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  if (LEGACY_TIMESTAMP.test(value)) {
    const parsed = new Date(`${value.replace(' ', 'T')}Z`);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  return null;
}
