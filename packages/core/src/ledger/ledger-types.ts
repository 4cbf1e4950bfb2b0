/**
 * Ledger Domain Types
 *
 * Canonical entry shapes shared by the normalizer, the store and the aggregates.
 */

export const ENTRY_TYPES = ['income', 'expense'] as const;

export type EntryType = (typeof ENTRY_TYPES)[number];

/**
 * Fully validated entry produced by the normalizer, before the store
 * assigns its identity.
 */
export interface LedgerEntryDraft {
  timestamp: Date;
  description: string;
  category: string;
  /**
   * Amount in minor units (hundredths), always > 0
   */
  amountMinor: number;
  type: EntryType;
}

/**
 * Committed ledger entry. Instances handed out by the store are frozen.
 */
export interface LedgerEntry extends LedgerEntryDraft {
  id: number;
  amount: number;
}

/**
 * Column order written to a fresh ledger table
 */
export const LEDGER_COLUMNS = ['timestamp', 'description', 'category', 'amount', 'type'] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

export function isEntryType(value: string): value is EntryType {
  return (ENTRY_TYPES as readonly string[]).includes(value);
}
