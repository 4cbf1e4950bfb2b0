import type { LedgerEntry } from '../ledger/ledger-types.js';
import { toMajor } from '../ledger/money.js';
import type { SummaryView } from './aggregation-types.js';

type SummarizableEntry = Pick<LedgerEntry, 'amountMinor' | 'type'>;

/**
 * Totals by entry type and the net balance. An empty ledger yields zeros.
 */
export function summary(entries: readonly SummarizableEntry[]): SummaryView {
  let incomeMinor = 0;
  let expenseMinor = 0;

  for (const entry of entries) {
    if (entry.type === 'income') {
      incomeMinor += entry.amountMinor;
    } else {
      expenseMinor += entry.amountMinor;
    }
  }

  return {
    totalIncome: toMajor(incomeMinor),
    totalExpense: toMajor(expenseMinor),
    netBalance: toMajor(incomeMinor - expenseMinor),
    entryCount: entries.length,
  };
}
