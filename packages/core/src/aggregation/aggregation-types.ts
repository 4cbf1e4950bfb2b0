/**
 * Aggregation Types
 *
 * All amounts are in major units with two fractional digits.
 */

export interface SummaryView {
  totalIncome: number;
  totalExpense: number;
  netBalance: number;
  entryCount: number;
}

export interface CategoryTotal {
  category: string;
  income: number;
  expense: number;
  /**
   * Sum of every entry amount in this month and category, whatever its type
   */
  total: number;
}

export interface MonthBreakdown {
  /**
   * Calendar month in UTC, `YYYY-MM`
   */
  month: string;
  /**
   * e.g. "May 2024"
   */
  label: string;
  income: number;
  expense: number;
  balance: number;
  categories: CategoryTotal[];
}

export interface BreakdownView {
  months: MonthBreakdown[];
}
