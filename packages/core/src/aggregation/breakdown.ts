/**
 * Month x category breakdown
 *
 * Groups entries by the UTC calendar month of their timestamp and by
 * category. Output ordering is fixed (months ascending, categories by
 * label), so the result does not depend on input order.
 */

import type { LedgerEntry } from '../ledger/ledger-types.js';
import { toMajor } from '../ledger/money.js';
import type { BreakdownView, CategoryTotal, MonthBreakdown } from './aggregation-types.js';

type BreakdownEntry = Pick<LedgerEntry, 'amountMinor' | 'type' | 'timestamp' | 'category'>;

interface Bucket {
  incomeMinor: number;
  expenseMinor: number;
}

interface MonthBucket extends Bucket {
  categories: Map<string, Bucket>;
}

const monthLabelFormat = new Intl.DateTimeFormat('en-US', {
  month: 'long',
  year: 'numeric',
  timeZone: 'UTC',
});

export function monthKey(timestamp: Date): string {
  const month = String(timestamp.getUTCMonth() + 1).padStart(2, '0');
  return `${timestamp.getUTCFullYear()}-${month}`;
}

export function breakdown(entries: readonly BreakdownEntry[]): BreakdownView {
  const months = new Map<string, { bucket: MonthBucket; sample: Date }>();

  for (const entry of entries) {
    const key = monthKey(entry.timestamp);
    let month = months.get(key);
    if (!month) {
      month = {
        bucket: { incomeMinor: 0, expenseMinor: 0, categories: new Map() },
        sample: entry.timestamp,
      };
      months.set(key, month);
    }

    let category = month.bucket.categories.get(entry.category);
    if (!category) {
      category = { incomeMinor: 0, expenseMinor: 0 };
      month.bucket.categories.set(entry.category, category);
    }

    if (entry.type === 'income') {
      month.bucket.incomeMinor += entry.amountMinor;
      category.incomeMinor += entry.amountMinor;
    } else {
      month.bucket.expenseMinor += entry.amountMinor;
      category.expenseMinor += entry.amountMinor;
    }
  }

  return {
    months: [...months.entries()]
      .sort(([a], [b]) => compare(a, b))
      .map(([key, { bucket, sample }]) => toMonthBreakdown(key, sample, bucket)),
  };
}

function toMonthBreakdown(key: string, sample: Date, bucket: MonthBucket): MonthBreakdown {
  const categories: CategoryTotal[] = [...bucket.categories.entries()]
    .sort(([a], [b]) => compare(a, b))
    .map(([category, totals]) => ({
      category,
      income: toMajor(totals.incomeMinor),
      expense: toMajor(totals.expenseMinor),
      total: toMajor(totals.incomeMinor + totals.expenseMinor),
    }));

  return {
    month: key,
    label: monthLabelFormat.format(sample),
    income: toMajor(bucket.incomeMinor),
    expense: toMajor(bucket.expenseMinor),
    balance: toMajor(bucket.incomeMinor - bucket.expenseMinor),
    categories,
  };
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
