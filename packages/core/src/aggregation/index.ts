/**
 * Aggregation Engine
 *
 * Pure, order-independent views over a snapshot of ledger entries.
 */

export { summary } from './summary.js';
export { breakdown, monthKey } from './breakdown.js';
export type {
  SummaryView,
  BreakdownView,
  MonthBreakdown,
  CategoryTotal,
} from './aggregation-types.js';
