/**
 * Summary and breakdown report schemas
 * Amounts are major units with at most two fractional digits
 */

import { z } from "zod";

export const SummaryResponseSchema = z.object({
  totalIncome: z.number(),
  totalExpense: z.number(),
  netBalance: z.number(),
  entryCount: z.number().int().nonnegative(),
});

export const CategoryTotalSchema = z.object({
  category: z.string(),
  income: z.number(),
  expense: z.number(),
  total: z.number(),
});

export const MonthBreakdownSchema = z.object({
  month: z.string().regex(/^\d{4}-\d{2}$/), // YYYY-MM (UTC)
  label: z.string(), // e.g. "May 2024"
  income: z.number(),
  expense: z.number(),
  balance: z.number(),
  categories: z.array(CategoryTotalSchema),
});

export const BreakdownResponseSchema = z.object({
  months: z.array(MonthBreakdownSchema),
});

export type SummaryResponse = z.infer<typeof SummaryResponseSchema>;
export type BreakdownResponse = z.infer<typeof BreakdownResponseSchema>;
