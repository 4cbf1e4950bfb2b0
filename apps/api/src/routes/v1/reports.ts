/**
 * GET /v1/summary   - Income, expense and net balance over the whole ledger
 * GET /v1/breakdown - Totals per calendar month (UTC) and category
 */

import { Hono } from 'hono';
import type { LedgerService } from '@tally/core';
import type { BreakdownResponse, SummaryResponse } from '@tally/types';
import type { AppBindings } from '../../types/context.js';

export function createReportsRoute(ledgerService: LedgerService) {
  const reportsRoute = new Hono<AppBindings>();

  reportsRoute.get('/summary', async (c) => {
    const body: SummaryResponse = await ledgerService.getSummary();
    return c.json(body);
  });

  reportsRoute.get('/breakdown', async (c) => {
    const body: BreakdownResponse = await ledgerService.getBreakdown();
    return c.json(body);
  });

  return reportsRoute;
}
