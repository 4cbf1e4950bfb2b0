/**
 * POST /v1/entries - Log a free-text message
 * GET  /v1/entries - List committed entries, optionally within a time range
 *
 * Outcome -> HTTP status:
 * - committed          201
 * - rejected           422 (not retryable; the message cannot become an entry)
 * - extraction failed  502 (retryable)
 * - persistence failed 503 (retryable)
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { LedgerService } from '@tally/core';
import {
  ListEntriesQuerySchema,
  LogEntryRequestSchema,
  type EntryErrorResponse,
  type ListEntriesResponse,
  type LogEntryResponse,
} from '@tally/types';
import type { AppBindings } from '../../types/context.js';
import { toEntryResponse } from './serializers.js';
import { validationFailed } from './validation.js';

export function createEntriesRoute(ledgerService: LedgerService) {
  const entriesRoute = new Hono<AppBindings>();

  entriesRoute.post('/', zValidator('json', LogEntryRequestSchema, validationFailed), async (c) => {
    const { text } = c.req.valid('json');
    const result = await ledgerService.logEntry(text);

    switch (result.status) {
      case 'committed': {
        const body: LogEntryResponse = {
          entry: toEntryResponse(result.entry),
          warnings: result.warnings,
        };
        return c.json(body, 201);
      }

      case 'rejected': {
        const body: EntryErrorResponse = {
          error: result.reason.message,
          code: result.reason.code,
          retryable: false,
        };
        return c.json(body, 422);
      }

      case 'extraction_failed': {
        c.get('logger').warn(
          { kind: result.failure.kind, upstreamStatus: result.failure.status },
          'Candidate extraction failed'
        );
        const body: EntryErrorResponse = {
          error: 'Could not read the message right now; try again',
          code: `extraction_${result.failure.kind}`,
          retryable: true,
        };
        return c.json(body, 502);
      }

      case 'persistence_failed': {
        c.get('logger').error({ reason: result.error.message }, 'Ledger append failed');
        const body: EntryErrorResponse = {
          error: 'Could not save the entry; try again',
          code: 'persistence_failed',
          retryable: true,
        };
        return c.json(body, 503);
      }
    }
  });

  entriesRoute.get('/', zValidator('query', ListEntriesQuerySchema, validationFailed), async (c) => {
    const { from, to } = c.req.valid('query');
    const entries = await ledgerService.listEntries({
      ...(from && { from }),
      ...(to && { to }),
    });

    const body: ListEntriesResponse = { entries: entries.map(toEntryResponse) };
    return c.json(body);
  });

  return entriesRoute;
}
