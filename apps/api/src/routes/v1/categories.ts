/**
 * GET  /v1/categories - Current taxonomy snapshot
 * POST /v1/categories - Add labels and synonyms for future entries
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import {
  InvalidTaxonomyError,
  SynonymConflictError,
  UnknownCategoryLabelError,
  type LedgerService,
} from '@tally/core';
import { ExtendCategoriesRequestSchema } from '@tally/types';
import type { AppBindings } from '../../types/context.js';
import { toCategoriesResponse } from './serializers.js';
import { validationFailed } from './validation.js';

export function createCategoriesRoute(ledgerService: LedgerService) {
  const categoriesRoute = new Hono<AppBindings>();

  categoriesRoute.get('/', (c) => c.json(toCategoriesResponse(ledgerService.getTaxonomy())));

  categoriesRoute.post(
    '/',
    zValidator('json', ExtendCategoriesRequestSchema, validationFailed),
    (c) => {
      const additions = c.req.valid('json');

      try {
        const taxonomy = ledgerService.extendTaxonomy(additions);
        return c.json(toCategoriesResponse(taxonomy));
      } catch (error) {
        // Handle domain errors -> HTTP status codes
        if (error instanceof SynonymConflictError) {
          return c.json({ error: error.message }, 409);
        }
        if (error instanceof UnknownCategoryLabelError || error instanceof InvalidTaxonomyError) {
          return c.json({ error: error.message }, 400);
        }
        throw error;
      }
    }
  );

  return categoriesRoute;
}
