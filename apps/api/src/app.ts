import { Hono } from 'hono';
import type { LedgerService } from '@tally/core';
import type { Logger } from '@tally/observability';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLogger } from './middleware/request-logger.js';
import { createCategoriesRoute } from './routes/v1/categories.js';
import { createEntriesRoute } from './routes/v1/entries.js';
import { healthRoute } from './routes/v1/health.js';
import { createReportsRoute } from './routes/v1/reports.js';
import type { AppBindings } from './types/context.js';

export interface AppDependencies {
  ledgerService: LedgerService;
  logger: Logger;
}

export function createApp({ ledgerService, logger }: AppDependencies) {
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', requestLogger(logger));

  app.route('/health', healthRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();

  v1.route('/health', healthRoute);
  v1.route('/entries', createEntriesRoute(ledgerService));
  v1.route('/categories', createCategoriesRoute(ledgerService));
  v1.route('/', createReportsRoute(ledgerService));

  app.route('/v1', v1);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    (c.get('logger') ?? logger).error({ err: error }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
