import type { MiddlewareHandler } from 'hono';
import type { Logger } from '@tally/observability';
import type { AppBindings } from '../types/context.js';

/**
 * Attach a request-scoped child logger and log one line per request outcome
 */
export function requestLogger(logger: Logger): MiddlewareHandler<AppBindings> {
  return async (c, next) => {
    const started = performance.now();
    const log = logger.child({ requestId: c.get('requestId') });
    c.set('logger', log);

    await next();

    const status = c.res.status;
    const line = {
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Math.round(performance.now() - started),
    };
    if (status >= 500) {
      log.error(line, 'Request failed');
    } else if (status >= 400) {
      log.warn(line, 'Request rejected');
    } else {
      log.info(line, 'Request completed');
    }
  };
}
