import { Hono } from 'hono';
import type { AppBindings } from '../../types/context.js';

const healthRoute = new Hono<AppBindings>();

healthRoute.get('/', (c) => {
  const response = {
    status: 'ok' as const,
    timestamp: new Date().toISOString(),
    version: '0.1.0',
  };

  return c.json(response);
});

export { healthRoute };
