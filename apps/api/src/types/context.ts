import type { Logger } from '@tally/observability';

/**
 * Shared Hono context variables for API requests
 */
export type ContextVariables = {
  requestId: string;
  logger: Logger;
};

export type AppBindings = {
  Variables: ContextVariables;
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
