import type { Context } from 'hono';
import type { ZodError } from 'zod';

/**
 * Shared zValidator hook: 400 with the zod issues instead of the default body
 */
export function validationFailed(
  result: { success: true } | { success: false; error: ZodError },
  c: Context
) {
  if (!result.success) {
    return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
  }
}
