/**
 * @tally/observability
 *
 * Structured logging for the ledger API and its audit trail.
 */

export { createLogger, logger, redactSecrets } from './logger.js';
export type { Logger } from './logger.js';
