import type { LedgerEvent, LedgerEventEmitter } from '@tally/core';
import type { Logger } from '@tally/observability';

/**
 * Initialize audit logging for ledger events
 * Every commit, rejection and failure becomes one structured log line;
 * handler failures are logged instead of printed to the console
 */
export function initializeAuditLogging(
  events: Pick<LedgerEventEmitter, 'on' | 'setErrorReporter'>,
  logger: Logger
) {
  events.setErrorReporter((error, event) => {
    logger.error({ err: error, event: event.type }, 'Ledger event handler failed');
  });
  events.on((event) => handleLedgerEvent(event, logger));
  logger.info('Audit logging initialized for ledger events');
}

/**
 * Log one ledger event at a level that matches its outcome
 */
export function handleLedgerEvent(event: LedgerEvent, logger: Logger) {
  const logEntry = {
    event: event.type,
    timestamp: event.timestamp.toISOString(),
    ...event.metadata,
  };

  switch (event.type) {
    case 'entry.committed':
      logger.info(logEntry, 'Ledger entry committed');
      break;

    case 'entry.rejected':
      logger.info(logEntry, 'Ledger entry rejected');
      break;

    case 'extraction.failed':
      logger.warn(logEntry, 'Candidate extraction failed');
      break;

    case 'persistence.failed':
      logger.error(logEntry, 'Ledger append failed');
      break;

    case 'taxonomy.extended':
      logger.info(logEntry, 'Category taxonomy extended');
      break;
  }
}
