import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createLogger } from '@tally/observability';
import { createApp } from './app.js';
import { ConfigError, loadConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { createServices } from './services/index.js';

function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const services = createServices(config, logger);

  // Initialize audit logging for ledger events
  initializeAuditLogging(services.events, logger);

  logger.info(
    { port: config.port, ledgerFile: config.ledgerFile, model: config.gemini.model },
    'Starting server'
  );

  const app = createApp({ ledgerService: services.ledgerService, logger });

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info({ port: info.port }, 'Server running');
  });
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    createLogger().fatal({ issues: error.issues }, 'Invalid configuration');
    process.exitCode = 1;
  } else {
    throw error;
  }
}
