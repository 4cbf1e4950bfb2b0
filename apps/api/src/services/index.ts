/**
 * Service Registry
 *
 * Dependency injection setup for the ledger
 * Creates the store, extractor and service with their dependencies
 */

import {
  CsvLedgerTable,
  GeminiExtractor,
  LedgerService,
  LedgerStore,
  createDefaultTaxonomy,
  ledgerEvents,
  type CandidateExtractor,
  type LedgerEventEmitter,
  type LedgerTable,
} from '@tally/core';
import type { Logger } from '@tally/observability';
import type { AppConfig } from '../config.js';

export interface Services {
  ledgerService: LedgerService;
  ledgerStore: LedgerStore;
  events: LedgerEventEmitter;
}

/**
 * Seams for tests: swap the oracle or the table without touching the wiring
 */
export interface ServiceOverrides {
  extractor?: CandidateExtractor;
  table?: LedgerTable;
  events?: LedgerEventEmitter;
  clock?: () => Date;
}

export function createServices(
  config: AppConfig,
  logger: Logger,
  overrides: ServiceOverrides = {}
): Services {
  const events = overrides.events ?? ledgerEvents;

  const table = overrides.table ?? new CsvLedgerTable(config.ledgerFile);
  const ledgerStore = new LedgerStore(table, {
    onInvalidRow: ({ rowNumber, reason }) => {
      logger.warn({ rowNumber, reason }, 'Skipping unreadable ledger row');
    },
  });

  const taxonomy = createDefaultTaxonomy();
  const extractor =
    overrides.extractor ??
    new GeminiExtractor({
      apiKey: config.gemini.apiKey,
      model: config.gemini.model,
      ...(config.gemini.baseUrl && { baseUrl: config.gemini.baseUrl }),
    });

  const ledgerService = new LedgerService(extractor, ledgerStore, taxonomy, events, {
    extractionTimeoutMs: config.extractorTimeoutMs,
    maxDescriptionLength: config.maxDescriptionLength,
    ...(overrides.clock && { clock: overrides.clock }),
  });

  return { ledgerService, ledgerStore, events };
}
