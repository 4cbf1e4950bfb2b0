/**
 * HTTP test helpers for route tests
 * Builds the app around an in-memory ledger table and a scripted extractor
 */

import {
  LedgerEventEmitter,
  MemoryLedgerTable,
  type CandidateExtractor,
  type ExtractionResult,
} from '@tally/core';
import { createLogger } from '@tally/observability';
import type { Env, Hono } from 'hono';
import { createApp } from '../app.js';
import type { AppConfig } from '../config.js';
import { createServices } from '../services/index.js';

export const TEST_CONFIG: AppConfig = {
  port: 0,
  logLevel: 'silent',
  gemini: { apiKey: 'test-secret', model: 'gemini-2.0-flash' },
  extractorTimeoutMs: 1_000,
  ledgerFile: 'unused.csv',
  maxDescriptionLength: 256,
};

/**
 * Extractor that answers from a queue of prepared results
 */
export class ScriptedExtractor implements CandidateExtractor {
  readonly messages: string[] = [];
  private replies: ExtractionResult[] = [];

  reply(...results: ExtractionResult[]) {
    this.replies.push(...results);
    return this;
  }

  async extract(rawText: string): Promise<ExtractionResult> {
    this.messages.push(rawText);
    const next = this.replies.shift();
    if (!next) {
      throw new Error(`No scripted reply for "${rawText}"`);
    }
    return next;
  }
}

export interface TestAppOptions {
  table?: MemoryLedgerTable;
  now?: string;
}

export function createTestApp(options: TestAppOptions = {}) {
  const extractor = new ScriptedExtractor();
  const table = options.table ?? new MemoryLedgerTable();
  const events = new LedgerEventEmitter();
  const logger = createLogger({ level: 'silent' });
  const now = options.now;

  const services = createServices(TEST_CONFIG, logger, {
    extractor,
    table,
    events,
    ...(now && { clock: () => new Date(now) }),
  });

  const app = createApp({ ledgerService: services.ledgerService, logger });
  return { app, extractor, table, events, services };
}

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, headers = {} } = options;

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = typeof body === 'string' ? body : JSON.stringify(body);
  }

  return app.fetch(new Request(`http://localhost${path}`, init));
}
