/**
 * Server configuration
 *
 * Read once from the environment at startup. Invalid values stop the server
 * before it binds a port.
 */

import { z } from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  GEMINI_API_KEY: z.string().trim().min(1, 'GEMINI_API_KEY is required'),
  GEMINI_MODEL: z.string().trim().min(1).default('gemini-2.0-flash'),
  GEMINI_API_BASE_URL: z.string().url().optional(),
  EXTRACTOR_TIMEOUT_MS: positiveInt(10_000),
  LEDGER_FILE: z.string().trim().min(1).default('./data/ledger.csv'),
  MAX_DESCRIPTION_LENGTH: positiveInt(256),
});

export interface AppConfig {
  port: number;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  gemini: {
    apiKey: string;
    model: string;
    baseUrl?: string;
  };
  extractorTimeoutMs: number;
  ledgerFile: string;
  maxDescriptionLength: number;
}

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from environment variables
 *
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings as unset so `.env` placeholders fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    gemini: {
      apiKey: parsed.GEMINI_API_KEY,
      model: parsed.GEMINI_MODEL,
      ...(parsed.GEMINI_API_BASE_URL && { baseUrl: parsed.GEMINI_API_BASE_URL }),
    },
    extractorTimeoutMs: parsed.EXTRACTOR_TIMEOUT_MS,
    ledgerFile: parsed.LEDGER_FILE,
    maxDescriptionLength: parsed.MAX_DESCRIPTION_LENGTH,
  };
}
