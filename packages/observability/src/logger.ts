import pino from 'pino';

/**
 * Redact sensitive data from logs
 * - Authorization headers
 * - Extraction provider API keys
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.Authorization',
  'headers.authorization',
  'headers.Authorization',
  'authorization',
  'Authorization',
  'apiKey',
  'api_key',
  'key',
  'geminiApiKey',
  'secret',
];

const KEY_QUERY_PARAM = /([?&]key=)[^&\s"]+/g;

/**
 * Redact API keys embedded in URLs (the Gemini endpoint takes `?key=`)
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    if (value.startsWith('Bearer ')) {
      return 'Bearer [REDACTED]';
    }
    return value.replace(KEY_QUERY_PARAM, '$1[REDACTED]');
  }
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = redactSecrets(nested);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Redaction of credentials, including keys carried in request URLs
 * - Structured JSON output
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log(object) {
        const redacted: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(object)) {
          redacted[key] = redactSecrets(value);
        }
        return redacted;
      },
    },
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

export type Logger = pino.Logger;

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
