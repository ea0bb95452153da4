import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Structured logger with credential redaction.
 * API keys never reach log output, either as fields or inside strings.
 */

// Credential patterns scrubbed from free-form strings
const SECRET_PATTERNS = {
  // Freshsales auth header value
  tokenHeader: /Token\s+token=[^\s&,;"']+/gi,
  // api_key=... in query strings
  apiKeyParam: /api_key=[^\s&,;"']+/gi,
  bearer: /Bearer\s+[a-zA-Z0-9._-]+/gi,
};

// Fields to completely redact (case-insensitive matching)
const REDACTED_FIELDS = ['apikey', 'api_key', 'authorization', 'token', 'password', 'secret'];

// Exact pino paths; pino matches keys case-sensitively
const REDACTED_PATHS = ['apiKey', 'api_key', 'authorization', 'Authorization', 'token', 'password', 'secret'];

export const REDACTED = '[REDACTED]';

/**
 * Scrub credential patterns out of a string
 */
export function scrubSecrets(value: string): string {
  let result = value;
  for (const pattern of Object.values(SECRET_PATTERNS)) {
    result = result.replace(pattern, REDACTED);
  }
  return result;
}

/**
 * Recursively redact credentials from an object
 */
export function redactObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return scrubSecrets(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map(redactObject);
  }

  if (typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const keyLower = key.toLowerCase();
      const shouldRedact = REDACTED_FIELDS.some(
        (field) => keyLower === field || keyLower.includes(field)
      );
      redacted[key] = shouldRedact ? REDACTED : redactObject(value);
    }
    return redacted;
  }

  return obj;
}

function createRedactor() {
  return {
    paths: [...REDACTED_PATHS, ...REDACTED_PATHS.map((field) => `*.${field}`)],
    censor: REDACTED,
  };
}

export interface CreateLoggerOptions {
  name: string;
  level?: string;
  correlationId?: string;
  /** Output stream, stdout when omitted */
  destination?: DestinationStream;
}

/**
 * Create a logger instance with credential redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const { name, level = process.env.LOG_LEVEL ?? 'info', correlationId, destination } = options;

  const loggerOptions: LoggerOptions = {
    name,
    level,
    redact: createRedactor(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: correlationId ? { correlationId } : null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Create a child logger with correlation ID
 */
export function withCorrelationId(logger: Logger, correlationId: string): Logger {
  return logger.child({ correlationId });
}

export type { Logger };
