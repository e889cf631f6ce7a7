import { pino, stdSerializers, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/**
 * Paths censored by pino before serialization.
 * Session tokens travel as Bearer headers and as the access_token cookie.
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.Authorization',
  'headers.cookie',
  'authorization',
  'Authorization',
  'password',
  'passwordHash',
  'token',
  'accessToken',
  'secret',
  'clientSecret',
  '*.password',
  '*.passwordHash',
  '*.accessToken',
];

// header.payload.signature, each segment base64url
const JWT_PATTERN = /eyJ[A-Za-z0-9_-]*\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

function redactString(value: string): string {
  if (value.startsWith('Bearer ')) {
    return 'Bearer [REDACTED]';
  }
  return value.replace(JWT_PATTERN, '[REDACTED_JWT]');
}

/**
 * Recursively masks JWT-shaped strings and Bearer values.
 * Errors pass through untouched so pino's err serializer still sees the instance.
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactString(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (value instanceof Error || value instanceof Date) {
    return value;
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = redactSecrets(entry);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with pino.
 *
 * An explicit destination is mainly for tests, which capture lines in memory.
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const baseOptions: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    hooks: {
      logMethod(args, method) {
        // The merge object or message is always the first argument
        const redacted = args.map((arg: unknown, index: number) =>
          index === 0 ? redactSecrets(arg) : arg
        );
        Reflect.apply(method, this, redacted);
      },
    },
    ...options,
  };

  return destination ? pino(baseOptions, destination) : pino(baseOptions);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
