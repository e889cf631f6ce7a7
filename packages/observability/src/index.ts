/**
 * @commerce/observability
 *
 * Structured logging for the commerce API.
 * - pino JSON logs with ISO timestamps
 * - redaction of passwords, session tokens and Authorization/Cookie headers
 */

export { createLogger, logger, redactSecrets } from './logger.js';
export type { Logger } from './logger.js';
