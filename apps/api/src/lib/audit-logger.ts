import type { AuthEvent, AuthEventEmitter } from '@commerce/auth';
import type { Logger } from '@commerce/observability';

const FAILURE_EVENTS = new Set<AuthEvent['type']>([
  'user.login.failed',
  'user.oauth.failed',
  'token.auth_failed',
]);

const MESSAGES: Record<AuthEvent['type'], string> = {
  'user.registered': 'User registered successfully',
  'user.login.success': 'User login successful',
  'user.login.failed': 'User login failed',
  'user.logout': 'User logged out',
  'user.oauth.login': 'OAuth login successful',
  'user.oauth.failed': 'OAuth login failed',
  'user.deactivated': 'User account deactivated',
  'token.auth_failed': 'Token authentication failed',
};

/**
 * Initialize audit logging for authentication events.
 * Sensitive fields are redacted by the logger.
 */
export function initializeAuditLogging(events: AuthEventEmitter, logger: Logger) {
  events.on((event) => handleAuthEvent(event, logger));
  logger.info('Audit logging initialized for authentication events');
}

export function handleAuthEvent(event: AuthEvent, logger: Logger) {
  const { type, userId, email, ip, timestamp, metadata } = event;

  const logEntry = {
    event: type,
    userId: userId || 'unknown',
    email: email || 'unknown',
    ip: ip || 'unknown',
    timestamp: timestamp.toISOString(),
    success: !FAILURE_EVENTS.has(type),
    ...(metadata && { metadata }),
  };

  if (FAILURE_EVENTS.has(type)) {
    logger.warn(logEntry, MESSAGES[type]);
  } else {
    logger.info(logEntry, MESSAGES[type]);
  }
}
