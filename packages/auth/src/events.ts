/**
 * Authentication event emitter for audit logging and monitoring
 * Events are fire-and-forget to avoid blocking the authentication flow
 */
import { logger } from '@commerce/observability';
import type { OAuthProviderId } from './constants.js';

export type AuthEventType =
  | 'user.registered'
  | 'user.login.success'
  | 'user.login.failed'
  | 'user.logout'
  | 'user.oauth.login'
  | 'user.oauth.failed'
  | 'user.deactivated'
  | 'token.auth_failed';

/**
 * Base authentication event structure
 */
export interface AuthEvent {
  type: AuthEventType;
  userId?: string;
  email?: string;
  ip?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/**
 * Failed password login. The reason stays server-side; callers only ever
 * see invalid_credentials.
 */
export interface LoginFailedEvent extends Omit<AuthEvent, 'type'> {
  type: 'user.login.failed';
  email: string;
  metadata: {
    reason: 'unknown_email' | 'no_password' | 'invalid_password' | 'account_disabled';
  };
}

/**
 * Successful OAuth login, with how the identity mapped onto an account
 */
export interface OAuthLoginEvent extends Omit<AuthEvent, 'type'> {
  type: 'user.oauth.login';
  userId: string;
  email: string;
  metadata: {
    provider: OAuthProviderId;
    outcome: 'matched' | 'linked' | 'created';
  };
}

export interface TokenAuthFailedEvent extends Omit<AuthEvent, 'type'> {
  type: 'token.auth_failed';
  metadata: {
    reason: 'missing' | 'invalid' | 'unknown_subject';
  };
}

export type AuthEventInput = Omit<AuthEvent, 'timestamp'>;

export type AuthEventHandler = (event: AuthEvent) => void | Promise<void>;

export class AuthEventEmitter {
  private handlers: AuthEventHandler[] = [];

  on(handler: AuthEventHandler) {
    this.handlers.push(handler);
  }

  emit(event: AuthEventInput): void {
    const fullEvent: AuthEvent = {
      ...event,
      timestamp: new Date(),
    };

    // Fire and forget - a failing handler never blocks auth or the other handlers
    for (const handler of this.handlers) {
      Promise.resolve()
        .then(() => handler(fullEvent))
        .catch((err: unknown) => {
          logger.error({ err, event: fullEvent.type }, 'Auth event handler error');
        });
    }
  }

  /**
   * Clear all event handlers
   * Useful for testing to prevent handler accumulation
   */
  clearHandlers() {
    this.handlers = [];
  }
}

export const authEvents = new AuthEventEmitter();
