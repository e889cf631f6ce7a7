import type { PublicUser } from '@commerce/auth-core';

/**
 * Shared Hono context variables for API requests.
 */
export type ContextVariables = {
  requestId: string;
};

export type AppBindings = {
  Variables: ContextVariables;
};

/**
 * Bindings available after requireAuth has run.
 */
export type AuthenticatedBindings = {
  Variables: ContextVariables & {
    user: PublicUser;
  };
};

declare module 'hono' {
  // Allow c.var / c.get access without casting everywhere
  interface ContextVariableMap extends ContextVariables {}
}
