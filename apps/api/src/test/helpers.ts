/**
 * HTTP test helpers for integration tests
 * Builds the app over in-memory stores and provides request/cookie utilities
 */

import { AuthEventEmitter } from '@commerce/auth';
import {
  type AuthCoreConfig,
  type CreateOAuthProvidersOptions,
  createAuthService,
} from '@commerce/auth-core';
import { InMemoryAccountStore } from '@commerce/auth-core/testing';
import { ItemService } from '@commerce/core';
import { InMemoryItemRepository } from '@commerce/core/testing';
import { createLogger } from '@commerce/observability';
import type { Env, Hono } from 'hono';
import { expect } from 'vitest';
import { createApp } from '../app.js';
import type { AppServices, AppSettings } from '../services/index.js';

export const TEST_AUTH_CONFIG: AuthCoreConfig = {
  jwtSecret: 'test-secret-for-api-tests-0123456789abcdef',
  jwtAlgorithm: 'HS256',
  sessionTtlMinutes: 30,
  google: { clientId: 'test-google-client', clientSecret: 'test-secret' },
  apple: { clientId: 'com.example.shop', clientSecret: 'test-secret' },
  oauthRedirectBaseUrl: 'http://localhost:8000',
  oauthTimeoutMs: 1000,
};

export const TEST_SETTINGS: AppSettings = {
  appName: 'commerce-api',
  appVersion: '0.1.0-test',
  corsOrigins: ['http://localhost:3000'],
  secureCookies: false,
  sessionTtlMinutes: TEST_AUTH_CONFIG.sessionTtlMinutes,
};

export interface TestServicesOptions extends CreateOAuthProvidersOptions {
  authConfig?: Partial<AuthCoreConfig>;
  checkDatabase?: () => Promise<boolean>;
}

/**
 * App services over in-memory stores. Log lines are kept in `logs` as parsed
 * JSON entries.
 */
export function createTestServices(options: TestServicesOptions = {}) {
  const { authConfig, checkDatabase, ...providerOptions } = options;

  const logs: Array<Record<string, unknown>> = [];
  const logger = createLogger(
    { level: 'debug' },
    {
      write: (line: string) => {
        logs.push(JSON.parse(line));
      },
    }
  );

  const accounts = new InMemoryAccountStore();
  const itemRepository = new InMemoryItemRepository();
  const events = new AuthEventEmitter();

  const services: AppServices = {
    auth: createAuthService(
      { ...TEST_AUTH_CONFIG, ...authConfig },
      { store: accounts, events, ...providerOptions }
    ),
    items: new ItemService(itemRepository),
    events,
    logger,
    settings: TEST_SETTINGS,
    checkDatabase: checkDatabase ?? (async () => true),
  };

  return { services, accounts, itemRepository, events, logs };
}

export function createTestApp(options: TestServicesOptions = {}) {
  const context = createTestServices(options);
  return { ...context, app: createApp(context.services) };
}

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  body?: unknown;
  form?: Record<string, string>;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
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
  const { body, form, cookies = {} } = options;
  const headers: Record<string, string> = { ...options.headers };

  // Build cookie header from cookies object
  const cookieHeader = Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');

  if (cookieHeader) {
    headers.Cookie = cookieHeader;
  }

  const init: RequestInit = { method: method.toUpperCase(), headers };

  if (form !== undefined) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    init.body = new URLSearchParams(form).toString();
  } else if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
    init.body = JSON.stringify(body);
  }

  return app.request(path, init);
}

/**
 * Make an authenticated HTTP request with a Bearer access token.
 */
export async function makeAuthenticatedRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  accessToken: string,
  options: RequestOptions = {}
): Promise<Response> {
  return makeRequest(app, method, path, {
    ...options,
    headers: {
      ...(options.headers ?? {}),
      Authorization: `Bearer ${accessToken}`,
    },
  });
}

/**
 * Full Set-Cookie line for a cookie, or null if the response does not set it
 */
export function findSetCookie(response: Response, name: string): string | null {
  return response.headers.getSetCookie().find((header) => header.startsWith(`${name}=`)) ?? null;
}

/**
 * Extract a cookie value from response headers
 */
export function extractCookie(response: Response, name: string): string | null {
  const header = findSetCookie(response, name);
  if (!header) {
    return null;
  }
  const value = header.slice(name.length + 1).split(';')[0];
  return value ? value : null;
}

/**
 * Register then log in, returning the access token and user id
 */
export async function registerAndLogin<E extends Env>(
  app: Hono<E>,
  email: string,
  password = 'test-password-1'
): Promise<{ accessToken: string; userId: string }> {
  const registered = await makeRequest(app, 'POST', '/api/auth/register', {
    body: { email, password },
  });
  expect(registered.status).toBe(201);

  const login = await makeRequest(app, 'POST', '/api/auth/login', {
    body: { email, password },
  });
  expect(login.status).toBe(200);
  const body = await login.json();
  return { accessToken: body.accessToken, userId: body.user.id };
}
