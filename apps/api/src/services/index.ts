/**
 * Service Registry
 *
 * Dependency injection setup for domain services. Everything the routes use is
 * built here once from the loaded configuration.
 */

import { type AuthEventEmitter, authEvents } from '@commerce/auth';
import { type AuthService, createAuthService } from '@commerce/auth-core';
import { DrizzleAccountStore, DrizzleItemRepository, ItemService } from '@commerce/core';
import { createDatabase, pingDatabase } from '@commerce/database';
import type { Logger } from '@commerce/observability';
import type { AppConfig } from '../config.js';

export type AppSettings = {
  appName: string;
  appVersion: string;
  corsOrigins: string[];
  /** Adds the Secure attribute to the session cookie */
  secureCookies: boolean;
  sessionTtlMinutes: number;
};

export type AppServices = {
  auth: AuthService;
  items: ItemService;
  events: AuthEventEmitter;
  logger: Logger;
  settings: AppSettings;
  checkDatabase: () => Promise<boolean>;
};

export function settingsFromConfig(config: AppConfig): AppSettings {
  return {
    appName: config.appName,
    appVersion: config.appVersion,
    corsOrigins: config.corsOrigins,
    secureCookies: config.appEnv !== 'development',
    sessionTtlMinutes: config.auth.sessionTtlMinutes,
  };
}

export function createServices(
  config: AppConfig,
  logger: Logger
): { services: AppServices; close: () => Promise<void> } {
  const { db, close } = createDatabase(config.databaseUrl);

  const services: AppServices = {
    auth: createAuthService(config.auth, {
      store: new DrizzleAccountStore(db),
      events: authEvents,
    }),
    items: new ItemService(new DrizzleItemRepository(db)),
    events: authEvents,
    logger,
    settings: settingsFromConfig(config),
    checkDatabase: () => pingDatabase(db),
  };

  return { services, close };
}
