import { authEvents } from '@commerce/auth';
import { ConfigError } from '@commerce/auth-core';
import { createLogger, logger as bootstrapLogger } from '@commerce/observability';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { type AppConfig, loadAppConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { createServices } from './services/index.js';

function loadConfigOrExit(): AppConfig {
  try {
    return loadAppConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      bootstrapLogger.fatal({ issues: error.issues }, 'Invalid configuration');
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfigOrExit();

const logger = createLogger({ level: config.logLevel, base: { service: config.appName } });

// Initialize audit logging for authentication events
initializeAuditLogging(authEvents, logger);

for (const provider of ['google', 'apple'] as const) {
  if (config.auth[provider]) {
    logger.info({ provider }, 'OAuth provider configured');
  } else {
    logger.warn({ provider }, 'OAuth provider not configured');
  }
}

const { services, close } = createServices(config, logger);
const app = createApp(services);

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, env: config.appEnv, version: config.appVersion }, 'Server running');
});

function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    close()
      .then(() => {
        logger.info('Database connections closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Failed to close database connections');
        process.exit(1);
      });
  });
}

process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
