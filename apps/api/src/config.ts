import {
  type AuthCoreConfig,
  ConfigError,
  formatZodIssues,
  loadAuthCoreConfig,
} from '@commerce/auth-core';
import { z } from 'zod';

const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://127.0.0.1:3000';
const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

export const APP_ENVIRONMENTS = ['development', 'staging', 'production'] as const;
export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

export type AppConfig = {
  appEnv: AppEnvironment;
  appName: string;
  appVersion: string;
  port: number;
  databaseUrl: string;
  corsOrigins: string[];
  logLevel: string;
  auth: AuthCoreConfig;
};

const originSchema = z
  .string()
  .url('CORS origin must be a URL')
  .refine((value) => /^https?:\/\//.test(value), 'CORS origin must use http or https')
  .transform((value) => new URL(value).origin);

const appEnvSchema = z.object({
  APP_ENV: z.enum(APP_ENVIRONMENTS).default('development'),
  APP_NAME: z.string().trim().min(1).default('commerce-api'),
  APP_VERSION: z.string().trim().min(1).default('0.1.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .regex(/^postgres(ql)?:\/\//, 'DATABASE_URL must start with postgresql:// or postgres://'),
  CORS_ORIGINS: z
    .string()
    .default(DEFAULT_CORS_ORIGINS)
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    )
    .pipe(z.array(originSchema)),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

function productionIssues(config: AppConfig): string[] {
  const issues: string[] = [];
  const secret = config.auth.jwtSecret.toLowerCase();
  if (secret.includes('dev') || secret.includes('test')) {
    issues.push('JWT_SECRET_KEY: must not contain "dev" or "test" in production');
  }
  for (const origin of config.corsOrigins) {
    const url = new URL(origin);
    if (url.protocol !== 'https:' && !LOCAL_HOSTS.has(url.hostname)) {
      issues.push(`CORS_ORIGINS: ${origin} must use https in production`);
    }
  }
  return issues;
}

/**
 * Builds the application configuration once at start-up. Every invalid
 * setting is reported together in a single ConfigError.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const issues: string[] = [];

  const parsed = appEnvSchema.safeParse(env);
  if (!parsed.success) {
    issues.push(...formatZodIssues(parsed.error));
  }

  let auth: AuthCoreConfig | null = null;
  try {
    auth = loadAuthCoreConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigError)) {
      throw error;
    }
    issues.push(...error.issues);
  }

  if (!parsed.success || !auth) {
    throw new ConfigError(issues);
  }

  const values = parsed.data;
  const config: AppConfig = {
    appEnv: values.APP_ENV,
    appName: values.APP_NAME,
    appVersion: values.APP_VERSION,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    corsOrigins: values.CORS_ORIGINS,
    logLevel: values.LOG_LEVEL,
    auth,
  };

  if (config.appEnv === 'production') {
    const violations = productionIssues(config);
    if (violations.length > 0) {
      throw new ConfigError(violations);
    }
  }

  return config;
}
