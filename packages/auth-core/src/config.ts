import { z } from 'zod';
import {
  DEFAULT_SESSION_TTL_MINUTES,
  MAX_SESSION_TTL_MINUTES,
  MIN_SESSION_TTL_MINUTES,
} from '@commerce/auth';

const MIN_SECRET_LENGTH = 32;
const DEFAULT_OAUTH_TIMEOUT_MS = 10_000;
const DEFAULT_REDIRECT_BASE_URL = 'http://localhost:8000';

/**
 * Placeholder secrets that ship in sample env files. Compared case-insensitively.
 */
export const WEAK_SECRETS: readonly string[] = [
  'your-secret-key-change-in-production',
  'dev-jwt-secret-key-not-for-production-use-only',
  'change-me',
  'secret',
  'password',
  '12345',
];

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export type OAuthClientCredentials = {
  clientId: string;
  clientSecret: string;
};

export type AuthCoreConfig = {
  jwtSecret: string;
  jwtAlgorithm: JwtAlgorithm;
  sessionTtlMinutes: number;
  google: OAuthClientCredentials | null;
  apple: OAuthClientCredentials | null;
  oauthRedirectBaseUrl: string;
  oauthTimeoutMs: number;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const authEnvSchema = z.object({
  JWT_SECRET_KEY: z
    .string({ required_error: 'JWT_SECRET_KEY is required' })
    .min(MIN_SECRET_LENGTH, `JWT_SECRET_KEY must be at least ${MIN_SECRET_LENGTH} characters`)
    .refine((value) => !WEAK_SECRETS.includes(value.toLowerCase()), {
      message: 'JWT_SECRET_KEY is a known placeholder value',
    }),
  JWT_ALGORITHM: z.enum(JWT_ALGORITHMS).default('HS256'),
  JWT_EXPIRE_MINUTES: z.coerce
    .number()
    .int()
    .min(MIN_SESSION_TTL_MINUTES)
    .max(MAX_SESSION_TTL_MINUTES)
    .default(DEFAULT_SESSION_TTL_MINUTES),
  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  APPLE_CLIENT_ID: optionalString,
  APPLE_CLIENT_SECRET: optionalString,
  OAUTH_REDIRECT_BASE_URL: z
    .string()
    .url()
    .default(DEFAULT_REDIRECT_BASE_URL)
    .transform((value) => value.replace(/\/+$/, '')),
  OAUTH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_OAUTH_TIMEOUT_MS),
});

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function credentials(
  clientId: string | undefined,
  clientSecret: string | undefined
): OAuthClientCredentials | null {
  if (!clientId || !clientSecret) {
    return null;
  }
  return { clientId, clientSecret };
}

export function loadAuthCoreConfig(env: NodeJS.ProcessEnv = process.env): AuthCoreConfig {
  const parsed = authEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues(parsed.error));
  }

  const values = parsed.data;
  return {
    jwtSecret: values.JWT_SECRET_KEY,
    jwtAlgorithm: values.JWT_ALGORITHM,
    sessionTtlMinutes: values.JWT_EXPIRE_MINUTES,
    google: credentials(values.GOOGLE_CLIENT_ID, values.GOOGLE_CLIENT_SECRET),
    apple: credentials(values.APPLE_CLIENT_ID, values.APPLE_CLIENT_SECRET),
    oauthRedirectBaseUrl: values.OAUTH_REDIRECT_BASE_URL,
    oauthTimeoutMs: values.OAUTH_TIMEOUT_MS,
  };
}
