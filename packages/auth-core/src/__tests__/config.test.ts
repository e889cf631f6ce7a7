import { describe, expect, it } from 'vitest';
import { ConfigError, loadAuthCoreConfig } from '../config.js';

const SECRET = 'test-secret-value-with-enough-length-0001';

function loadError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadAuthCoreConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected loadAuthCoreConfig to throw');
}

describe('loadAuthCoreConfig', () => {
  it('applies defaults', () => {
    expect(loadAuthCoreConfig({ JWT_SECRET_KEY: SECRET })).toEqual({
      jwtSecret: SECRET,
      jwtAlgorithm: 'HS256',
      sessionTtlMinutes: 30,
      google: null,
      apple: null,
      oauthRedirectBaseUrl: 'http://localhost:8000',
      oauthTimeoutMs: 10000,
    });
  });

  it('reads provider credentials only when both halves are set', () => {
    const config = loadAuthCoreConfig({
      JWT_SECRET_KEY: SECRET,
      GOOGLE_CLIENT_ID: 'google-client',
      GOOGLE_CLIENT_SECRET: 'test-secret',
      APPLE_CLIENT_ID: 'com.example.shop',
      APPLE_CLIENT_SECRET: '',
    });

    expect(config.google).toEqual({ clientId: 'google-client', clientSecret: 'test-secret' });
    expect(config.apple).toBeNull();
  });

  it('parses numeric settings and trims the redirect base', () => {
    const config = loadAuthCoreConfig({
      JWT_SECRET_KEY: SECRET,
      JWT_ALGORITHM: 'HS512',
      JWT_EXPIRE_MINUTES: '60',
      OAUTH_TIMEOUT_MS: '2500',
      OAUTH_REDIRECT_BASE_URL: 'https://api.example.com/',
    });

    expect(config.jwtAlgorithm).toBe('HS512');
    expect(config.sessionTtlMinutes).toBe(60);
    expect(config.oauthTimeoutMs).toBe(2500);
    expect(config.oauthRedirectBaseUrl).toBe('https://api.example.com');
  });

  it('requires a secret', () => {
    expect(loadError({}).issues).toContain('JWT_SECRET_KEY: JWT_SECRET_KEY is required');
  });

  it('rejects short secrets', () => {
    expect(loadError({ JWT_SECRET_KEY: 'short' }).issues).toContain(
      'JWT_SECRET_KEY: JWT_SECRET_KEY must be at least 32 characters'
    );
  });

  it('rejects known placeholder secrets regardless of case', () => {
    expect(loadError({ JWT_SECRET_KEY: 'YOUR-SECRET-KEY-CHANGE-IN-PRODUCTION' }).issues).toEqual([
      'JWT_SECRET_KEY: JWT_SECRET_KEY is a known placeholder value',
    ]);
  });

  it.each(['0', '1441', 'abc'])('rejects JWT_EXPIRE_MINUTES=%s', (value) => {
    const error = loadError({ JWT_SECRET_KEY: SECRET, JWT_EXPIRE_MINUTES: value });

    expect(error.issues.some((issue) => issue.startsWith('JWT_EXPIRE_MINUTES:'))).toBe(true);
  });

  it('rejects unsupported algorithms', () => {
    const error = loadError({ JWT_SECRET_KEY: SECRET, JWT_ALGORITHM: 'RS256' });

    expect(error.issues.some((issue) => issue.startsWith('JWT_ALGORITHM:'))).toBe(true);
  });
});
