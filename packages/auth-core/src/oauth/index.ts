import type { OAuthProviderId } from '@commerce/auth';
import type { AuthCoreConfig } from '../config.js';
import type { OAuthProvider } from '../interfaces.js';
import { AppleOAuthProvider, type AppleProviderOptions } from './apple.js';
import { GoogleOAuthProvider } from './google.js';
import type { FetchFn } from './http.js';

export * from './apple.js';
export * from './google.js';
export type { FetchFn } from './http.js';

export type OAuthProviderRegistry = Record<OAuthProviderId, OAuthProvider>;

export type CreateOAuthProvidersOptions = {
  fetchImpl?: FetchFn;
  appleKeySet?: AppleProviderOptions['keySet'];
};

export function createOAuthProviders(
  config: Pick<AuthCoreConfig, 'google' | 'apple' | 'oauthRedirectBaseUrl' | 'oauthTimeoutMs'>,
  options: CreateOAuthProvidersOptions = {}
): OAuthProviderRegistry {
  const shared = {
    redirectBaseUrl: config.oauthRedirectBaseUrl,
    timeoutMs: config.oauthTimeoutMs,
    ...(options.fetchImpl ? { fetchImpl: options.fetchImpl } : {}),
  };

  return {
    google: new GoogleOAuthProvider({ ...shared, credentials: config.google }),
    apple: new AppleOAuthProvider({
      ...shared,
      credentials: config.apple,
      ...(options.appleKeySet ? { keySet: options.appleKeySet } : {}),
    }),
  };
}
