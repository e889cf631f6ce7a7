import { GOOGLE_PROVIDER_ID } from '@commerce/auth';
import { z } from 'zod';
import type { OAuthClientCredentials } from '../config.js';
import { OAuthFailedError, OAuthNotConfiguredError } from '../errors.js';
import type { OAuthProvider } from '../interfaces.js';
import type { OAuthProfile } from '../types.js';
import { type FetchFn, redirectUriFor, requestProviderJson } from './http.js';

export const GOOGLE_AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const GOOGLE_USERINFO_URL = 'https://www.googleapis.com/oauth2/v3/userinfo';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

const userInfoSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email(),
  email_verified: z.boolean().optional(),
  name: z.string().optional(),
  picture: z.string().url().optional(),
});

export type GoogleProviderOptions = {
  credentials: OAuthClientCredentials | null;
  redirectBaseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchFn;
};

export class GoogleOAuthProvider implements OAuthProvider {
  readonly id = GOOGLE_PROVIDER_ID;

  constructor(private readonly options: GoogleProviderOptions) {}

  isConfigured(): boolean {
    return this.options.credentials !== null;
  }

  buildAuthorizationUrl(state: string): string {
    const credentials = this.requireCredentials();
    const params = new URLSearchParams({
      client_id: credentials.clientId,
      redirect_uri: this.redirectUri,
      response_type: 'code',
      scope: 'openid email profile',
      state,
      prompt: 'select_account',
      access_type: 'online',
    });
    return `${GOOGLE_AUTH_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string): Promise<OAuthProfile> {
    const credentials = this.requireCredentials();
    const request = { fetchImpl: this.options.fetchImpl, timeoutMs: this.options.timeoutMs };

    const token = await requestProviderJson(
      GOOGLE_TOKEN_URL,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          client_id: credentials.clientId,
          client_secret: credentials.clientSecret,
          code,
          grant_type: 'authorization_code',
          redirect_uri: this.redirectUri,
        }),
      },
      tokenResponseSchema,
      request
    );

    const userInfo = await requestProviderJson(
      GOOGLE_USERINFO_URL,
      { headers: { Authorization: `Bearer ${token.access_token}` } },
      userInfoSchema,
      request
    );

    if (userInfo.email_verified !== true) {
      throw new OAuthFailedError({ cause: new Error('Google email is not verified') });
    }

    return {
      provider: GOOGLE_PROVIDER_ID,
      providerId: userInfo.sub,
      email: userInfo.email,
      displayName: userInfo.name ?? null,
      avatarUrl: userInfo.picture ?? null,
    };
  }

  private get redirectUri(): string {
    return redirectUriFor(this.options.redirectBaseUrl, GOOGLE_PROVIDER_ID);
  }

  private requireCredentials(): OAuthClientCredentials {
    if (!this.options.credentials) {
      throw new OAuthNotConfiguredError(GOOGLE_PROVIDER_ID);
    }
    return this.options.credentials;
  }
}
