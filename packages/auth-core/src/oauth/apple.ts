import { APPLE_PROVIDER_ID } from '@commerce/auth';
import { createRemoteJWKSet, type JWTVerifyGetKey, jwtVerify } from 'jose';
import { z } from 'zod';
import type { OAuthClientCredentials } from '../config.js';
import { OAuthFailedError, OAuthNotConfiguredError } from '../errors.js';
import type { OAuthProvider } from '../interfaces.js';
import type { OAuthProfile } from '../types.js';
import { type FetchFn, redirectUriFor, requestProviderJson } from './http.js';

export const APPLE_AUTH_URL = 'https://appleid.apple.com/auth/authorize';
export const APPLE_TOKEN_URL = 'https://appleid.apple.com/auth/token';
export const APPLE_KEYS_URL = 'https://appleid.apple.com/auth/keys';
export const APPLE_ISSUER = 'https://appleid.apple.com';

const tokenResponseSchema = z.object({
  id_token: z.string().min(1),
});

// Apple sends email_verified as either a boolean or the string "true"/"false".
const identityClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email(),
  email_verified: z.union([z.boolean(), z.enum(['true', 'false'])]).optional(),
});

const appleUserSchema = z.object({
  name: z
    .object({
      firstName: z.string().optional(),
      lastName: z.string().optional(),
    })
    .optional(),
});

export type AppleProviderOptions = {
  credentials: OAuthClientCredentials | null;
  redirectBaseUrl: string;
  timeoutMs: number;
  fetchImpl?: FetchFn;
  /** Key set used to verify identity tokens. Defaults to Apple's published keys. */
  keySet?: JWTVerifyGetKey;
  now?: () => Date;
};

/**
 * Reads the display name out of the `user` form field Apple posts on first
 * consent. Returns null when absent or unreadable.
 */
export function parseAppleUserName(raw: string | null | undefined): string | null {
  if (!raw) {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = appleUserSchema.safeParse(json);
  if (!parsed.success || !parsed.data.name) {
    return null;
  }

  const { firstName, lastName } = parsed.data.name;
  const name = [firstName, lastName]
    .map((part) => part?.trim())
    .filter((part): part is string => Boolean(part))
    .join(' ');
  return name || null;
}

export class AppleOAuthProvider implements OAuthProvider {
  readonly id = APPLE_PROVIDER_ID;
  private readonly keySet: JWTVerifyGetKey;

  constructor(private readonly options: AppleProviderOptions) {
    this.keySet =
      options.keySet ??
      createRemoteJWKSet(new URL(APPLE_KEYS_URL), { timeoutDuration: options.timeoutMs });
  }

  isConfigured(): boolean {
    return this.options.credentials !== null;
  }

  buildAuthorizationUrl(state: string): string {
    const credentials = this.requireCredentials();
    const params = new URLSearchParams({
      client_id: credentials.clientId,
      redirect_uri: this.redirectUri,
      response_type: 'code',
      scope: 'name email',
      response_mode: 'form_post',
      state,
    });
    return `${APPLE_AUTH_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string, displayNameHint?: string | null): Promise<OAuthProfile> {
    const credentials = this.requireCredentials();

    const token = await requestProviderJson(
      APPLE_TOKEN_URL,
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
      { fetchImpl: this.options.fetchImpl, timeoutMs: this.options.timeoutMs }
    );

    let payload: unknown;
    try {
      const verified = await jwtVerify(token.id_token, this.keySet, {
        issuer: APPLE_ISSUER,
        audience: credentials.clientId,
        currentDate: this.options.now?.(),
      });
      payload = verified.payload;
    } catch (error) {
      throw new OAuthFailedError({ cause: error });
    }

    const claims = identityClaimsSchema.safeParse(payload);
    if (!claims.success) {
      throw new OAuthFailedError({ cause: claims.error });
    }

    const verifiedEmail = claims.data.email_verified;
    if (verifiedEmail === false || verifiedEmail === 'false') {
      throw new OAuthFailedError({ cause: new Error('Apple email is not verified') });
    }

    return {
      provider: APPLE_PROVIDER_ID,
      providerId: claims.data.sub,
      email: claims.data.email,
      displayName: displayNameHint ?? null,
      avatarUrl: null,
    };
  }

  private get redirectUri(): string {
    return redirectUriFor(this.options.redirectBaseUrl, APPLE_PROVIDER_ID);
  }

  private requireCredentials(): OAuthClientCredentials {
    if (!this.options.credentials) {
      throw new OAuthNotConfiguredError(APPLE_PROVIDER_ID);
    }
    return this.options.credentials;
  }
}
