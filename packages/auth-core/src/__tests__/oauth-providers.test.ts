import {
  type KeyLike,
  SignJWT,
  createLocalJWKSet,
  exportJWK,
  generateKeyPair,
} from 'jose';
import { beforeAll, describe, expect, it, vi } from 'vitest';
import { OAuthFailedError, OAuthNotConfiguredError } from '../errors.js';
import {
  APPLE_ISSUER,
  APPLE_TOKEN_URL,
  AppleOAuthProvider,
  type FetchFn,
  GOOGLE_TOKEN_URL,
  GOOGLE_USERINFO_URL,
  GoogleOAuthProvider,
  createOAuthProviders,
  parseAppleUserName,
} from '../oauth/index.js';

const REDIRECT_BASE = 'https://shop.example.com';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function googleFetch(userInfo: Record<string, unknown>) {
  return vi.fn<FetchFn>(async (input) => {
    if (String(input) === GOOGLE_TOKEN_URL) {
      return jsonResponse({ access_token: 'test-access-token', token_type: 'Bearer' });
    }
    return jsonResponse(userInfo);
  });
}

function createGoogle(fetchImpl?: FetchFn) {
  return new GoogleOAuthProvider({
    credentials: { clientId: 'google-client', clientSecret: 'test-secret' },
    redirectBaseUrl: REDIRECT_BASE,
    timeoutMs: 5000,
    ...(fetchImpl ? { fetchImpl } : {}),
  });
}

describe('GoogleOAuthProvider', () => {
  const verifiedUser = {
    sub: 'g-123',
    email: 'shopper@example.com',
    email_verified: true,
    name: 'Sam Shopper',
    picture: 'https://example.com/sam.png',
  };

  it('builds the authorization URL', () => {
    const url = new URL(createGoogle().buildAuthorizationUrl('state-123'));

    expect(`${url.origin}${url.pathname}`).toBe('https://accounts.google.com/o/oauth2/v2/auth');
    expect(url.searchParams.get('client_id')).toBe('google-client');
    expect(url.searchParams.get('redirect_uri')).toBe(
      'https://shop.example.com/api/auth/google/callback'
    );
    expect(url.searchParams.get('scope')).toBe('openid email profile');
    expect(url.searchParams.get('response_type')).toBe('code');
    expect(url.searchParams.get('state')).toBe('state-123');
  });

  it('exchanges the code and reads the profile', async () => {
    const fetchImpl = googleFetch(verifiedUser);

    const profile = await createGoogle(fetchImpl).exchangeCode('auth-code');

    expect(profile).toEqual({
      provider: 'google',
      providerId: 'g-123',
      email: 'shopper@example.com',
      displayName: 'Sam Shopper',
      avatarUrl: 'https://example.com/sam.png',
    });

    const [tokenUrl, tokenInit] = fetchImpl.mock.calls[0] ?? [];
    expect(tokenUrl).toBe(GOOGLE_TOKEN_URL);
    const body = new URLSearchParams(String(tokenInit?.body));
    expect(body.get('code')).toBe('auth-code');
    expect(body.get('grant_type')).toBe('authorization_code');
    expect(body.get('redirect_uri')).toBe('https://shop.example.com/api/auth/google/callback');
    expect(tokenInit?.signal).toBeInstanceOf(AbortSignal);

    const [profileUrl, profileInit] = fetchImpl.mock.calls[1] ?? [];
    expect(profileUrl).toBe(GOOGLE_USERINFO_URL);
    expect(new Headers(profileInit?.headers).get('authorization')).toBe('Bearer test-access-token');
  });

  it('rejects an unverified email', async () => {
    const provider = createGoogle(googleFetch({ ...verifiedUser, email_verified: false }));

    await expect(provider.exchangeCode('auth-code')).rejects.toBeInstanceOf(OAuthFailedError);
  });

  it('rejects a profile without an email', async () => {
    const { email: _email, ...withoutEmail } = verifiedUser;
    const provider = createGoogle(googleFetch(withoutEmail));

    await expect(provider.exchangeCode('auth-code')).rejects.toBeInstanceOf(OAuthFailedError);
  });

  it('fails with OAuthFailedError when the provider does not answer in time', async () => {
    const fetchImpl = vi.fn<FetchFn>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init.signal?.reason), {
            once: true,
          });
        })
    );
    const provider = new GoogleOAuthProvider({
      credentials: { clientId: 'google-client', clientSecret: 'test-secret' },
      redirectBaseUrl: REDIRECT_BASE,
      timeoutMs: 50,
      fetchImpl,
    });

    const error = await provider.exchangeCode('auth-code').then(
      () => null,
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(OAuthFailedError);
    expect(error instanceof OAuthFailedError ? error.cause : null).toBeInstanceOf(DOMException);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('rejects a non-2xx token response', async () => {
    const fetchImpl = vi.fn<FetchFn>(async () => jsonResponse({ error: 'invalid_grant' }, 400));

    await expect(createGoogle(fetchImpl).exchangeCode('auth-code')).rejects.toBeInstanceOf(
      OAuthFailedError
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('wraps transport errors and keeps the cause', async () => {
    const networkError = new TypeError('fetch failed');
    const fetchImpl = vi.fn<FetchFn>(async () => {
      throw networkError;
    });

    const error = await createGoogle(fetchImpl)
      .exchangeCode('auth-code')
      .then(
        () => null,
        (caught: unknown) => caught
      );

    expect(error).toBeInstanceOf(OAuthFailedError);
    expect(error instanceof Error ? error.cause : null).toBe(networkError);
  });

  it('refuses to run without credentials', async () => {
    const provider = new GoogleOAuthProvider({
      credentials: null,
      redirectBaseUrl: REDIRECT_BASE,
      timeoutMs: 5000,
    });

    expect(provider.isConfigured()).toBe(false);
    expect(() => provider.buildAuthorizationUrl('state')).toThrow(OAuthNotConfiguredError);
    await expect(provider.exchangeCode('code')).rejects.toBeInstanceOf(OAuthNotConfiguredError);
  });
});

describe('AppleOAuthProvider', () => {
  const CLIENT_ID = 'com.example.shop';
  let privateKey: KeyLike;
  let otherPrivateKey: KeyLike;
  let keySet: ReturnType<typeof createLocalJWKSet>;

  beforeAll(async () => {
    const pair = await generateKeyPair('RS256');
    const other = await generateKeyPair('RS256');
    privateKey = pair.privateKey;
    otherPrivateKey = other.privateKey;
    const jwk = await exportJWK(pair.publicKey);
    keySet = createLocalJWKSet({ keys: [{ ...jwk, kid: 'apple-test-key', alg: 'RS256' }] });
  });

  async function identityToken(
    claims: Record<string, unknown>,
    options: { audience?: string; key?: KeyLike } = {}
  ): Promise<string> {
    return new SignJWT(claims)
      .setProtectedHeader({ alg: 'RS256', kid: 'apple-test-key' })
      .setIssuer(APPLE_ISSUER)
      .setAudience(options.audience ?? CLIENT_ID)
      .setSubject('apple-001')
      .setIssuedAt()
      .setExpirationTime('5m')
      .sign(options.key ?? privateKey);
  }

  function createApple(idToken: string) {
    const fetchImpl = vi.fn<FetchFn>(async () => jsonResponse({ id_token: idToken }));
    const provider = new AppleOAuthProvider({
      credentials: { clientId: CLIENT_ID, clientSecret: 'test-secret' },
      redirectBaseUrl: REDIRECT_BASE,
      timeoutMs: 5000,
      fetchImpl,
      keySet,
    });
    return { provider, fetchImpl };
  }

  it('builds a form_post authorization URL', async () => {
    const { provider } = createApple('unused');
    const url = new URL(provider.buildAuthorizationUrl('state-abc'));

    expect(`${url.origin}${url.pathname}`).toBe('https://appleid.apple.com/auth/authorize');
    expect(url.searchParams.get('scope')).toBe('name email');
    expect(url.searchParams.get('response_mode')).toBe('form_post');
    expect(url.searchParams.get('redirect_uri')).toBe(
      'https://shop.example.com/api/auth/apple/callback'
    );
  });

  it('verifies the identity token and uses the callback name', async () => {
    const token = await identityToken({ email: 'buyer@example.com', email_verified: 'true' });
    const { provider, fetchImpl } = createApple(token);

    const profile = await provider.exchangeCode('apple-code', 'Jane Doe');

    expect(profile).toEqual({
      provider: 'apple',
      providerId: 'apple-001',
      email: 'buyer@example.com',
      displayName: 'Jane Doe',
      avatarUrl: null,
    });
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(APPLE_TOKEN_URL);
  });

  it('rejects a token issued for another client', async () => {
    const token = await identityToken(
      { email: 'buyer@example.com', email_verified: true },
      { audience: 'com.example.other' }
    );

    await expect(createApple(token).provider.exchangeCode('apple-code')).rejects.toBeInstanceOf(
      OAuthFailedError
    );
  });

  it('rejects a token signed with an unknown key', async () => {
    const token = await identityToken(
      { email: 'buyer@example.com', email_verified: true },
      { key: otherPrivateKey }
    );

    await expect(createApple(token).provider.exchangeCode('apple-code')).rejects.toBeInstanceOf(
      OAuthFailedError
    );
  });

  it('rejects an unverified email', async () => {
    const token = await identityToken({ email: 'buyer@example.com', email_verified: 'false' });

    await expect(createApple(token).provider.exchangeCode('apple-code')).rejects.toBeInstanceOf(
      OAuthFailedError
    );
  });

  it('rejects a token without an email', async () => {
    const token = await identityToken({ email_verified: true });

    await expect(createApple(token).provider.exchangeCode('apple-code')).rejects.toBeInstanceOf(
      OAuthFailedError
    );
  });
});

describe('parseAppleUserName', () => {
  it.each([
    ['{"name":{"firstName":"Jane","lastName":"Doe"}}', 'Jane Doe'],
    ['{"name":{"firstName":" Jane "}}', 'Jane'],
    ['{"name":{}}', null],
    ['{"email":"buyer@example.com"}', null],
    ['not json', null],
    ['', null],
  ])('reads %j as %j', (raw, expected) => {
    expect(parseAppleUserName(raw)).toBe(expected);
  });
});

describe('createOAuthProviders', () => {
  it('enables only providers with both credentials', () => {
    const providers = createOAuthProviders({
      google: { clientId: 'google-client', clientSecret: 'test-secret' },
      apple: null,
      oauthRedirectBaseUrl: REDIRECT_BASE,
      oauthTimeoutMs: 1000,
    });

    expect(providers.google.isConfigured()).toBe(true);
    expect(providers.apple.isConfigured()).toBe(false);
  });
});
