import { createHash, randomBytes, timingSafeEqual } from 'node:crypto';
import {
  type AuthEventEmitter,
  type OAuthProviderId,
  authEvents,
  hashPassword,
  verifyPassword,
} from '@commerce/auth';
import { AccountResolver, normalizeEmail } from './account-resolver.js';
import type { AuthCoreConfig } from './config.js';
import {
  AccountDisabledError,
  AccountNotFoundError,
  AuthCoreError,
  AuthInternalError,
  DuplicateAccountError,
  InvalidCredentialsError,
  OAuthFailedError,
  OAuthNotConfiguredError,
  TokenInvalidError,
  UniqueViolationError,
} from './errors.js';
import type { AccountStore, AuthService } from './interfaces.js';
import {
  type CreateOAuthProvidersOptions,
  type OAuthProviderRegistry,
  createOAuthProviders,
} from './oauth/index.js';
import { SessionTokenCodec } from './session-token.js';
import type {
  AccountRecord,
  AuthResult,
  AuthenticateInput,
  AuthorizationUrl,
  LoginInput,
  OAuthLoginInput,
  OAuthProfile,
  PublicUser,
  RegisterInput,
} from './types.js';
import { toPublicUser } from './views.js';

type AuthCoreServiceDependencies = {
  store: AccountStore;
  tokens: SessionTokenCodec;
  providers: OAuthProviderRegistry;
  events?: AuthEventEmitter;
  hashPassword?: (password: string) => Promise<string>;
  verifyPassword?: (password: string, hash: string) => Promise<boolean>;
  generateState?: () => string;
};

export function extractBearer(header?: string | null): string | null {
  if (!header) {
    return null;
  }
  const trimmed = header.trim();
  if (!trimmed.toLowerCase().startsWith('bearer ')) {
    return null;
  }
  const token = trimmed.slice(7).trim();
  return token.length > 0 ? token : null;
}

function statesMatch(received: string, expected: string): boolean {
  if (!received || !expected) {
    return false;
  }
  const a = createHash('sha256').update(received).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

type TokenLookup =
  | { user: PublicUser }
  | { reason: 'invalid' }
  | { reason: 'unknown_subject'; subject: string };

function selectToken(input: AuthenticateInput): string | null {
  return extractBearer(input.authorizationHeader) ?? (input.cookieToken?.trim() || null);
}

function defaultState(): string {
  return randomBytes(32).toString('base64url');
}

export class AuthCoreService implements AuthService {
  private readonly store: AccountStore;
  private readonly resolver: AccountResolver;
  private readonly tokens: SessionTokenCodec;
  private readonly providers: OAuthProviderRegistry;
  private readonly events: AuthEventEmitter;
  private readonly hash: (password: string) => Promise<string>;
  private readonly verifyHash: (password: string, hash: string) => Promise<boolean>;
  private readonly generateState: () => string;
  private dummyCredential: Promise<string> | null = null;

  constructor(dependencies: AuthCoreServiceDependencies) {
    this.store = dependencies.store;
    this.resolver = new AccountResolver(dependencies.store);
    this.tokens = dependencies.tokens;
    this.providers = dependencies.providers;
    this.events = dependencies.events ?? authEvents;
    this.hash = dependencies.hashPassword ?? hashPassword;
    this.verifyHash = dependencies.verifyPassword ?? verifyPassword;
    this.generateState = dependencies.generateState ?? defaultState;
  }

  async register(input: RegisterInput): Promise<PublicUser> {
    const email = normalizeEmail(input.email);

    const existing = await this.withStore(() => this.resolver.resolvePasswordIdentity(email));
    if (existing) {
      throw new DuplicateAccountError();
    }

    const passwordHash = await this.hash(input.password);

    let account: AccountRecord;
    try {
      account = await this.store.insert({
        email,
        passwordHash,
        oauthProvider: null,
        oauthId: null,
        displayName: input.displayName?.trim() || null,
        avatarUrl: null,
      });
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new DuplicateAccountError({ cause: error });
      }
      throw new AuthInternalError({ cause: error });
    }

    this.events.emit({
      type: 'user.registered',
      userId: account.id,
      email: account.email,
      ...(input.ip ? { ip: input.ip } : {}),
    });

    return toPublicUser(account);
  }

  async login(input: LoginInput): Promise<AuthResult> {
    const email = normalizeEmail(input.email);
    const ip = input.ip ? { ip: input.ip } : {};

    const account = await this.withStore(() => this.resolver.resolvePasswordIdentity(email));
    if (!account) {
      await this.verifyAgainstDummy(input.password);
      this.events.emit({
        type: 'user.login.failed',
        email,
        ...ip,
        metadata: { reason: 'unknown_email' },
      });
      throw new InvalidCredentialsError();
    }

    if (!account.passwordHash) {
      await this.verifyAgainstDummy(input.password);
      this.events.emit({
        type: 'user.login.failed',
        userId: account.id,
        email,
        ...ip,
        metadata: { reason: 'no_password' },
      });
      throw new InvalidCredentialsError();
    }

    const valid = await this.verifyHash(input.password, account.passwordHash);
    if (!valid) {
      this.events.emit({
        type: 'user.login.failed',
        userId: account.id,
        email,
        ...ip,
        metadata: { reason: 'invalid_password' },
      });
      throw new InvalidCredentialsError();
    }

    if (!account.isActive) {
      this.events.emit({
        type: 'user.login.failed',
        userId: account.id,
        email,
        ...ip,
        metadata: { reason: 'account_disabled' },
      });
      throw new AccountDisabledError();
    }

    const result = await this.issueFor(account);
    this.events.emit({
      type: 'user.login.success',
      userId: account.id,
      email: account.email,
      ...ip,
    });
    return result;
  }

  getAuthorizationUrl(provider: OAuthProviderId): AuthorizationUrl {
    const client = this.providers[provider];
    if (!client.isConfigured()) {
      throw new OAuthNotConfiguredError(provider);
    }

    const state = this.generateState();
    return { authorizationUrl: client.buildAuthorizationUrl(state), state };
  }

  async oauthLogin(input: OAuthLoginInput): Promise<AuthResult> {
    const client = this.providers[input.provider];
    if (!client.isConfigured()) {
      throw new OAuthNotConfiguredError(input.provider);
    }

    const ip = input.ip ? { ip: input.ip } : {};

    let account: AccountRecord;
    let outcome: 'matched' | 'linked' | 'created';
    try {
      if (input.expectedState !== undefined && !statesMatch(input.state, input.expectedState)) {
        throw new OAuthFailedError({ cause: new Error('OAuth state mismatch') });
      }

      const profile: OAuthProfile = await client.exchangeCode(input.code, input.displayNameHint);
      const resolution = await this.resolver.resolveOAuthIdentity(profile);
      account = resolution.account;
      outcome = resolution.outcome;
    } catch (error) {
      const failure =
        error instanceof AuthCoreError ? error : new OAuthFailedError({ cause: error });
      this.events.emit({
        type: 'user.oauth.failed',
        ...ip,
        metadata: { provider: input.provider, kind: failure.kind },
      });
      throw failure;
    }

    if (!account.isActive) {
      throw new AccountDisabledError();
    }

    const result = await this.issueFor(account);
    this.events.emit({
      type: 'user.oauth.login',
      userId: account.id,
      email: account.email,
      ...ip,
      metadata: { provider: input.provider, outcome },
    });
    return result;
  }

  async verify(token: string): Promise<PublicUser> {
    const outcome = await this.lookupToken(token);
    if ('reason' in outcome) {
      this.events.emit({
        type: 'token.auth_failed',
        ...(outcome.reason === 'unknown_subject' ? { userId: outcome.subject } : {}),
        metadata: { reason: outcome.reason },
      });
      throw outcome.reason === 'invalid' ? new TokenInvalidError() : new AccountNotFoundError();
    }
    return outcome.user;
  }

  /**
   * Bearer header first, then the session cookie.
   */
  async authenticate(input: AuthenticateInput): Promise<PublicUser> {
    const token = selectToken(input);
    if (!token) {
      this.events.emit({ type: 'token.auth_failed', metadata: { reason: 'missing' } });
      throw new TokenInvalidError();
    }
    return this.verify(token);
  }

  async findSessionUser(input: AuthenticateInput): Promise<PublicUser | null> {
    const token = selectToken(input);
    if (!token) {
      return null;
    }
    const outcome = await this.lookupToken(token);
    return 'user' in outcome ? outcome.user : null;
  }

  async deactivate(userId: string): Promise<boolean> {
    const account = await this.withStore(() => this.resolver.resolveSubject(userId));
    if (!account) {
      return false;
    }

    const deactivated = await this.withStore(() => this.store.deactivate(account.id));
    if (deactivated) {
      this.events.emit({ type: 'user.deactivated', userId: account.id, email: account.email });
    }
    return deactivated;
  }

  private async lookupToken(token: string): Promise<TokenLookup> {
    const claims = await this.tokens.verify(token);
    if (!claims) {
      return { reason: 'invalid' };
    }

    const account = await this.withStore(() => this.resolver.resolveSubject(claims.sub));
    if (!account || !account.isActive) {
      return { reason: 'unknown_subject', subject: claims.sub };
    }
    return { user: toPublicUser(account) };
  }

  /**
   * Unknown emails and passwordless accounts still pay for one hash check,
   * so response time does not reveal which accounts exist.
   */
  private async verifyAgainstDummy(password: string): Promise<void> {
    if (!this.dummyCredential) {
      this.dummyCredential = this.hash(randomBytes(16).toString('hex'));
    }
    await this.verifyHash(password, await this.dummyCredential);
  }

  private async issueFor(account: AccountRecord): Promise<AuthResult> {
    const { token, claims } = await this.tokens.issue(account.id, account.email);
    return {
      accessToken: token,
      tokenType: 'bearer',
      expiresAt: new Date(claims.exp * 1000).toISOString(),
      user: toPublicUser(account),
    };
  }

  private async withStore<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof AuthCoreError) {
        throw error;
      }
      throw new AuthInternalError({ cause: error });
    }
  }
}

export type CreateAuthServiceOptions = CreateOAuthProvidersOptions & {
  store: AccountStore;
  events?: AuthEventEmitter;
  now?: () => Date;
};

export function createAuthService(
  config: AuthCoreConfig,
  options: CreateAuthServiceOptions
): AuthCoreService {
  const { store, events, now, ...providerOptions } = options;
  return new AuthCoreService({
    store,
    tokens: new SessionTokenCodec({ ...config, ...(now ? { now } : {}) }),
    providers: createOAuthProviders(config, providerOptions),
    ...(events ? { events } : {}),
  });
}
