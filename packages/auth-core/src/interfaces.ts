import type {
  AccountRecord,
  AuthResult,
  AuthenticateInput,
  AuthorizationUrl,
  LoginInput,
  NewAccount,
  OAuthLoginInput,
  OAuthProfile,
  OAuthProviderId,
  PublicUser,
  RegisterInput,
} from './types.js';

/**
 * Persistence boundary for accounts. Every finder only sees active accounts.
 * Writes that collide with a unique index throw UniqueViolationError.
 */
export interface AccountStore {
  findByEmail(email: string): Promise<AccountRecord | null>;
  findByOAuth(provider: OAuthProviderId, oauthId: string): Promise<AccountRecord | null>;
  findById(id: string): Promise<AccountRecord | null>;
  insert(account: NewAccount): Promise<AccountRecord>;
  update(account: AccountRecord): Promise<AccountRecord>;
  deactivate(id: string): Promise<boolean>;
}

export interface OAuthProvider {
  readonly id: OAuthProviderId;
  isConfigured(): boolean;
  buildAuthorizationUrl(state: string): string;
  /**
   * Exchanges an authorization code for the provider's identity claim.
   * `displayNameHint` carries a name the provider sent outside the token.
   */
  exchangeCode(code: string, displayNameHint?: string | null): Promise<OAuthProfile>;
}

export interface AuthService {
  register(input: RegisterInput): Promise<PublicUser>;
  login(input: LoginInput): Promise<AuthResult>;
  getAuthorizationUrl(provider: OAuthProviderId): AuthorizationUrl;
  oauthLogin(input: OAuthLoginInput): Promise<AuthResult>;
  verify(token: string): Promise<PublicUser>;
  authenticate(input: AuthenticateInput): Promise<PublicUser>;
  /** Like authenticate, but returns null instead of failing and records no audit event */
  findSessionUser(input: AuthenticateInput): Promise<PublicUser | null>;
  deactivate(userId: string): Promise<boolean>;
}
