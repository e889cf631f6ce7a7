import { errors as joseErrors, SignJWT, jwtVerify } from 'jose';
import { z } from 'zod';
import { MAX_SESSION_TTL_MINUTES, MIN_SESSION_TTL_MINUTES } from '@commerce/auth';
import type { AuthCoreConfig, JwtAlgorithm } from './config.js';
import type { IssuedSessionToken, SessionClaims } from './types.js';

const sessionClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

export type SessionTokenCodecOptions = Pick<
  AuthCoreConfig,
  'jwtSecret' | 'jwtAlgorithm' | 'sessionTtlMinutes'
> & {
  now?: () => Date;
};

/**
 * Mints and checks stateless HMAC-signed session tokens.
 * Rotating the secret invalidates every outstanding token.
 */
export class SessionTokenCodec {
  private readonly key: Uint8Array;
  private readonly algorithm: JwtAlgorithm;
  private readonly defaultTtlMinutes: number;
  private readonly now: () => Date;

  constructor(options: SessionTokenCodecOptions) {
    assertTtl(options.sessionTtlMinutes);
    this.key = new TextEncoder().encode(options.jwtSecret);
    this.algorithm = options.jwtAlgorithm;
    this.defaultTtlMinutes = options.sessionTtlMinutes;
    this.now = options.now ?? (() => new Date());
  }

  get ttlMinutes(): number {
    return this.defaultTtlMinutes;
  }

  async issue(subjectId: string, email: string, ttlMinutes?: number): Promise<IssuedSessionToken> {
    const ttl = ttlMinutes ?? this.defaultTtlMinutes;
    assertTtl(ttl);

    const iat = Math.floor(this.now().getTime() / 1000);
    const exp = iat + ttl * 60;

    const token = await new SignJWT({ email })
      .setProtectedHeader({ alg: this.algorithm, typ: 'JWT' })
      .setSubject(subjectId)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .sign(this.key);

    return { token, claims: { sub: subjectId, email, iat, exp } };
  }

  /**
   * Returns the claims of a valid token, or null. Signature, structure,
   * algorithm and expiry failures are not distinguished.
   */
  async verify(token: string): Promise<SessionClaims | null> {
    if (!isCanonicalCompact(token)) {
      return null;
    }

    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: [this.algorithm],
        currentDate: this.now(),
        clockTolerance: 0,
      });
      const parsed = sessionClaimsSchema.safeParse(payload);
      return parsed.success ? parsed.data : null;
    } catch (error) {
      if (error instanceof joseErrors.JOSEError || error instanceof TypeError) {
        return null;
      }
      throw error;
    }
  }
}

const BASE64URL_SEGMENT = /^[A-Za-z0-9_-]*$/;

/**
 * The last character of a base64url segment may carry unused bits that
 * decoders ignore. Only the canonical encoding of each segment is accepted,
 * so no two token strings share one signature.
 */
function isCanonicalCompact(token: string): boolean {
  const segments = token.split('.');
  return (
    segments.length === 3 &&
    segments.every(
      (segment) =>
        BASE64URL_SEGMENT.test(segment) &&
        Buffer.from(segment, 'base64url').toString('base64url') === segment
    )
  );
}

function assertTtl(ttlMinutes: number): void {
  if (
    !Number.isInteger(ttlMinutes) ||
    ttlMinutes < MIN_SESSION_TTL_MINUTES ||
    ttlMinutes > MAX_SESSION_TTL_MINUTES
  ) {
    throw new RangeError(
      `Session TTL must be an integer between ${MIN_SESSION_TTL_MINUTES} and ${MAX_SESSION_TTL_MINUTES} minutes`
    );
  }
}
