import { jwtVerify, SignJWT } from 'jose';
import { z } from 'zod';
import type { RuntimeConfig } from './config.js';
import type { Principal, SessionUser } from './types.js';

export const SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;
const REFRESH_TTL = '30d';

export type SessionCheck =
  | { valid: true; principal: Principal }
  | { valid: false; error: string };

export type IssuedTokens = {
  access_token: string;
  refresh_token: string;
  expires_in: number;
};

const SessionUserSchema = z.object({
  id: z.string().min(1),
  email: z.string().email(),
  displayName: z.string().default(''),
  photoURL: z.string().nullable().default(null),
});

const SessionClaimsSchema = z.object({
  sub: z.string().min(1),
  exp: z.number(),
  typ: z.literal('session'),
  user: SessionUserSchema,
});

const RefreshClaimsSchema = z.object({
  sub: z.string().min(1),
  typ: z.literal('refresh'),
  user: SessionUserSchema,
});

export function emailInDomain(email: string, domain: string): boolean {
  return email.toLowerCase().endsWith(`@${domain.toLowerCase()}`);
}

/**
 * Issues and verifies the HS256 session tokens handed to the client after a
 * Google sign-in. Refresh tokens carry `typ: refresh` and are never accepted
 * as bearer credentials.
 */
export class SessionTokens {
  private readonly secret: Uint8Array;

  constructor(private readonly config: Pick<RuntimeConfig, 'jwtSecret' | 'allowedDomain'>) {
    this.secret = new TextEncoder().encode(config.jwtSecret);
  }

  async verify(authHeader: string | undefined): Promise<SessionCheck> {
    const match = authHeader?.match(/^Bearer\s+(\S+)$/i);
    if (!match) {
      return { valid: false, error: 'Missing or invalid Authorization header' };
    }

    let claims: unknown;
    try {
      const { payload } = await jwtVerify(match[1], this.secret, { algorithms: ['HS256'] });
      claims = payload;
    } catch {
      return { valid: false, error: 'Invalid or expired token' };
    }

    const parsed = SessionClaimsSchema.safeParse(claims);
    if (!parsed.success) {
      return { valid: false, error: 'Invalid or expired token' };
    }
    if (!emailInDomain(parsed.data.user.email, this.config.allowedDomain)) {
      return { valid: false, error: 'Account domain is not allowed' };
    }

    return {
      valid: true,
      principal: {
        id: parsed.data.sub,
        email: parsed.data.user.email,
        expiresAt: new Date(parsed.data.exp * 1000),
      },
    };
  }

  async issue(user: SessionUser): Promise<IssuedTokens> {
    const accessToken = await this.sign(user, 'session', `${SESSION_TTL_SECONDS}s`);
    const refreshToken = await this.sign(user, 'refresh', REFRESH_TTL);
    return {
      access_token: accessToken,
      refresh_token: refreshToken,
      expires_in: SESSION_TTL_SECONDS,
    };
  }

  /** Returns a fresh access token, or null when the refresh token is unusable. */
  async refresh(refreshToken: string): Promise<IssuedTokens | null> {
    let claims: unknown;
    try {
      const { payload } = await jwtVerify(refreshToken, this.secret, { algorithms: ['HS256'] });
      claims = payload;
    } catch {
      return null;
    }

    const parsed = RefreshClaimsSchema.safeParse(claims);
    if (!parsed.success || !emailInDomain(parsed.data.user.email, this.config.allowedDomain)) {
      return null;
    }

    return {
      access_token: await this.sign(parsed.data.user, 'session', `${SESSION_TTL_SECONDS}s`),
      refresh_token: refreshToken,
      expires_in: SESSION_TTL_SECONDS,
    };
  }

  private sign(user: SessionUser, typ: 'session' | 'refresh', ttl: string): Promise<string> {
    return new SignJWT({ user, typ })
      .setProtectedHeader({ alg: 'HS256' })
      .setIssuedAt()
      .setExpirationTime(ttl)
      .setSubject(user.id)
      .sign(this.secret);
  }
}
