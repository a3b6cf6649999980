import { createRemoteJWKSet, jwtVerify, type JWTVerifyGetKey } from 'jose';
import { z } from 'zod';
import type { RuntimeConfig } from './config.js';
import type { SessionUser } from './types.js';

const GOOGLE_CERTS_URL = 'https://www.googleapis.com/oauth2/v3/certs';
const GOOGLE_ISSUERS = ['https://accounts.google.com', 'accounts.google.com'];

const GoogleClaimsSchema = z.object({
  sub: z.string().min(1),
  hd: z.string().optional(),
  email: z.string().email(),
  email_verified: z.boolean(),
  name: z.string().optional(),
  picture: z.string().optional(),
});

export type IdentityCheck =
  | { ok: true; user: SessionUser }
  | { ok: false; status: 401 | 403; error: string; message?: string };

/** Verifies Google ID tokens and restricts them to one hosted domain. */
export class GoogleIdentityVerifier {
  constructor(
    private readonly config: Pick<RuntimeConfig, 'googleClientId' | 'allowedDomain'>,
    private readonly keys: JWTVerifyGetKey = createRemoteJWKSet(new URL(GOOGLE_CERTS_URL)),
  ) {}

  async verify(idToken: string): Promise<IdentityCheck> {
    const audience = this.config.googleClientId;
    if (!audience) {
      throw new Error('GOOGLE_CLIENT_ID is not configured');
    }

    let claims: unknown;
    try {
      const { payload } = await jwtVerify(idToken, this.keys, { issuer: GOOGLE_ISSUERS, audience });
      claims = payload;
    } catch {
      return { ok: false, status: 401, error: 'Invalid token' };
    }

    const parsed = GoogleClaimsSchema.safeParse(claims);
    if (!parsed.success) {
      return { ok: false, status: 401, error: 'Invalid token' };
    }

    const google = parsed.data;
    if (google.hd?.toLowerCase() !== this.config.allowedDomain) {
      return {
        ok: false,
        status: 403,
        error: 'Access denied',
        message: `Only @${this.config.allowedDomain} accounts are allowed`,
      };
    }
    if (!google.email_verified) {
      return { ok: false, status: 403, error: 'Email not verified' };
    }

    return {
      ok: true,
      user: {
        id: google.sub,
        email: google.email,
        displayName: google.name ?? google.email,
        photoURL: google.picture ?? null,
      },
    };
  }
}
