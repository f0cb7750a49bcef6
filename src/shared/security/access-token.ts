/**
 * src/shared/security/access-token.ts
 *
 * WHY:
 * - The API is consumed by SPAs and mobile clients: stateless bearer tokens.
 * - HS256 JWT signed with SECRET_KEY; `sub` is the user id.
 *
 * RULES:
 * - verify() never throws: invalid, expired or malformed tokens return null.
 *   The HTTP guard decides whether a missing identity is an error.
 */

import { SignJWT, jwtVerify } from 'jose';

export type AccessTokenClaims = {
  userId: string;
  email: string;
};

export type IssuedAccessToken = {
  token: string;
  expiresInSeconds: number;
};

export class AccessTokenService {
  private readonly key: Uint8Array;

  constructor(
    secretKey: string,
    private readonly opts: { algorithm: 'HS256'; expireMinutes: number },
  ) {
    this.key = new TextEncoder().encode(secretKey);
  }

  async issue(claims: AccessTokenClaims): Promise<IssuedAccessToken> {
    const expiresInSeconds = this.opts.expireMinutes * 60;

    const token = await new SignJWT({ email: claims.email })
      .setProtectedHeader({ alg: this.opts.algorithm })
      .setSubject(claims.userId)
      .setIssuedAt()
      .setExpirationTime(`${this.opts.expireMinutes}m`)
      .sign(this.key);

    return { token, expiresInSeconds };
  }

  async verify(token: string): Promise<AccessTokenClaims | null> {
    try {
      const { payload } = await jwtVerify(token, this.key, {
        algorithms: [this.opts.algorithm],
      });

      if (typeof payload.sub !== 'string' || typeof payload.email !== 'string') return null;
      return { userId: payload.sub, email: payload.email };
    } catch {
      return null;
    }
  }
}
