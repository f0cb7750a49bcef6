/**
 * src/shared/auth/bearer-auth.middleware.ts
 *
 * WHY:
 * - Reads `Authorization: Bearer <jwt>` on every request.
 * - If the token is valid and its user exists, populates req.authContext.
 * - Does NOT throw; endpoints decide if auth is required (requireUser).
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - Best-effort: missing/invalid/expired token → anonymous context.
 * - A valid token whose user is gone or deactivated is attached with isActive=false,
 *   so the guard answers "User not found or inactive" instead of a credentials error.
 * - The user lookup is injected; shared code never imports modules.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { AccessTokenService } from '../security/access-token';

export type AuthUserLookup = (
  userId: string,
) => Promise<{ id: string; email: string; isActive: boolean } | undefined>;

const BEARER_PREFIX = 'bearer ';

export function readBearerToken(raw: string | undefined): string | null {
  if (!raw) return null;
  if (raw.slice(0, BEARER_PREFIX.length).toLowerCase() !== BEARER_PREFIX) return null;

  const token = raw.slice(BEARER_PREFIX.length).trim();
  return token ? token : null;
}

export function registerBearerAuth(
  app: FastifyInstance,
  deps: { tokens: AccessTokenService; loadUser: AuthUserLookup },
): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const token = readBearerToken(req.headers.authorization);
    if (!token) return;

    const claims = await deps.tokens.verify(token);
    if (!claims) return;

    const user = await deps.loadUser(claims.userId);
    if (!user) {
      req.authContext = { userId: claims.userId, email: claims.email, isActive: false };
      return;
    }

    req.authContext = {
      userId: user.id,
      email: user.email,
      isActive: user.isActive,
    };
  });
}
