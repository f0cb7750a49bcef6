/**
 * src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication state is attached to the request once and read everywhere.
 * - The bearer-token middleware (shared/auth) fills it in; before that all fields are null.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets the anonymous stub on every request.
 * 2. registerBearerAuth() overwrites it when a valid `Authorization: Bearer` token is sent.
 * 3. Controllers call requireUser(req) when the endpoint needs a user.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  userId: string | null;
  email: string | null;
  isActive: boolean;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function anonymousAuthContext(): AuthContext {
  return { userId: null, email: null, isActive: false };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = anonymousAuthContext();
    done();
  });
}
