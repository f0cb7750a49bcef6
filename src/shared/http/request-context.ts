/**
 * src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging and tracing.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  host: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "api.localhost:8000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

function readIncomingRequestId(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;
  return /^[A-Za-z0-9-]{8,64}$/.test(raw) ? raw : null;
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = readIncomingRequestId(req.headers['x-request-id']) ?? randomUUID();

    req.requestContext = {
      requestId,
      host: parseHost(req.headers.host),
    };
    void reply.header('x-request-id', requestId);

    done();
  });
}
