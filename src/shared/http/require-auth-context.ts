/**
 * src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require user" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 *
 * Guard sequence:
 * 1) no valid token                  -> 401 "Could not validate credentials"
 * 2) user missing or deactivated     -> 401 "User not found or inactive"
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type RequiredAuthContext = Readonly<{
  userId: string;
  email: string;
}>;

export function requireUser(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;

  if (!ctx || !ctx.userId || !ctx.email) {
    throw AppError.unauthorized('Could not validate credentials');
  }

  if (!ctx.isActive) {
    throw AppError.unauthorized('User not found or inactive');
  }

  return { userId: ctx.userId, email: ctx.email };
}
