/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseInput } from '../../shared/http/parse-input';
import { requireUser } from '../../shared/http/require-auth-context';
import { registerSchema, loginSchema } from './auth.schemas';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const body = parseInput(registerSchema, req.body);

    const result = await this.authService.register({
      email: body.email,
      password: body.password,
      fullName: body.full_name ?? null,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(result);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseInput(loginSchema, req.body);

    const result = await this.authService.login({
      email: body.email,
      password: body.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const user = await this.authService.me(userId);
    return reply.status(200).send(user);
  }
}
