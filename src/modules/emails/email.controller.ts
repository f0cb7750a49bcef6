/**
 * src/modules/emails/email.controller.ts
 *
 * WHY:
 * - Maps HTTP → EmailService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseInput } from '../../shared/http/parse-input';
import { requireUser } from '../../shared/http/require-auth-context';
import {
  accountParamsSchema,
  addAccountSchema,
  emailActionParamsSchema,
  emailParamsSchema,
  listEmailsQuerySchema,
  searchQuerySchema,
  syncSchema,
} from './email.schemas';
import type { EmailService } from './email.service';

export class EmailController {
  constructor(private readonly emailService: EmailService) {}

  async addAccount(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(addAccountSchema, req.body);
    const result = await this.emailService.addAccount(userId, body, req.requestContext.requestId);
    return reply.status(201).send(result);
  }

  async listAccounts(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    return reply.status(200).send(await this.emailService.listAccounts(userId));
  }

  async removeAccount(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const params = parseInput(accountParamsSchema, req.params, 'params');
    const result = await this.emailService.removeAccount(
      userId,
      params.accountId,
      req.requestContext.requestId,
    );
    return reply.status(200).send(result);
  }

  async sync(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(syncSchema, req.body ?? {});
    const result = await this.emailService.triggerSync(
      userId,
      body.account_id ?? null,
      req.requestContext.requestId,
    );
    return reply.status(202).send(result);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const query = parseInput(listEmailsQuerySchema, req.query, 'query');

    const items = await this.emailService.list(userId, {
      skip: query.skip,
      limit: query.limit,
      category: query.category ?? null,
      importanceMin: query.importance_min ?? null,
      unreadOnly: query.unread_only,
      includeArchived: query.include_archived,
    });

    return reply.status(200).send(items);
  }

  async search(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const query = parseInput(searchQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.emailService.search(userId, query.q, query.limit));
  }

  async stats(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    return reply.status(200).send(await this.emailService.stats(userId));
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const params = parseInput(emailParamsSchema, req.params, 'params');
    return reply.status(200).send(await this.emailService.getEmail(userId, params.id));
  }

  async action(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const params = parseInput(emailActionParamsSchema, req.params, 'params');
    const result = await this.emailService.performAction(
      userId,
      params.id,
      params.action,
      req.requestContext.requestId,
    );
    return reply.status(200).send(result);
  }
}
