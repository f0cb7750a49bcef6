/**
 * src/modules/analytics/analytics.controller.ts
 *
 * WHY:
 * - Maps HTTP → AnalyticsService.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseInput } from '../../shared/http/parse-input';
import { requireUser } from '../../shared/http/require-auth-context';
import {
  sendersQuerySchema,
  timeSeriesQuerySchema,
  volumeQuerySchema,
  windowQuerySchema,
} from './analytics.schemas';
import type { AnalyticsService } from './analytics.service';

export class AnalyticsController {
  constructor(private readonly analyticsService: AnalyticsService) {}

  async overview(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(windowQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.analyticsService.overview(userId, q.days));
  }

  async senders(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(sendersQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.analyticsService.senders(userId, q.days, q.limit));
  }

  async timeSeries(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(timeSeriesQuerySchema, req.query, 'query');
    const result = await this.analyticsService.timeSeries(userId, q.days, q.granularity);
    return reply.status(200).send(result);
  }

  async categoryTrends(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(windowQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.analyticsService.categoryTrends(userId, q.days));
  }

  async productivity(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(windowQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.analyticsService.productivity(userId, q.days));
  }

  async volume(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(volumeQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.analyticsService.volume(userId, q.days, q.period));
  }
}
