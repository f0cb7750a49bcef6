/**
 * src/modules/ai-insights/ai-insights.controller.ts
 *
 * WHY:
 * - Maps HTTP → AiInsightsService.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here (metering and plan gates live in the service).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { parseInput } from '../../shared/http/parse-input';
import { requireUser } from '../../shared/http/require-auth-context';
import {
  analyzeBatchSchema,
  analyzeSingleSchema,
  classifySchema,
  emailParamsSchema,
  executiveSummarySchema,
  generateInsightsSchema,
  historyQuerySchema,
  insightsSummaryQuerySchema,
  sentimentQuerySchema,
  trendsQuerySchema,
} from './ai-insights.schemas';
import type { AiInsightsService } from './ai-insights.service';

export class AiInsightsController {
  constructor(private readonly aiService: AiInsightsService) {}

  async analyzeSingle(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(analyzeSingleSchema, req.body);
    const result = await this.aiService.analyzeSingle(
      userId,
      body.email_id,
      req.requestContext.requestId,
    );
    return reply.status(200).send(result);
  }

  async analyzeBatch(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(analyzeBatchSchema, req.body);
    const result = await this.aiService.analyzeBatch(
      userId,
      body.email_ids,
      req.requestContext.requestId,
    );
    return reply.status(202).send(result);
  }

  async insightsSummary(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(insightsSummaryQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.aiService.insightsSummary(userId, q.days));
  }

  async classify(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(classifySchema, req.body);
    return reply.status(200).send(await this.aiService.classify(userId, body));
  }

  async sentiment(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(sentimentQuerySchema, req.query, 'query');
    const result = await this.aiService.sentimentAnalysis(userId, q.days, q.sender_filter ?? null);
    return reply.status(200).send(result);
  }

  async trends(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(trendsQuerySchema, req.query, 'query');
    return reply.status(200).send(await this.aiService.trendAnalysis(userId, q.days));
  }

  async unsubscribeRecommendations(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    return reply.status(200).send(await this.aiService.unsubscribeRecommendations(userId));
  }

  async executiveSummary(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(executiveSummarySchema, req.body ?? {});
    const result = await this.aiService.executiveSummary(
      userId,
      body.days,
      req.requestContext.requestId,
    );
    return reply.status(200).send(result);
  }

  async predictions(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    return reply.status(200).send(await this.aiService.predictions(userId));
  }

  async generateInsights(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const body = parseInput(generateInsightsSchema, req.body ?? {});
    const result = await this.aiService.generateInsights(
      userId,
      body.time_period,
      req.requestContext.requestId,
    );
    return reply.status(200).send(result);
  }

  async history(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const q = parseInput(historyQuerySchema, req.query, 'query');
    const result = await this.aiService.history(userId, q.limit, q.insight_type ?? null);
    return reply.status(200).send(result);
  }

  async emailSummary(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireUser(req);
    const params = parseInput(emailParamsSchema, req.params, 'params');
    return reply.status(200).send(await this.aiService.emailSummary(userId, params.id));
  }
}
