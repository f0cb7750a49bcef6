/**
 * src/modules/ai-insights/ai-insights.routes.ts
 *
 * WHY:
 * - Declares AI module endpoints (all authenticated, all metered).
 */

import type { FastifyInstance } from 'fastify';
import type { AiInsightsController } from './ai-insights.controller';

export function registerAiInsightsRoutes(app: FastifyInstance, controller: AiInsightsController) {
  app.post('/ai/analyze/single', controller.analyzeSingle.bind(controller));
  app.post('/ai/analyze/batch', controller.analyzeBatch.bind(controller));
  app.get('/ai/insights/summary', controller.insightsSummary.bind(controller));
  app.post('/ai/classify', controller.classify.bind(controller));
  app.get('/ai/sentiment/analysis', controller.sentiment.bind(controller));
  app.get('/ai/trends/analysis', controller.trends.bind(controller));
  app.get('/ai/unsubscribe-recommendations', controller.unsubscribeRecommendations.bind(controller));
  app.post('/ai/executive-summary', controller.executiveSummary.bind(controller));
  app.get('/ai/predictions', controller.predictions.bind(controller));
  app.post('/ai/insights/generate', controller.generateInsights.bind(controller));
  app.get('/ai/insights/history', controller.history.bind(controller));
  app.get('/ai/emails/:id/summary', controller.emailSummary.bind(controller));
}
