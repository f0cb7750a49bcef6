/**
 * src/modules/analytics/analytics.routes.ts
 *
 * WHY:
 * - Declares Analytics module endpoints (all authenticated, all GET).
 */

import type { FastifyInstance } from 'fastify';
import type { AnalyticsController } from './analytics.controller';

export function registerAnalyticsRoutes(app: FastifyInstance, controller: AnalyticsController) {
  app.get('/analytics/overview', controller.overview.bind(controller));
  app.get('/analytics/senders', controller.senders.bind(controller));
  app.get('/analytics/trends/time-series', controller.timeSeries.bind(controller));
  app.get('/analytics/trends/categories', controller.categoryTrends.bind(controller));
  app.get('/analytics/productivity', controller.productivity.bind(controller));
  app.get('/analytics/volume', controller.volume.bind(controller));
}
