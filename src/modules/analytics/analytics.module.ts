/**
 * src/modules/analytics/analytics.module.ts
 */

import type { FastifyInstance } from 'fastify';

import { AnalyticsController } from './analytics.controller';
import { registerAnalyticsRoutes } from './analytics.routes';
import { AnalyticsService, type AnalyticsServiceDeps } from './analytics.service';

export type AnalyticsModule = ReturnType<typeof createAnalyticsModule>;

export function createAnalyticsModule(deps: AnalyticsServiceDeps) {
  const analyticsService = new AnalyticsService(deps);
  const controller = new AnalyticsController(analyticsService);

  return {
    analyticsService,
    registerRoutes(app: FastifyInstance) {
      registerAnalyticsRoutes(app, controller);
    },
  };
}
