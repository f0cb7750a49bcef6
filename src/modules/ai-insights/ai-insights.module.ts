/**
 * src/modules/ai-insights/ai-insights.module.ts
 *
 * WHY:
 * - Encapsulates AI module wiring: the request-side service (HTTP) and the job
 *   service (worker) share the engine and repos.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import { AiInsightsController } from './ai-insights.controller';
import { registerAiInsightsRoutes } from './ai-insights.routes';
import { AiInsightsService, type AiInsightsServiceDeps } from './ai-insights.service';
import { AiJobsService, type AiJobsServiceDeps } from './ai-jobs.service';

export type AiInsightsModuleDeps = AiInsightsServiceDeps & AiJobsServiceDeps;

export type AiInsightsModule = ReturnType<typeof createAiInsightsModule>;

export function createAiInsightsModule(deps: AiInsightsModuleDeps) {
  const aiInsightsService = new AiInsightsService(deps);
  const aiJobsService = new AiJobsService(deps);
  const controller = new AiInsightsController(aiInsightsService);

  return {
    aiInsightsService,
    aiJobsService,
    registerRoutes(app: FastifyInstance) {
      registerAiInsightsRoutes(app, controller);
    },
  };
}
