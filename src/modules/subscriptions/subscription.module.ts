/**
 * src/modules/subscriptions/subscription.module.ts
 *
 * WHY:
 * - Encapsulates Subscriptions module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes the billing gateway + repos in).
 */

import type { FastifyInstance } from 'fastify';

import { SubscriptionController } from './subscription.controller';
import { registerSubscriptionRoutes } from './subscription.routes';
import { SubscriptionService, type SubscriptionServiceDeps } from './subscription.service';
import { UsageGuard } from './usage-guard';

export type SubscriptionModule = ReturnType<typeof createSubscriptionModule>;

export function createSubscriptionModule(deps: SubscriptionServiceDeps) {
  const subscriptionService = new SubscriptionService(deps);
  const usageGuard = new UsageGuard({ userRepo: deps.userRepo });
  const controller = new SubscriptionController(subscriptionService);

  return {
    subscriptionService,
    usageGuard,
    registerRoutes(app: FastifyInstance) {
      registerSubscriptionRoutes(app, controller);
    },
  };
}
