/**
 * src/modules/subscriptions/subscription.routes.ts
 *
 * WHY:
 * - Declares billing endpoints.
 * - The webhook lives in its own encapsulated scope: there JSON bodies are kept as raw
 *   Buffers (signature verification), everywhere else they are parsed as usual.
 *
 * RULES:
 * - No business logic here.
 * - /subscriptions/plans and /subscriptions/webhook are public (no requireUser).
 */

import type { FastifyInstance } from 'fastify';
import type { SubscriptionController } from './subscription.controller';

export function registerSubscriptionRoutes(
  app: FastifyInstance,
  controller: SubscriptionController,
) {
  app.get('/subscriptions/plans', controller.plans.bind(controller));
  app.get('/subscriptions/current', controller.current.bind(controller));
  app.post('/subscriptions/create', controller.create.bind(controller));
  app.post('/subscriptions/payment-method', controller.paymentMethod.bind(controller));
  app.put('/subscriptions/change-plan', controller.changePlan.bind(controller));
  app.post('/subscriptions/cancel', controller.cancel.bind(controller));
  app.post('/subscriptions/reactivate', controller.reactivate.bind(controller));
  app.get('/subscriptions/usage', controller.usage.bind(controller));
  app.get('/subscriptions/billing-history', controller.billingHistory.bind(controller));
  app.put('/subscriptions/billing-address', controller.billingAddress.bind(controller));

  void app.register(async (scope) => {
    scope.removeContentTypeParser('application/json');
    scope.addContentTypeParser(
      'application/json',
      { parseAs: 'buffer' },
      (_req, body, done) => done(null, body),
    );
    scope.post('/subscriptions/webhook', controller.webhook.bind(controller));
  });
}
