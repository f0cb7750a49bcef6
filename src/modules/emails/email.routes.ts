/**
 * src/modules/emails/email.routes.ts
 *
 * WHY:
 * - Declares Emails module endpoints.
 *
 * RULES:
 * - No business logic here.
 * - Static paths (/emails/search, /emails/stats/overview) are registered before /emails/:id;
 *   find-my-way prefers static segments anyway, the order just reads that way.
 */

import type { FastifyInstance } from 'fastify';
import type { EmailController } from './email.controller';

export function registerEmailRoutes(app: FastifyInstance, controller: EmailController) {
  app.post('/emails/accounts', controller.addAccount.bind(controller));
  app.get('/emails/accounts', controller.listAccounts.bind(controller));
  app.delete('/emails/accounts/:accountId', controller.removeAccount.bind(controller));
  app.post('/emails/sync', controller.sync.bind(controller));

  app.get('/emails', controller.list.bind(controller));
  app.get('/emails/search', controller.search.bind(controller));
  app.get('/emails/stats/overview', controller.stats.bind(controller));
  app.get('/emails/:id', controller.get.bind(controller));
  app.post('/emails/:id/actions/:action', controller.action.bind(controller));
}
