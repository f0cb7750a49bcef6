/**
 * src/modules/emails/email.module.ts
 *
 * WHY:
 * - Encapsulates Emails module wiring: the request-side service (HTTP) and the
 *   sync service (worker jobs) share repos but are separate units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import { EmailController } from './email.controller';
import { registerEmailRoutes } from './email.routes';
import { EmailService, type EmailServiceDeps } from './email.service';
import { EmailSyncService, type EmailSyncServiceDeps } from './email-sync.service';

export type EmailModuleDeps = EmailServiceDeps & EmailSyncServiceDeps;

export type EmailModule = ReturnType<typeof createEmailModule>;

export function createEmailModule(deps: EmailModuleDeps) {
  const emailService = new EmailService(deps);
  const emailSyncService = new EmailSyncService(deps);
  const controller = new EmailController(emailService);

  return {
    emailService,
    emailSyncService,
    registerRoutes(app: FastifyInstance) {
      registerEmailRoutes(app, controller);
    },
  };
}
