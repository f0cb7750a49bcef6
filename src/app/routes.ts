/**
 * src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/, /health) at the root
 *   - module routes under the API prefix (/api/v1 by default)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export async function registerRoutes(
  app: FastifyInstance,
  opts: { config: AppConfig; deps: AppDeps },
) {
  const { config, deps } = opts;

  app.get('/', () => {
    return { message: `${config.projectName} API`, version: config.version };
  });

  app.get('/health', (req) => {
    return {
      status: 'healthy',
      version: config.version,
      service: config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  await app.register(
    async (api) => {
      deps.auth.registerRoutes(api);
      deps.emails.registerRoutes(api);
      deps.analytics.registerRoutes(api);
      deps.ai.registerRoutes(api);
      deps.subscriptions.registerRoutes(api);
    },
    { prefix: config.apiPrefix },
  );
}
