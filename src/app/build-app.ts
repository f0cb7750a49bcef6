/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type AppDeps } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';

/** Tests pass pre-composed deps (in-memory infra); production builds them from config. */
export async function buildApp(config: AppConfig, prebuilt?: AppDeps) {
  const deps = prebuilt ?? (await buildDeps(config));
  const app = await buildServer({ config, deps });

  await registerRoutes(app, { config, deps });
  await app.ready();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
