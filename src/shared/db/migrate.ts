/**
 * src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably in every environment.
 * - Migrations are imported statically: the compiled script carries them, so there is
 *   no dist/src path juggling and no dynamic import of .ts files.
 *
 * HOW TO USE:
 * - npm run build && npm run db:migrate
 *
 * RULES:
 * - New migration: add a file under ./migrations AND register it in MIGRATIONS below.
 *   Names sort lexicographically; keep the 4-digit prefix.
 */

import 'dotenv/config';

import { Migrator, type Migration, type MigrationProvider } from 'kysely';

import { createDb } from './db';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

import * as m0001 from './migrations/0001_users';
import * as m0002 from './migrations/0002_email_accounts_threads';
import * as m0003 from './migrations/0003_emails';
import * as m0004 from './migrations/0004_subscriptions';
import * as m0005 from './migrations/0005_ai_insights';

export const MIGRATIONS: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_email_accounts_threads': m0002,
  '0003_emails': m0003,
  '0004_subscriptions': m0004,
  '0005_ai_insights': m0005,
};

const staticProvider: MigrationProvider = {
  getMigrations: () => Promise.resolve(MIGRATIONS),
};

async function runMigrations(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  logger.info('db.migrate.start', { count: Object.keys(MIGRATIONS).length });

  const migrator = new Migrator({ db, provider: staticProvider });
  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('db.migrate.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('db.migrate.error', { migration: r.migrationName });
  });

  await db.destroy();

  if (error) {
    logger.error('db.migrate.failed', { err: error });
    process.exit(1);
  }

  logger.info('db.migrate.done');
}

if (require.main === module) {
  void runMigrations().catch((err: unknown) => {
    logger.error('db.migrate.fatal', { err });
    process.exit(1);
  });
}
