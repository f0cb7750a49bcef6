/**
 * src/shared/db/migrations/0001_users.ts
 *
 * WHY:
 * - Users own everything else (accounts, emails, subscriptions, insights).
 * - Tier + usage counters live on the user row: limit checks need one read.
 *
 * HOW TO USE:
 * - npm run build && npm run db:migrate
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  // gen_random_uuid()
  await sql`CREATE EXTENSION IF NOT EXISTS "pgcrypto";`.execute(db);

  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('email', 'text', (col) => col.notNull().unique())
    .addColumn('password_hash', 'text', (col) => col.notNull())
    .addColumn('full_name', 'text')
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('is_verified', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('subscription_tier', 'text', (col) => col.notNull().defaultTo('free_trial'))
    .addColumn('stripe_customer_id', 'text')
    .addColumn('subscription_end_date', 'timestamptz')
    .addColumn('emails_processed', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('api_calls_this_month', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('email_sync_enabled', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('last_email_sync_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE users
      ADD CONSTRAINT users_subscription_tier_check
      CHECK (subscription_tier IN ('free_trial','starter','professional','enterprise'));
  `.execute(db);

  // Incremental sync scans active users by last sync time
  await db.schema
    .createIndex('users_sync_idx')
    .on('users')
    .columns(['is_active', 'email_sync_enabled', 'last_email_sync_at'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
