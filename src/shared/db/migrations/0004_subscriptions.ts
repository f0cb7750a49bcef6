/**
 * src/shared/db/migrations/0004_subscriptions.ts
 *
 * WHY:
 * - subscriptions mirrors the Stripe subscription (one per user).
 * - stripe_events is the webhook idempotency ledger: Stripe retries deliveries,
 *   an event id is applied at most once.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('subscriptions')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) =>
      col.notNull().unique().references('users.id').onDelete('cascade'),
    )
    .addColumn('stripe_subscription_id', 'text', (col) => col.unique())
    .addColumn('stripe_customer_id', 'text', (col) => col.notNull())
    .addColumn('stripe_price_id', 'text', (col) => col.notNull())
    .addColumn('status', 'text', (col) => col.notNull())
    .addColumn('tier', 'text', (col) => col.notNull())
    .addColumn('amount_cents', 'integer', (col) => col.notNull())
    .addColumn('currency', 'text', (col) => col.notNull().defaultTo('usd'))
    .addColumn('billing_cycle', 'text', (col) => col.notNull())
    .addColumn('current_period_start', 'timestamptz')
    .addColumn('current_period_end', 'timestamptz')
    .addColumn('trial_start', 'timestamptz')
    .addColumn('trial_end', 'timestamptz')
    .addColumn('canceled_at', 'timestamptz')
    .addColumn('cancel_at_period_end', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('email_limit', 'integer', (col) => col.notNull())
    .addColumn('api_limit', 'integer', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE subscriptions
      ADD CONSTRAINT subscriptions_status_check
      CHECK (status IN ('active','canceled','past_due','trialing','incomplete','unpaid'));
  `.execute(db);

  await sql`
    ALTER TABLE subscriptions
      ADD CONSTRAINT subscriptions_billing_cycle_check
      CHECK (billing_cycle IN ('monthly','yearly'));
  `.execute(db);

  await db.schema
    .createTable('stripe_events')
    .addColumn('event_id', 'text', (col) => col.primaryKey())
    .addColumn('event_type', 'text', (col) => col.notNull())
    .addColumn('processed_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('stripe_events').ifExists().execute();
  await db.schema.dropTable('subscriptions').ifExists().execute();
}
