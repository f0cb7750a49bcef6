/**
 * src/modules/subscriptions/dal/subscription.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for subscriptions and the webhook ledger.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { SubscriptionsTable } from '../../../shared/db/schema';

export type SubscriptionRow = Selectable<SubscriptionsTable>;

export async function selectSubscriptionByUserSql(
  db: DbExecutor,
  userId: string,
): Promise<SubscriptionRow | undefined> {
  return db
    .selectFrom('subscriptions')
    .selectAll()
    .where('user_id', '=', userId)
    .executeTakeFirst();
}

export async function selectSubscriptionByStripeIdSql(
  db: DbExecutor,
  stripeSubscriptionId: string,
): Promise<SubscriptionRow | undefined> {
  return db
    .selectFrom('subscriptions')
    .selectAll()
    .where('stripe_subscription_id', '=', stripeSubscriptionId)
    .executeTakeFirst();
}

export async function selectStripeEventExistsSql(db: DbExecutor, eventId: string): Promise<boolean> {
  const row = await db
    .selectFrom('stripe_events')
    .select('event_id')
    .where('event_id', '=', eventId)
    .executeTakeFirst();
  return row !== undefined;
}
