/**
 * src/modules/subscriptions/dal/subscription.repo.ts
 *
 * WHY:
 * - Data-access contract for subscriptions + the processed-webhook ledger.
 *
 * RULES:
 * - One subscription row per user (user_id is unique): a new checkout replaces
 *   the previous, no longer blocking, row.
 * - No AppError. No policies.
 */

import type { Updateable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { SubscriptionsTable } from '../../../shared/db/schema';
import type { NewSubscription, Subscription, SubscriptionPatch } from '../subscription.types';
import {
  selectStripeEventExistsSql,
  selectSubscriptionByStripeIdSql,
  selectSubscriptionByUserSql,
  type SubscriptionRow,
} from './subscription.query-sql';

export interface SubscriptionRepo {
  findByUser(userId: string): Promise<Subscription | undefined>;
  findByStripeId(stripeSubscriptionId: string): Promise<Subscription | undefined>;
  upsertForUser(input: NewSubscription): Promise<Subscription>;
  update(id: string, patch: SubscriptionPatch): Promise<void>;

  isEventProcessed(eventId: string): Promise<boolean>;
  markEventProcessed(eventId: string, eventType: string): Promise<void>;
}

function toSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    userId: row.user_id,
    stripeSubscriptionId: row.stripe_subscription_id ?? null,
    stripeCustomerId: row.stripe_customer_id,
    stripePriceId: row.stripe_price_id,
    status: row.status,
    tier: row.tier,
    amountCents: row.amount_cents,
    currency: row.currency,
    billingCycle: row.billing_cycle,
    currentPeriodStart: row.current_period_start ?? null,
    currentPeriodEnd: row.current_period_end ?? null,
    trialStart: row.trial_start ?? null,
    trialEnd: row.trial_end ?? null,
    canceledAt: row.canceled_at ?? null,
    cancelAtPeriodEnd: row.cancel_at_period_end,
    emailLimit: row.email_limit,
    apiLimit: row.api_limit,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toRowPatch(patch: SubscriptionPatch): Updateable<SubscriptionsTable> {
  const row: Updateable<SubscriptionsTable> = {};
  if (patch.status !== undefined) row.status = patch.status;
  if (patch.tier !== undefined) row.tier = patch.tier;
  if (patch.stripePriceId !== undefined) row.stripe_price_id = patch.stripePriceId;
  if (patch.amountCents !== undefined) row.amount_cents = patch.amountCents;
  if (patch.billingCycle !== undefined) row.billing_cycle = patch.billingCycle;
  if (patch.currentPeriodStart !== undefined) row.current_period_start = patch.currentPeriodStart;
  if (patch.currentPeriodEnd !== undefined) row.current_period_end = patch.currentPeriodEnd;
  if (patch.trialStart !== undefined) row.trial_start = patch.trialStart;
  if (patch.trialEnd !== undefined) row.trial_end = patch.trialEnd;
  if (patch.canceledAt !== undefined) row.canceled_at = patch.canceledAt;
  if (patch.cancelAtPeriodEnd !== undefined) row.cancel_at_period_end = patch.cancelAtPeriodEnd;
  if (patch.emailLimit !== undefined) row.email_limit = patch.emailLimit;
  if (patch.apiLimit !== undefined) row.api_limit = patch.apiLimit;
  return row;
}

export class KyselySubscriptionRepo implements SubscriptionRepo {
  constructor(private readonly db: DbExecutor) {}

  async findByUser(userId: string): Promise<Subscription | undefined> {
    const row = await selectSubscriptionByUserSql(this.db, userId);
    return row ? toSubscription(row) : undefined;
  }

  async findByStripeId(stripeSubscriptionId: string): Promise<Subscription | undefined> {
    const row = await selectSubscriptionByStripeIdSql(this.db, stripeSubscriptionId);
    return row ? toSubscription(row) : undefined;
  }

  async upsertForUser(input: NewSubscription): Promise<Subscription> {
    const updatable = {
      stripe_subscription_id: input.stripeSubscriptionId,
      stripe_customer_id: input.stripeCustomerId,
      stripe_price_id: input.stripePriceId,
      status: input.status,
      tier: input.tier,
      amount_cents: input.amountCents,
      currency: input.currency,
      billing_cycle: input.billingCycle,
      current_period_start: input.currentPeriodStart,
      current_period_end: input.currentPeriodEnd,
      trial_start: input.trialStart,
      trial_end: input.trialEnd,
      canceled_at: input.canceledAt,
      cancel_at_period_end: input.cancelAtPeriodEnd,
      email_limit: input.emailLimit,
      api_limit: input.apiLimit,
    };

    const row = await this.db
      .insertInto('subscriptions')
      .values({ user_id: input.userId, ...updatable })
      .onConflict((oc) => oc.column('user_id').doUpdateSet({ ...updatable, updated_at: new Date() }))
      .returningAll()
      .executeTakeFirstOrThrow();

    return toSubscription(row);
  }

  async update(id: string, patch: SubscriptionPatch): Promise<void> {
    await this.db
      .updateTable('subscriptions')
      .set({ ...toRowPatch(patch), updated_at: new Date() })
      .where('id', '=', id)
      .execute();
  }

  async isEventProcessed(eventId: string): Promise<boolean> {
    return selectStripeEventExistsSql(this.db, eventId);
  }

  async markEventProcessed(eventId: string, eventType: string): Promise<void> {
    await this.db
      .insertInto('stripe_events')
      .values({ event_id: eventId, event_type: eventType })
      .onConflict((oc) => oc.column('event_id').doNothing())
      .execute();
  }
}
