/**
 * src/modules/subscriptions/subscription.types.ts
 *
 * WHY:
 * - Domain types for subscriptions (local mirror of the Stripe subscription).
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 */

import type { BillingCycle as DbBillingCycle, SubscriptionStatus } from '../../shared/db/schema';
import type { SubscriptionTier } from '../users';

export type { SubscriptionStatus, SubscriptionTier };
export type BillingCycle = DbBillingCycle;
export type PaidTier = Exclude<SubscriptionTier, 'free_trial'>;

export type Subscription = {
  id: string;
  userId: string;
  stripeSubscriptionId: string | null;
  stripeCustomerId: string;
  stripePriceId: string;
  status: SubscriptionStatus;
  tier: SubscriptionTier;
  amountCents: number;
  currency: string;
  billingCycle: BillingCycle;
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  trialStart: Date | null;
  trialEnd: Date | null;
  canceledAt: Date | null;
  cancelAtPeriodEnd: boolean;
  emailLimit: number;
  apiLimit: number;
  createdAt: Date;
  updatedAt: Date;
};

export type NewSubscription = Omit<Subscription, 'id' | 'createdAt' | 'updatedAt'>;

export type SubscriptionPatch = Partial<
  Pick<
    Subscription,
    | 'status'
    | 'tier'
    | 'stripePriceId'
    | 'amountCents'
    | 'billingCycle'
    | 'currentPeriodStart'
    | 'currentPeriodEnd'
    | 'trialStart'
    | 'trialEnd'
    | 'canceledAt'
    | 'cancelAtPeriodEnd'
    | 'emailLimit'
    | 'apiLimit'
  >
>;

export type UsageSnapshot = {
  tier: SubscriptionTier;
  emails_processed: number;
  emails_limit: number;
  api_calls_this_month: number;
  api_calls_limit: number;
  emails_remaining: number;
  api_calls_remaining: number;
};
