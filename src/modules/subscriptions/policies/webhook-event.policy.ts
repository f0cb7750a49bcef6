/**
 * src/modules/subscriptions/policies/webhook-event.policy.ts
 *
 * WHY:
 * - Decides what a (verified, normalized) billing webhook changes locally.
 * - Pure: the service loads the subscription, applies the plan, records the event id.
 *
 * RULES:
 * - Returns null for events we acknowledge but do not act on.
 * - The user's tier follows the subscription only while the status grants it;
 *   a deleted subscription sends the user back to free_trial.
 */

import type { BillingWebhookEvent } from '../billing/billing-gateway';
import type { Subscription, SubscriptionPatch, SubscriptionTier } from '../subscription.types';
import { grantsTier } from './subscription-status.policy';

export type WebhookUpdatePlan = {
  subscriptionPatch: SubscriptionPatch;
  userTier: { tier: SubscriptionTier; endDate: Date | null } | null;
};

/** Stripe subscription id the event refers to (null: nothing to look up). */
export function webhookSubscriptionId(event: BillingWebhookEvent): string | null {
  switch (event.type) {
    case 'customer.subscription.updated':
      return event.subscription.id;
    case 'customer.subscription.deleted':
    case 'invoice.payment_succeeded':
    case 'invoice.payment_failed':
      return event.subscriptionId;
    case 'ignored':
      return null;
  }
}

export function planWebhookUpdate(
  event: BillingWebhookEvent,
  current: Subscription,
  now: Date,
): WebhookUpdatePlan | null {
  switch (event.type) {
    case 'customer.subscription.updated': {
      const { status, currentPeriodStart, currentPeriodEnd, cancelAtPeriodEnd } =
        event.subscription;
      return {
        subscriptionPatch: { status, currentPeriodStart, currentPeriodEnd, cancelAtPeriodEnd },
        userTier: grantsTier(status) ? { tier: current.tier, endDate: currentPeriodEnd } : null,
      };
    }

    case 'customer.subscription.deleted':
      return {
        subscriptionPatch: { status: 'canceled', canceledAt: now },
        userTier: { tier: 'free_trial', endDate: null },
      };

    case 'invoice.payment_succeeded':
      return {
        subscriptionPatch: { status: 'active' },
        userTier: { tier: current.tier, endDate: current.currentPeriodEnd },
      };

    case 'invoice.payment_failed':
      return {
        subscriptionPatch: { status: 'past_due' },
        userTier: null,
      };

    case 'ignored':
      return null;
  }
}
