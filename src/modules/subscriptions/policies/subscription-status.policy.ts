/**
 * src/modules/subscriptions/policies/subscription-status.policy.ts
 *
 * WHY:
 * - Which local statuses count as "has a subscription" differs per operation.
 *   Naming the sets keeps the controller/service branches readable.
 *
 * RULES:
 * - LIVE: the subscription is in force (current/change-plan/cancel act on it).
 * - BLOCKING: a new checkout is refused (LIVE + an unfinished incomplete checkout).
 * - TIER_GRANTING: the user's tier follows the subscription's tier.
 */

import type { SubscriptionStatus } from '../subscription.types';

const LIVE: ReadonlySet<SubscriptionStatus> = new Set(['active', 'trialing', 'past_due']);
const BLOCKING: ReadonlySet<SubscriptionStatus> = new Set([
  'active',
  'trialing',
  'past_due',
  'incomplete',
]);
const TIER_GRANTING: ReadonlySet<SubscriptionStatus> = new Set(['active', 'trialing']);

export function isLive(status: SubscriptionStatus): boolean {
  return LIVE.has(status);
}

export function blocksNewSubscription(status: SubscriptionStatus): boolean {
  return BLOCKING.has(status);
}

export function grantsTier(status: SubscriptionStatus): boolean {
  return TIER_GRANTING.has(status);
}

/**
 * Stripe has more statuses than we store. Expired checkouts are canceled for us;
 * a paused subscription is not collecting money, which we treat as unpaid.
 */
export function fromStripeStatus(status: string): SubscriptionStatus {
  switch (status) {
    case 'active':
    case 'canceled':
    case 'past_due':
    case 'trialing':
    case 'incomplete':
    case 'unpaid':
      return status;
    case 'incomplete_expired':
      return 'canceled';
    default:
      return 'unpaid';
  }
}
