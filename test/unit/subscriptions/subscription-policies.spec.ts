import { describe, it, expect } from 'vitest';
import type { BillingWebhookEvent } from '../../../src/modules/subscriptions/billing/billing-gateway';
import { listPlans, planPriceCents } from '../../../src/modules/subscriptions/plans';
import {
  blocksNewSubscription,
  fromStripeStatus,
  grantsTier,
  isLive,
} from '../../../src/modules/subscriptions/policies/subscription-status.policy';
import {
  hasCapacity,
  limitsForTier,
  remaining,
} from '../../../src/modules/subscriptions/policies/usage-limits.policy';
import {
  planWebhookUpdate,
  webhookSubscriptionId,
} from '../../../src/modules/subscriptions/policies/webhook-event.policy';
import type { Subscription } from '../../../src/modules/subscriptions/subscription.types';

const NOW = new Date('2024-05-20T10:00:00Z');
const PERIOD_END = new Date('2024-06-01T00:00:00Z');

function subscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: 'sub-row-1',
    userId: 'usr_1',
    stripeSubscriptionId: 'sub_test_1',
    stripeCustomerId: 'cus_test_1',
    stripePriceId: 'price_pro_m',
    status: 'active',
    tier: 'professional',
    amountCents: 2900,
    currency: 'usd',
    billingCycle: 'monthly',
    currentPeriodStart: new Date('2024-05-01T00:00:00Z'),
    currentPeriodEnd: PERIOD_END,
    trialStart: null,
    trialEnd: null,
    canceledAt: null,
    cancelAtPeriodEnd: false,
    emailLimit: 100000,
    apiLimit: 10000,
    createdAt: new Date('2024-05-01T00:00:00Z'),
    updatedAt: new Date('2024-05-01T00:00:00Z'),
    ...overrides,
  };
}

describe('usage limits', () => {
  it('maps tiers to quotas and unknown tiers to the trial quota', () => {
    expect(limitsForTier('starter')).toEqual({ emails: 10000, apiCalls: 1000 });
    expect(limitsForTier('enterprise')).toEqual({ emails: -1, apiCalls: -1 });
    expect(limitsForTier('platinum')).toEqual({ emails: 1000, apiCalls: 100 });
  });

  it('treats a counter at the limit as full', () => {
    expect(hasCapacity(99, 100)).toBe(true);
    expect(hasCapacity(100, 100)).toBe(false);
    expect(hasCapacity(1_000_000, -1)).toBe(true);
  });

  it('never reports negative remaining quota', () => {
    expect(remaining(40, 100)).toBe(60);
    expect(remaining(140, 100)).toBe(0);
    expect(remaining(5, -1)).toBe(-1);
  });
});

describe('subscription status', () => {
  it('separates live, blocking and tier-granting statuses', () => {
    expect(isLive('past_due')).toBe(true);
    expect(isLive('incomplete')).toBe(false);
    expect(blocksNewSubscription('incomplete')).toBe(true);
    expect(blocksNewSubscription('canceled')).toBe(false);
    expect(grantsTier('trialing')).toBe(true);
    expect(grantsTier('past_due')).toBe(false);
  });

  it('folds provider statuses we do not store', () => {
    expect(fromStripeStatus('active')).toBe('active');
    expect(fromStripeStatus('incomplete_expired')).toBe('canceled');
    expect(fromStripeStatus('paused')).toBe('unpaid');
  });
});

describe('webhook event plan', () => {
  it('copies the provider state on subscription updates', () => {
    const periodStart = new Date('2024-06-01T00:00:00Z');
    const periodEnd = new Date('2024-07-01T00:00:00Z');
    const event: BillingWebhookEvent = {
      id: 'evt_1',
      type: 'customer.subscription.updated',
      subscription: {
        id: 'sub_test_1',
        status: 'active',
        currentPeriodStart: periodStart,
        currentPeriodEnd: periodEnd,
        cancelAtPeriodEnd: true,
      },
    };

    expect(webhookSubscriptionId(event)).toBe('sub_test_1');
    expect(planWebhookUpdate(event, subscription(), NOW)).toEqual({
      subscriptionPatch: {
        status: 'active',
        currentPeriodStart: periodStart,
        currentPeriodEnd: periodEnd,
        cancelAtPeriodEnd: true,
      },
      userTier: { tier: 'professional', endDate: periodEnd },
    });
  });

  it('leaves the tier alone when an update moves to a non-granting status', () => {
    const event: BillingWebhookEvent = {
      id: 'evt_2',
      type: 'customer.subscription.updated',
      subscription: {
        id: 'sub_test_1',
        status: 'unpaid',
        currentPeriodStart: null,
        currentPeriodEnd: null,
        cancelAtPeriodEnd: false,
      },
    };
    expect(planWebhookUpdate(event, subscription(), NOW)?.userTier).toBeNull();
  });

  it('sends the user back to the trial tier on deletion', () => {
    const event: BillingWebhookEvent = {
      id: 'evt_3',
      type: 'customer.subscription.deleted',
      subscriptionId: 'sub_test_1',
    };

    expect(planWebhookUpdate(event, subscription(), NOW)).toEqual({
      subscriptionPatch: { status: 'canceled', canceledAt: NOW },
      userTier: { tier: 'free_trial', endDate: null },
    });
  });

  it('reactivates on a paid invoice and marks past due on a failed one', () => {
    const paid: BillingWebhookEvent = {
      id: 'evt_4',
      type: 'invoice.payment_succeeded',
      subscriptionId: 'sub_test_1',
    };
    const failed: BillingWebhookEvent = {
      id: 'evt_5',
      type: 'invoice.payment_failed',
      subscriptionId: 'sub_test_1',
    };
    const current = subscription({ status: 'past_due' });

    expect(planWebhookUpdate(paid, current, NOW)).toEqual({
      subscriptionPatch: { status: 'active' },
      userTier: { tier: 'professional', endDate: PERIOD_END },
    });
    expect(planWebhookUpdate(failed, current, NOW)).toEqual({
      subscriptionPatch: { status: 'past_due' },
      userTier: null,
    });
  });

  it('acknowledges other events without acting', () => {
    const event: BillingWebhookEvent = { id: 'evt_6', type: 'ignored', eventType: 'charge.refunded' };

    expect(webhookSubscriptionId(event)).toBeNull();
    expect(planWebhookUpdate(event, subscription(), NOW)).toBeNull();
  });
});

describe('plan catalog', () => {
  it('lists the three paid plans in order', () => {
    expect(listPlans().map((p) => p.id)).toEqual(['starter', 'professional', 'enterprise']);
  });

  it('prices plans in cents per billing cycle', () => {
    expect(planPriceCents('starter', 'monthly')).toBe(900);
    expect(planPriceCents('professional', 'yearly')).toBe(29000);
  });
});
