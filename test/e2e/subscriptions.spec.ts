import { describe, it, expect } from 'vitest';
import { buildTestApp, readJson, registerUser, type TestApp } from '../helpers/build-test-app';
import { TEST_WEBHOOK_SIGNATURE } from '../helpers/fakes';

/**
 * E2E tests for /subscriptions/*, against the in-process billing gateway.
 */

type ErrorResponseBody = { error: { code: string; message: string } };

type UsageBody = {
  tier: string;
  emails_processed: number;
  emails_limit: number;
  api_calls_this_month: number;
  api_calls_limit: number;
  emails_remaining: number;
  api_calls_remaining: number;
};

type CurrentBody = {
  subscription: {
    tier: string;
    status: string;
    billing_cycle: string;
    amount: number;
    currency: string;
    current_period_end: string | null;
    cancel_at_period_end: boolean;
  } | null;
  plan: string;
  status: string;
  usage: UsageBody;
};

async function subscribe(
  t: TestApp,
  headers: { authorization: string },
  payload: Record<string, string> = { plan_type: 'professional' },
) {
  return t.app.inject({ method: 'POST', url: '/api/v1/subscriptions/create', headers, payload });
}

async function getUsage(t: TestApp, headers: { authorization: string }): Promise<UsageBody> {
  const res = await t.app.inject({ method: 'GET', url: '/api/v1/subscriptions/usage', headers });
  return readJson<UsageBody>(res);
}

function webhook(t: TestApp, id: string, signature: string | null = TEST_WEBHOOK_SIGNATURE) {
  return t.app.inject({
    method: 'POST',
    url: '/api/v1/subscriptions/webhook',
    headers: {
      'content-type': 'application/json',
      ...(signature ? { 'stripe-signature': signature } : {}),
    },
    payload: JSON.stringify({ id, object: 'event' }),
  });
}

describe('GET /subscriptions/plans', () => {
  it('lists the paid plans without authentication', async () => {
    const t = await buildTestApp();

    try {
      const res = await t.app.inject({ method: 'GET', url: '/api/v1/subscriptions/plans' });

      expect(res.statusCode).toBe(200);
      const body = readJson<{ plans: Array<{ id: string; price_monthly: number }> }>(res);
      expect(body.plans.map((p) => [p.id, p.price_monthly])).toEqual([
        ['starter', 9],
        ['professional', 29],
        ['enterprise', 99],
      ]);
    } finally {
      await t.close();
    }
  });
});

describe('subscription lifecycle', () => {
  it('reports the trial plan before any subscription', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);

      const res = await t.app.inject({
        method: 'GET',
        url: '/api/v1/subscriptions/current',
        headers,
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        subscription: null,
        plan: 'free',
        status: 'inactive',
        usage: {
          tier: 'free_trial',
          emails_processed: 0,
          emails_limit: 1000,
          api_calls_this_month: 0,
          api_calls_limit: 100,
          emails_remaining: 1000,
          api_calls_remaining: 100,
        },
      });
    } finally {
      await t.close();
    }
  });

  it('creates a subscription, creating the billing customer first', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);

      const res = await subscribe(t, headers);

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({
        subscription_id: 'sub_test_2',
        client_secret: 'pi_test_secret',
        status: 'active',
      });
      expect(t.billing.calls).toEqual([
        'createCustomer:user@example.com',
        'createSubscription:cus_test_1:price_pro_m',
      ]);

      const current = readJson<CurrentBody>(
        await t.app.inject({ method: 'GET', url: '/api/v1/subscriptions/current', headers }),
      );
      expect(current.plan).toBe('professional');
      expect(current.subscription).toEqual({
        id: expect.any(String),
        tier: 'professional',
        status: 'active',
        billing_cycle: 'monthly',
        amount: 29,
        currency: 'usd',
        current_period_start: '2024-05-01T00:00:00.000Z',
        current_period_end: '2024-06-01T00:00:00.000Z',
        cancel_at_period_end: false,
        trial_end: null,
      });
      expect(current.usage.emails_limit).toBe(100000);
    } finally {
      await t.close();
    }
  });

  it('refuses a second subscription', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);
      await subscribe(t, headers);

      const res = await subscribe(t, headers, { plan_type: 'starter' });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'User already has an active subscription',
      );
    } finally {
      await t.close();
    }
  });

  it('fails when no price is configured for the cycle', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);

      const res = await subscribe(t, headers, { plan_type: 'enterprise', billing_cycle: 'yearly' });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'Failed to create subscription: no price configured for enterprise (yearly)',
      );
      expect(t.billing.calls).toEqual([]);
    } finally {
      await t.close();
    }
  });

  it('changes plan and moves the user to the new tier', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);
      await subscribe(t, headers);

      const res = await t.app.inject({
        method: 'PUT',
        url: '/api/v1/subscriptions/change-plan',
        headers,
        payload: { new_plan_type: 'starter', billing_cycle: 'yearly' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ message: 'Plan changed successfully', tier: 'starter' });
      expect(t.billing.calls).toContain('changeSubscriptionPrice:sub_test_2:price_starter_y');

      const usage = await getUsage(t, headers);
      expect(usage.tier).toBe('starter');
      expect(usage.emails_limit).toBe(10000);
    } finally {
      await t.close();
    }
  });

  it('cancels at period end and reactivates', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);
      await subscribe(t, headers);

      const cancel = await t.app.inject({
        method: 'POST',
        url: '/api/v1/subscriptions/cancel',
        headers,
      });
      expect(cancel.statusCode).toBe(200);
      expect(cancel.json()).toEqual({
        message: 'Subscription will be canceled at the end of current period',
        current_period_end: '2024-06-01T00:00:00.000Z',
      });

      const reactivate = await t.app.inject({
        method: 'POST',
        url: '/api/v1/subscriptions/reactivate',
        headers,
      });
      expect(reactivate.statusCode).toBe(200);
      expect(reactivate.json()).toEqual({ message: 'Subscription reactivated', status: 'active' });
      expect(t.billing.calls.slice(-2)).toEqual([
        'setCancelAtPeriodEnd:sub_test_2:true',
        'setCancelAtPeriodEnd:sub_test_2:false',
      ]);
    } finally {
      await t.close();
    }
  });

  it('answers 404 when there is nothing to cancel or reactivate', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);

      const cancel = await t.app.inject({
        method: 'POST',
        url: '/api/v1/subscriptions/cancel',
        headers,
      });
      const reactivate = await t.app.inject({
        method: 'POST',
        url: '/api/v1/subscriptions/reactivate',
        headers,
      });

      expect(cancel.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(cancel).error.message).toBe('No active subscription found');
      expect(reactivate.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(reactivate).error.message).toBe(
        'No canceled subscription found',
      );
    } finally {
      await t.close();
    }
  });
});

describe('billing details', () => {
  it('adds a card and updates the billing address on one customer', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);

      const card = await t.app.inject({
        method: 'POST',
        url: '/api/v1/subscriptions/payment-method',
        headers,
        payload: { token: 'tok_test' },
      });
      expect(card.statusCode).toBe(200);
      expect(card.json()).toEqual({ payment_method_id: 'pm_test_2', brand: 'visa', last4: '4242' });

      const address = await t.app.inject({
        method: 'PUT',
        url: '/api/v1/subscriptions/billing-address',
        headers,
        payload: {
          line1: '1 Main St',
          city: 'Springfield',
          state: 'IL',
          postal_code: '62701',
          country: 'US',
        },
      });
      expect(address.statusCode).toBe(200);
      expect(address.json()).toEqual({ message: 'Billing address updated' });

      expect(t.billing.calls).toEqual([
        'createCustomer:user@example.com',
        'createCardPaymentMethod:cus_test_1:tok_test',
        'updateBillingAddress:cus_test_1:US',
      ]);
    } finally {
      await t.close();
    }
  });

  it('returns an empty history without a billing customer', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);

      const res = await t.app.inject({
        method: 'GET',
        url: '/api/v1/subscriptions/billing-history',
        headers,
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ invoices: [] });
    } finally {
      await t.close();
    }
  });

  it('maps provider invoices to dollars', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);
      await subscribe(t, headers);
      t.billing.invoices.push({
        id: 'in_test_1',
        amountPaidCents: 2900,
        currency: 'usd',
        status: 'paid',
        created: new Date('2024-05-01T00:00:00.000Z'),
        invoicePdf: null,
        hostedInvoiceUrl: null,
        periodStart: new Date('2024-05-01T00:00:00.000Z'),
        periodEnd: new Date('2024-06-01T00:00:00.000Z'),
      });

      const res = await t.app.inject({
        method: 'GET',
        url: '/api/v1/subscriptions/billing-history?limit=5',
        headers,
      });

      expect(res.json()).toEqual({
        invoices: [
          {
            id: 'in_test_1',
            amount_paid: 29,
            currency: 'usd',
            status: 'paid',
            created: '2024-05-01T00:00:00.000Z',
            invoice_pdf: null,
            hosted_invoice_url: null,
            period_start: '2024-05-01T00:00:00.000Z',
            period_end: '2024-06-01T00:00:00.000Z',
          },
        ],
      });
      expect(t.billing.calls).toContain('listInvoices:cus_test_1:5');
    } finally {
      await t.close();
    }
  });
});

describe('POST /subscriptions/webhook', () => {
  it('rejects a bad or missing signature', async () => {
    const t = await buildTestApp();

    try {
      const bad = await webhook(t, 'evt_1', 'forged');
      const missing = await webhook(t, 'evt_1', null);

      expect(bad.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(bad).error.message).toBe('Invalid webhook signature');
      expect(missing.statusCode).toBe(400);
      expect(t.repos.subscriptionRepo.processedEvents.size).toBe(0);
    } finally {
      await t.close();
    }
  });

  it('drops the user to the trial tier when the subscription is deleted', async () => {
    const t = await buildTestApp();

    try {
      const { headers } = await registerUser(t);
      await subscribe(t, headers);
      t.billing.events.set('evt_del', {
        id: 'evt_del',
        type: 'customer.subscription.deleted',
        subscriptionId: 'sub_test_2',
      });

      const res = await webhook(t, 'evt_del');

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ received: true });
      expect((await getUsage(t, headers)).tier).toBe('free_trial');

      const current = readJson<CurrentBody>(
        await t.app.inject({ method: 'GET', url: '/api/v1/subscriptions/current', headers }),
      );
      expect(current.subscription).toBeNull();
    } finally {
      await t.close();
    }
  });

  it('syncs status, period and cancellation from a subscription update', async () => {
    const t = await buildTestApp();

    try {
      const { userId, headers } = await registerUser(t);
      await subscribe(t, headers);
      t.billing.events.set('evt_upd', {
        id: 'evt_upd',
        type: 'customer.subscription.updated',
        subscription: {
          id: 'sub_test_2',
          status: 'active',
          currentPeriodStart: new Date('2024-06-01T00:00:00.000Z'),
          currentPeriodEnd: new Date('2024-07-01T00:00:00.000Z'),
          cancelAtPeriodEnd: true,
        },
      });

      const res = await webhook(t, 'evt_upd');

      expect(res.statusCode).toBe(200);
      const sub = await t.repos.subscriptionRepo.findByStripeId('sub_test_2');
      expect(sub?.status).toBe('active');
      expect(sub?.currentPeriodStart).toEqual(new Date('2024-06-01T00:00:00.000Z'));
      expect(sub?.currentPeriodEnd).toEqual(new Date('2024-07-01T00:00:00.000Z'));
      expect(sub?.cancelAtPeriodEnd).toBe(true);

      const user = await t.repos.userRepo.findById(userId);
      expect(user?.subscriptionTier).toBe('professional');
      expect(user?.subscriptionEndDate).toEqual(new Date('2024-07-01T00:00:00.000Z'));
    } finally {
      await t.close();
    }
  });

  it('marks the subscription past due on a failed payment and keeps the tier', async () => {
    const t = await buildTestApp();

    try {
      const { userId, headers } = await registerUser(t);
      await subscribe(t, headers);
      t.billing.events.set('evt_fail', {
        id: 'evt_fail',
        type: 'invoice.payment_failed',
        subscriptionId: 'sub_test_2',
      });

      const res = await webhook(t, 'evt_fail');

      expect(res.statusCode).toBe(200);
      expect((await t.repos.subscriptionRepo.findByStripeId('sub_test_2'))?.status).toBe(
        'past_due',
      );
      expect((await t.repos.userRepo.findById(userId))?.subscriptionTier).toBe('professional');
      expect(t.repos.subscriptionRepo.processedEvents.get('evt_fail')).toBe(
        'invoice.payment_failed',
      );
    } finally {
      await t.close();
    }
  });

  it('reactivates the subscription and restores the tier on a paid invoice', async () => {
    const t = await buildTestApp();

    try {
      const { userId, headers } = await registerUser(t);
      await subscribe(t, headers);
      t.billing.events.set('evt_fail', {
        id: 'evt_fail',
        type: 'invoice.payment_failed',
        subscriptionId: 'sub_test_2',
      });
      t.billing.events.set('evt_paid', {
        id: 'evt_paid',
        type: 'invoice.payment_succeeded',
        subscriptionId: 'sub_test_2',
      });

      await webhook(t, 'evt_fail');
      t.repos.userRepo.patch(userId, { subscriptionTier: 'free_trial', subscriptionEndDate: null });

      const res = await webhook(t, 'evt_paid');

      expect(res.statusCode).toBe(200);
      expect((await t.repos.subscriptionRepo.findByStripeId('sub_test_2'))?.status).toBe('active');
      const user = await t.repos.userRepo.findById(userId);
      expect(user?.subscriptionTier).toBe('professional');
      expect(user?.subscriptionEndDate).toEqual(new Date('2024-06-01T00:00:00.000Z'));
    } finally {
      await t.close();
    }
  });

  it('applies each event id only once', async () => {
    const t = await buildTestApp();

    try {
      const { userId, headers } = await registerUser(t);
      await subscribe(t, headers);
      t.billing.events.set('evt_del', {
        id: 'evt_del',
        type: 'customer.subscription.deleted',
        subscriptionId: 'sub_test_2',
      });

      await webhook(t, 'evt_del');
      t.repos.userRepo.patch(userId, { subscriptionTier: 'professional' });

      const again = await webhook(t, 'evt_del');

      expect(again.statusCode).toBe(200);
      expect((await getUsage(t, headers)).tier).toBe('professional');
      expect([...t.repos.subscriptionRepo.processedEvents]).toEqual([
        ['evt_del', 'customer.subscription.deleted'],
      ]);
    } finally {
      await t.close();
    }
  });

  it('acknowledges events it does not act on', async () => {
    const t = await buildTestApp();

    try {
      const res = await webhook(t, 'evt_other');

      expect(res.statusCode).toBe(200);
      expect(t.repos.subscriptionRepo.processedEvents.get('evt_other')).toBe('unknown');
    } finally {
      await t.close();
    }
  });
});
