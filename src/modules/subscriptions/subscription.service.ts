/**
 * src/modules/subscriptions/subscription.service.ts
 *
 * WHY:
 * - Owns the local subscription mirror and keeps it in step with the billing provider.
 * - The user's tier (which drives usage limits) only changes here.
 *
 * RULES:
 * - Provider calls go through BillingGateway; BillingGatewayError becomes a 400.
 * - Webhooks are idempotent on the provider event id: an event already in the
 *   ledger is acknowledged without touching any row.
 * - Never log payment tokens or client secrets.
 */

import type { Logger } from '../../shared/logger/logger';
import type { StripePriceIds } from '../../app/config';
import type { User, UserRepo } from '../users';

import {
  BillingGatewayError,
  WebhookSignatureError,
  type BillingGateway,
  type BillingWebhookEvent,
  type ProviderSubscription,
} from './billing/billing-gateway';
import type { SubscriptionRepo } from './dal/subscription.repo';
import { listPlans, planPriceCents, type Plan } from './plans';
import { blocksNewSubscription, grantsTier, isLive } from './policies/subscription-status.policy';
import { limitsForTier } from './policies/usage-limits.policy';
import {
  planWebhookUpdate,
  webhookSubscriptionId,
  type WebhookUpdatePlan,
} from './policies/webhook-event.policy';
import { SubscriptionErrors, UsageErrors } from './subscription.errors';
import type {
  BillingCycle,
  PaidTier,
  Subscription,
  SubscriptionPatch,
  UsageSnapshot,
} from './subscription.types';
import { usageSnapshot } from './usage-guard';

export type SubscriptionServiceDeps = {
  subscriptionRepo: SubscriptionRepo;
  userRepo: UserRepo;
  billing: BillingGateway;
  priceIds: StripePriceIds;
  logger: Logger;
};

export type CurrentSubscriptionResponse = {
  subscription: {
    id: string;
    tier: string;
    status: string;
    billing_cycle: BillingCycle;
    amount: number;
    currency: string;
    current_period_start: string | null;
    current_period_end: string | null;
    cancel_at_period_end: boolean;
    trial_end: string | null;
  } | null;
  plan: string;
  status: string;
  usage: UsageSnapshot;
};

export type CreateSubscriptionParams = {
  userId: string;
  requestId: string;
  planType: PaidTier;
  billingCycle: BillingCycle;
  paymentMethodId: string | null;
};

export type InvoiceResponse = {
  id: string;
  amount_paid: number;
  currency: string;
  status: string | null;
  created: string;
  invoice_pdf: string | null;
  hosted_invoice_url: string | null;
  period_start: string;
  period_end: string;
};

function iso(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

function periodPatch(sub: ProviderSubscription): SubscriptionPatch {
  return {
    status: sub.status,
    currentPeriodStart: sub.currentPeriodStart,
    currentPeriodEnd: sub.currentPeriodEnd,
    cancelAtPeriodEnd: sub.cancelAtPeriodEnd,
  };
}

export class SubscriptionService {
  constructor(private readonly deps: SubscriptionServiceDeps) {}

  listPlans(): readonly Plan[] {
    return listPlans();
  }

  async current(userId: string): Promise<CurrentSubscriptionResponse> {
    const user = await this.loadUser(userId);
    const usage = usageSnapshot(user);
    const sub = await this.deps.subscriptionRepo.findByUser(userId);

    if (!sub || !isLive(sub.status)) {
      return { subscription: null, plan: 'free', status: 'inactive', usage };
    }

    return {
      subscription: {
        id: sub.id,
        tier: sub.tier,
        status: sub.status,
        billing_cycle: sub.billingCycle,
        amount: sub.amountCents / 100,
        currency: sub.currency,
        current_period_start: iso(sub.currentPeriodStart),
        current_period_end: iso(sub.currentPeriodEnd),
        cancel_at_period_end: sub.cancelAtPeriodEnd,
        trial_end: iso(sub.trialEnd),
      },
      plan: sub.tier,
      status: sub.status,
      usage,
    };
  }

  async create(params: CreateSubscriptionParams): Promise<{
    subscription_id: string;
    client_secret: string | null;
    status: string;
  }> {
    const { userId, requestId, planType, billingCycle } = params;

    this.deps.logger.info({
      msg: 'subscriptions.create.start',
      flow: 'subscriptions.create',
      requestId,
      userId,
      planType,
      billingCycle,
    });

    const user = await this.loadUser(userId);

    const existing = await this.deps.subscriptionRepo.findByUser(userId);
    if (existing && blocksNewSubscription(existing.status)) {
      throw SubscriptionErrors.alreadySubscribed({ status: existing.status });
    }

    const priceId = this.deps.priceIds[planType][billingCycle];
    if (!priceId) {
      throw SubscriptionErrors.createFailed(`no price configured for ${planType} (${billingCycle})`);
    }

    try {
      const customerId = await this.ensureCustomer(user);

      if (params.paymentMethodId) {
        await this.deps.billing.attachDefaultPaymentMethod(customerId, params.paymentMethodId);
      }

      const created = await this.deps.billing.createSubscription({
        customerId,
        priceId,
        metadata: { user_id: userId, tier: planType },
      });

      const limits = limitsForTier(planType);
      await this.deps.subscriptionRepo.upsertForUser({
        userId,
        stripeSubscriptionId: created.id,
        stripeCustomerId: customerId,
        stripePriceId: priceId,
        status: created.status,
        tier: planType,
        amountCents: planPriceCents(planType, billingCycle),
        currency: 'usd',
        billingCycle,
        currentPeriodStart: created.currentPeriodStart,
        currentPeriodEnd: created.currentPeriodEnd,
        trialStart: created.trialStart,
        trialEnd: created.trialEnd,
        canceledAt: null,
        cancelAtPeriodEnd: created.cancelAtPeriodEnd,
        emailLimit: limits.emails,
        apiLimit: limits.apiCalls,
      });

      if (grantsTier(created.status)) {
        await this.deps.userRepo.setTier(userId, planType, created.currentPeriodEnd);
      }

      this.deps.logger.info({
        msg: 'subscriptions.create.success',
        flow: 'subscriptions.create',
        requestId,
        userId,
        stripeSubscriptionId: created.id,
        status: created.status,
      });

      return {
        subscription_id: created.id,
        client_secret: created.clientSecret,
        status: created.status,
      };
    } catch (err) {
      if (err instanceof BillingGatewayError) {
        this.deps.logger.warn({
          msg: 'subscriptions.create.failed',
          flow: 'subscriptions.create',
          requestId,
          userId,
          reason: err.message,
        });
        throw SubscriptionErrors.createFailed(err.message);
      }
      throw err;
    }
  }

  async addPaymentMethod(
    userId: string,
    token: string,
  ): Promise<{ payment_method_id: string; brand: string | null; last4: string | null }> {
    const user = await this.loadUser(userId);

    const card = await this.billingCall(async () => {
      const customerId = await this.ensureCustomer(user);
      return this.deps.billing.createCardPaymentMethod(customerId, token);
    });

    return { payment_method_id: card.id, brand: card.brand, last4: card.last4 };
  }

  async changePlan(params: {
    userId: string;
    requestId: string;
    newPlanType: PaidTier;
    billingCycle: BillingCycle | null;
  }): Promise<{ message: string; tier: PaidTier }> {
    const sub = await this.deps.subscriptionRepo.findByUser(params.userId);
    if (!sub || !isLive(sub.status) || !sub.stripeSubscriptionId) {
      throw SubscriptionErrors.noActiveSubscription();
    }

    const cycle = params.billingCycle ?? sub.billingCycle;
    const priceId = this.deps.priceIds[params.newPlanType][cycle];
    if (!priceId) {
      throw SubscriptionErrors.billingFailed(
        `no price configured for ${params.newPlanType} (${cycle})`,
      );
    }

    const stripeSubscriptionId = sub.stripeSubscriptionId;
    const updated = await this.billingCall(() =>
      this.deps.billing.changeSubscriptionPrice(stripeSubscriptionId, priceId),
    );

    const limits = limitsForTier(params.newPlanType);
    await this.deps.subscriptionRepo.update(sub.id, {
      ...periodPatch(updated),
      tier: params.newPlanType,
      stripePriceId: priceId,
      billingCycle: cycle,
      amountCents: planPriceCents(params.newPlanType, cycle),
      emailLimit: limits.emails,
      apiLimit: limits.apiCalls,
    });
    await this.deps.userRepo.setTier(params.userId, params.newPlanType, updated.currentPeriodEnd);

    this.deps.logger.info({
      msg: 'subscriptions.change_plan.success',
      flow: 'subscriptions.change_plan',
      requestId: params.requestId,
      userId: params.userId,
      from: sub.tier,
      to: params.newPlanType,
    });

    return { message: 'Plan changed successfully', tier: params.newPlanType };
  }

  async cancel(
    userId: string,
    requestId: string,
  ): Promise<{ message: string; current_period_end: string | null }> {
    const sub = await this.deps.subscriptionRepo.findByUser(userId);
    if (!sub || !isLive(sub.status) || !sub.stripeSubscriptionId) {
      throw SubscriptionErrors.noActiveSubscription();
    }

    const stripeSubscriptionId = sub.stripeSubscriptionId;
    const updated = await this.billingCall(() =>
      this.deps.billing.setCancelAtPeriodEnd(stripeSubscriptionId, true),
    );

    await this.deps.subscriptionRepo.update(sub.id, {
      status: 'canceled',
      cancelAtPeriodEnd: true,
      canceledAt: new Date(),
      currentPeriodEnd: updated.currentPeriodEnd,
    });

    this.deps.logger.info({
      msg: 'subscriptions.cancel.success',
      flow: 'subscriptions.cancel',
      requestId,
      userId,
    });

    return {
      message: 'Subscription will be canceled at the end of current period',
      current_period_end: iso(updated.currentPeriodEnd),
    };
  }

  async reactivate(userId: string, requestId: string): Promise<{ message: string; status: string }> {
    const sub = await this.deps.subscriptionRepo.findByUser(userId);
    if (
      !sub ||
      sub.status !== 'canceled' ||
      !sub.cancelAtPeriodEnd ||
      !sub.stripeSubscriptionId
    ) {
      throw SubscriptionErrors.noCanceledSubscription();
    }

    const stripeSubscriptionId = sub.stripeSubscriptionId;
    const updated = await this.billingCall(() =>
      this.deps.billing.setCancelAtPeriodEnd(stripeSubscriptionId, false),
    );

    await this.deps.subscriptionRepo.update(sub.id, {
      status: 'active',
      cancelAtPeriodEnd: false,
      canceledAt: null,
      currentPeriodEnd: updated.currentPeriodEnd,
    });

    this.deps.logger.info({
      msg: 'subscriptions.reactivate.success',
      flow: 'subscriptions.reactivate',
      requestId,
      userId,
    });

    return { message: 'Subscription reactivated', status: 'active' };
  }

  async usage(userId: string): Promise<UsageSnapshot> {
    return usageSnapshot(await this.loadUser(userId));
  }

  async billingHistory(userId: string, limit: number): Promise<{ invoices: InvoiceResponse[] }> {
    const user = await this.loadUser(userId);
    if (!user.stripeCustomerId) {
      return { invoices: [] };
    }

    const customerId = user.stripeCustomerId;
    const invoices = await this.billingCall(() =>
      this.deps.billing.listInvoices(customerId, limit),
    );

    return {
      invoices: invoices.map((inv) => ({
        id: inv.id,
        amount_paid: inv.amountPaidCents / 100,
        currency: inv.currency,
        status: inv.status,
        created: inv.created.toISOString(),
        invoice_pdf: inv.invoicePdf,
        hosted_invoice_url: inv.hostedInvoiceUrl,
        period_start: inv.periodStart.toISOString(),
        period_end: inv.periodEnd.toISOString(),
      })),
    };
  }

  async updateBillingAddress(
    userId: string,
    address: {
      line1: string;
      line2: string | null;
      city: string;
      state: string;
      postalCode: string;
      country: string;
    },
  ): Promise<{ message: string }> {
    const user = await this.loadUser(userId);

    await this.billingCall(async () => {
      const customerId = await this.ensureCustomer(user);
      await this.deps.billing.updateBillingAddress(customerId, address);
    });

    return { message: 'Billing address updated' };
  }

  /**
   * Verifies, de-duplicates and applies one provider webhook.
   * Events for subscriptions we do not know are recorded and acknowledged.
   */
  async handleWebhook(params: {
    rawBody: Buffer;
    signature: string;
    requestId: string;
  }): Promise<{ received: true }> {
    const event = this.verifyWebhook(params.rawBody, params.signature, params.requestId);

    const eventType = event.type === 'ignored' ? event.eventType : event.type;

    if (await this.deps.subscriptionRepo.isEventProcessed(event.id)) {
      this.deps.logger.info({
        msg: 'subscriptions.webhook.duplicate',
        flow: 'subscriptions.webhook',
        requestId: params.requestId,
        eventId: event.id,
        eventType,
      });
      return { received: true };
    }

    const stripeSubscriptionId = webhookSubscriptionId(event);
    const sub = stripeSubscriptionId
      ? await this.deps.subscriptionRepo.findByStripeId(stripeSubscriptionId)
      : undefined;

    const plan = sub ? planWebhookUpdate(event, sub, new Date()) : null;
    if (sub && plan) {
      await this.applyWebhookPlan(sub, plan);
    }

    await this.deps.subscriptionRepo.markEventProcessed(event.id, eventType);

    this.deps.logger.info({
      msg: 'subscriptions.webhook.processed',
      flow: 'subscriptions.webhook',
      requestId: params.requestId,
      eventId: event.id,
      eventType,
      applied: plan !== null,
    });

    return { received: true };
  }

  async resetMonthlyUsage(): Promise<number> {
    const count = await this.deps.userRepo.resetApiCalls();
    this.deps.logger.info({
      msg: 'subscriptions.reset_usage.done',
      flow: 'billing.reset-monthly-usage',
      usersReset: count,
    });
    return count;
  }

  // ── internals ────────────────────────────────────────────

  private async applyWebhookPlan(
    sub: Subscription,
    plan: WebhookUpdatePlan,
  ): Promise<void> {
    await this.deps.subscriptionRepo.update(sub.id, plan.subscriptionPatch);
    if (plan.userTier) {
      await this.deps.userRepo.setTier(sub.userId, plan.userTier.tier, plan.userTier.endDate);
    }
  }

  private verifyWebhook(rawBody: Buffer, signature: string, requestId: string): BillingWebhookEvent {
    try {
      return this.deps.billing.parseWebhookEvent(rawBody, signature);
    } catch (err) {
      if (err instanceof WebhookSignatureError) {
        this.deps.logger.warn({
          msg: 'subscriptions.webhook.invalid_signature',
          flow: 'subscriptions.webhook',
          requestId,
        });
        throw SubscriptionErrors.invalidWebhookSignature();
      }
      throw err;
    }
  }

  private async loadUser(userId: string): Promise<User> {
    const user = await this.deps.userRepo.findById(userId);
    if (!user || !user.isActive) throw UsageErrors.userUnavailable();
    return user;
  }

  private async ensureCustomer(user: User): Promise<string> {
    if (user.stripeCustomerId) return user.stripeCustomerId;

    const customerId = await this.deps.billing.createCustomer({
      userId: user.id,
      email: user.email,
      name: user.fullName,
    });
    await this.deps.userRepo.setStripeCustomerId(user.id, customerId);
    return customerId;
  }

  private async billingCall<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof BillingGatewayError) {
        throw SubscriptionErrors.billingFailed(err.message);
      }
      throw err;
    }
  }
}
