/**
 * src/modules/subscriptions/billing/stripe-billing-gateway.ts
 *
 * WHY:
 * - BillingGateway over the official Stripe SDK.
 *
 * RULES:
 * - The Stripe client is created lazily: the API boots without STRIPE_SECRET_KEY and only
 *   billing calls fail (400 through BillingGatewayError).
 * - Webhook payloads are verified with the endpoint secret, then narrowed with zod.
 *   We never trust the event body's shape beyond what we read.
 */

import Stripe from 'stripe';
import { z } from 'zod';

import {
  BillingGatewayError,
  WebhookSignatureError,
  type BillingAddress,
  type BillingGateway,
  type BillingWebhookEvent,
  type CardPaymentMethod,
  type CreatedProviderSubscription,
  type ProviderInvoice,
  type ProviderSubscription,
} from './billing-gateway';
import { fromStripeStatus } from '../policies/subscription-status.policy';

function fromEpoch(seconds: number | null | undefined): Date | null {
  return typeof seconds === 'number' ? new Date(seconds * 1000) : null;
}

function toGatewayError(err: unknown): BillingGatewayError {
  if (err instanceof BillingGatewayError) return err;
  if (err instanceof Error) return new BillingGatewayError(err.message);
  return new BillingGatewayError('Billing provider request failed');
}

function toProviderSubscription(sub: Stripe.Subscription): ProviderSubscription {
  return {
    id: sub.id,
    status: fromStripeStatus(sub.status),
    currentPeriodStart: fromEpoch(sub.current_period_start),
    currentPeriodEnd: fromEpoch(sub.current_period_end),
    trialStart: fromEpoch(sub.trial_start),
    trialEnd: fromEpoch(sub.trial_end),
    cancelAtPeriodEnd: sub.cancel_at_period_end,
  };
}

function clientSecretOf(sub: Stripe.Subscription): string | null {
  const invoice = sub.latest_invoice;
  if (!invoice || typeof invoice === 'string') return null;

  const intent = invoice.payment_intent;
  if (!intent || typeof intent === 'string') return null;

  return intent.client_secret;
}

const WebhookSubscriptionSchema = z.object({
  id: z.string(),
  status: z.string(),
  current_period_start: z.number().nullish(),
  current_period_end: z.number().nullish(),
  cancel_at_period_end: z.boolean().default(false),
});

const WebhookInvoiceSchema = z.object({
  subscription: z.union([z.string(), z.object({ id: z.string() })]).nullish(),
});

function invoiceSubscriptionId(object: unknown): string | null {
  const ref = WebhookInvoiceSchema.parse(object).subscription;
  if (!ref) return null;
  return typeof ref === 'string' ? ref : ref.id;
}

export function normalizeStripeEvent(event: {
  id: string;
  type: string;
  data: { object: unknown };
}): BillingWebhookEvent {
  switch (event.type) {
    case 'customer.subscription.updated': {
      const sub = WebhookSubscriptionSchema.parse(event.data.object);
      return {
        id: event.id,
        type: 'customer.subscription.updated',
        subscription: {
          id: sub.id,
          status: fromStripeStatus(sub.status),
          currentPeriodStart: fromEpoch(sub.current_period_start),
          currentPeriodEnd: fromEpoch(sub.current_period_end),
          cancelAtPeriodEnd: sub.cancel_at_period_end,
        },
      };
    }
    case 'customer.subscription.deleted': {
      const sub = WebhookSubscriptionSchema.parse(event.data.object);
      return { id: event.id, type: 'customer.subscription.deleted', subscriptionId: sub.id };
    }
    case 'invoice.payment_succeeded':
      return {
        id: event.id,
        type: 'invoice.payment_succeeded',
        subscriptionId: invoiceSubscriptionId(event.data.object),
      };
    case 'invoice.payment_failed':
      return {
        id: event.id,
        type: 'invoice.payment_failed',
        subscriptionId: invoiceSubscriptionId(event.data.object),
      };
    default:
      return { id: event.id, type: 'ignored', eventType: event.type };
  }
}

export class StripeBillingGateway implements BillingGateway {
  private client: Stripe | null = null;

  constructor(
    private readonly opts: {
      secretKey: string | null;
      webhookSecret: string | null;
    },
  ) {}

  private stripe(): Stripe {
    if (!this.opts.secretKey) {
      throw new BillingGatewayError('Billing is not configured');
    }
    if (!this.client) {
      this.client = new Stripe(this.opts.secretKey, { maxNetworkRetries: 2 });
    }
    return this.client;
  }

  async createCustomer(input: {
    userId: string;
    email: string;
    name: string | null;
  }): Promise<string> {
    try {
      const customer = await this.stripe().customers.create({
        email: input.email,
        name: input.name ?? input.email,
        metadata: { user_id: input.userId },
      });
      return customer.id;
    } catch (err) {
      throw toGatewayError(err);
    }
  }

  async attachDefaultPaymentMethod(customerId: string, paymentMethodId: string): Promise<void> {
    try {
      const stripe = this.stripe();
      await stripe.paymentMethods.attach(paymentMethodId, { customer: customerId });
      await stripe.customers.update(customerId, {
        invoice_settings: { default_payment_method: paymentMethodId },
      });
    } catch (err) {
      throw toGatewayError(err);
    }
  }

  async createSubscription(input: {
    customerId: string;
    priceId: string;
    metadata: Record<string, string>;
  }): Promise<CreatedProviderSubscription> {
    try {
      const sub = await this.stripe().subscriptions.create({
        customer: input.customerId,
        items: [{ price: input.priceId }],
        payment_behavior: 'default_incomplete',
        payment_settings: { save_default_payment_method: 'on_subscription' },
        expand: ['latest_invoice.payment_intent'],
        metadata: input.metadata,
      });

      return { ...toProviderSubscription(sub), clientSecret: clientSecretOf(sub) };
    } catch (err) {
      throw toGatewayError(err);
    }
  }

  async changeSubscriptionPrice(subscriptionId: string, priceId: string): Promise<ProviderSubscription> {
    try {
      const stripe = this.stripe();
      const current = await stripe.subscriptions.retrieve(subscriptionId);

      const item = current.items.data[0];
      if (!item) {
        throw new BillingGatewayError('Subscription has no items');
      }

      const updated = await stripe.subscriptions.update(subscriptionId, {
        items: [{ id: item.id, price: priceId }],
        proration_behavior: 'create_prorations',
      });
      return toProviderSubscription(updated);
    } catch (err) {
      throw toGatewayError(err);
    }
  }

  async setCancelAtPeriodEnd(subscriptionId: string, cancel: boolean): Promise<ProviderSubscription> {
    try {
      const updated = await this.stripe().subscriptions.update(subscriptionId, {
        cancel_at_period_end: cancel,
      });
      return toProviderSubscription(updated);
    } catch (err) {
      throw toGatewayError(err);
    }
  }

  async createCardPaymentMethod(customerId: string, token: string): Promise<CardPaymentMethod> {
    try {
      const stripe = this.stripe();
      const method = await stripe.paymentMethods.create({ type: 'card', card: { token } });
      await stripe.paymentMethods.attach(method.id, { customer: customerId });

      return {
        id: method.id,
        brand: method.card?.brand ?? null,
        last4: method.card?.last4 ?? null,
      };
    } catch (err) {
      throw toGatewayError(err);
    }
  }

  async updateBillingAddress(customerId: string, address: BillingAddress): Promise<void> {
    try {
      await this.stripe().customers.update(customerId, {
        address: {
          line1: address.line1,
          line2: address.line2 ?? undefined,
          city: address.city,
          state: address.state,
          postal_code: address.postalCode,
          country: address.country,
        },
      });
    } catch (err) {
      throw toGatewayError(err);
    }
  }

  async listInvoices(customerId: string, limit: number): Promise<ProviderInvoice[]> {
    try {
      const page = await this.stripe().invoices.list({ customer: customerId, limit });

      return page.data.map((invoice) => ({
        id: invoice.id,
        amountPaidCents: invoice.amount_paid,
        currency: invoice.currency,
        status: invoice.status,
        created: new Date(invoice.created * 1000),
        invoicePdf: invoice.invoice_pdf ?? null,
        hostedInvoiceUrl: invoice.hosted_invoice_url ?? null,
        periodStart: new Date(invoice.period_start * 1000),
        periodEnd: new Date(invoice.period_end * 1000),
      }));
    } catch (err) {
      throw toGatewayError(err);
    }
  }

  parseWebhookEvent(rawBody: Buffer, signature: string): BillingWebhookEvent {
    if (!this.opts.webhookSecret || !this.opts.secretKey) {
      throw new WebhookSignatureError();
    }

    let event: Stripe.Event;
    try {
      event = this.stripe().webhooks.constructEvent(rawBody, signature, this.opts.webhookSecret);
    } catch {
      throw new WebhookSignatureError();
    }

    return normalizeStripeEvent(event);
  }
}
