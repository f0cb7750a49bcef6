/**
 * src/modules/subscriptions/billing/billing-gateway.ts
 *
 * WHY:
 * - The subscriptions service talks to the payment provider through this port.
 * - Stripe objects never leave the adapter: callers see small, typed snapshots.
 *
 * RULES:
 * - Every provider failure surfaces as BillingGatewayError (message is safe to show).
 * - Webhook verification failures surface as WebhookSignatureError.
 */

import type { SubscriptionStatus } from '../subscription.types';

export class BillingGatewayError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BillingGatewayError';
  }
}

export class WebhookSignatureError extends Error {
  constructor(message = 'Invalid webhook signature') {
    super(message);
    this.name = 'WebhookSignatureError';
  }
}

export type ProviderSubscription = {
  id: string;
  status: SubscriptionStatus;
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  trialStart: Date | null;
  trialEnd: Date | null;
  cancelAtPeriodEnd: boolean;
};

export type CreatedProviderSubscription = ProviderSubscription & {
  /** PaymentIntent client secret the frontend confirms; null when nothing is due. */
  clientSecret: string | null;
};

export type CardPaymentMethod = {
  id: string;
  brand: string | null;
  last4: string | null;
};

export type ProviderInvoice = {
  id: string;
  amountPaidCents: number;
  currency: string;
  status: string | null;
  created: Date;
  invoicePdf: string | null;
  hostedInvoiceUrl: string | null;
  periodStart: Date;
  periodEnd: Date;
};

export type BillingAddress = {
  line1: string;
  line2: string | null;
  city: string;
  state: string;
  postalCode: string;
  country: string;
};

/** Webhook events normalized to what the service acts on. */
export type BillingWebhookEvent =
  | {
      id: string;
      type: 'customer.subscription.updated';
      subscription: Pick<
        ProviderSubscription,
        'id' | 'status' | 'currentPeriodStart' | 'currentPeriodEnd' | 'cancelAtPeriodEnd'
      >;
    }
  | { id: string; type: 'customer.subscription.deleted'; subscriptionId: string }
  | { id: string; type: 'invoice.payment_succeeded'; subscriptionId: string | null }
  | { id: string; type: 'invoice.payment_failed'; subscriptionId: string | null }
  | { id: string; type: 'ignored'; eventType: string };

export interface BillingGateway {
  createCustomer(input: { userId: string; email: string; name: string | null }): Promise<string>;

  attachDefaultPaymentMethod(customerId: string, paymentMethodId: string): Promise<void>;

  createSubscription(input: {
    customerId: string;
    priceId: string;
    metadata: Record<string, string>;
  }): Promise<CreatedProviderSubscription>;

  /** Swaps the single subscription item to a new price, prorating the difference. */
  changeSubscriptionPrice(subscriptionId: string, priceId: string): Promise<ProviderSubscription>;

  setCancelAtPeriodEnd(subscriptionId: string, cancel: boolean): Promise<ProviderSubscription>;

  /** Creates a card payment method from a client-side token and attaches it to the customer. */
  createCardPaymentMethod(customerId: string, token: string): Promise<CardPaymentMethod>;

  updateBillingAddress(customerId: string, address: BillingAddress): Promise<void>;

  listInvoices(customerId: string, limit: number): Promise<ProviderInvoice[]>;

  parseWebhookEvent(rawBody: Buffer, signature: string): BillingWebhookEvent;
}
