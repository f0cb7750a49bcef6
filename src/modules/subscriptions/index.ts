/**
 * src/modules/subscriptions/index.ts
 *
 * Public surface of the subscriptions module.
 */

export type {
  BillingCycle,
  NewSubscription,
  PaidTier,
  Subscription,
  SubscriptionPatch,
  SubscriptionStatus,
  UsageSnapshot,
} from './subscription.types';
export type { SubscriptionRepo } from './dal/subscription.repo';
export { KyselySubscriptionRepo } from './dal/subscription.repo';
export type {
  BillingGateway,
  BillingWebhookEvent,
  CardPaymentMethod,
  CreatedProviderSubscription,
  ProviderInvoice,
  ProviderSubscription,
} from './billing/billing-gateway';
export { BillingGatewayError, WebhookSignatureError } from './billing/billing-gateway';
export { StripeBillingGateway } from './billing/stripe-billing-gateway';
export { UsageGuard, hasApiCapacity, hasEmailCapacity, usageSnapshot } from './usage-guard';
export { SubscriptionService } from './subscription.service';
export { createSubscriptionModule, type SubscriptionModule } from './subscription.module';
