/**
 * src/modules/subscriptions/subscription.errors.ts
 *
 * WHY:
 * - Subscriptions module owns billing + quota error semantics.
 *
 * RULES:
 * - Provider messages are passed through (they are user-facing in Stripe's API too).
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const SubscriptionErrors = {
  alreadySubscribed(meta?: AppErrorMeta) {
    return AppError.badRequest('User already has an active subscription', meta);
  },

  createFailed(reason: string, meta?: AppErrorMeta) {
    return AppError.badRequest(`Failed to create subscription: ${reason}`, meta);
  },

  billingFailed(reason: string, meta?: AppErrorMeta) {
    return AppError.badRequest(`Billing request failed: ${reason}`, meta);
  },

  noActiveSubscription(meta?: AppErrorMeta) {
    return AppError.notFound('No active subscription found', meta);
  },

  noCanceledSubscription(meta?: AppErrorMeta) {
    return AppError.notFound('No canceled subscription found', meta);
  },

  noBillingCustomer(meta?: AppErrorMeta) {
    return AppError.badRequest('No billing customer on file', meta);
  },

  invalidWebhookSignature(meta?: AppErrorMeta) {
    return AppError.badRequest('Invalid webhook signature', meta);
  },
} as const;

export const UsageErrors = {
  emailLimitExceeded(meta?: AppErrorMeta) {
    return AppError.limitExceeded(
      'Email processing limit exceeded for your subscription tier',
      meta,
    );
  },

  apiLimitExceeded(meta?: AppErrorMeta) {
    return AppError.limitExceeded('API call limit exceeded for your subscription tier', meta);
  },

  userUnavailable(meta?: AppErrorMeta) {
    return AppError.unauthorized('User not found or inactive', meta);
  },
} as const;
