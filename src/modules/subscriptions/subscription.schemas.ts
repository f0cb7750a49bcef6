/**
 * src/modules/subscriptions/subscription.schemas.ts
 */

import { z } from 'zod';

const paidTier = z.enum(['starter', 'professional', 'enterprise']);
const billingCycle = z.enum(['monthly', 'yearly']);

export const createSubscriptionSchema = z.object({
  plan_type: paidTier,
  billing_cycle: billingCycle.default('monthly'),
  payment_method_id: z.string().min(1).optional(),
});

export const paymentMethodSchema = z.object({
  token: z.string().min(1),
  type: z.literal('card').default('card'),
});

export const changePlanSchema = z.object({
  new_plan_type: paidTier,
  billing_cycle: billingCycle.optional(),
});

export const billingHistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export const billingAddressSchema = z.object({
  line1: z.string().min(1).max(200),
  line2: z.string().max(200).optional(),
  city: z.string().min(1).max(100),
  state: z.string().min(1).max(100),
  postal_code: z.string().min(1).max(20),
  country: z.string().length(2),
});
