/**
 * src/modules/subscriptions/plans.ts
 *
 * WHY:
 * - The plan catalog is data (plans.json), validated once at import.
 * - A malformed catalog fails at startup, not on the first checkout.
 */

import { z } from 'zod';

import catalog from './plans.json';
import type { BillingCycle, PaidTier } from './subscription.types';

const PlanSchema = z.object({
  id: z.enum(['starter', 'professional', 'enterprise']),
  name: z.string(),
  description: z.string(),
  price_monthly: z.number().nonnegative(),
  price_yearly: z.number().nonnegative(),
  features: z.array(z.string()),
  limits: z.object({
    emails_per_month: z.number().int(),
    ai_insights: z.number().int(),
    export_formats: z.array(z.string()),
    api_calls: z.number().int(),
  }),
});

export type Plan = z.infer<typeof PlanSchema>;

const PLANS: readonly Plan[] = z.object({ plans: z.array(PlanSchema) }).parse(catalog).plans;

export function listPlans(): readonly Plan[] {
  return PLANS;
}

export function findPlan(tier: PaidTier): Plan {
  const plan = PLANS.find((p) => p.id === tier);
  if (!plan) {
    throw new Error(`Plan catalog has no entry for tier "${tier}"`);
  }
  return plan;
}

export function planPriceCents(tier: PaidTier, cycle: BillingCycle): number {
  const plan = findPlan(tier);
  const dollars = cycle === 'yearly' ? plan.price_yearly : plan.price_monthly;
  return Math.round(dollars * 100);
}
