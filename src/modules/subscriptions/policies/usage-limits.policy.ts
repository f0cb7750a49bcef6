/**
 * src/modules/subscriptions/policies/usage-limits.policy.ts
 *
 * WHY:
 * - Tier → quota mapping and the "is there room left" decision, in one pure place.
 *
 * RULES:
 * - -1 means unlimited (never reached, remaining stays -1).
 * - An unknown tier falls back to free_trial limits.
 * - A counter equal to the limit is already over: the check runs BEFORE the work.
 */

export type TierLimits = {
  emails: number;
  apiCalls: number;
};

export const UNLIMITED = -1;

export const TIER_LIMITS = {
  free_trial: { emails: 1000, apiCalls: 100 },
  starter: { emails: 10000, apiCalls: 1000 },
  professional: { emails: 100000, apiCalls: 10000 },
  enterprise: { emails: UNLIMITED, apiCalls: UNLIMITED },
} as const satisfies Record<string, TierLimits>;

function isKnownTier(tier: string): tier is keyof typeof TIER_LIMITS {
  return Object.prototype.hasOwnProperty.call(TIER_LIMITS, tier);
}

export function limitsForTier(tier: string): TierLimits {
  return isKnownTier(tier) ? TIER_LIMITS[tier] : TIER_LIMITS.free_trial;
}

export function hasCapacity(used: number, limit: number): boolean {
  return limit === UNLIMITED || used < limit;
}

export function remaining(used: number, limit: number): number {
  return limit === UNLIMITED ? UNLIMITED : Math.max(0, limit - used);
}
