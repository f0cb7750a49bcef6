/**
 * src/modules/ai-insights/policies/executive-summary-access.policy.ts
 */

import type { SubscriptionTier } from '../../users';

const EXECUTIVE_TIERS: ReadonlySet<SubscriptionTier> = new Set(['professional', 'enterprise']);

export function canUseExecutiveSummary(tier: SubscriptionTier): boolean {
  return EXECUTIVE_TIERS.has(tier);
}
