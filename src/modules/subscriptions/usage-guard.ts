/**
 * src/modules/subscriptions/usage-guard.ts
 *
 * WHY:
 * - Plan quotas are enforced by several modules (emails, ai-insights, jobs).
 *   They share this guard instead of re-reading limits each.
 *
 * RULES:
 * - assert* methods load the user fresh (counters move between requests) and throw
 *   LIMIT_EXCEEDED (429) when the quota is used up.
 * - recordApiCall is called only AFTER a successful metered call.
 */

import type { User, UserRepo } from '../users';
import { UsageErrors } from './subscription.errors';
import { hasCapacity, limitsForTier, remaining } from './policies/usage-limits.policy';
import type { UsageSnapshot } from './subscription.types';

export function hasEmailCapacity(user: User): boolean {
  return hasCapacity(user.emailsProcessed, limitsForTier(user.subscriptionTier).emails);
}

export function hasApiCapacity(user: User): boolean {
  return hasCapacity(user.apiCallsThisMonth, limitsForTier(user.subscriptionTier).apiCalls);
}

export function usageSnapshot(user: User): UsageSnapshot {
  const limits = limitsForTier(user.subscriptionTier);
  return {
    tier: user.subscriptionTier,
    emails_processed: user.emailsProcessed,
    emails_limit: limits.emails,
    api_calls_this_month: user.apiCallsThisMonth,
    api_calls_limit: limits.apiCalls,
    emails_remaining: remaining(user.emailsProcessed, limits.emails),
    api_calls_remaining: remaining(user.apiCallsThisMonth, limits.apiCalls),
  };
}

export class UsageGuard {
  constructor(private readonly deps: { userRepo: UserRepo }) {}

  private async loadUser(userId: string): Promise<User> {
    const user = await this.deps.userRepo.findById(userId);
    if (!user || !user.isActive) throw UsageErrors.userUnavailable();
    return user;
  }

  async assertEmailCapacity(userId: string): Promise<User> {
    const user = await this.loadUser(userId);
    if (!hasEmailCapacity(user)) {
      throw UsageErrors.emailLimitExceeded({ tier: user.subscriptionTier });
    }
    return user;
  }

  async assertApiCapacity(userId: string): Promise<User> {
    const user = await this.loadUser(userId);
    if (!hasApiCapacity(user)) {
      throw UsageErrors.apiLimitExceeded({ tier: user.subscriptionTier });
    }
    return user;
  }

  async recordApiCall(userId: string): Promise<void> {
    await this.deps.userRepo.incrementApiCalls(userId);
  }

  async snapshot(userId: string): Promise<UsageSnapshot> {
    return usageSnapshot(await this.loadUser(userId));
  }
}
