/**
 * src/modules/users/user.presenter.ts
 *
 * Wire shape of a user (auth responses, /auth/me). Never includes the password hash.
 */

import type { SubscriptionTier, User } from './user.types';

export type UserResponse = {
  id: string;
  email: string;
  full_name: string | null;
  is_active: boolean;
  is_verified: boolean;
  subscription_tier: SubscriptionTier;
  emails_processed: number;
  api_calls_this_month: number;
  created_at: string;
};

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    full_name: user.fullName,
    is_active: user.isActive,
    is_verified: user.isVerified,
    subscription_tier: user.subscriptionTier,
    emails_processed: user.emailsProcessed,
    api_calls_this_month: user.apiCallsThisMonth,
    created_at: user.createdAt.toISOString(),
  };
}
