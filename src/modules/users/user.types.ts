/**
 * src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - A user carries its subscription tier and usage counters: limit checks need one read.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 */

import type { SubscriptionTier } from '../../shared/db/schema';

export type { SubscriptionTier };

export type UserId = string;

export type User = {
  id: UserId;
  email: string;
  passwordHash: string;
  fullName: string | null;
  isActive: boolean;
  isVerified: boolean;

  subscriptionTier: SubscriptionTier;
  stripeCustomerId: string | null;
  subscriptionEndDate: Date | null;

  emailsProcessed: number;
  apiCallsThisMonth: number;

  emailSyncEnabled: boolean;
  lastEmailSyncAt: Date | null;

  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = {
  email: string;
  passwordHash: string;
  fullName: string | null;
};
