/**
 * src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export type { User, UserId, NewUser, SubscriptionTier } from './user.types';
export type { UserRepo } from './dal/user.repo';
export { KyselyUserRepo } from './dal/user.repo';
export { toUserResponse, type UserResponse } from './user.presenter';
