/**
 * src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - The single data-access contract for users (reads + mutations).
 * - Services depend on the UserRepo interface; tests plug an in-memory implementation.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError.
 * - No policies.
 * - Counters are incremented in SQL (never read-modify-write in JS).
 */

import { sql } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { SubscriptionTier, NewUser, User } from '../user.types';
import {
  selectActiveUsersSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUsersDueForSyncSql,
  type UserRow,
} from './user.query-sql';

export interface UserRepo {
  findById(userId: string): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  insert(input: NewUser): Promise<User>;

  listDueForSync(olderThan: Date): Promise<User[]>;
  listActive(): Promise<User[]>;

  incrementEmailsProcessed(userId: string, by: number): Promise<void>;
  incrementApiCalls(userId: string): Promise<void>;
  /** Returns the number of users whose counter was reset. */
  resetApiCalls(): Promise<number>;

  setTier(userId: string, tier: SubscriptionTier, endDate?: Date | null): Promise<void>;
  setStripeCustomerId(userId: string, customerId: string): Promise<void>;
  touchLastEmailSync(userId: string, at: Date): Promise<void>;
}

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name ?? null,
    isActive: row.is_active,
    isVerified: row.is_verified,
    subscriptionTier: row.subscription_tier,
    stripeCustomerId: row.stripe_customer_id ?? null,
    subscriptionEndDate: row.subscription_end_date ?? null,
    emailsProcessed: row.emails_processed,
    apiCallsThisMonth: row.api_calls_this_month,
    emailSyncEnabled: row.email_sync_enabled,
    lastEmailSyncAt: row.last_email_sync_at ?? null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyUserRepo implements UserRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(userId: string): Promise<User | undefined> {
    const row = await selectUserByIdSql(this.db, userId);
    return row ? toUser(row) : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const row = await selectUserByEmailSql(this.db, email);
    return row ? toUser(row) : undefined;
  }

  /**
   * Email must be globally unique (enforced by DB constraint).
   * Callers check findByEmail first; a concurrent duplicate surfaces as a unique violation.
   */
  async insert(input: NewUser): Promise<User> {
    const row = await this.db
      .insertInto('users')
      .values({
        email: input.email.toLowerCase(),
        password_hash: input.passwordHash,
        full_name: input.fullName,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toUser(row);
  }

  async listDueForSync(olderThan: Date): Promise<User[]> {
    const rows = await selectUsersDueForSyncSql(this.db, olderThan);
    return rows.map(toUser);
  }

  async listActive(): Promise<User[]> {
    const rows = await selectActiveUsersSql(this.db);
    return rows.map(toUser);
  }

  async incrementEmailsProcessed(userId: string, by: number): Promise<void> {
    if (by <= 0) return;

    await this.db
      .updateTable('users')
      .set({
        emails_processed: sql<number>`emails_processed + ${by}`,
        updated_at: new Date(),
      })
      .where('id', '=', userId)
      .execute();
  }

  async incrementApiCalls(userId: string): Promise<void> {
    await this.db
      .updateTable('users')
      .set({
        api_calls_this_month: sql<number>`api_calls_this_month + 1`,
        updated_at: new Date(),
      })
      .where('id', '=', userId)
      .execute();
  }

  async resetApiCalls(): Promise<number> {
    const result = await this.db
      .updateTable('users')
      .set({ api_calls_this_month: 0, updated_at: new Date() })
      .where('api_calls_this_month', '>', 0)
      .executeTakeFirst();

    return Number(result.numUpdatedRows);
  }

  async setTier(userId: string, tier: SubscriptionTier, endDate?: Date | null): Promise<void> {
    await this.db
      .updateTable('users')
      .set({
        subscription_tier: tier,
        ...(endDate !== undefined ? { subscription_end_date: endDate } : {}),
        updated_at: new Date(),
      })
      .where('id', '=', userId)
      .execute();
  }

  async setStripeCustomerId(userId: string, customerId: string): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ stripe_customer_id: customerId, updated_at: new Date() })
      .where('id', '=', userId)
      .execute();
  }

  async touchLastEmailSync(userId: string, at: Date): Promise<void> {
    await this.db
      .updateTable('users')
      .set({ last_email_sync_at: at, updated_at: at })
      .where('id', '=', userId)
      .execute();
  }
}
