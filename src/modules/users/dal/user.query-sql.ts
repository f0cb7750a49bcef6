/**
 * src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/schema';

export type UserRow = Selectable<UsersTable>;

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('email', '=', email.toLowerCase())
    .executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('users').selectAll().where('id', '=', userId).executeTakeFirst();
}

/** Active users with sync enabled whose last sync is older than `olderThan` (or never). */
export async function selectUsersDueForSyncSql(
  db: DbExecutor,
  olderThan: Date,
): Promise<UserRow[]> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('is_active', '=', true)
    .where('email_sync_enabled', '=', true)
    .where((eb) =>
      eb.or([eb('last_email_sync_at', 'is', null), eb('last_email_sync_at', '<', olderThan)]),
    )
    .orderBy('last_email_sync_at', 'asc')
    .execute();
}

export async function selectActiveUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('is_active', '=', true)
    .orderBy('created_at', 'asc')
    .execute();
}
