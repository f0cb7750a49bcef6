/**
 * src/modules/emails/dal/email-account.repo.ts
 *
 * WHY:
 * - Data-access contract for connected mailboxes.
 *
 * RULES:
 * - No AppError. No policies.
 * - Secrets arrive already encrypted; this layer never sees plaintext credentials.
 * - Deleting an account cascades to its emails (FK on delete cascade).
 */

import { sql, type Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { EmailAccountsTable } from '../../../shared/db/schema';
import type { EmailAccount, NewEmailAccount } from '../email.types';

type EmailAccountRow = Selectable<EmailAccountsTable>;

export interface EmailAccountRepo {
  findById(userId: string, accountId: string): Promise<EmailAccount | undefined>;
  findByAddress(userId: string, emailAddress: string): Promise<EmailAccount | undefined>;
  listByUser(userId: string): Promise<EmailAccount[]>;
  listActiveByUser(userId: string): Promise<EmailAccount[]>;

  insert(input: NewEmailAccount): Promise<EmailAccount>;
  delete(accountId: string): Promise<void>;

  touchLastSync(accountId: string, at: Date): Promise<void>;
  incrementTotalEmails(accountId: string, by: number): Promise<void>;
  setTotalEmails(accountId: string, total: number): Promise<void>;
}

function toEmailAccount(row: EmailAccountRow): EmailAccount {
  return {
    id: row.id,
    userId: row.user_id,
    provider: row.provider,
    emailAddress: row.email_address,
    displayName: row.display_name ?? null,
    accessToken: row.access_token ?? null,
    refreshToken: row.refresh_token ?? null,
    tokenExpiresAt: row.token_expires_at ?? null,
    imapHost: row.imap_host ?? null,
    imapPort: row.imap_port ?? null,
    imapUsername: row.imap_username ?? null,
    imapPassword: row.imap_password ?? null,
    isActive: row.is_active,
    lastSyncAt: row.last_sync_at ?? null,
    syncFromDate: row.sync_from_date ?? null,
    totalEmails: row.total_emails,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyEmailAccountRepo implements EmailAccountRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(userId: string, accountId: string): Promise<EmailAccount | undefined> {
    const row = await this.db
      .selectFrom('email_accounts')
      .selectAll()
      .where('user_id', '=', userId)
      .where('id', '=', accountId)
      .executeTakeFirst();
    return row ? toEmailAccount(row) : undefined;
  }

  async findByAddress(userId: string, emailAddress: string): Promise<EmailAccount | undefined> {
    const row = await this.db
      .selectFrom('email_accounts')
      .selectAll()
      .where('user_id', '=', userId)
      .where(sql<string>`lower(email_address)`, '=', emailAddress.toLowerCase())
      .executeTakeFirst();
    return row ? toEmailAccount(row) : undefined;
  }

  async listByUser(userId: string): Promise<EmailAccount[]> {
    const rows = await this.db
      .selectFrom('email_accounts')
      .selectAll()
      .where('user_id', '=', userId)
      .orderBy('created_at', 'asc')
      .execute();
    return rows.map(toEmailAccount);
  }

  async listActiveByUser(userId: string): Promise<EmailAccount[]> {
    const rows = await this.db
      .selectFrom('email_accounts')
      .selectAll()
      .where('user_id', '=', userId)
      .where('is_active', '=', true)
      .orderBy('created_at', 'asc')
      .execute();
    return rows.map(toEmailAccount);
  }

  async insert(input: NewEmailAccount): Promise<EmailAccount> {
    const row = await this.db
      .insertInto('email_accounts')
      .values({
        user_id: input.userId,
        provider: input.provider,
        email_address: input.emailAddress.toLowerCase(),
        display_name: input.displayName,
        access_token: input.accessToken,
        refresh_token: input.refreshToken,
        token_expires_at: input.tokenExpiresAt,
        imap_host: input.imapHost,
        imap_port: input.imapPort,
        imap_username: input.imapUsername,
        imap_password: input.imapPassword,
        sync_from_date: input.syncFromDate,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toEmailAccount(row);
  }

  async delete(accountId: string): Promise<void> {
    await this.db.deleteFrom('email_accounts').where('id', '=', accountId).execute();
  }

  async touchLastSync(accountId: string, at: Date): Promise<void> {
    await this.db
      .updateTable('email_accounts')
      .set({ last_sync_at: at, updated_at: new Date() })
      .where('id', '=', accountId)
      .execute();
  }

  async incrementTotalEmails(accountId: string, by: number): Promise<void> {
    if (by === 0) return;
    await this.db
      .updateTable('email_accounts')
      .set({ total_emails: sql`total_emails + ${by}`, updated_at: new Date() })
      .where('id', '=', accountId)
      .execute();
  }

  async setTotalEmails(accountId: string, total: number): Promise<void> {
    await this.db
      .updateTable('email_accounts')
      .set({ total_emails: total, updated_at: new Date() })
      .where('id', '=', accountId)
      .execute();
  }
}
