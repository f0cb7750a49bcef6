/**
 * src/modules/emails/dal/email.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for emails and attachments.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Every read of a user's mail is scoped by user_id.
 */

import { sql, type Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { EmailAttachmentsTable, EmailsTable } from '../../../shared/db/schema';
import type { EmailListFilter, EmailQuery } from '../email.types';

export type EmailRow = Selectable<EmailsTable>;
export type EmailAttachmentRow = Selectable<EmailAttachmentsTable>;

export const EMAIL_FACT_COLUMNS = [
  'id',
  'subject',
  'sender_email',
  'sender_name',
  'received_date',
  'is_read',
  'is_flagged',
  'importance',
  'priority',
  'response_time_minutes',
  'ai_category',
  'ai_sentiment',
  'ai_sentiment_score',
  'ai_action_required',
] as const;

export type EmailFactRow = Pick<EmailRow, (typeof EMAIL_FACT_COLUMNS)[number]>;

export async function selectEmailByIdSql(
  db: DbExecutor,
  userId: string,
  emailId: string,
): Promise<EmailRow | undefined> {
  return db
    .selectFrom('emails')
    .selectAll()
    .where('user_id', '=', userId)
    .where('id', '=', emailId)
    .executeTakeFirst();
}

export async function selectEmailsByIdsSql(
  db: DbExecutor,
  userId: string,
  emailIds: readonly string[],
): Promise<EmailRow[]> {
  if (emailIds.length === 0) return [];
  return db
    .selectFrom('emails')
    .selectAll()
    .where('user_id', '=', userId)
    .where('id', 'in', [...emailIds])
    .execute();
}

export async function selectEmailExistsSql(
  db: DbExecutor,
  userId: string,
  messageId: string,
): Promise<boolean> {
  const row = await db
    .selectFrom('emails')
    .select('id')
    .where('user_id', '=', userId)
    .where('message_id', '=', messageId)
    .executeTakeFirst();
  return row !== undefined;
}

export async function selectEmailPageSql(
  db: DbExecutor,
  userId: string,
  filter: EmailListFilter,
): Promise<EmailRow[]> {
  let q = db.selectFrom('emails').selectAll().where('user_id', '=', userId);

  if (!filter.includeArchived) q = q.where('is_archived', '=', false);
  if (filter.unreadOnly) q = q.where('is_read', '=', false);
  if (filter.category) q = q.where('ai_category', '=', filter.category);
  if (filter.importanceMin !== null) {
    q = q.where('ai_importance_score', '>=', filter.importanceMin);
  }

  return q
    .orderBy(sql`received_date desc nulls last`)
    .offset(filter.skip)
    .limit(filter.limit)
    .execute();
}

/** `%term%` for ilike, with the LIKE wildcards in term matched literally. */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

export async function searchEmailsSql(
  db: DbExecutor,
  userId: string,
  term: string,
  limit: number,
): Promise<EmailRow[]> {
  const pattern = containsPattern(term);

  return db
    .selectFrom('emails')
    .selectAll()
    .where('user_id', '=', userId)
    .where((eb) => eb.or([eb('subject', 'ilike', pattern), eb('body_text', 'ilike', pattern)]))
    .orderBy(sql`received_date desc nulls last`)
    .limit(limit)
    .execute();
}

export async function selectEmailStatsSql(
  db: DbExecutor,
  userId: string,
  weekStart: Date,
): Promise<{ total: number; unread: number; thisWeek: number }> {
  const row = await db
    .selectFrom('emails')
    .select([
      sql<number>`count(*)::int`.as('total'),
      sql<number>`count(*) filter (where not is_read)::int`.as('unread'),
      sql<number>`count(*) filter (where received_date >= ${weekStart})::int`.as('this_week'),
    ])
    .where('user_id', '=', userId)
    .executeTakeFirstOrThrow();

  return { total: row.total, unread: row.unread, thisWeek: row.this_week };
}

export async function selectEmailsForQuerySql(
  db: DbExecutor,
  userId: string,
  query: EmailQuery,
): Promise<EmailRow[]> {
  let q = db.selectFrom('emails').selectAll().where('user_id', '=', userId);

  if (query.since) q = q.where('received_date', '>=', query.since);
  if (query.until) q = q.where('received_date', '<=', query.until);
  if (query.analyzedOnly) q = q.where('ai_analyzed_at', 'is not', null);
  if (query.withSentiment) q = q.where('ai_sentiment', 'is not', null);
  if (query.senderContains) {
    q = q.where('sender_email', 'ilike', containsPattern(query.senderContains));
  }

  q = q.orderBy(sql`received_date desc nulls last`);
  if (query.limit !== undefined) q = q.limit(query.limit);

  return q.execute();
}

export async function selectEmailFactsInWindowSql(
  db: DbExecutor,
  userId: string,
  from: Date,
  to: Date,
): Promise<EmailFactRow[]> {
  return db
    .selectFrom('emails')
    .select(EMAIL_FACT_COLUMNS)
    .where('user_id', '=', userId)
    .where('received_date', '>=', from)
    .where('received_date', '<=', to)
    .execute();
}

export async function selectEmailsByThreadSql(
  db: DbExecutor,
  threadId: string,
): Promise<EmailRow[]> {
  return db
    .selectFrom('emails')
    .selectAll()
    .where('thread_id', '=', threadId)
    .orderBy(sql`received_date asc nulls first`)
    .execute();
}

export async function selectUnprocessedSinceSql(
  db: DbExecutor,
  since: Date,
  userId: string | null,
): Promise<Array<{ id: string; user_id: string }>> {
  let q = db
    .selectFrom('emails')
    .select(['id', 'user_id'])
    .where('is_processed', '=', false)
    .where('created_at', '>=', since);

  if (userId) q = q.where('user_id', '=', userId);

  return q.orderBy('created_at', 'asc').execute();
}

export async function countEmailsByAccountSql(db: DbExecutor, accountId: string): Promise<number> {
  const row = await db
    .selectFrom('emails')
    .select(sql<number>`count(*)::int`.as('n'))
    .where('email_account_id', '=', accountId)
    .executeTakeFirstOrThrow();
  return row.n;
}

export async function selectAttachmentsSql(
  db: DbExecutor,
  emailId: string,
): Promise<EmailAttachmentRow[]> {
  return db
    .selectFrom('email_attachments')
    .selectAll()
    .where('email_id', '=', emailId)
    .orderBy('created_at', 'asc')
    .execute();
}
