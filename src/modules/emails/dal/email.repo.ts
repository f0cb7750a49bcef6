/**
 * src/modules/emails/dal/email.repo.ts
 *
 * WHY:
 * - Data-access contract for emails + attachment metadata.
 * - Sync, the emails API, analytics and the AI jobs all read mail through this interface.
 *
 * RULES:
 * - No AppError. No policies.
 * - (user_id, message_id) is the ingestion dedupe key: insertIfAbsent never duplicates.
 * - jsonb arrays are written with toJson().
 */

import type { Updateable } from 'kysely';

import { toJson, type DbExecutor } from '../../../shared/db/db';
import type { EmailsTable } from '../../../shared/db/schema';
import type {
  Email,
  EmailAttachment,
  EmailFacts,
  EmailListFilter,
  EmailQuery,
  EmailStats,
  EmailUpdate,
  NewEmail,
  NewEmailAttachment,
} from '../email.types';
import {
  countEmailsByAccountSql,
  searchEmailsSql,
  selectAttachmentsSql,
  selectEmailByIdSql,
  selectEmailExistsSql,
  selectEmailFactsInWindowSql,
  selectEmailPageSql,
  selectEmailStatsSql,
  selectEmailsByIdsSql,
  selectEmailsByThreadSql,
  selectEmailsForQuerySql,
  selectUnprocessedSinceSql,
  type EmailAttachmentRow,
  type EmailFactRow,
  type EmailRow,
} from './email.query-sql';

export interface EmailRepo {
  findById(userId: string, emailId: string): Promise<Email | undefined>;
  findManyByIds(userId: string, emailIds: readonly string[]): Promise<Email[]>;
  exists(userId: string, messageId: string): Promise<boolean>;

  list(userId: string, filter: EmailListFilter): Promise<Email[]>;
  search(userId: string, term: string, limit: number): Promise<Email[]>;
  stats(userId: string, weekStart: Date): Promise<EmailStats>;
  query(userId: string, query: EmailQuery): Promise<Email[]>;
  listFactsInWindow(userId: string, from: Date, to: Date): Promise<EmailFacts[]>;
  listByThread(threadId: string): Promise<Email[]>;
  listUnprocessedSince(
    since: Date,
    userId: string | null,
  ): Promise<Array<{ id: string; userId: string }>>;
  countByAccount(accountId: string): Promise<number>;

  /** Returns undefined when (userId, messageId) already exists. */
  insertIfAbsent(input: NewEmail): Promise<Email | undefined>;
  insertAttachments(emailId: string, attachments: readonly NewEmailAttachment[]): Promise<void>;
  listAttachments(emailId: string): Promise<EmailAttachment[]>;

  update(emailId: string, patch: EmailUpdate): Promise<void>;
  delete(emailId: string): Promise<void>;
}

export function toEmail(row: EmailRow): Email {
  return {
    id: row.id,
    userId: row.user_id,
    emailAccountId: row.email_account_id,
    threadId: row.thread_id ?? null,
    messageId: row.message_id,
    providerThreadId: row.provider_thread_id ?? null,
    subject: row.subject ?? null,
    senderEmail: row.sender_email ?? null,
    senderName: row.sender_name ?? null,
    recipientEmails: row.recipient_emails,
    ccEmails: row.cc_emails,
    bccEmails: row.bcc_emails,
    bodyText: row.body_text ?? null,
    bodyHtml: row.body_html ?? null,
    snippet: row.snippet ?? null,
    sentDate: row.sent_date ?? null,
    receivedDate: row.received_date ?? null,
    labels: row.labels,
    importance: row.importance,
    priority: row.priority ?? null,
    isRead: row.is_read,
    isReplied: row.is_replied,
    isForwarded: row.is_forwarded,
    isFlagged: row.is_flagged,
    isArchived: row.is_archived,
    hasAttachments: row.has_attachments,
    responseTimeMinutes: row.response_time_minutes ?? null,
    aiCategory: row.ai_category ?? null,
    aiCategoryConfidence: row.ai_category_confidence ?? null,
    aiImportanceScore: row.ai_importance_score ?? null,
    aiSentiment: row.ai_sentiment ?? null,
    aiSentimentScore: row.ai_sentiment_score ?? null,
    aiSummary: row.ai_summary ?? null,
    aiActionItems: row.ai_action_items,
    aiKeyTopics: row.ai_key_topics,
    aiActionRequired: row.ai_action_required ?? null,
    aiSuggestedAction: row.ai_suggested_action ?? null,
    aiConfidenceScore: row.ai_confidence_score ?? null,
    aiAnalyzedAt: row.ai_analyzed_at ?? null,
    isProcessed: row.is_processed,
    processingError: row.processing_error ?? null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toEmailFacts(row: EmailFactRow): EmailFacts {
  return {
    id: row.id,
    subject: row.subject ?? null,
    senderEmail: row.sender_email ?? null,
    senderName: row.sender_name ?? null,
    receivedDate: row.received_date ?? null,
    isRead: row.is_read,
    isFlagged: row.is_flagged,
    importance: row.importance,
    priority: row.priority ?? null,
    responseTimeMinutes: row.response_time_minutes ?? null,
    aiCategory: row.ai_category ?? null,
    aiSentiment: row.ai_sentiment ?? null,
    aiSentimentScore: row.ai_sentiment_score ?? null,
    aiActionRequired: row.ai_action_required ?? null,
  };
}

function toAttachment(row: EmailAttachmentRow): EmailAttachment {
  return {
    id: row.id,
    emailId: row.email_id,
    filename: row.filename,
    contentType: row.content_type ?? null,
    sizeBytes: row.size_bytes ?? null,
    providerAttachmentId: row.provider_attachment_id ?? null,
    createdAt: row.created_at,
  };
}

function toRowPatch(patch: EmailUpdate): Updateable<EmailsTable> {
  const row: Updateable<EmailsTable> = {};
  if (patch.isRead !== undefined) row.is_read = patch.isRead;
  if (patch.isFlagged !== undefined) row.is_flagged = patch.isFlagged;
  if (patch.isArchived !== undefined) row.is_archived = patch.isArchived;
  if (patch.importance !== undefined) row.importance = patch.importance;
  if (patch.priority !== undefined) row.priority = patch.priority;
  if (patch.aiCategory !== undefined) row.ai_category = patch.aiCategory;
  if (patch.aiCategoryConfidence !== undefined) {
    row.ai_category_confidence = patch.aiCategoryConfidence;
  }
  if (patch.aiImportanceScore !== undefined) row.ai_importance_score = patch.aiImportanceScore;
  if (patch.aiSentiment !== undefined) row.ai_sentiment = patch.aiSentiment;
  if (patch.aiSentimentScore !== undefined) row.ai_sentiment_score = patch.aiSentimentScore;
  if (patch.aiSummary !== undefined) row.ai_summary = patch.aiSummary;
  if (patch.aiActionItems !== undefined) row.ai_action_items = toJson(patch.aiActionItems);
  if (patch.aiKeyTopics !== undefined) row.ai_key_topics = toJson(patch.aiKeyTopics);
  if (patch.aiActionRequired !== undefined) row.ai_action_required = patch.aiActionRequired;
  if (patch.aiSuggestedAction !== undefined) row.ai_suggested_action = patch.aiSuggestedAction;
  if (patch.aiConfidenceScore !== undefined) row.ai_confidence_score = patch.aiConfidenceScore;
  if (patch.aiAnalyzedAt !== undefined) row.ai_analyzed_at = patch.aiAnalyzedAt;
  if (patch.isProcessed !== undefined) row.is_processed = patch.isProcessed;
  if (patch.processingError !== undefined) row.processing_error = patch.processingError;
  return row;
}

export class KyselyEmailRepo implements EmailRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(userId: string, emailId: string): Promise<Email | undefined> {
    const row = await selectEmailByIdSql(this.db, userId, emailId);
    return row ? toEmail(row) : undefined;
  }

  async findManyByIds(userId: string, emailIds: readonly string[]): Promise<Email[]> {
    const rows = await selectEmailsByIdsSql(this.db, userId, emailIds);
    return rows.map(toEmail);
  }

  async exists(userId: string, messageId: string): Promise<boolean> {
    return selectEmailExistsSql(this.db, userId, messageId);
  }

  async list(userId: string, filter: EmailListFilter): Promise<Email[]> {
    const rows = await selectEmailPageSql(this.db, userId, filter);
    return rows.map(toEmail);
  }

  async search(userId: string, term: string, limit: number): Promise<Email[]> {
    const rows = await searchEmailsSql(this.db, userId, term, limit);
    return rows.map(toEmail);
  }

  async stats(userId: string, weekStart: Date): Promise<EmailStats> {
    return selectEmailStatsSql(this.db, userId, weekStart);
  }

  async query(userId: string, query: EmailQuery): Promise<Email[]> {
    const rows = await selectEmailsForQuerySql(this.db, userId, query);
    return rows.map(toEmail);
  }

  async listFactsInWindow(userId: string, from: Date, to: Date): Promise<EmailFacts[]> {
    const rows = await selectEmailFactsInWindowSql(this.db, userId, from, to);
    return rows.map(toEmailFacts);
  }

  async listByThread(threadId: string): Promise<Email[]> {
    const rows = await selectEmailsByThreadSql(this.db, threadId);
    return rows.map(toEmail);
  }

  async listUnprocessedSince(
    since: Date,
    userId: string | null,
  ): Promise<Array<{ id: string; userId: string }>> {
    const rows = await selectUnprocessedSinceSql(this.db, since, userId);
    return rows.map((r) => ({ id: r.id, userId: r.user_id }));
  }

  async countByAccount(accountId: string): Promise<number> {
    return countEmailsByAccountSql(this.db, accountId);
  }

  async insertIfAbsent(input: NewEmail): Promise<Email | undefined> {
    const row = await this.db
      .insertInto('emails')
      .values({
        user_id: input.userId,
        email_account_id: input.emailAccountId,
        thread_id: input.threadId,
        message_id: input.messageId,
        provider_thread_id: input.providerThreadId,
        subject: input.subject,
        sender_email: input.senderEmail,
        sender_name: input.senderName,
        recipient_emails: toJson(input.recipientEmails),
        cc_emails: toJson(input.ccEmails),
        bcc_emails: toJson(input.bccEmails),
        body_text: input.bodyText,
        body_html: input.bodyHtml,
        snippet: input.snippet,
        sent_date: input.sentDate,
        received_date: input.receivedDate,
        labels: toJson(input.labels),
        importance: input.importance,
        is_read: input.isRead,
        is_flagged: input.isFlagged,
        has_attachments: input.hasAttachments,
        ai_action_items: toJson([]),
        ai_key_topics: toJson([]),
      })
      .onConflict((oc) => oc.columns(['user_id', 'message_id']).doNothing())
      .returningAll()
      .executeTakeFirst();

    return row ? toEmail(row) : undefined;
  }

  async insertAttachments(
    emailId: string,
    attachments: readonly NewEmailAttachment[],
  ): Promise<void> {
    if (attachments.length === 0) return;

    await this.db
      .insertInto('email_attachments')
      .values(
        attachments.map((a) => ({
          email_id: emailId,
          filename: a.filename,
          content_type: a.contentType,
          size_bytes: a.sizeBytes,
          provider_attachment_id: a.providerAttachmentId,
        })),
      )
      .execute();
  }

  async listAttachments(emailId: string): Promise<EmailAttachment[]> {
    const rows = await selectAttachmentsSql(this.db, emailId);
    return rows.map(toAttachment);
  }

  async update(emailId: string, patch: EmailUpdate): Promise<void> {
    await this.db
      .updateTable('emails')
      .set({ ...toRowPatch(patch), updated_at: new Date() })
      .where('id', '=', emailId)
      .execute();
  }

  async delete(emailId: string): Promise<void> {
    await this.db.deleteFrom('emails').where('id', '=', emailId).execute();
  }
}
