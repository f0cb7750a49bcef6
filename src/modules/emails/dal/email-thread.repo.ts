/**
 * src/modules/emails/dal/email-thread.repo.ts
 *
 * WHY:
 * - Threads group emails by the provider's thread id and carry the AI thread analysis.
 *
 * RULES:
 * - No AppError. No policies.
 * - upsertByProviderId counts one more email per call and merges participants;
 *   callers only call it for emails that will actually be inserted.
 */

import { sql, type Selectable } from 'kysely';

import { toJson, type DbExecutor } from '../../../shared/db/db';
import type { EmailThreadsTable } from '../../../shared/db/schema';
import type { EmailThread, ThreadAnalysisUpdate } from '../email.types';

type EmailThreadRow = Selectable<EmailThreadsTable>;

export interface EmailThreadRepo {
  upsertByProviderId(input: {
    userId: string;
    providerThreadId: string;
    subject: string | null;
    participants: string[];
  }): Promise<EmailThread>;

  /** Threads touched since `updatedSince` holding at least `minEmails` emails. */
  listForAnalysis(userId: string, updatedSince: Date, minEmails: number): Promise<EmailThread[]>;

  saveAnalysis(threadId: string, analysis: ThreadAnalysisUpdate): Promise<void>;
}

function toEmailThread(row: EmailThreadRow): EmailThread {
  return {
    id: row.id,
    userId: row.user_id,
    providerThreadId: row.provider_thread_id,
    subject: row.subject ?? null,
    participants: row.participants,
    emailCount: row.email_count,
    aiInsights: row.ai_insights ?? null,
    responsePattern: row.response_pattern ?? null,
    conversationTone: row.conversation_tone ?? null,
    keyTopics: row.key_topics,
    lastAnalyzedAt: row.last_analyzed_at ?? null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class KyselyEmailThreadRepo implements EmailThreadRepo {
  constructor(private readonly db: DbExecutor) {}

  async upsertByProviderId(input: {
    userId: string;
    providerThreadId: string;
    subject: string | null;
    participants: string[];
  }): Promise<EmailThread> {
    const row = await this.db
      .insertInto('email_threads')
      .values({
        user_id: input.userId,
        provider_thread_id: input.providerThreadId,
        subject: input.subject,
        participants: toJson(input.participants),
        key_topics: toJson([]),
        email_count: 1,
      })
      .onConflict((oc) =>
        oc.columns(['user_id', 'provider_thread_id']).doUpdateSet({
          email_count: sql`email_threads.email_count + 1`,
          participants: sql`(
            select coalesce(jsonb_agg(distinct p), '[]'::jsonb)
            from jsonb_array_elements_text(email_threads.participants || excluded.participants) as p
          )`,
          updated_at: new Date(),
        }),
      )
      .returningAll()
      .executeTakeFirstOrThrow();

    return toEmailThread(row);
  }

  async listForAnalysis(
    userId: string,
    updatedSince: Date,
    minEmails: number,
  ): Promise<EmailThread[]> {
    const rows = await this.db
      .selectFrom('email_threads')
      .selectAll()
      .where('user_id', '=', userId)
      .where('updated_at', '>=', updatedSince)
      .where('email_count', '>=', minEmails)
      .orderBy('updated_at', 'desc')
      .execute();
    return rows.map(toEmailThread);
  }

  async saveAnalysis(threadId: string, analysis: ThreadAnalysisUpdate): Promise<void> {
    await this.db
      .updateTable('email_threads')
      .set({
        response_pattern: analysis.responsePattern,
        conversation_tone: analysis.conversationTone,
        key_topics: toJson(analysis.keyTopics),
        ai_insights: toJson(analysis.aiInsights),
        last_analyzed_at: analysis.analyzedAt,
        updated_at: new Date(),
      })
      .where('id', '=', threadId)
      .execute();
  }
}
