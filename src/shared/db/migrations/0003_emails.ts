/**
 * src/shared/db/migrations/0003_emails.ts
 *
 * WHY:
 * - emails carries the message, its flags and every AI annotation in one row:
 *   list/detail/analytics read a single table.
 * - (user_id, message_id) is unique: ingestion is idempotent across re-syncs.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('emails')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('email_account_id', 'uuid', (col) =>
      col.notNull().references('email_accounts.id').onDelete('cascade'),
    )
    .addColumn('thread_id', 'uuid', (col) => col.references('email_threads.id').onDelete('set null'))
    .addColumn('message_id', 'text', (col) => col.notNull())
    .addColumn('provider_thread_id', 'text')
    .addColumn('subject', 'text')
    .addColumn('sender_email', 'text')
    .addColumn('sender_name', 'text')
    .addColumn('recipient_emails', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addColumn('cc_emails', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addColumn('bcc_emails', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addColumn('body_text', 'text')
    .addColumn('body_html', 'text')
    .addColumn('snippet', 'text')
    .addColumn('sent_date', 'timestamptz')
    .addColumn('received_date', 'timestamptz')
    .addColumn('labels', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addColumn('importance', 'text', (col) => col.notNull().defaultTo('normal'))
    .addColumn('priority', 'text')
    .addColumn('is_read', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_replied', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_forwarded', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_flagged', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_archived', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('has_attachments', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('response_time_minutes', 'integer')
    .addColumn('ai_category', 'text')
    .addColumn('ai_category_confidence', 'double precision')
    .addColumn('ai_importance_score', 'double precision')
    .addColumn('ai_sentiment', 'text')
    .addColumn('ai_sentiment_score', 'double precision')
    .addColumn('ai_summary', 'text')
    .addColumn('ai_action_items', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addColumn('ai_key_topics', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addColumn('ai_action_required', 'boolean')
    .addColumn('ai_suggested_action', 'text')
    .addColumn('ai_confidence_score', 'double precision')
    .addColumn('ai_analyzed_at', 'timestamptz')
    .addColumn('is_processed', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('processing_error', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE emails
      ADD CONSTRAINT emails_importance_check
      CHECK (importance IN ('high','normal','low'));
  `.execute(db);

  await db.schema
    .createIndex('emails_user_message_uq')
    .on('emails')
    .columns(['user_id', 'message_id'])
    .unique()
    .execute();

  // Inbox listing + every analytics window
  await db.schema
    .createIndex('emails_user_received_idx')
    .on('emails')
    .columns(['user_id', 'received_date'])
    .execute();

  // Reprocess job: unprocessed rows by creation time
  await db.schema
    .createIndex('emails_unprocessed_idx')
    .on('emails')
    .columns(['is_processed', 'created_at'])
    .execute();

  await db.schema
    .createTable('email_attachments')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('email_id', 'uuid', (col) => col.notNull().references('emails.id').onDelete('cascade'))
    .addColumn('filename', 'text', (col) => col.notNull())
    .addColumn('content_type', 'text')
    .addColumn('size_bytes', 'integer')
    .addColumn('provider_attachment_id', 'text')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('email_attachments_email_idx')
    .on('email_attachments')
    .column('email_id')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('email_attachments').ifExists().execute();
  await db.schema.dropTable('emails').ifExists().execute();
}
