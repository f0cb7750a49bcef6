/**
 * src/shared/db/migrations/0002_email_accounts_threads.ts
 *
 * WHY:
 * - email_accounts: one row per connected mailbox. Secrets are stored encrypted
 *   (AES-256-GCM, see shared/security/encryption.ts); columns hold ciphertext.
 * - email_threads: conversation grouping keyed by the provider's thread id.
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('email_accounts')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('provider', 'text', (col) => col.notNull())
    .addColumn('email_address', 'text', (col) => col.notNull())
    .addColumn('display_name', 'text')
    .addColumn('access_token', 'text')
    .addColumn('refresh_token', 'text')
    .addColumn('token_expires_at', 'timestamptz')
    .addColumn('imap_host', 'text')
    .addColumn('imap_port', 'integer')
    .addColumn('imap_username', 'text')
    .addColumn('imap_password', 'text')
    .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
    .addColumn('last_sync_at', 'timestamptz')
    .addColumn('sync_from_date', 'timestamptz')
    .addColumn('total_emails', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await sql`
    ALTER TABLE email_accounts
      ADD CONSTRAINT email_accounts_provider_check
      CHECK (provider IN ('gmail','outlook','imap'));
  `.execute(db);

  await db.schema
    .createIndex('email_accounts_user_address_uq')
    .on('email_accounts')
    .columns(['user_id', 'email_address'])
    .unique()
    .execute();

  await db.schema
    .createTable('email_threads')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('provider_thread_id', 'text', (col) => col.notNull())
    .addColumn('subject', 'text')
    .addColumn('participants', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addColumn('email_count', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('ai_insights', 'jsonb')
    .addColumn('response_pattern', 'text')
    .addColumn('conversation_tone', 'text')
    .addColumn('key_topics', 'jsonb', (col) => col.notNull().defaultTo(sql`'[]'::jsonb`))
    .addColumn('last_analyzed_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('email_threads_user_provider_uq')
    .on('email_threads')
    .columns(['user_id', 'provider_thread_id'])
    .unique()
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('email_threads').ifExists().execute();
  await db.schema.dropTable('email_accounts').ifExists().execute();
}
