/**
 * src/shared/db/migrations/0005_ai_insights.ts
 *
 * WHY:
 * - ai_insights stores generated period summaries / patterns / predictions as jsonb.
 * - sender_analytics keeps one AI relationship profile per (user, sender).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('ai_insights')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('insight_type', 'text', (col) => col.notNull())
    .addColumn('time_period', 'text', (col) => col.notNull())
    .addColumn('data', 'jsonb', (col) => col.notNull())
    .addColumn('confidence_score', 'double precision')
    .addColumn('generated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('ai_insights_user_generated_idx')
    .on('ai_insights')
    .columns(['user_id', 'generated_at'])
    .execute();

  await db.schema
    .createTable('sender_analytics')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('sender_email', 'text', (col) => col.notNull())
    .addColumn('sender_name', 'text')
    .addColumn('total_emails', 'integer', (col) => col.notNull())
    .addColumn('relationship_type', 'text')
    .addColumn('importance_level', 'text')
    .addColumn('avg_sentiment', 'double precision')
    .addColumn('suggested_action', 'text')
    .addColumn('confidence_score', 'double precision')
    .addColumn('analyzed_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('sender_analytics_user_sender_uq')
    .on('sender_analytics')
    .columns(['user_id', 'sender_email'])
    .unique()
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('sender_analytics').ifExists().execute();
  await db.schema.dropTable('ai_insights').ifExists().execute();
}
