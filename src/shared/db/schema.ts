/**
 * src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a compile-time description of every table it queries.
 * - Kept next to the migrations: a migration that changes a table updates this file
 *   in the same commit.
 *
 * CONVENTIONS:
 * - snake_case columns exactly as in Postgres.
 * - Generated<> for columns with DB defaults (ids, timestamps, counters, flags).
 * - jsonb columns are read as parsed values and written as JSON strings.
 * - Nullable timestamp/jsonb columns use their own ColumnType: Kysely does not unwrap
 *   `ColumnType<...> | null`.
 */

import type { ColumnType } from 'kysely';

/**
 * Kysely's own Generated<T> wraps T again when T is already a ColumnType, which would
 * make `Generated<Timestamp>` select as the ColumnType object. This one (the shape
 * kysely-codegen emits) keeps the select type of the wrapped column.
 */
export type Generated<T> = [T] extends [ColumnType<infer S, infer I, infer U>]
  ? ColumnType<S, I | undefined, U>
  : ColumnType<T, T | undefined, T>;

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
export type NullableTimestamp = ColumnType<Date | null, Date | string | null, Date | string | null>;

/** jsonb: pg parses on read; we JSON.stringify on write. */
export type Json<T> = ColumnType<T, string, string>;
export type NullableJson<T> = ColumnType<T | null, string | null, string | null>;

export type SubscriptionTier = 'free_trial' | 'starter' | 'professional' | 'enterprise';
export type EmailProvider = 'gmail' | 'outlook' | 'imap';
export type EmailImportance = 'high' | 'normal' | 'low';
export type SubscriptionStatus =
  | 'active'
  | 'canceled'
  | 'past_due'
  | 'trialing'
  | 'incomplete'
  | 'unpaid';
export type BillingCycle = 'monthly' | 'yearly';

export interface UsersTable {
  id: Generated<string>;
  email: string;
  password_hash: string;
  full_name: string | null;
  is_active: Generated<boolean>;
  is_verified: Generated<boolean>;
  subscription_tier: Generated<SubscriptionTier>;
  stripe_customer_id: string | null;
  subscription_end_date: NullableTimestamp;
  emails_processed: Generated<number>;
  api_calls_this_month: Generated<number>;
  email_sync_enabled: Generated<boolean>;
  last_email_sync_at: NullableTimestamp;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface EmailAccountsTable {
  id: Generated<string>;
  user_id: string;
  provider: EmailProvider;
  email_address: string;
  display_name: string | null;
  access_token: string | null;
  refresh_token: string | null;
  token_expires_at: NullableTimestamp;
  imap_host: string | null;
  imap_port: number | null;
  imap_username: string | null;
  imap_password: string | null;
  is_active: Generated<boolean>;
  last_sync_at: NullableTimestamp;
  sync_from_date: NullableTimestamp;
  total_emails: Generated<number>;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface EmailThreadsTable {
  id: Generated<string>;
  user_id: string;
  provider_thread_id: string;
  subject: string | null;
  participants: Json<string[]>;
  email_count: Generated<number>;
  ai_insights: NullableJson<Record<string, unknown>>;
  response_pattern: string | null;
  conversation_tone: string | null;
  key_topics: Json<string[]>;
  last_analyzed_at: NullableTimestamp;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface EmailsTable {
  id: Generated<string>;
  user_id: string;
  email_account_id: string;
  thread_id: string | null;
  message_id: string;
  provider_thread_id: string | null;
  subject: string | null;
  sender_email: string | null;
  sender_name: string | null;
  recipient_emails: Json<string[]>;
  cc_emails: Json<string[]>;
  bcc_emails: Json<string[]>;
  body_text: string | null;
  body_html: string | null;
  snippet: string | null;
  sent_date: NullableTimestamp;
  received_date: NullableTimestamp;
  labels: Json<string[]>;
  importance: Generated<EmailImportance>;
  priority: string | null;
  is_read: Generated<boolean>;
  is_replied: Generated<boolean>;
  is_forwarded: Generated<boolean>;
  is_flagged: Generated<boolean>;
  is_archived: Generated<boolean>;
  has_attachments: Generated<boolean>;
  response_time_minutes: number | null;
  ai_category: string | null;
  ai_category_confidence: number | null;
  ai_importance_score: number | null;
  ai_sentiment: string | null;
  ai_sentiment_score: number | null;
  ai_summary: string | null;
  ai_action_items: Json<string[]>;
  ai_key_topics: Json<string[]>;
  ai_action_required: boolean | null;
  ai_suggested_action: string | null;
  ai_confidence_score: number | null;
  ai_analyzed_at: NullableTimestamp;
  is_processed: Generated<boolean>;
  processing_error: string | null;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface EmailAttachmentsTable {
  id: Generated<string>;
  email_id: string;
  filename: string;
  content_type: string | null;
  size_bytes: number | null;
  provider_attachment_id: string | null;
  created_at: Generated<Timestamp>;
}

export interface SubscriptionsTable {
  id: Generated<string>;
  user_id: string;
  stripe_subscription_id: string | null;
  stripe_customer_id: string;
  stripe_price_id: string;
  status: SubscriptionStatus;
  tier: SubscriptionTier;
  amount_cents: number;
  currency: Generated<string>;
  billing_cycle: BillingCycle;
  current_period_start: NullableTimestamp;
  current_period_end: NullableTimestamp;
  trial_start: NullableTimestamp;
  trial_end: NullableTimestamp;
  canceled_at: NullableTimestamp;
  cancel_at_period_end: Generated<boolean>;
  email_limit: number;
  api_limit: number;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

export interface AiInsightsTable {
  id: Generated<string>;
  user_id: string;
  insight_type: string;
  time_period: string;
  data: Json<Record<string, unknown>>;
  confidence_score: number | null;
  generated_at: Generated<Timestamp>;
}

export interface SenderAnalyticsTable {
  id: Generated<string>;
  user_id: string;
  sender_email: string;
  sender_name: string | null;
  total_emails: number;
  relationship_type: string | null;
  importance_level: string | null;
  avg_sentiment: number | null;
  suggested_action: string | null;
  confidence_score: number | null;
  analyzed_at: Generated<Timestamp>;
}

export interface StripeEventsTable {
  event_id: string;
  event_type: string;
  processed_at: Generated<Timestamp>;
}

export interface DB {
  users: UsersTable;
  email_accounts: EmailAccountsTable;
  email_threads: EmailThreadsTable;
  emails: EmailsTable;
  email_attachments: EmailAttachmentsTable;
  subscriptions: SubscriptionsTable;
  ai_insights: AiInsightsTable;
  sender_analytics: SenderAnalyticsTable;
  stripe_events: StripeEventsTable;
}
