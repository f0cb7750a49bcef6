/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "this work should happen in the background" from "how jobs are transported".
 * - Services enqueue messages; the transport (BullMQ in prod, in-memory in tests) is wired
 *   at the DI layer only. Services never change when the transport changes.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable (dates travel as ISO strings).
 * - Never put provider tokens, IMAP passwords or API keys in messages.
 */

// ── Email payload fetched from a provider ─────────────────────

export type SyncedAttachmentPayload = {
  filename: string;
  contentType: string | null;
  sizeBytes: number | null;
  providerAttachmentId: string | null;
};

export type SyncedEmailPayload = {
  messageId: string;
  providerThreadId: string | null;
  subject: string | null;
  senderEmail: string | null;
  senderName: string | null;
  recipientEmails: string[];
  ccEmails: string[];
  bccEmails: string[];
  bodyText: string | null;
  bodyHtml: string | null;
  snippet: string | null;
  sentDate: string | null;
  receivedDate: string | null;
  labels: string[];
  importance: 'high' | 'normal' | 'low';
  isRead: boolean;
  isFlagged: boolean;
  attachments: SyncedAttachmentPayload[];
};

// ── Email jobs ────────────────────────────────────────────────

export type SyncUserEmailsMessage = {
  type: 'email.sync-user';
  userId: string;
  /** Restrict the sync to one account; all active accounts otherwise. */
  accountId?: string;
};

export type ProcessEmailBatchMessage = {
  type: 'email.process-batch';
  userId: string;
  accountId: string;
  emails: SyncedEmailPayload[];
};

export type IncrementalSyncMessage = { type: 'email.incremental-sync' };

export type BulkSyncMessage = { type: 'email.bulk-sync'; userIds: string[] };

export type UpdateEmailStatsMessage = { type: 'email.update-stats'; userId: string };

export type ReprocessFailedEmailsMessage = {
  type: 'email.reprocess-failed';
  userId?: string;
  hoursBack: number;
};

// ── AI jobs ───────────────────────────────────────────────────

export type ProcessAiInsightsMessage = {
  type: 'ai.process-emails';
  userId: string;
  emailIds: string[];
};

export type AnalyzeEmailBatchMessage = {
  type: 'ai.analyze-batch';
  userId: string;
  emailIds: string[];
};

export type AnalyzeThreadsMessage = { type: 'ai.analyze-threads'; userId: string };

export type DailyInsightsMessage = { type: 'ai.daily-insights' };

export type WeeklyInsightsMessage = { type: 'ai.weekly-insights' };

export type DetectPatternsMessage = { type: 'ai.detect-patterns'; userId: string };

export type SenderRelationshipsMessage = { type: 'ai.sender-relationships'; userId: string };

// ── Billing jobs ──────────────────────────────────────────────

export type ResetMonthlyUsageMessage = { type: 'billing.reset-monthly-usage' };

export type QueueMessage =
  | SyncUserEmailsMessage
  | ProcessEmailBatchMessage
  | IncrementalSyncMessage
  | BulkSyncMessage
  | UpdateEmailStatsMessage
  | ReprocessFailedEmailsMessage
  | ProcessAiInsightsMessage
  | AnalyzeEmailBatchMessage
  | AnalyzeThreadsMessage
  | DailyInsightsMessage
  | WeeklyInsightsMessage
  | DetectPatternsMessage
  | SenderRelationshipsMessage
  | ResetMonthlyUsageMessage;

export type QueueMessageType = QueueMessage['type'];

export type QueueMessageOf<T extends QueueMessageType> = Extract<QueueMessage, { type: T }>;

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
