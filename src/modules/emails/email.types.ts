/**
 * src/modules/emails/email.types.ts
 *
 * WHY:
 * - Domain types for connected mailboxes, threads, messages and attachments.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - Account secrets are stored encrypted; only the sync job ever decrypts them.
 */

import type { EmailImportance, EmailProvider } from '../../shared/db/schema';

export type { EmailImportance, EmailProvider };

// ── Accounts ──────────────────────────────────────────────────

export type EmailAccount = {
  id: string;
  userId: string;
  provider: EmailProvider;
  emailAddress: string;
  displayName: string | null;
  /** Encrypted. */
  accessToken: string | null;
  /** Encrypted. */
  refreshToken: string | null;
  tokenExpiresAt: Date | null;
  imapHost: string | null;
  imapPort: number | null;
  imapUsername: string | null;
  /** Encrypted. */
  imapPassword: string | null;
  isActive: boolean;
  lastSyncAt: Date | null;
  syncFromDate: Date | null;
  totalEmails: number;
  createdAt: Date;
  updatedAt: Date;
};

export type NewEmailAccount = Omit<
  EmailAccount,
  'id' | 'isActive' | 'lastSyncAt' | 'totalEmails' | 'createdAt' | 'updatedAt'
>;

// ── Threads ───────────────────────────────────────────────────

export type EmailThread = {
  id: string;
  userId: string;
  providerThreadId: string;
  subject: string | null;
  participants: string[];
  emailCount: number;
  aiInsights: Record<string, unknown> | null;
  responsePattern: string | null;
  conversationTone: string | null;
  keyTopics: string[];
  lastAnalyzedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ThreadAnalysisUpdate = {
  responsePattern: string;
  conversationTone: string;
  keyTopics: string[];
  aiInsights: Record<string, unknown>;
  analyzedAt: Date;
};

// ── Emails ────────────────────────────────────────────────────

export type Email = {
  id: string;
  userId: string;
  emailAccountId: string;
  threadId: string | null;
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
  sentDate: Date | null;
  receivedDate: Date | null;
  labels: string[];
  importance: EmailImportance;
  priority: string | null;
  isRead: boolean;
  isReplied: boolean;
  isForwarded: boolean;
  isFlagged: boolean;
  isArchived: boolean;
  hasAttachments: boolean;
  responseTimeMinutes: number | null;
  aiCategory: string | null;
  aiCategoryConfidence: number | null;
  aiImportanceScore: number | null;
  aiSentiment: string | null;
  aiSentimentScore: number | null;
  aiSummary: string | null;
  aiActionItems: string[];
  aiKeyTopics: string[];
  aiActionRequired: boolean | null;
  aiSuggestedAction: string | null;
  aiConfidenceScore: number | null;
  aiAnalyzedAt: Date | null;
  isProcessed: boolean;
  processingError: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type NewEmail = Pick<
  Email,
  | 'userId'
  | 'emailAccountId'
  | 'threadId'
  | 'messageId'
  | 'providerThreadId'
  | 'subject'
  | 'senderEmail'
  | 'senderName'
  | 'recipientEmails'
  | 'ccEmails'
  | 'bccEmails'
  | 'bodyText'
  | 'bodyHtml'
  | 'snippet'
  | 'sentDate'
  | 'receivedDate'
  | 'labels'
  | 'importance'
  | 'isRead'
  | 'isFlagged'
  | 'hasAttachments'
>;

/** Columns analytics aggregate over (no bodies). */
export type EmailFacts = Pick<
  Email,
  | 'id'
  | 'subject'
  | 'senderEmail'
  | 'senderName'
  | 'receivedDate'
  | 'isRead'
  | 'isFlagged'
  | 'importance'
  | 'priority'
  | 'responseTimeMinutes'
  | 'aiCategory'
  | 'aiSentiment'
  | 'aiSentimentScore'
  | 'aiActionRequired'
>;

export type EmailUpdate = Partial<
  Pick<
    Email,
    | 'isRead'
    | 'isFlagged'
    | 'isArchived'
    | 'importance'
    | 'priority'
    | 'aiCategory'
    | 'aiCategoryConfidence'
    | 'aiImportanceScore'
    | 'aiSentiment'
    | 'aiSentimentScore'
    | 'aiSummary'
    | 'aiActionItems'
    | 'aiKeyTopics'
    | 'aiActionRequired'
    | 'aiSuggestedAction'
    | 'aiConfidenceScore'
    | 'aiAnalyzedAt'
    | 'isProcessed'
    | 'processingError'
  >
>;

export type EmailListFilter = {
  skip: number;
  limit: number;
  category: string | null;
  importanceMin: number | null;
  unreadOnly: boolean;
  includeArchived: boolean;
};

/** Newest-first selection used by the AI routes and jobs. */
export type EmailQuery = {
  since?: Date;
  until?: Date;
  analyzedOnly?: boolean;
  withSentiment?: boolean;
  /** Case-insensitive substring on sender_email. */
  senderContains?: string;
  limit?: number;
};

export type EmailStats = {
  total: number;
  unread: number;
  thisWeek: number;
};

// ── Attachments ───────────────────────────────────────────────

export type EmailAttachment = {
  id: string;
  emailId: string;
  filename: string;
  contentType: string | null;
  sizeBytes: number | null;
  providerAttachmentId: string | null;
  createdAt: Date;
};

export type NewEmailAttachment = Omit<EmailAttachment, 'id' | 'emailId' | 'createdAt'>;
