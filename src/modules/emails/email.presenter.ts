/**
 * src/modules/emails/email.presenter.ts
 *
 * WHY:
 * - Domain → wire (snake_case) mapping for the emails API in one place.
 *
 * RULES:
 * - Account responses never include credentials (encrypted or not).
 * - Missing subject / sender / snippet / body text render as "" (clients expect strings).
 */

import type { Email, EmailAccount, EmailAttachment } from './email.types';

export type EmailAccountResponse = {
  id: string;
  provider: string;
  email_address: string;
  display_name: string | null;
  is_active: boolean;
  last_sync_at: string | null;
  total_emails: number;
  created_at: string;
};

export type EmailListItem = {
  id: string;
  subject: string;
  sender_email: string;
  sender_name: string | null;
  snippet: string;
  sent_date: string | null;
  received_date: string | null;
  is_read: boolean;
  is_flagged: boolean;
  ai_category: string | null;
  ai_importance_score: number | null;
  ai_sentiment: string | null;
};

export type EmailDetail = EmailListItem & {
  recipient_emails: string[];
  cc_emails: string[];
  body_text: string;
  body_html: string | null;
  labels: string[];
  importance: string;
  ai_summary: string | null;
  ai_action_items: string[];
  attachments: Array<{
    id: string;
    filename: string;
    content_type: string | null;
    size_bytes: number | null;
  }>;
};

function iso(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

export function toAccountResponse(account: EmailAccount): EmailAccountResponse {
  return {
    id: account.id,
    provider: account.provider,
    email_address: account.emailAddress,
    display_name: account.displayName,
    is_active: account.isActive,
    last_sync_at: iso(account.lastSyncAt),
    total_emails: account.totalEmails,
    created_at: account.createdAt.toISOString(),
  };
}

export function toEmailListItem(email: Email): EmailListItem {
  return {
    id: email.id,
    subject: email.subject ?? '',
    sender_email: email.senderEmail ?? '',
    sender_name: email.senderName,
    snippet: email.snippet ?? '',
    sent_date: iso(email.sentDate),
    received_date: iso(email.receivedDate),
    is_read: email.isRead,
    is_flagged: email.isFlagged,
    ai_category: email.aiCategory,
    ai_importance_score: email.aiImportanceScore,
    ai_sentiment: email.aiSentiment,
  };
}

export function toEmailDetail(email: Email, attachments: readonly EmailAttachment[]): EmailDetail {
  return {
    ...toEmailListItem(email),
    recipient_emails: email.recipientEmails,
    cc_emails: email.ccEmails,
    body_text: email.bodyText ?? '',
    body_html: email.bodyHtml,
    labels: email.labels,
    importance: email.importance,
    ai_summary: email.aiSummary,
    ai_action_items: email.aiActionItems,
    attachments: attachments.map((a) => ({
      id: a.id,
      filename: a.filename,
      content_type: a.contentType,
      size_bytes: a.sizeBytes,
    })),
  };
}
