/**
 * src/modules/emails/providers/imap-mail-provider.ts
 *
 * WHY:
 * - Generic IMAP mailboxes and Outlook (IMAP + XOAUTH2) share one adapter: ImapFlow for
 *   the protocol, mailparser for MIME.
 *
 * MAPPING:
 * - INBOX only, SEARCH SINCE <date>, newest `maxMessages` uids.
 * - Thread id = first References id, else the message id.
 * - \Seen → read, \Flagged → flagged.
 */

import { ImapFlow } from 'imapflow';
import { simpleParser, type AddressObject, type ParsedMail } from 'mailparser';

import type { SyncedEmailPayload } from '../../../shared/messaging/queue';
import { toSnippet } from './address';
import type { FetchOptions } from './mail-provider';

export const OUTLOOK_IMAP_HOST = 'outlook.office365.com';
export const OUTLOOK_IMAP_PORT = 993;

export type ImapConnection = {
  host: string;
  port: number;
  auth: { user: string; pass: string } | { user: string; accessToken: string };
};

function addresses(field: AddressObject | AddressObject[] | undefined): string[] {
  if (!field) return [];
  const objects = Array.isArray(field) ? field : [field];
  return objects.flatMap((o) =>
    o.value.flatMap((a) => (a.address ? [a.address.toLowerCase()] : [])),
  );
}

function firstReference(refs: string | string[] | undefined): string | null {
  if (!refs) return null;
  const list = Array.isArray(refs) ? refs : refs.trim().split(/\s+/);
  return list.find((r) => r.length > 0) ?? null;
}

/** Maps a parsed RFC 822 message plus its IMAP flags. */
export function parsedMailToPayload(
  parsed: ParsedMail,
  flags: ReadonlySet<string>,
  fallbackMessageId: string,
): SyncedEmailPayload {
  const messageId = parsed.messageId ?? fallbackMessageId;
  const sender = parsed.from?.value[0];
  const html = typeof parsed.html === 'string' ? parsed.html : null;
  const text = parsed.text ?? null;
  const date = parsed.date ? parsed.date.toISOString() : null;
  const isFlagged = flags.has('\\Flagged');
  // mailparser folds X-Priority, Importance and X-MSMail-Priority into one 'priority' header.
  const priority = parsed.headers.get('priority');

  return {
    messageId,
    providerThreadId: firstReference(parsed.references) ?? messageId,
    subject: parsed.subject ?? null,
    senderEmail: sender?.address ? sender.address.toLowerCase() : null,
    senderName: sender?.name ? sender.name : null,
    recipientEmails: addresses(parsed.to),
    ccEmails: addresses(parsed.cc),
    bccEmails: addresses(parsed.bcc),
    bodyText: text,
    bodyHtml: html,
    snippet: toSnippet(text),
    sentDate: date,
    receivedDate: date,
    labels: [...flags],
    importance: priority === 'high' ? 'high' : priority === 'low' ? 'low' : 'normal',
    isRead: flags.has('\\Seen'),
    isFlagged,
    attachments: parsed.attachments.map((a) => ({
      filename: a.filename ?? 'unnamed',
      contentType: a.contentType || null,
      sizeBytes: a.size,
      providerAttachmentId: a.contentId ?? null,
    })),
  };
}

export class ImapMailProvider {
  async fetchMessages(conn: ImapConnection, opts: FetchOptions): Promise<SyncedEmailPayload[]> {
    const client = new ImapFlow({
      host: conn.host,
      port: conn.port,
      secure: conn.port === 993,
      auth: conn.auth,
      logger: false,
    });

    await client.connect();
    try {
      const lock = await client.getMailboxLock('INBOX');
      try {
        const found = await client.search({ since: opts.since }, { uid: true });
        const uids = Array.isArray(found) ? found.slice(-opts.maxMessages) : [];
        if (uids.length === 0) return [];

        const out: SyncedEmailPayload[] = [];
        for await (const msg of client.fetch(uids, { source: true, flags: true }, { uid: true })) {
          if (!msg.source) continue;
          const parsed = await simpleParser(msg.source);
          out.push(
            parsedMailToPayload(parsed, msg.flags ?? new Set<string>(), `imap-${conn.host}-${msg.uid}`),
          );
        }
        return out;
      } finally {
        lock.release();
      }
    } finally {
      await client.logout();
    }
  }
}
