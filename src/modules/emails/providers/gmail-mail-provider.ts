/**
 * src/modules/emails/providers/gmail-mail-provider.ts
 *
 * WHY:
 * - Gmail mailboxes are read over the Gmail REST API (googleapis) with the OAuth tokens
 *   the client app obtained.
 *
 * MAPPING:
 * - Headers Subject / From / To / Cc / Date / Message-ID.
 * - Body text = first text/plain part, html = first text/html part (base64url).
 * - labelIds: UNREAD → unread, STARRED → flagged, IMPORTANT → importance high.
 * - Thread id = Gmail threadId. Received date = internalDate.
 */

import { google, type gmail_v1 } from 'googleapis';

import type { SyncedAttachmentPayload, SyncedEmailPayload } from '../../../shared/messaging/queue';
import { parseAddress, parseAddressList, toSnippet } from './address';
import type { FetchOptions } from './mail-provider';

type MessagePart = gmail_v1.Schema$MessagePart;

function header(part: MessagePart | undefined, name: string): string | null {
  const wanted = name.toLowerCase();
  const h = part?.headers?.find((x) => x.name?.toLowerCase() === wanted);
  return h?.value ?? null;
}

function decodeBase64Url(data: string | null | undefined): string | null {
  if (!data) return null;
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function walkParts(part: MessagePart | undefined, visit: (p: MessagePart) => void): void {
  if (!part) return;
  visit(part);
  for (const child of part.parts ?? []) walkParts(child, visit);
}

function parseDate(value: string | null): string | null {
  if (!value) return null;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d.toISOString();
}

/** Maps one `format: full` Gmail message. Returns null when it has no id. */
export function parseGmailMessage(msg: gmail_v1.Schema$Message): SyncedEmailPayload | null {
  if (!msg.id) return null;

  const payload = msg.payload ?? undefined;
  const body: { text: string | null; html: string | null } = { text: null, html: null };
  const attachments: SyncedAttachmentPayload[] = [];

  walkParts(payload, (p) => {
    if (p.filename) {
      attachments.push({
        filename: p.filename,
        contentType: p.mimeType ?? null,
        sizeBytes: p.body?.size ?? null,
        providerAttachmentId: p.body?.attachmentId ?? null,
      });
      return;
    }
    if (p.mimeType === 'text/plain' && body.text === null) {
      body.text = decodeBase64Url(p.body?.data);
    } else if (p.mimeType === 'text/html' && body.html === null) {
      body.html = decodeBase64Url(p.body?.data);
    }
  });

  const labels = msg.labelIds ?? [];
  const from = parseAddress(header(payload, 'From'));
  const internalMs = msg.internalDate ? Number(msg.internalDate) : NaN;
  const sentDate = parseDate(header(payload, 'Date'));

  return {
    messageId: header(payload, 'Message-ID') ?? msg.id,
    providerThreadId: msg.threadId ?? null,
    subject: header(payload, 'Subject'),
    senderEmail: from?.email ?? null,
    senderName: from?.name ?? null,
    recipientEmails: parseAddressList(header(payload, 'To')).map((a) => a.email),
    ccEmails: parseAddressList(header(payload, 'Cc')).map((a) => a.email),
    bccEmails: parseAddressList(header(payload, 'Bcc')).map((a) => a.email),
    bodyText: body.text,
    bodyHtml: body.html,
    snippet: msg.snippet ?? toSnippet(body.text),
    sentDate,
    receivedDate: Number.isFinite(internalMs) ? new Date(internalMs).toISOString() : sentDate,
    labels,
    importance: labels.includes('IMPORTANT') ? 'high' : 'normal',
    isRead: !labels.includes('UNREAD'),
    isFlagged: labels.includes('STARRED'),
    attachments,
  };
}

export class GmailMailProvider {
  constructor(
    private readonly oauthClient: { clientId: string | null; clientSecret: string | null },
  ) {}

  async fetchMessages(
    creds: { accessToken: string; refreshToken: string | null },
    opts: FetchOptions,
  ): Promise<SyncedEmailPayload[]> {
    const auth = new google.auth.OAuth2(
      this.oauthClient.clientId ?? undefined,
      this.oauthClient.clientSecret ?? undefined,
    );
    auth.setCredentials({
      access_token: creds.accessToken,
      refresh_token: creds.refreshToken ?? undefined,
    });
    const gmail = google.gmail({ version: 'v1', auth });

    const after = Math.floor(opts.since.getTime() / 1000);
    const list = await gmail.users.messages.list({
      userId: 'me',
      q: `in:inbox after:${after}`,
      maxResults: Math.min(opts.maxMessages, 500),
    });

    const ids = (list.data.messages ?? [])
      .map((m) => m.id)
      .filter((id): id is string => typeof id === 'string')
      .slice(0, opts.maxMessages);

    const out: SyncedEmailPayload[] = [];
    for (const id of ids) {
      const res = await gmail.users.messages.get({ userId: 'me', id, format: 'full' });
      const parsed = parseGmailMessage(res.data);
      if (parsed) out.push(parsed);
    }
    return out;
  }
}
