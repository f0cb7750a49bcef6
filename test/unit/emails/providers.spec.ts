import { describe, it, expect } from 'vitest';
import { simpleParser } from 'mailparser';
import {
  parseAddress,
  parseAddressList,
  toSnippet,
} from '../../../src/modules/emails/providers/address';
import { parseGmailMessage } from '../../../src/modules/emails/providers/gmail-mail-provider';
import { parsedMailToPayload } from '../../../src/modules/emails/providers/imap-mail-provider';

function b64url(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64url');
}

describe('address parsing', () => {
  it('reads display names and bare addresses', () => {
    expect(parseAddressList('"Jane Doe" <Jane@Example.com>, bob@example.com')).toEqual([
      { email: 'jane@example.com', name: 'Jane Doe' },
      { email: 'bob@example.com', name: null },
    ]);
    expect(parseAddress('Alice <alice@example.com>')).toEqual({
      email: 'alice@example.com',
      name: 'Alice',
    });
    expect(parseAddress(null)).toBeNull();
  });

  it('collapses whitespace in snippets', () => {
    expect(toSnippet('  hello\n\n  world  ')).toBe('hello world');
    expect(toSnippet('abcdef', 3)).toBe('abc');
    expect(toSnippet('   ')).toBeNull();
  });
});

describe('parseGmailMessage', () => {
  it('maps headers, labels, bodies and attachments', () => {
    const payload = parseGmailMessage({
      id: 'gm-1',
      threadId: 'th-1',
      labelIds: ['INBOX', 'STARRED', 'IMPORTANT'],
      internalDate: String(Date.parse('2024-05-10T09:00:05Z')),
      payload: {
        mimeType: 'multipart/mixed',
        headers: [
          { name: 'Subject', value: 'Invoice' },
          { name: 'From', value: 'Billing Team <billing@example.com>' },
          { name: 'To', value: 'me@example.com' },
          { name: 'Cc', value: 'A <a@example.com>, b@example.com' },
          { name: 'Date', value: 'Fri, 10 May 2024 09:00:00 +0000' },
          { name: 'Message-ID', value: '<inv-1@example.com>' },
        ],
        parts: [
          { mimeType: 'text/plain', body: { data: b64url('Your invoice is attached.') } },
          { mimeType: 'text/html', body: { data: b64url('<p>Your invoice</p>') } },
          {
            mimeType: 'application/pdf',
            filename: 'invoice.pdf',
            body: { size: 1024, attachmentId: 'att-1' },
          },
        ],
      },
    });

    expect(payload).toEqual({
      messageId: '<inv-1@example.com>',
      providerThreadId: 'th-1',
      subject: 'Invoice',
      senderEmail: 'billing@example.com',
      senderName: 'Billing Team',
      recipientEmails: ['me@example.com'],
      ccEmails: ['a@example.com', 'b@example.com'],
      bccEmails: [],
      bodyText: 'Your invoice is attached.',
      bodyHtml: '<p>Your invoice</p>',
      snippet: 'Your invoice is attached.',
      sentDate: '2024-05-10T09:00:00.000Z',
      receivedDate: '2024-05-10T09:00:05.000Z',
      labels: ['INBOX', 'STARRED', 'IMPORTANT'],
      importance: 'high',
      isRead: true,
      isFlagged: true,
      attachments: [
        {
          filename: 'invoice.pdf',
          contentType: 'application/pdf',
          sizeBytes: 1024,
          providerAttachmentId: 'att-1',
        },
      ],
    });
  });

  it('treats UNREAD as unread and falls back to the Gmail id', () => {
    const payload = parseGmailMessage({ id: 'gm-2', labelIds: ['UNREAD'], payload: {} });

    expect(payload?.messageId).toBe('gm-2');
    expect(payload?.isRead).toBe(false);
    expect(payload?.receivedDate).toBeNull();
  });

  it('skips messages without an id', () => {
    expect(parseGmailMessage({})).toBeNull();
  });
});

describe('parsedMailToPayload', () => {
  it('maps a parsed MIME message and its IMAP flags', async () => {
    const raw = [
      'From: "Carol" <Carol@Example.com>',
      'To: me@example.com',
      'Subject: Re: Lunch',
      'Date: Tue, 14 May 2024 12:30:00 +0000',
      'Message-ID: <reply-2@example.com>',
      'References: <root-1@example.com> <reply-1@example.com>',
      'X-Priority: 1',
      'Content-Type: text/plain; charset=utf-8',
      '',
      'Sounds good.',
      '',
    ].join('\r\n');

    const parsed = await simpleParser(raw);
    const payload = parsedMailToPayload(parsed, new Set(['\\Seen']), 'uid-7');

    expect(payload.messageId).toBe('<reply-2@example.com>');
    expect(payload.providerThreadId).toBe('<root-1@example.com>');
    expect(payload.senderEmail).toBe('carol@example.com');
    expect(payload.senderName).toBe('Carol');
    expect(payload.recipientEmails).toEqual(['me@example.com']);
    expect(payload.subject).toBe('Re: Lunch');
    expect(payload.receivedDate).toBe('2024-05-14T12:30:00.000Z');
    expect(payload.importance).toBe('high');
    expect(payload.isRead).toBe(true);
    expect(payload.isFlagged).toBe(false);
    expect(payload.labels).toEqual(['\\Seen']);
  });

  it('reads low importance from the X-Priority header', async () => {
    const raw = [
      'From: news@example.com',
      'To: me@example.com',
      'Subject: Digest',
      'Message-ID: <digest-9@example.com>',
      'X-Priority: 5',
      'Content-Type: text/plain; charset=utf-8',
      '',
      'Weekly digest.',
      '',
    ].join('\r\n');

    const payload = parsedMailToPayload(await simpleParser(raw), new Set(), 'uid-9');

    expect(payload.importance).toBe('low');
    expect(payload.isRead).toBe(false);
  });
});
