/**
 * src/modules/emails/providers/mail-fetcher.ts
 *
 * Production MailFetcher: dispatches on the mailbox provider.
 */

import type { SyncedEmailPayload } from '../../../shared/messaging/queue';
import { GmailMailProvider } from './gmail-mail-provider';
import { ImapMailProvider, OUTLOOK_IMAP_HOST, OUTLOOK_IMAP_PORT } from './imap-mail-provider';
import {
  MailProviderError,
  type FetchOptions,
  type MailFetcher,
  type MailboxCredentials,
} from './mail-provider';

export class ProviderMailFetcher implements MailFetcher {
  private readonly gmail: GmailMailProvider;
  private readonly imap = new ImapMailProvider();

  constructor(gmailClient: { clientId: string | null; clientSecret: string | null }) {
    this.gmail = new GmailMailProvider(gmailClient);
  }

  async fetchMessages(
    creds: MailboxCredentials,
    opts: FetchOptions,
  ): Promise<SyncedEmailPayload[]> {
    try {
      switch (creds.provider) {
        case 'gmail':
          return await this.gmail.fetchMessages(creds, opts);
        case 'outlook':
          return await this.imap.fetchMessages(
            {
              host: OUTLOOK_IMAP_HOST,
              port: OUTLOOK_IMAP_PORT,
              auth: { user: creds.emailAddress, accessToken: creds.accessToken },
            },
            opts,
          );
        case 'imap':
          return await this.imap.fetchMessages(
            {
              host: creds.host,
              port: creds.port,
              auth: { user: creds.username, pass: creds.password },
            },
            opts,
          );
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new MailProviderError(`${creds.provider} fetch failed: ${reason}`, creds.provider);
    }
  }
}
