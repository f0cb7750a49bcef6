/**
 * src/modules/emails/providers/mail-provider.ts
 *
 * WHY:
 * - The sync job fetches mail without knowing which protocol a mailbox speaks.
 * - Tests plug a scripted MailFetcher; production dispatches to Gmail / IMAP adapters.
 *
 * RULES:
 * - Credentials are plaintext here (decrypted by the caller, never logged, never queued).
 * - Adapters return SyncedEmailPayload (JSON-safe) so batches can travel through the queue.
 */

import type { SyncedEmailPayload } from '../../../shared/messaging/queue';

export type MailboxCredentials =
  | {
      provider: 'gmail';
      emailAddress: string;
      accessToken: string;
      refreshToken: string | null;
    }
  | {
      provider: 'outlook';
      emailAddress: string;
      accessToken: string;
    }
  | {
      provider: 'imap';
      emailAddress: string;
      host: string;
      port: number;
      username: string;
      password: string;
    };

export type FetchOptions = {
  since: Date;
  maxMessages: number;
};

export interface MailFetcher {
  fetchMessages(creds: MailboxCredentials, opts: FetchOptions): Promise<SyncedEmailPayload[]>;
}

export class MailProviderError extends Error {
  constructor(
    message: string,
    readonly provider: MailboxCredentials['provider'],
  ) {
    super(message);
    this.name = 'MailProviderError';
  }
}
