/**
 * src/modules/emails/index.ts
 *
 * Public surface of the emails module.
 */

export type {
  Email,
  EmailAccount,
  EmailAttachment,
  EmailFacts,
  EmailImportance,
  EmailProvider,
  EmailQuery,
  EmailThread,
  EmailUpdate,
  NewEmail,
  NewEmailAccount,
  NewEmailAttachment,
  ThreadAnalysisUpdate,
} from './email.types';
export type { EmailRepo } from './dal/email.repo';
export { KyselyEmailRepo } from './dal/email.repo';
export type { EmailAccountRepo } from './dal/email-account.repo';
export { KyselyEmailAccountRepo } from './dal/email-account.repo';
export type { EmailThreadRepo } from './dal/email-thread.repo';
export { KyselyEmailThreadRepo } from './dal/email-thread.repo';
export type { MailFetcher, MailboxCredentials, FetchOptions } from './providers/mail-provider';
export { MailProviderError } from './providers/mail-provider';
export { ProviderMailFetcher } from './providers/mail-fetcher';
export { EmailSyncService } from './email-sync.service';
export { createEmailModule, type EmailModule } from './email.module';
