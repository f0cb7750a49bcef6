/**
 * src/modules/emails/email-sync.service.ts
 *
 * WHY:
 * - Worker-side ingestion: pull mail from providers, store it, hand new ids to the AI jobs.
 * - Each method is the handler of one `email.*` queue message.
 *
 * RULES:
 * - sync-user only fetches; storing happens in process-batch (small, retryable units).
 * - (user_id, message_id) dedupes: re-running a batch never double-counts.
 * - A user over the email quota is skipped (logged), not failed: retrying would not help.
 * - A failing mailbox does not stop the others; the job fails at the end so it is retried.
 */

import type { Logger } from '../../shared/logger/logger';
import type {
  BulkSyncMessage,
  ProcessEmailBatchMessage,
  Queue,
  ReprocessFailedEmailsMessage,
  SyncUserEmailsMessage,
  SyncedEmailPayload,
  UpdateEmailStatsMessage,
} from '../../shared/messaging/queue';
import type { EncryptionService } from '../../shared/security/encryption';
import { hasEmailCapacity } from '../subscriptions';
import type { UserRepo } from '../users';

import type { EmailAccountRepo } from './dal/email-account.repo';
import type { EmailThreadRepo } from './dal/email-thread.repo';
import type { EmailRepo } from './dal/email.repo';
import type { EmailAccount } from './email.types';
import type { MailFetcher, MailboxCredentials } from './providers/mail-provider';
import {
  SYNC_BATCH_SIZE,
  SYNC_MAX_MESSAGES,
  chunk,
  staleSyncCutoff,
  syncSince,
} from './policies/sync-window.policy';

export type EmailSyncServiceDeps = {
  userRepo: UserRepo;
  accountRepo: EmailAccountRepo;
  emailRepo: EmailRepo;
  threadRepo: EmailThreadRepo;
  fetcher: MailFetcher;
  encryption: EncryptionService;
  queue: Queue;
  logger: Logger;
  now?: () => Date;
};

export type SyncUserResult = {
  skipped: 'user_unavailable' | 'email_limit_reached' | null;
  accountsSynced: number;
  messagesFetched: number;
  batchesEnqueued: number;
};

function toDate(value: string | null): Date | null {
  if (!value) return null;
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}

function participantsOf(payload: SyncedEmailPayload): string[] {
  const all = [payload.senderEmail, ...payload.recipientEmails, ...payload.ccEmails];
  return [...new Set(all.filter((a): a is string => typeof a === 'string' && a.length > 0))];
}

export class EmailSyncService {
  private readonly now: () => Date;

  constructor(private readonly deps: EmailSyncServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Plaintext credentials for a stored account, or null when the set is incomplete. */
  decryptCredentials(account: EmailAccount): MailboxCredentials | null {
    const { encryption } = this.deps;

    switch (account.provider) {
      case 'gmail': {
        const accessToken = encryption.decryptNullable(account.accessToken);
        if (!accessToken) return null;
        return {
          provider: 'gmail',
          emailAddress: account.emailAddress,
          accessToken,
          refreshToken: encryption.decryptNullable(account.refreshToken),
        };
      }
      case 'outlook': {
        const accessToken = encryption.decryptNullable(account.accessToken);
        if (!accessToken) return null;
        return { provider: 'outlook', emailAddress: account.emailAddress, accessToken };
      }
      case 'imap': {
        const password = encryption.decryptNullable(account.imapPassword);
        if (!account.imapHost || !account.imapUsername || !password) return null;
        return {
          provider: 'imap',
          emailAddress: account.emailAddress,
          host: account.imapHost,
          port: account.imapPort ?? 993,
          username: account.imapUsername,
          password,
        };
      }
    }
  }

  async syncUser(msg: SyncUserEmailsMessage): Promise<SyncUserResult> {
    const flow = 'email.sync-user';
    const result: SyncUserResult = {
      skipped: null,
      accountsSynced: 0,
      messagesFetched: 0,
      batchesEnqueued: 0,
    };

    const user = await this.deps.userRepo.findById(msg.userId);
    if (!user || !user.isActive) {
      this.deps.logger.warn({
        msg: 'email.sync.skipped',
        flow,
        userId: msg.userId,
        reason: 'user_unavailable',
      });
      return { ...result, skipped: 'user_unavailable' };
    }

    if (!hasEmailCapacity(user)) {
      this.deps.logger.info({
        msg: 'email.sync.skipped',
        flow,
        userId: user.id,
        reason: 'email_limit_reached',
        tier: user.subscriptionTier,
      });
      return { ...result, skipped: 'email_limit_reached' };
    }

    const accounts = msg.accountId
      ? [await this.deps.accountRepo.findById(user.id, msg.accountId)].filter(
          (a): a is EmailAccount => a !== undefined && a.isActive,
        )
      : await this.deps.accountRepo.listActiveByUser(user.id);

    const now = this.now();
    const failures: string[] = [];

    for (const account of accounts) {
      const creds = this.decryptCredentials(account);
      if (!creds) {
        this.deps.logger.warn({
          msg: 'email.sync.account_skipped',
          flow,
          userId: user.id,
          accountId: account.id,
          reason: 'incomplete_credentials',
        });
        continue;
      }

      try {
        const fetched = await this.deps.fetcher.fetchMessages(creds, {
          since: syncSince(account, now),
          maxMessages: SYNC_MAX_MESSAGES,
        });

        const batches = chunk(fetched, SYNC_BATCH_SIZE);
        for (const emails of batches) {
          await this.deps.queue.enqueue({
            type: 'email.process-batch',
            userId: user.id,
            accountId: account.id,
            emails,
          });
        }

        await this.deps.accountRepo.touchLastSync(account.id, now);

        result.accountsSynced += 1;
        result.messagesFetched += fetched.length;
        result.batchesEnqueued += batches.length;

        this.deps.logger.info({
          msg: 'email.sync.account_done',
          flow,
          userId: user.id,
          accountId: account.id,
          provider: account.provider,
          fetched: fetched.length,
          batches: batches.length,
        });
      } catch (err) {
        failures.push(account.id);
        this.deps.logger.error({
          msg: 'email.sync.account_failed',
          flow,
          userId: user.id,
          accountId: account.id,
          provider: account.provider,
          err,
        });
      }
    }

    await this.deps.userRepo.touchLastEmailSync(user.id, now);

    if (failures.length > 0) {
      throw new Error(`email sync failed for ${failures.length} account(s)`);
    }

    return result;
  }

  /** Returns the ids of newly stored emails. */
  async processBatch(msg: ProcessEmailBatchMessage): Promise<string[]> {
    const flow = 'email.process-batch';

    const account = await this.deps.accountRepo.findById(msg.userId, msg.accountId);
    if (!account) {
      this.deps.logger.warn({
        msg: 'email.batch.skipped',
        flow,
        userId: msg.userId,
        accountId: msg.accountId,
        reason: 'account_not_found',
      });
      return [];
    }

    const inserted: string[] = [];

    for (const payload of msg.emails) {
      if (await this.deps.emailRepo.exists(msg.userId, payload.messageId)) continue;

      const thread = payload.providerThreadId
        ? await this.deps.threadRepo.upsertByProviderId({
            userId: msg.userId,
            providerThreadId: payload.providerThreadId,
            subject: payload.subject,
            participants: participantsOf(payload),
          })
        : null;

      const email = await this.deps.emailRepo.insertIfAbsent({
        userId: msg.userId,
        emailAccountId: account.id,
        threadId: thread?.id ?? null,
        messageId: payload.messageId,
        providerThreadId: payload.providerThreadId,
        subject: payload.subject,
        senderEmail: payload.senderEmail,
        senderName: payload.senderName,
        recipientEmails: payload.recipientEmails,
        ccEmails: payload.ccEmails,
        bccEmails: payload.bccEmails,
        bodyText: payload.bodyText,
        bodyHtml: payload.bodyHtml,
        snippet: payload.snippet,
        sentDate: toDate(payload.sentDate),
        receivedDate: toDate(payload.receivedDate),
        labels: payload.labels,
        importance: payload.importance,
        isRead: payload.isRead,
        isFlagged: payload.isFlagged,
        hasAttachments: payload.attachments.length > 0,
      });
      if (!email) continue;

      await this.deps.emailRepo.insertAttachments(email.id, payload.attachments);
      inserted.push(email.id);
    }

    if (inserted.length > 0) {
      await this.deps.userRepo.incrementEmailsProcessed(msg.userId, inserted.length);
      await this.deps.accountRepo.incrementTotalEmails(account.id, inserted.length);
      await this.deps.queue.enqueue({
        type: 'ai.process-emails',
        userId: msg.userId,
        emailIds: inserted,
      });
    }

    this.deps.logger.info({
      msg: 'email.batch.done',
      flow,
      userId: msg.userId,
      accountId: account.id,
      received: msg.emails.length,
      inserted: inserted.length,
    });

    return inserted;
  }

  /** Enqueues a sync for every user whose last sync is stale. Returns the count. */
  async incrementalSync(): Promise<number> {
    const users = await this.deps.userRepo.listDueForSync(staleSyncCutoff(this.now()));

    for (const user of users) {
      await this.deps.queue.enqueue({ type: 'email.sync-user', userId: user.id });
    }

    this.deps.logger.info({
      msg: 'email.incremental_sync.enqueued',
      flow: 'email.incremental-sync',
      users: users.length,
    });
    return users.length;
  }

  async bulkSync(msg: BulkSyncMessage): Promise<number> {
    for (const userId of msg.userIds) {
      await this.deps.queue.enqueue({ type: 'email.sync-user', userId });
    }
    return msg.userIds.length;
  }

  async updateStats(msg: UpdateEmailStatsMessage): Promise<Record<string, number>> {
    const accounts = await this.deps.accountRepo.listByUser(msg.userId);
    const totals: Record<string, number> = {};

    for (const account of accounts) {
      const total = await this.deps.emailRepo.countByAccount(account.id);
      await this.deps.accountRepo.setTotalEmails(account.id, total);
      totals[account.id] = total;
    }

    this.deps.logger.info({
      msg: 'email.update_stats.done',
      flow: 'email.update-stats',
      userId: msg.userId,
      accounts: accounts.length,
    });
    return totals;
  }

  /** Re-queues unprocessed emails created within the window, grouped by user. */
  async reprocessFailed(msg: ReprocessFailedEmailsMessage): Promise<number> {
    const since = new Date(this.now().getTime() - msg.hoursBack * 60 * 60 * 1000);
    const rows = await this.deps.emailRepo.listUnprocessedSince(since, msg.userId ?? null);

    const byUser = new Map<string, string[]>();
    for (const row of rows) {
      const ids = byUser.get(row.userId) ?? [];
      ids.push(row.id);
      byUser.set(row.userId, ids);
    }

    for (const [userId, emailIds] of byUser) {
      await this.deps.queue.enqueue({ type: 'ai.process-emails', userId, emailIds });
    }

    this.deps.logger.info({
      msg: 'email.reprocess_failed.enqueued',
      flow: 'email.reprocess-failed',
      emails: rows.length,
      users: byUser.size,
    });
    return rows.length;
  }
}
