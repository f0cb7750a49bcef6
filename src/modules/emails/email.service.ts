/**
 * src/modules/emails/email.service.ts
 *
 * WHY:
 * - Request-side email operations: connect/remove mailboxes, trigger syncs,
 *   browse, search and act on stored messages.
 * - Fetching mail is NOT done here: syncs are enqueued and run by the worker.
 *
 * RULES:
 * - Every read is scoped by the caller's userId (foreign ids are "not found").
 * - Credentials are encrypted before they reach the repository.
 * - Email quota is checked before connecting an account and before a sync.
 */

import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { EncryptionService } from '../../shared/security/encryption';
import type { UsageGuard } from '../subscriptions';

import type { EmailAccountRepo } from './dal/email-account.repo';
import type { EmailRepo } from './dal/email.repo';
import { EmailErrors } from './email.errors';
import {
  toAccountResponse,
  toEmailDetail,
  toEmailListItem,
  type EmailAccountResponse,
  type EmailDetail,
  type EmailListItem,
} from './email.presenter';
import type { AddAccountInput } from './email.schemas';
import type { EmailListFilter } from './email.types';
import { missingCredentialsMessage } from './policies/account-credentials.policy';
import { planEmailAction } from './policies/email-action.policy';

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export type EmailServiceDeps = {
  emailRepo: EmailRepo;
  accountRepo: EmailAccountRepo;
  usageGuard: UsageGuard;
  encryption: EncryptionService;
  queue: Queue;
  logger: Logger;
  now?: () => Date;
};

export type EmailStatsResponse = {
  total_emails: number;
  unread_emails: number;
  this_week_emails: number;
  read_rate: number;
};

export function readRate(total: number, unread: number): number {
  return Math.round(((total - unread) / Math.max(total, 1)) * 100 * 100) / 100;
}

export class EmailService {
  private readonly now: () => Date;

  constructor(private readonly deps: EmailServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  // ── Accounts ──────────────────────────────────────────────

  async addAccount(
    userId: string,
    input: AddAccountInput,
    requestId: string,
  ): Promise<{ message: string; account_id: string }> {
    this.deps.logger.info({
      msg: 'emails.add_account.start',
      flow: 'emails.add_account',
      requestId,
      userId,
      provider: input.provider,
    });

    await this.deps.usageGuard.assertEmailCapacity(userId);

    const missing = missingCredentialsMessage(input.provider, {
      accessToken: input.access_token,
      imapHost: input.imap_host,
      imapUsername: input.imap_username,
      imapPassword: input.imap_password,
    });
    if (missing) {
      throw EmailErrors.missingCredentials(missing);
    }

    // Mailbox addresses compare case-insensitively, as user emails do.
    const emailAddress = input.email_address.trim().toLowerCase();
    const existing = await this.deps.accountRepo.findByAddress(userId, emailAddress);
    if (existing) {
      throw EmailErrors.accountAlreadyConnected();
    }

    const { encryption } = this.deps;
    const account = await this.deps.accountRepo.insert({
      userId,
      provider: input.provider,
      emailAddress,
      displayName: input.display_name ?? null,
      accessToken: encryption.encryptNullable(input.access_token),
      refreshToken: encryption.encryptNullable(input.refresh_token),
      tokenExpiresAt: input.token_expires_at ?? null,
      imapHost: input.imap_host ?? null,
      imapPort: input.provider === 'imap' ? (input.imap_port ?? 993) : null,
      imapUsername: input.imap_username ?? null,
      imapPassword: encryption.encryptNullable(input.imap_password),
      syncFromDate: null,
    });

    await this.deps.queue.enqueue({ type: 'email.sync-user', userId, accountId: account.id });

    this.deps.logger.info({
      msg: 'emails.add_account.success',
      flow: 'emails.add_account',
      requestId,
      userId,
      accountId: account.id,
    });

    return { message: 'Email account added successfully', account_id: account.id };
  }

  async listAccounts(userId: string): Promise<EmailAccountResponse[]> {
    const accounts = await this.deps.accountRepo.listByUser(userId);
    return accounts.map(toAccountResponse);
  }

  async removeAccount(
    userId: string,
    accountId: string,
    requestId: string,
  ): Promise<{ message: string }> {
    const account = await this.deps.accountRepo.findById(userId, accountId);
    if (!account) {
      throw EmailErrors.accountNotFound();
    }

    await this.deps.accountRepo.delete(account.id);

    this.deps.logger.info({
      msg: 'emails.remove_account.success',
      flow: 'emails.remove_account',
      requestId,
      userId,
      accountId,
    });

    return { message: 'Email account removed' };
  }

  async triggerSync(
    userId: string,
    accountId: string | null,
    requestId: string,
  ): Promise<{ message: string; account_ids: string[] }> {
    await this.deps.usageGuard.assertEmailCapacity(userId);

    let accountIds: string[];
    if (accountId) {
      const account = await this.deps.accountRepo.findById(userId, accountId);
      if (!account) {
        throw EmailErrors.accountNotFound();
      }
      accountIds = [account.id];
    } else {
      const accounts = await this.deps.accountRepo.listActiveByUser(userId);
      accountIds = accounts.map((a) => a.id);
    }

    await this.deps.queue.enqueue({
      type: 'email.sync-user',
      userId,
      ...(accountId ? { accountId } : {}),
    });

    this.deps.logger.info({
      msg: 'emails.sync.enqueued',
      flow: 'emails.sync',
      requestId,
      userId,
      accountCount: accountIds.length,
    });

    return { message: 'Email sync started', account_ids: accountIds };
  }

  // ── Messages ──────────────────────────────────────────────

  async list(userId: string, filter: EmailListFilter): Promise<EmailListItem[]> {
    const emails = await this.deps.emailRepo.list(userId, filter);
    return emails.map(toEmailListItem);
  }

  async search(userId: string, term: string, limit: number): Promise<EmailListItem[]> {
    const emails = await this.deps.emailRepo.search(userId, term, limit);
    return emails.map(toEmailListItem);
  }

  async stats(userId: string): Promise<EmailStatsResponse> {
    const weekStart = new Date(this.now().getTime() - WEEK_MS);
    const s = await this.deps.emailRepo.stats(userId, weekStart);

    return {
      total_emails: s.total,
      unread_emails: s.unread,
      this_week_emails: s.thisWeek,
      read_rate: readRate(s.total, s.unread),
    };
  }

  /** Opening an email marks it read. */
  async getEmail(userId: string, emailId: string): Promise<EmailDetail> {
    const email = await this.deps.emailRepo.findById(userId, emailId);
    if (!email) {
      throw EmailErrors.emailNotFound();
    }

    if (!email.isRead) {
      await this.deps.emailRepo.update(email.id, { isRead: true });
    }

    const attachments = await this.deps.emailRepo.listAttachments(email.id);
    return toEmailDetail({ ...email, isRead: true }, attachments);
  }

  async performAction(
    userId: string,
    emailId: string,
    action: string,
    requestId: string,
  ): Promise<{ message: string }> {
    const email = await this.deps.emailRepo.findById(userId, emailId);
    if (!email) {
      throw EmailErrors.emailNotFound();
    }

    const plan = planEmailAction(action);
    if (!plan) {
      throw EmailErrors.invalidAction({ action });
    }

    if (plan.kind === 'delete') {
      await this.deps.emailRepo.delete(email.id);
    } else {
      await this.deps.emailRepo.update(email.id, plan.patch);
    }

    this.deps.logger.info({
      msg: 'emails.action.success',
      flow: 'emails.action',
      requestId,
      userId,
      emailId,
      action,
    });

    return { message: `Action '${action}' performed successfully` };
  }
}
