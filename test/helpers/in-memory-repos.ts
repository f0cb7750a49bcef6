import { randomUUID } from 'node:crypto';

import type { AppRepos } from '../../src/app/repos';
import type {
  AiInsight,
  AiInsightRepo,
  NewAiInsight,
  SenderProfile,
  SenderProfileRepo,
} from '../../src/modules/ai-insights';
import type {
  Email,
  EmailAccount,
  EmailAccountRepo,
  EmailAttachment,
  EmailFacts,
  EmailQuery,
  EmailRepo,
  EmailThread,
  EmailThreadRepo,
  EmailUpdate,
  NewEmail,
  NewEmailAccount,
  NewEmailAttachment,
  ThreadAnalysisUpdate,
} from '../../src/modules/emails';
import type { EmailListFilter, EmailStats } from '../../src/modules/emails/email.types';
import type {
  NewSubscription,
  Subscription,
  SubscriptionPatch,
  SubscriptionRepo,
} from '../../src/modules/subscriptions';
import type { NewUser, SubscriptionTier, User, UserRepo } from '../../src/modules/users';

/**
 * WHY:
 * - E2E-style tests run the real services and controllers without Postgres.
 * - Each class mirrors the filters and ordering of its Kysely counterpart.
 *
 * RULES:
 * - Returned objects are copies: callers mutating them never change stored state.
 */

function byReceivedDesc(a: Email, b: Email): number {
  const at = a.receivedDate?.getTime() ?? Number.NEGATIVE_INFINITY;
  const bt = b.receivedDate?.getTime() ?? Number.NEGATIVE_INFINITY;
  return bt - at;
}

function toFacts(e: Email): EmailFacts {
  return {
    id: e.id,
    subject: e.subject,
    senderEmail: e.senderEmail,
    senderName: e.senderName,
    receivedDate: e.receivedDate,
    isRead: e.isRead,
    isFlagged: e.isFlagged,
    importance: e.importance,
    priority: e.priority,
    responseTimeMinutes: e.responseTimeMinutes,
    aiCategory: e.aiCategory,
    aiSentiment: e.aiSentiment,
    aiSentimentScore: e.aiSentimentScore,
    aiActionRequired: e.aiActionRequired,
  };
}

// ── Users ─────────────────────────────────────────────────────

export class InMemUserRepo implements UserRepo {
  readonly rows = new Map<string, User>();

  async findById(userId: string): Promise<User | undefined> {
    const u = this.rows.get(userId);
    return u ? { ...u } : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const lower = email.toLowerCase();
    const u = [...this.rows.values()].find((r) => r.email === lower);
    return u ? { ...u } : undefined;
  }

  async insert(input: NewUser): Promise<User> {
    const now = new Date();
    const user: User = {
      id: randomUUID(),
      email: input.email.toLowerCase(),
      passwordHash: input.passwordHash,
      fullName: input.fullName,
      isActive: true,
      isVerified: false,
      subscriptionTier: 'free_trial',
      stripeCustomerId: null,
      subscriptionEndDate: null,
      emailsProcessed: 0,
      apiCallsThisMonth: 0,
      emailSyncEnabled: true,
      lastEmailSyncAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(user.id, user);
    return { ...user };
  }

  /** Test-only: overwrite fields of a stored user. */
  patch(userId: string, patch: Partial<User>): void {
    const u = this.rows.get(userId);
    if (!u) throw new Error(`unknown user ${userId}`);
    this.rows.set(userId, { ...u, ...patch });
  }

  async listDueForSync(olderThan: Date): Promise<User[]> {
    return [...this.rows.values()]
      .filter(
        (u) =>
          u.isActive &&
          u.emailSyncEnabled &&
          (u.lastEmailSyncAt === null || u.lastEmailSyncAt < olderThan),
      )
      .map((u) => ({ ...u }));
  }

  async listActive(): Promise<User[]> {
    return [...this.rows.values()].filter((u) => u.isActive).map((u) => ({ ...u }));
  }

  async incrementEmailsProcessed(userId: string, by: number): Promise<void> {
    const u = this.rows.get(userId);
    if (u && by > 0) u.emailsProcessed += by;
  }

  async incrementApiCalls(userId: string): Promise<void> {
    const u = this.rows.get(userId);
    if (u) u.apiCallsThisMonth += 1;
  }

  async resetApiCalls(): Promise<number> {
    let n = 0;
    for (const u of this.rows.values()) {
      if (u.apiCallsThisMonth > 0) {
        u.apiCallsThisMonth = 0;
        n += 1;
      }
    }
    return n;
  }

  async setTier(userId: string, tier: SubscriptionTier, endDate?: Date | null): Promise<void> {
    const u = this.rows.get(userId);
    if (!u) return;
    u.subscriptionTier = tier;
    if (endDate !== undefined) u.subscriptionEndDate = endDate;
  }

  async setStripeCustomerId(userId: string, customerId: string): Promise<void> {
    const u = this.rows.get(userId);
    if (u) u.stripeCustomerId = customerId;
  }

  async touchLastEmailSync(userId: string, at: Date): Promise<void> {
    const u = this.rows.get(userId);
    if (u) u.lastEmailSyncAt = at;
  }
}

// ── Emails ────────────────────────────────────────────────────

export class InMemEmailRepo implements EmailRepo {
  readonly rows = new Map<string, Email>();
  readonly attachments: EmailAttachment[] = [];

  /** Test-only: store an email with defaults for every omitted column. */
  seed(input: Partial<Email> & { userId: string }): Email {
    const now = new Date();
    const email: Email = {
      id: randomUUID(),
      emailAccountId: randomUUID(),
      threadId: null,
      messageId: `<${randomUUID()}@example.com>`,
      providerThreadId: null,
      subject: null,
      senderEmail: null,
      senderName: null,
      recipientEmails: [],
      ccEmails: [],
      bccEmails: [],
      bodyText: null,
      bodyHtml: null,
      snippet: null,
      sentDate: null,
      receivedDate: null,
      labels: [],
      importance: 'normal',
      priority: null,
      isRead: false,
      isReplied: false,
      isForwarded: false,
      isFlagged: false,
      isArchived: false,
      hasAttachments: false,
      responseTimeMinutes: null,
      aiCategory: null,
      aiCategoryConfidence: null,
      aiImportanceScore: null,
      aiSentiment: null,
      aiSentimentScore: null,
      aiSummary: null,
      aiActionItems: [],
      aiKeyTopics: [],
      aiActionRequired: null,
      aiSuggestedAction: null,
      aiConfidenceScore: null,
      aiAnalyzedAt: null,
      isProcessed: false,
      processingError: null,
      createdAt: now,
      updatedAt: now,
      ...input,
    };
    this.rows.set(email.id, email);
    return { ...email };
  }

  private ofUser(userId: string): Email[] {
    return [...this.rows.values()].filter((e) => e.userId === userId);
  }

  async findById(userId: string, emailId: string): Promise<Email | undefined> {
    const e = this.rows.get(emailId);
    return e && e.userId === userId ? { ...e } : undefined;
  }

  async findManyByIds(userId: string, emailIds: readonly string[]): Promise<Email[]> {
    const wanted = new Set(emailIds);
    return this.ofUser(userId)
      .filter((e) => wanted.has(e.id))
      .map((e) => ({ ...e }));
  }

  async exists(userId: string, messageId: string): Promise<boolean> {
    return this.ofUser(userId).some((e) => e.messageId === messageId);
  }

  async list(userId: string, filter: EmailListFilter): Promise<Email[]> {
    return this.ofUser(userId)
      .filter((e) => filter.includeArchived || !e.isArchived)
      .filter((e) => !filter.unreadOnly || !e.isRead)
      .filter((e) => !filter.category || e.aiCategory === filter.category)
      .filter(
        (e) =>
          filter.importanceMin === null ||
          (e.aiImportanceScore !== null && e.aiImportanceScore >= filter.importanceMin),
      )
      .sort(byReceivedDesc)
      .slice(filter.skip, filter.skip + filter.limit)
      .map((e) => ({ ...e }));
  }

  async search(userId: string, term: string, limit: number): Promise<Email[]> {
    const needle = term.toLowerCase();
    return this.ofUser(userId)
      .filter(
        (e) =>
          (e.subject ?? '').toLowerCase().includes(needle) ||
          (e.bodyText ?? '').toLowerCase().includes(needle),
      )
      .sort(byReceivedDesc)
      .slice(0, limit)
      .map((e) => ({ ...e }));
  }

  async stats(userId: string, weekStart: Date): Promise<EmailStats> {
    const all = this.ofUser(userId);
    return {
      total: all.length,
      unread: all.filter((e) => !e.isRead).length,
      thisWeek: all.filter((e) => e.receivedDate !== null && e.receivedDate >= weekStart).length,
    };
  }

  async query(userId: string, query: EmailQuery): Promise<Email[]> {
    const { since, until, senderContains } = query;
    const rows = this.ofUser(userId)
      .filter((e) => !since || (e.receivedDate !== null && e.receivedDate >= since))
      .filter((e) => !until || (e.receivedDate !== null && e.receivedDate <= until))
      .filter((e) => !query.analyzedOnly || e.aiAnalyzedAt !== null)
      .filter((e) => !query.withSentiment || e.aiSentiment !== null)
      .filter(
        (e) =>
          !senderContains ||
          (e.senderEmail ?? '').toLowerCase().includes(senderContains.toLowerCase()),
      )
      .sort(byReceivedDesc);
    const limited = query.limit !== undefined ? rows.slice(0, query.limit) : rows;
    return limited.map((e) => ({ ...e }));
  }

  async listFactsInWindow(userId: string, from: Date, to: Date): Promise<EmailFacts[]> {
    return this.ofUser(userId)
      .filter((e) => e.receivedDate !== null && e.receivedDate >= from && e.receivedDate <= to)
      .map(toFacts);
  }

  async listByThread(threadId: string): Promise<Email[]> {
    return [...this.rows.values()]
      .filter((e) => e.threadId === threadId)
      .sort((a, b) => -byReceivedDesc(a, b))
      .map((e) => ({ ...e }));
  }

  async listUnprocessedSince(
    since: Date,
    userId: string | null,
  ): Promise<Array<{ id: string; userId: string }>> {
    return [...this.rows.values()]
      .filter((e) => !e.isProcessed && e.createdAt >= since)
      .filter((e) => userId === null || e.userId === userId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((e) => ({ id: e.id, userId: e.userId }));
  }

  async countByAccount(accountId: string): Promise<number> {
    return [...this.rows.values()].filter((e) => e.emailAccountId === accountId).length;
  }

  async insertIfAbsent(input: NewEmail): Promise<Email | undefined> {
    if (await this.exists(input.userId, input.messageId)) return undefined;
    return this.seed(input);
  }

  async insertAttachments(
    emailId: string,
    attachments: readonly NewEmailAttachment[],
  ): Promise<void> {
    for (const a of attachments) {
      this.attachments.push({ ...a, id: randomUUID(), emailId, createdAt: new Date() });
    }
  }

  async listAttachments(emailId: string): Promise<EmailAttachment[]> {
    return this.attachments.filter((a) => a.emailId === emailId).map((a) => ({ ...a }));
  }

  async update(emailId: string, patch: EmailUpdate): Promise<void> {
    const e = this.rows.get(emailId);
    if (!e) return;
    this.rows.set(emailId, { ...e, ...patch, updatedAt: new Date() });
  }

  async delete(emailId: string): Promise<void> {
    this.rows.delete(emailId);
  }

  deleteByAccount(accountId: string): void {
    for (const e of [...this.rows.values()]) {
      if (e.emailAccountId === accountId) this.rows.delete(e.id);
    }
  }
}

// ── Accounts ──────────────────────────────────────────────────

export class InMemEmailAccountRepo implements EmailAccountRepo {
  readonly rows = new Map<string, EmailAccount>();

  constructor(private readonly emails: InMemEmailRepo) {}

  async findById(userId: string, accountId: string): Promise<EmailAccount | undefined> {
    const a = this.rows.get(accountId);
    return a && a.userId === userId ? { ...a } : undefined;
  }

  async findByAddress(userId: string, emailAddress: string): Promise<EmailAccount | undefined> {
    const lower = emailAddress.toLowerCase();
    const a = [...this.rows.values()].find(
      (r) => r.userId === userId && r.emailAddress === lower,
    );
    return a ? { ...a } : undefined;
  }

  async listByUser(userId: string): Promise<EmailAccount[]> {
    return [...this.rows.values()].filter((a) => a.userId === userId).map((a) => ({ ...a }));
  }

  async listActiveByUser(userId: string): Promise<EmailAccount[]> {
    return (await this.listByUser(userId)).filter((a) => a.isActive);
  }

  async insert(input: NewEmailAccount): Promise<EmailAccount> {
    const now = new Date();
    const account: EmailAccount = {
      ...input,
      emailAddress: input.emailAddress.toLowerCase(),
      id: randomUUID(),
      isActive: true,
      lastSyncAt: null,
      totalEmails: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(account.id, account);
    return { ...account };
  }

  async delete(accountId: string): Promise<void> {
    this.rows.delete(accountId);
    this.emails.deleteByAccount(accountId);
  }

  async touchLastSync(accountId: string, at: Date): Promise<void> {
    const a = this.rows.get(accountId);
    if (a) a.lastSyncAt = at;
  }

  async incrementTotalEmails(accountId: string, by: number): Promise<void> {
    const a = this.rows.get(accountId);
    if (a) a.totalEmails += by;
  }

  async setTotalEmails(accountId: string, total: number): Promise<void> {
    const a = this.rows.get(accountId);
    if (a) a.totalEmails = total;
  }
}

// ── Threads ───────────────────────────────────────────────────

export class InMemEmailThreadRepo implements EmailThreadRepo {
  readonly rows = new Map<string, EmailThread>();

  async upsertByProviderId(input: {
    userId: string;
    providerThreadId: string;
    subject: string | null;
    participants: string[];
  }): Promise<EmailThread> {
    const existing = [...this.rows.values()].find(
      (t) => t.userId === input.userId && t.providerThreadId === input.providerThreadId,
    );
    const now = new Date();

    if (existing) {
      existing.emailCount += 1;
      existing.participants = [...new Set([...existing.participants, ...input.participants])];
      existing.updatedAt = now;
      return { ...existing };
    }

    const thread: EmailThread = {
      id: randomUUID(),
      userId: input.userId,
      providerThreadId: input.providerThreadId,
      subject: input.subject,
      participants: [...new Set(input.participants)],
      emailCount: 1,
      aiInsights: null,
      responsePattern: null,
      conversationTone: null,
      keyTopics: [],
      lastAnalyzedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(thread.id, thread);
    return { ...thread };
  }

  async listForAnalysis(
    userId: string,
    updatedSince: Date,
    minEmails: number,
  ): Promise<EmailThread[]> {
    return [...this.rows.values()]
      .filter((t) => t.userId === userId && t.updatedAt >= updatedSince)
      .filter((t) => t.emailCount >= minEmails)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .map((t) => ({ ...t }));
  }

  async saveAnalysis(threadId: string, analysis: ThreadAnalysisUpdate): Promise<void> {
    const t = this.rows.get(threadId);
    if (!t) return;
    t.responsePattern = analysis.responsePattern;
    t.conversationTone = analysis.conversationTone;
    t.keyTopics = analysis.keyTopics;
    t.aiInsights = analysis.aiInsights;
    t.lastAnalyzedAt = analysis.analyzedAt;
  }
}

// ── Subscriptions ─────────────────────────────────────────────

export class InMemSubscriptionRepo implements SubscriptionRepo {
  readonly rows = new Map<string, Subscription>();
  readonly processedEvents = new Map<string, string>();

  async findByUser(userId: string): Promise<Subscription | undefined> {
    const s = [...this.rows.values()].find((r) => r.userId === userId);
    return s ? { ...s } : undefined;
  }

  async findByStripeId(stripeSubscriptionId: string): Promise<Subscription | undefined> {
    const s = [...this.rows.values()].find((r) => r.stripeSubscriptionId === stripeSubscriptionId);
    return s ? { ...s } : undefined;
  }

  async upsertForUser(input: NewSubscription): Promise<Subscription> {
    const existing = [...this.rows.values()].find((r) => r.userId === input.userId);
    const now = new Date();
    const row: Subscription = existing
      ? { ...existing, ...input, updatedAt: now }
      : { ...input, id: randomUUID(), createdAt: now, updatedAt: now };
    this.rows.set(row.id, row);
    return { ...row };
  }

  async update(id: string, patch: SubscriptionPatch): Promise<void> {
    const s = this.rows.get(id);
    if (!s) return;
    this.rows.set(id, { ...s, ...patch, updatedAt: new Date() });
  }

  async isEventProcessed(eventId: string): Promise<boolean> {
    return this.processedEvents.has(eventId);
  }

  async markEventProcessed(eventId: string, eventType: string): Promise<void> {
    if (!this.processedEvents.has(eventId)) this.processedEvents.set(eventId, eventType);
  }
}

// ── AI insights ───────────────────────────────────────────────

export class InMemAiInsightRepo implements AiInsightRepo {
  readonly rows: AiInsight[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async insert(input: NewAiInsight): Promise<AiInsight> {
    const row: AiInsight = { ...input, id: randomUUID(), generatedAt: this.now() };
    this.rows.push(row);
    return { ...row };
  }

  async listHistory(
    userId: string,
    limit: number,
    insightType: string | null,
  ): Promise<AiInsight[]> {
    return this.rows
      .filter((r) => r.userId === userId)
      .filter((r) => insightType === null || r.insightType === insightType)
      .map((r, i) => ({ r, i }))
      .sort((a, b) => b.r.generatedAt.getTime() - a.r.generatedAt.getTime() || b.i - a.i)
      .slice(0, limit)
      .map(({ r }) => ({ ...r }));
  }
}

export class InMemSenderProfileRepo implements SenderProfileRepo {
  readonly rows = new Map<string, SenderProfile>();

  async upsert(profile: SenderProfile): Promise<void> {
    this.rows.set(`${profile.userId}|${profile.senderEmail}`, { ...profile });
  }
}

export type InMemRepos = AppRepos & {
  userRepo: InMemUserRepo;
  subscriptionRepo: InMemSubscriptionRepo;
  accountRepo: InMemEmailAccountRepo;
  emailRepo: InMemEmailRepo;
  threadRepo: InMemEmailThreadRepo;
  insightRepo: InMemAiInsightRepo;
  senderProfileRepo: InMemSenderProfileRepo;
};

export function createInMemRepos(now?: () => Date): InMemRepos {
  const emailRepo = new InMemEmailRepo();
  return {
    userRepo: new InMemUserRepo(),
    subscriptionRepo: new InMemSubscriptionRepo(),
    accountRepo: new InMemEmailAccountRepo(emailRepo),
    emailRepo,
    threadRepo: new InMemEmailThreadRepo(),
    insightRepo: new InMemAiInsightRepo(now),
    senderProfileRepo: new InMemSenderProfileRepo(),
  };
}
