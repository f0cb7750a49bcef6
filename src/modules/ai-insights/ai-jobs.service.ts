/**
 * src/modules/ai-insights/ai-jobs.service.ts
 *
 * WHY:
 * - Worker-side AI analysis. Each method is the handler of one `ai.*` queue message.
 *
 * RULES:
 * - process-emails never re-processes an email (is_processed) and records a per-email
 *   failure in processing_error instead of failing the whole batch.
 * - Periodic jobs (daily / weekly) iterate users; one failing user does not stop the
 *   others. The job then fails so the run is reported, but it is not retried: a retry would
 *   store a second insight for every user that already succeeded. The next schedule catches up.
 * - Periods are UTC days.
 */

import type { Logger } from '../../shared/logger/logger';
import type {
  AnalyzeEmailBatchMessage,
  AnalyzeThreadsMessage,
  DetectPatternsMessage,
  ProcessAiInsightsMessage,
  Queue,
  SenderRelationshipsMessage,
} from '../../shared/messaging/queue';
import type { Email, EmailFacts, EmailRepo, EmailThreadRepo } from '../emails';
import type { User, UserRepo } from '../users';

import type { AiInsightRepo, SenderProfileRepo } from './dal/ai-insight.repo';
import type { AiEngine } from './engine/ai-engine';
import type { InsightEmail, PatternInput, SenderProfileInput } from './engine/ai-engine.types';
import { contentAnalysisPatch } from './ai-insights.service';
import { DAY_NAMES_BY_INDEX, previousIsoWeek, previousUtcDay } from './policies/periods.policy';

const DAY_MS = 24 * 60 * 60 * 1000;
const THREAD_LOOKBACK_MS = DAY_MS;
const THREAD_MIN_EMAILS = 2;
const PATTERN_WINDOW_DAYS = 30;
const PATTERN_MIN_EMAILS = 10;
const SENDER_WINDOW_DAYS = 90;
const SENDER_MIN_EMAILS = 3;
const PATTERN_TOP_SENDERS = 10;

export type AiJobsServiceDeps = {
  userRepo: UserRepo;
  emailRepo: EmailRepo;
  threadRepo: EmailThreadRepo;
  insightRepo: AiInsightRepo;
  senderProfileRepo: SenderProfileRepo;
  engine: AiEngine;
  queue: Queue;
  logger: Logger;
  now?: () => Date;
};

export type ProcessEmailsResult = { processed: number; failed: number; skipped: number };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sentimentText(email: Pick<Email, 'subject' | 'bodyText'>): string {
  return [email.subject, email.bodyText].filter((p): p is string => !!p).join('\n\n');
}

function toInsightEmail(email: Email): InsightEmail {
  return { category: email.aiCategory, sentiment: email.aiSentiment, senderEmail: email.senderEmail };
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function buildPatternInput(emails: readonly EmailFacts[]): PatternInput {
  const hourly: Record<number, number> = {};
  const weekday: Record<string, number> = {};
  const categories: Record<string, number> = {};
  const senders: Record<string, number> = {};

  for (const e of emails) {
    if (e.receivedDate) {
      const h = e.receivedDate.getUTCHours();
      hourly[h] = (hourly[h] ?? 0) + 1;
      increment(weekday, DAY_NAMES_BY_INDEX[e.receivedDate.getUTCDay()] ?? 'Unknown');
    }
    increment(categories, e.aiCategory ?? 'uncategorized');
    if (e.senderEmail) increment(senders, e.senderEmail);
  }

  const topSenders = Object.fromEntries(
    Object.entries(senders)
      .sort((a, b) => b[1] - a[1])
      .slice(0, PATTERN_TOP_SENDERS),
  );

  return {
    totalEmails: emails.length,
    hourlyDistribution: hourly,
    weekdayDistribution: weekday,
    categories,
    topSenders,
  };
}

/** Senders with at least `minEmails` emails, with the facts the relationship prompt needs. */
export function buildSenderProfiles(
  emails: readonly EmailFacts[],
  minEmails: number,
): SenderProfileInput[] {
  const bySender = new Map<string, EmailFacts[]>();
  for (const e of emails) {
    if (!e.senderEmail) continue;
    const list = bySender.get(e.senderEmail) ?? [];
    list.push(e);
    bySender.set(e.senderEmail, list);
  }

  const profiles: SenderProfileInput[] = [];
  for (const [senderEmail, list] of bySender) {
    if (list.length < minEmails) continue;

    const scores = list.flatMap((e) => (e.aiSentimentScore === null ? [] : [e.aiSentimentScore]));
    const categories: Record<string, number> = {};
    for (const e of list) increment(categories, e.aiCategory ?? 'uncategorized');

    profiles.push({
      senderEmail,
      senderName: list.find((e) => e.senderName)?.senderName ?? null,
      totalEmails: list.length,
      readRate: list.filter((e) => e.isRead).length / list.length,
      avgSentiment:
        scores.length > 0
          ? Math.round((scores.reduce((a, b) => a + b, 0) / scores.length) * 100) / 100
          : null,
      categories,
    });
  }

  return profiles.sort((a, b) => b.totalEmails - a.totalEmails);
}

export class AiJobsService {
  private readonly now: () => Date;

  constructor(private readonly deps: AiJobsServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async processEmails(msg: ProcessAiInsightsMessage): Promise<ProcessEmailsResult> {
    const flow = 'ai.process-emails';
    const emails = await this.deps.emailRepo.findManyByIds(msg.userId, msg.emailIds);
    const result: ProcessEmailsResult = { processed: 0, failed: 0, skipped: 0 };

    for (const email of emails) {
      if (email.isProcessed) {
        result.skipped += 1;
        continue;
      }

      try {
        const classification = await this.deps.engine.classifyEmail(email);
        const sentiment = await this.deps.engine.analyzeSentiment(sentimentText(email));
        const importance = await this.deps.engine.scoreImportance(email);

        await this.deps.emailRepo.update(email.id, {
          aiCategory: classification.category,
          aiCategoryConfidence: classification.confidence,
          aiSentiment: sentiment.sentiment,
          aiSentimentScore: sentiment.score,
          aiImportanceScore: importance,
          aiAnalyzedAt: this.now(),
          isProcessed: true,
          processingError: null,
        });
        result.processed += 1;
      } catch (err) {
        result.failed += 1;
        this.deps.logger.error({
          msg: 'ai.process_emails.email_failed',
          flow,
          userId: msg.userId,
          emailId: email.id,
          err,
        });
        await this.deps.emailRepo.update(email.id, { processingError: errorMessage(err) });
      }
    }

    await this.deps.queue.enqueue({ type: 'ai.analyze-threads', userId: msg.userId });

    this.deps.logger.info({ msg: 'ai.process_emails.done', flow, userId: msg.userId, ...result });
    return result;
  }

  async analyzeBatch(msg: AnalyzeEmailBatchMessage): Promise<number> {
    const emails = await this.deps.emailRepo.findManyByIds(msg.userId, msg.emailIds);
    let analyzed = 0;

    for (const email of emails) {
      if (email.aiAnalyzedAt) continue;
      const analysis = await this.deps.engine.analyzeEmailContent(email);
      await this.deps.emailRepo.update(email.id, contentAnalysisPatch(analysis, this.now()));
      analyzed += 1;
    }

    this.deps.logger.info({
      msg: 'ai.analyze_batch.done',
      flow: 'ai.analyze-batch',
      userId: msg.userId,
      requested: msg.emailIds.length,
      analyzed,
    });
    return analyzed;
  }

  async analyzeThreads(msg: AnalyzeThreadsMessage): Promise<number> {
    const since = new Date(this.now().getTime() - THREAD_LOOKBACK_MS);
    const threads = await this.deps.threadRepo.listForAnalysis(msg.userId, since, THREAD_MIN_EMAILS);
    let analyzed = 0;

    for (const thread of threads) {
      const emails = await this.deps.emailRepo.listByThread(thread.id);
      const analysis = await this.deps.engine.analyzeThread(emails);
      if (!analysis) continue;

      await this.deps.threadRepo.saveAnalysis(thread.id, {
        responsePattern: analysis.response_pattern,
        conversationTone: analysis.conversation_tone,
        keyTopics: analysis.key_topics,
        aiInsights: { summary: analysis.summary, action_items: analysis.action_items },
        analyzedAt: this.now(),
      });
      analyzed += 1;
    }

    this.deps.logger.info({
      msg: 'ai.analyze_threads.done',
      flow: 'ai.analyze-threads',
      userId: msg.userId,
      threads: threads.length,
      analyzed,
    });
    return analyzed;
  }

  /** Runs `work` per active user; failures are logged and rethrown as one error at the end. */
  private async forEachActiveUser(flow: string, work: (user: User) => Promise<boolean>) {
    const users = await this.deps.userRepo.listActive();
    const failures: string[] = [];
    let produced = 0;

    for (const user of users) {
      try {
        if (await work(user)) produced += 1;
      } catch (err) {
        failures.push(user.id);
        this.deps.logger.error({ msg: `${flow}.user_failed`, flow, userId: user.id, err });
      }
    }

    this.deps.logger.info({ msg: `${flow}.done`, flow, users: users.length, produced });

    if (failures.length > 0) {
      throw new Error(`${flow} failed for ${failures.length} user(s)`);
    }
    return produced;
  }

  async dailyInsights(): Promise<number> {
    const period = previousUtcDay(this.now());

    return this.forEachActiveUser('ai.daily-insights', async (user) => {
      const emails = await this.deps.emailRepo.query(user.id, {
        since: period.start,
        until: period.end,
      });
      if (emails.length === 0) return false;

      const insights = await this.deps.engine.generateInsights(
        emails.map(toInsightEmail),
        'daily',
      );
      await this.deps.insightRepo.insert({
        userId: user.id,
        insightType: 'daily_summary',
        timePeriod: period.label,
        data: insights,
        confidenceScore: null,
      });
      await this.deps.queue.enqueue({ type: 'ai.analyze-threads', userId: user.id });
      return true;
    });
  }

  async weeklyInsights(): Promise<number> {
    const period = previousIsoWeek(this.now());

    return this.forEachActiveUser('ai.weekly-insights', async (user) => {
      const emails = await this.deps.emailRepo.query(user.id, {
        since: period.start,
        until: period.end,
      });
      if (emails.length === 0) return false;

      const insights = await this.deps.engine.generateInsights(
        emails.map(toInsightEmail),
        'weekly',
      );
      await this.deps.insightRepo.insert({
        userId: user.id,
        insightType: 'weekly_summary',
        timePeriod: period.label,
        data: insights,
        confidenceScore: null,
      });
      await this.deps.queue.enqueue({ type: 'ai.detect-patterns', userId: user.id });
      await this.deps.queue.enqueue({ type: 'ai.sender-relationships', userId: user.id });
      return true;
    });
  }

  /** Returns false when the user has too few recent emails. */
  async detectPatterns(msg: DetectPatternsMessage): Promise<boolean> {
    const now = this.now();
    const emails = await this.deps.emailRepo.listFactsInWindow(
      msg.userId,
      new Date(now.getTime() - PATTERN_WINDOW_DAYS * DAY_MS),
      now,
    );

    if (emails.length < PATTERN_MIN_EMAILS) {
      this.deps.logger.info({
        msg: 'ai.detect_patterns.skipped',
        flow: 'ai.detect-patterns',
        userId: msg.userId,
        emails: emails.length,
      });
      return false;
    }

    const patterns = await this.deps.engine.detectPatterns(buildPatternInput(emails));
    await this.deps.insightRepo.insert({
      userId: msg.userId,
      insightType: 'email_patterns',
      timePeriod: `last_${PATTERN_WINDOW_DAYS}_days`,
      data: patterns,
      confidenceScore: patterns.confidence,
    });
    return true;
  }

  async senderRelationships(msg: SenderRelationshipsMessage): Promise<number> {
    const now = this.now();
    const emails = await this.deps.emailRepo.listFactsInWindow(
      msg.userId,
      new Date(now.getTime() - SENDER_WINDOW_DAYS * DAY_MS),
      now,
    );

    let stored = 0;
    for (const profile of buildSenderProfiles(emails, SENDER_MIN_EMAILS)) {
      const relationship = await this.deps.engine.analyzeSenderRelationship(profile);
      if (!relationship) continue;

      await this.deps.senderProfileRepo.upsert({
        userId: msg.userId,
        senderEmail: profile.senderEmail,
        senderName: profile.senderName,
        totalEmails: profile.totalEmails,
        relationshipType: relationship.relationship_type,
        importanceLevel: relationship.importance_level,
        avgSentiment: profile.avgSentiment,
        suggestedAction: relationship.suggested_action,
        confidenceScore: relationship.confidence,
      });
      stored += 1;
    }

    this.deps.logger.info({
      msg: 'ai.sender_relationships.done',
      flow: 'ai.sender-relationships',
      userId: msg.userId,
      stored,
    });
    return stored;
  }
}
