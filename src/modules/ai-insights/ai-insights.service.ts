/**
 * src/modules/ai-insights/ai-insights.service.ts
 *
 * WHY:
 * - Request-side AI operations (/ai/*): on-demand analysis, summaries, predictions
 *   and the stored insight history.
 * - Heavy work (batch analysis) is enqueued, not run in the request.
 *
 * RULES:
 * - Every operation is metered: the API-call limit is checked first and one call is
 *   recorded once the operation succeeded.
 * - Reads are scoped by the caller's userId (foreign ids are "not found").
 * - AI engine failures never surface as errors; the engine returns its fallbacks.
 */

import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { Email, EmailRepo } from '../emails';
import type { UsageGuard } from '../subscriptions';
import type { User } from '../users';

import type { AiEngine } from './engine/ai-engine';
import type {
  EmailContentAnalysis,
  EmailSummary,
  ExecutiveSummary,
  PeriodInsights,
  TrendAnalysis,
} from './engine/ai-engine.types';
import type { AiInsightRepo } from './dal/ai-insight.repo';
import { AiInsightErrors } from './ai-insights.errors';
import { toInsightResponse, type AiInsightResponse } from './ai-insights.presenter';
import type { ClassifyInput } from './ai-insights.schemas';
import { canUseExecutiveSummary } from './policies/executive-summary-access.policy';
import {
  averageSentiment,
  categoryDistribution,
  dailyAggregates,
  periodMetrics,
  sentimentDistribution,
  type DailyAggregate,
  type PeriodMetrics,
} from './policies/period-metrics.policy';
import { predictEmailTrend, type TrendPrediction } from './policies/trend-prediction.policy';
import {
  findUnsubscribeCandidates,
  type UnsubscribeCandidate,
} from './policies/unsubscribe-candidates.policy';

const DAY_MS = 24 * 60 * 60 * 1000;
const SUMMARY_EMAIL_LIMIT = 100;
const SENTIMENT_EMAIL_LIMIT = 100;
const UNSUBSCRIBE_WINDOW_DAYS = 90;
const PREDICTION_WINDOW_DAYS = 30;

const PERIOD_DAYS = { daily: 1, weekly: 7, monthly: 30 } as const;
export type InsightPeriod = keyof typeof PERIOD_DAYS;

export type AiInsightsServiceDeps = {
  emailRepo: EmailRepo;
  insightRepo: AiInsightRepo;
  engine: AiEngine;
  usageGuard: UsageGuard;
  queue: Queue;
  logger: Logger;
  now?: () => Date;
};

export type SingleAnalysisResponse = {
  email_id: string;
  category: string;
  priority: string;
  sentiment: string;
  sentiment_score: number;
  key_topics: string[];
  requires_action: boolean;
  action_type: string;
  summary: string;
  confidence_score: number;
  analyzed_at: string;
};

export type InsightSummaryResponse = {
  period_days: number;
  total_emails_analyzed: number;
  emails_requiring_action: number;
  average_sentiment_score: number;
  category_distribution: Record<string, number>;
  actionable_insights: Array<{
    type: string;
    title: string;
    description: string;
    impact_level: string;
    action_items: string[];
    estimated_time_saved: number;
  }>;
  generated_at: string;
};

export type ClassifyResponse = {
  classifications: Record<string, string>;
  total_classified: number;
  errors: number;
};

export type SentimentAnalysisResponse = {
  period_days: number;
  total_emails: number;
  average_sentiment_score: number;
  sentiment_distribution: Record<string, number>;
  emails: Array<{
    email_id: string;
    subject: string;
    sender_email: string;
    sentiment: string;
    sentiment_score: number;
    received_date: string | null;
  }>;
};

export type TrendAnalysisResponse = {
  period_days: number;
  total_emails: number;
  daily_data: DailyAggregate[];
  analysis: TrendAnalysis;
};

export type ExecutiveSummaryResponse = {
  summary: ExecutiveSummary;
  metrics: PeriodMetrics;
  insight_id: string;
  generated_at: string;
};

export type PredictionResponse = {
  predictions: TrendPrediction;
  insight_id: string | null;
  generated_at: string;
};

export type GeneratedInsightsResponse = {
  insights: PeriodInsights;
  insight_id: string;
  generated_at: string;
};

export type EmailSummaryResponse = {
  email_id: string;
  summary: EmailSummary;
  generated_at: string;
};

/** AI fields written after a content analysis (single route and batch job). */
export function contentAnalysisPatch(analysis: EmailContentAnalysis, analyzedAt: Date) {
  return {
    aiCategory: analysis.category,
    priority: analysis.priority,
    aiSentiment: analysis.sentiment,
    aiSentimentScore: analysis.sentiment_score,
    aiSummary: analysis.summary,
    aiKeyTopics: analysis.key_topics,
    aiActionRequired: analysis.requires_action,
    aiSuggestedAction: analysis.action_type,
    aiConfidenceScore: analysis.confidence_score,
    aiAnalyzedAt: analyzedAt,
  };
}

export class AiInsightsService {
  private readonly now: () => Date;

  constructor(private readonly deps: AiInsightsServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private daysAgo(days: number): Date {
    return new Date(this.now().getTime() - days * DAY_MS);
  }

  private async metered<T>(userId: string, run: (user: User) => Promise<T>): Promise<T> {
    const user = await this.deps.usageGuard.assertApiCapacity(userId);
    const result = await run(user);
    await this.deps.usageGuard.recordApiCall(userId);
    return result;
  }

  private async loadEmail(userId: string, emailId: string): Promise<Email> {
    const email = await this.deps.emailRepo.findById(userId, emailId);
    if (!email) throw AiInsightErrors.emailNotFound({ emailId });
    return email;
  }

  async analyzeSingle(
    userId: string,
    emailId: string,
    requestId: string,
  ): Promise<SingleAnalysisResponse> {
    return this.metered(userId, async () => {
      const email = await this.loadEmail(userId, emailId);

      this.deps.logger.info({
        msg: 'ai.analyze_single.start',
        flow: 'ai.analyze-single',
        requestId,
        userId,
        emailId,
      });

      const analysis = await this.deps.engine.analyzeEmailContent(email);
      const analyzedAt = this.now();
      await this.deps.emailRepo.update(email.id, contentAnalysisPatch(analysis, analyzedAt));

      return {
        email_id: email.id,
        category: analysis.category,
        priority: analysis.priority,
        sentiment: analysis.sentiment,
        sentiment_score: analysis.sentiment_score,
        key_topics: analysis.key_topics,
        requires_action: analysis.requires_action,
        action_type: analysis.action_type,
        summary: analysis.summary,
        confidence_score: analysis.confidence_score,
        analyzed_at: analyzedAt.toISOString(),
      };
    });
  }

  async analyzeBatch(userId: string, emailIds: string[], requestId: string) {
    return this.metered(userId, async () => {
      const unique = [...new Set(emailIds)];
      const emails = await this.deps.emailRepo.findManyByIds(userId, unique);
      if (emails.length !== unique.length) {
        throw AiInsightErrors.batchEmailsNotFound({
          requested: unique.length,
          found: emails.length,
        });
      }

      await this.deps.queue.enqueue({
        type: 'ai.analyze-batch',
        userId,
        emailIds: emails.map((e) => e.id),
      });

      this.deps.logger.info({
        msg: 'ai.analyze_batch.enqueued',
        flow: 'ai.analyze-batch',
        requestId,
        userId,
        emails: emails.length,
      });

      return {
        message: 'Batch analysis started',
        email_count: emails.length,
        estimated_completion_minutes: emails.length * 0.5,
      };
    });
  }

  async insightsSummary(userId: string, days: number): Promise<InsightSummaryResponse> {
    return this.metered(userId, async () => {
      const emails = await this.deps.emailRepo.query(userId, {
        since: this.daysAgo(days),
        analyzedOnly: true,
        limit: SUMMARY_EMAIL_LIMIT,
      });
      if (emails.length === 0) throw AiInsightErrors.noAnalyzedEmailsInPeriod({ days });

      const insights = await this.deps.engine.generateActionableInsights(
        emails.map((e) => ({
          category: e.aiCategory,
          priority: e.priority,
          requiresAction: e.aiActionRequired === true,
        })),
      );

      const totalScore = emails.reduce((acc, e) => acc + (e.aiSentimentScore ?? 0), 0);

      return {
        period_days: days,
        total_emails_analyzed: emails.length,
        emails_requiring_action: emails.filter((e) => e.aiActionRequired === true).length,
        average_sentiment_score: Math.round((totalScore / emails.length) * 100) / 100,
        category_distribution: categoryDistribution(emails),
        actionable_insights: insights.map((i) => ({
          type: i.type,
          title: i.title,
          description: i.description,
          impact_level: i.impact,
          action_items: i.action_items,
          estimated_time_saved: i.metrics.time_saved_minutes,
        })),
        generated_at: this.now().toISOString(),
      };
    });
  }

  async classify(userId: string, input: ClassifyInput): Promise<ClassifyResponse> {
    return this.metered(userId, async () => {
      const emails = input.email_ids
        ? (await this.deps.emailRepo.findManyByIds(userId, input.email_ids)).slice(0, input.limit)
        : await this.deps.emailRepo.query(userId, {
            since: this.daysAgo(input.days),
            limit: input.limit,
          });

      const allowed = new Set(input.categories);
      const classifications: Record<string, string> = {};
      let errors = 0;

      for (const email of emails) {
        const label = await this.deps.engine.classifyCustom(email, input.categories);
        if (label === null) {
          classifications[email.id] = 'error: classification unavailable';
          errors += 1;
          continue;
        }
        if (!allowed.has(label)) continue;

        await this.deps.emailRepo.update(email.id, { aiCategory: label });
        classifications[email.id] = label;
      }

      return {
        classifications,
        total_classified: Object.keys(classifications).length - errors,
        errors,
      };
    });
  }

  async sentimentAnalysis(
    userId: string,
    days: number,
    senderFilter: string | null,
  ): Promise<SentimentAnalysisResponse> {
    return this.metered(userId, async () => {
      const emails = await this.deps.emailRepo.query(userId, {
        since: this.daysAgo(days),
        withSentiment: true,
        senderContains: senderFilter ?? undefined,
        limit: SENTIMENT_EMAIL_LIMIT,
      });

      return {
        period_days: days,
        total_emails: emails.length,
        average_sentiment_score: averageSentiment(emails.map((e) => e.aiSentimentScore)),
        sentiment_distribution: sentimentDistribution(emails),
        emails: emails.map((e) => ({
          email_id: e.id,
          subject: e.subject ?? '',
          sender_email: e.senderEmail ?? '',
          sentiment: e.aiSentiment ?? 'neutral',
          sentiment_score: e.aiSentimentScore ?? 0,
          received_date: e.receivedDate ? e.receivedDate.toISOString() : null,
        })),
      };
    });
  }

  async trendAnalysis(userId: string, days: number): Promise<TrendAnalysisResponse> {
    return this.metered(userId, async () => {
      const emails = await this.deps.emailRepo.query(userId, {
        since: this.daysAgo(days),
        analyzedOnly: true,
      });
      if (emails.length === 0) throw AiInsightErrors.noAnalyzedEmailsForTrends({ days });

      const daily = dailyAggregates(emails);
      const analysis = await this.deps.engine.analyzeTrends({
        date_range_days: days,
        total_emails: emails.length,
        categories: categoryDistribution(emails),
        sentiment_distribution: sentimentDistribution(emails),
        daily_volumes: Object.fromEntries(daily.map((d) => [d.date, d.total_emails])),
      });

      return { period_days: days, total_emails: emails.length, daily_data: daily, analysis };
    });
  }

  async unsubscribeRecommendations(
    userId: string,
  ): Promise<{ recommendations: UnsubscribeCandidate[]; total_candidates: number }> {
    return this.metered(userId, async () => {
      const emails = await this.deps.emailRepo.listFactsInWindow(
        userId,
        this.daysAgo(UNSUBSCRIBE_WINDOW_DAYS),
        this.now(),
      );
      const recommendations = findUnsubscribeCandidates(emails);
      return { recommendations, total_candidates: recommendations.length };
    });
  }

  async executiveSummary(
    userId: string,
    days: number,
    requestId: string,
  ): Promise<ExecutiveSummaryResponse> {
    return this.metered(userId, async (user) => {
      if (!canUseExecutiveSummary(user.subscriptionTier)) {
        throw AiInsightErrors.executiveSummaryRequiresPlan({ tier: user.subscriptionTier });
      }

      const emails = await this.deps.emailRepo.listFactsInWindow(
        userId,
        this.daysAgo(days),
        this.now(),
      );
      const metrics = periodMetrics(emails);
      const timePeriod = `last_${days}_days`;
      const summary = await this.deps.engine.generateExecutiveSummary(metrics, timePeriod);

      const stored = await this.deps.insightRepo.insert({
        userId,
        insightType: 'executive_summary',
        timePeriod,
        data: { ...summary, metrics },
        confidenceScore: null,
      });

      this.deps.logger.info({
        msg: 'ai.executive_summary.stored',
        flow: 'ai.executive-summary',
        requestId,
        userId,
        insightId: stored.id,
      });

      return {
        summary,
        metrics,
        insight_id: stored.id,
        generated_at: stored.generatedAt.toISOString(),
      };
    });
  }

  async predictions(userId: string): Promise<PredictionResponse> {
    return this.metered(userId, async () => {
      const now = this.now();
      const emails = await this.deps.emailRepo.listFactsInWindow(
        userId,
        this.daysAgo(PREDICTION_WINDOW_DAYS),
        now,
      );
      const dates = emails.flatMap((e) => (e.receivedDate ? [e.receivedDate] : []));
      const predictions = predictEmailTrend(dates, now);

      if ('error' in predictions) {
        return { predictions, insight_id: null, generated_at: now.toISOString() };
      }

      const stored = await this.deps.insightRepo.insert({
        userId,
        insightType: 'trend_prediction',
        timePeriod: 'next_week',
        data: predictions,
        confidenceScore: predictions.confidence,
      });

      return {
        predictions,
        insight_id: stored.id,
        generated_at: stored.generatedAt.toISOString(),
      };
    });
  }

  async generateInsights(
    userId: string,
    period: InsightPeriod,
    requestId: string,
  ): Promise<GeneratedInsightsResponse> {
    return this.metered(userId, async () => {
      const emails = await this.deps.emailRepo.query(userId, {
        since: this.daysAgo(PERIOD_DAYS[period]),
      });

      const insights = await this.deps.engine.generateInsights(
        emails.map((e) => ({
          category: e.aiCategory,
          sentiment: e.aiSentiment,
          senderEmail: e.senderEmail,
        })),
        period,
      );

      const stored = await this.deps.insightRepo.insert({
        userId,
        insightType: 'custom',
        timePeriod: period,
        data: insights,
        confidenceScore: null,
      });

      this.deps.logger.info({
        msg: 'ai.insights.generated',
        flow: 'ai.generate-insights',
        requestId,
        userId,
        period,
        emails: emails.length,
        insightId: stored.id,
      });

      return {
        insights,
        insight_id: stored.id,
        generated_at: stored.generatedAt.toISOString(),
      };
    });
  }

  async history(
    userId: string,
    limit: number,
    insightType: string | null,
  ): Promise<AiInsightResponse[]> {
    return this.metered(userId, async () => {
      const insights = await this.deps.insightRepo.listHistory(userId, limit, insightType);
      return insights.map(toInsightResponse);
    });
  }

  async emailSummary(userId: string, emailId: string): Promise<EmailSummaryResponse> {
    return this.metered(userId, async () => {
      const email = await this.loadEmail(userId, emailId);
      const summary = await this.deps.engine.summarizeEmail(email);
      return { email_id: email.id, summary, generated_at: this.now().toISOString() };
    });
  }
}
