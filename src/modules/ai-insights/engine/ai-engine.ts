/**
 * src/modules/ai-insights/engine/ai-engine.ts
 *
 * WHY:
 * - One place that turns email data into LLM prompts and LLM answers into typed results.
 * - Used by the HTTP services (ai-insights) and by the background jobs.
 *
 * RULES:
 * - Every operation returns a value. A provider error, unparsable JSON or a schema
 *   mismatch is logged and replaced by the operation's fallback.
 * - Never log prompts or answers (they contain email content); log the operation + error.
 * - No DB access here. Callers load and store.
 */

import type { z } from 'zod';

import type { ChatClient, ChatCompletionRequest } from '../../../shared/ai/chat-client';
import type { Logger } from '../../../shared/logger/logger';

import { parseLlmJson } from './llm-json';
import {
  actionableInsightsPrompt,
  classifyEmailPrompt,
  contentAnalysisPrompt,
  customClassificationPrompt,
  emailSummaryPrompt,
  executiveSummaryPrompt,
  importancePrompt,
  patternDetectionPrompt,
  periodInsightsPrompt,
  senderRelationshipPrompt,
  sentimentPrompt,
  threadAnalysisPrompt,
  trendAnalysisPrompt,
  truncate,
} from './prompts';
import {
  ActionableInsightsSchema,
  EmailClassificationSchema,
  EmailContentAnalysisSchema,
  EmailSummarySchema,
  ExecutiveSummarySchema,
  PatternDetectionSchema,
  PeriodInsightsSchema,
  SenderRelationshipSchema,
  SentimentSchema,
  ThreadAnalysisSchema,
  TrendAnalysisSchema,
  type ActionableEmailFacts,
  type ActionableInsight,
  type AnalyzableEmail,
  type EmailClassification,
  type EmailContentAnalysis,
  type EmailSummary,
  type ExecutiveSummary,
  type InsightEmail,
  type PatternDetection,
  type PatternInput,
  type PeriodEmailSummary,
  type PeriodInsights,
  type SenderProfileInput,
  type SenderRelationship,
  type SentimentResult,
  type ThreadAnalysis,
  type ThreadMessage,
  type TrendAnalysis,
} from './ai-engine.types';

export type AiEngineModels = {
  /** Analysis / generation model. */
  analysis: string;
  /** Cheaper model for single-label classification. */
  classifier: string;
};

const ANALYST_SYSTEM =
  'You are an expert email analyst. Provide structured, consistent analysis in valid JSON format only.';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Category / sentiment / sender counts fed to period summaries. */
export function summarizeForInsights(emails: InsightEmail[]): PeriodEmailSummary {
  const summary: PeriodEmailSummary = {
    total_emails: emails.length,
    categories: {},
    sentiments: { positive: 0, neutral: 0, negative: 0 },
    top_senders: {},
  };

  for (const email of emails) {
    const category = email.category ?? 'unknown';
    summary.categories[category] = (summary.categories[category] ?? 0) + 1;

    const sentiment = email.sentiment ?? 'neutral';
    if (sentiment === 'positive' || sentiment === 'neutral' || sentiment === 'negative') {
      summary.sentiments[sentiment] += 1;
    }

    const sender = email.senderEmail ?? 'unknown';
    summary.top_senders[sender] = (summary.top_senders[sender] ?? 0) + 1;
  }

  summary.top_senders = Object.fromEntries(
    Object.entries(summary.top_senders).sort((a, b) => b[1] - a[1]),
  );

  return summary;
}

export class AiEngine {
  constructor(
    private readonly deps: {
      chat: ChatClient;
      logger: Logger;
      models: AiEngineModels;
    },
  ) {}

  private async askJson<S extends z.ZodTypeAny>(
    req: Omit<ChatCompletionRequest, 'json'>,
    schema: S,
  ): Promise<z.output<S>> {
    const raw = await this.deps.chat.complete({ ...req, json: true });
    return parseLlmJson(raw, schema);
  }

  private fallback<T>(operation: string, err: unknown, value: T): T {
    this.deps.logger.warn({
      msg: 'ai.engine.fallback',
      flow: `ai.engine.${operation}`,
      err: errorMessage(err),
    });
    return value;
  }

  private userPrompt(system: string, prompt: string) {
    return [
      { role: 'system' as const, content: system },
      { role: 'user' as const, content: prompt },
    ];
  }

  async classifyEmail(email: AnalyzableEmail): Promise<EmailClassification> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.classifier,
          messages: this.userPrompt(
            'You are an email classification expert.',
            classifyEmailPrompt(email),
          ),
          temperature: 0.1,
          maxTokens: 100,
        },
        EmailClassificationSchema,
      );
    } catch (err) {
      return this.fallback('classify', err, { category: 'unknown', confidence: 0 });
    }
  }

  async analyzeSentiment(text: string): Promise<SentimentResult> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.classifier,
          messages: this.userPrompt('You are a sentiment analysis expert.', sentimentPrompt(text)),
          temperature: 0,
          maxTokens: 60,
        },
        SentimentSchema,
      );
    } catch (err) {
      return this.fallback('sentiment', err, {
        sentiment: 'neutral' as const,
        score: 0,
        confidence: 0,
      });
    }
  }

  async scoreImportance(email: AnalyzableEmail): Promise<number> {
    try {
      const raw = await this.deps.chat.complete({
        model: this.deps.models.analysis,
        messages: this.userPrompt(
          'You are an email importance scoring expert.',
          importancePrompt(email),
        ),
        temperature: 0.1,
        maxTokens: 10,
      });

      const score = Number.parseFloat(raw.trim());
      if (Number.isNaN(score)) throw new Error('Importance score is not a number');

      return Math.max(0, Math.min(1, score));
    } catch (err) {
      return this.fallback('importance', err, 0.5);
    }
  }

  async analyzeEmailContent(email: AnalyzableEmail): Promise<EmailContentAnalysis> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(ANALYST_SYSTEM, contentAnalysisPrompt(email)),
          temperature: 0.3,
          maxTokens: 500,
        },
        EmailContentAnalysisSchema,
      );
    } catch (err) {
      return this.fallback('content_analysis', err, {
        category: 'uncategorized',
        priority: 'medium',
        sentiment: 'neutral',
        sentiment_score: 0,
        key_topics: [],
        requires_action: false,
        action_type: 'none',
        urgency_indicators: [],
        summary: 'Analysis unavailable',
        confidence_score: 0,
        error: errorMessage(err),
      });
    }
  }

  async generateActionableInsights(emails: ActionableEmailFacts[]): Promise<ActionableInsight[]> {
    try {
      const result = await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(
            'You are a productivity expert analyzing email patterns to provide actionable insights.',
            actionableInsightsPrompt(emails),
          ),
          temperature: 0.4,
          maxTokens: 800,
        },
        ActionableInsightsSchema,
      );
      return result.insights;
    } catch (err) {
      return this.fallback('actionable_insights', err, [
        {
          type: 'error',
          title: 'Analysis Error',
          description: `Unable to generate insights: ${errorMessage(err)}`,
          impact: 'low',
          action_items: [],
          metrics: { emails_affected: 0, time_saved_minutes: 0 },
        },
      ]);
    }
  }

  async analyzeTrends(summary: Record<string, unknown>): Promise<TrendAnalysis> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(
            'You are an expert data analyst specializing in email communication patterns.',
            trendAnalysisPrompt(summary),
          ),
          temperature: 0.3,
          maxTokens: 600,
        },
        TrendAnalysisSchema,
      );
    } catch (err) {
      return this.fallback('trends', err, {
        key_trends: ['Unable to generate detailed trend analysis'],
        sentiment_trend: 'unknown',
        volume_trend: 'unknown',
        notable_patterns: [],
        recommendations: ['Ensure sufficient analyzed email data'],
        risk_areas: [],
        confidence: 'low',
      });
    }
  }

  /**
   * Picks one label from a caller-supplied list. The answer is returned as-is;
   * the caller decides whether it is one of its labels.
   */
  async classifyCustom(email: AnalyzableEmail, categories: string[]): Promise<string | null> {
    try {
      const raw = await this.deps.chat.complete({
        model: this.deps.models.classifier,
        messages: this.userPrompt(
          'You are an email classifier. Return only the category name.',
          customClassificationPrompt(email, categories),
        ),
        temperature: 0.1,
        maxTokens: 50,
      });
      return raw.trim();
    } catch (err) {
      return this.fallback('custom_classification', err, null);
    }
  }

  async generateInsights(emails: InsightEmail[], periodLabel: string): Promise<PeriodInsights> {
    if (emails.length === 0) {
      return { insights: [], summary: 'No emails to analyze', recommendations: [] };
    }

    const metadata = summarizeForInsights(emails);

    try {
      const insights = await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(
            'You are an email productivity and analytics expert.',
            periodInsightsPrompt(metadata, periodLabel),
          ),
          temperature: 0.3,
          maxTokens: 800,
        },
        PeriodInsightsSchema,
      );
      return { ...insights, metadata };
    } catch (err) {
      return this.fallback('period_insights', err, {
        insights: [],
        summary: 'Insight generation failed',
        recommendations: [],
      });
    }
  }

  async generateExecutiveSummary(
    metrics: Record<string, unknown>,
    periodLabel: string,
  ): Promise<ExecutiveSummary> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(
            'You are an executive email productivity advisor.',
            executiveSummaryPrompt(metrics, periodLabel),
          ),
          temperature: 0.2,
          maxTokens: 600,
        },
        ExecutiveSummarySchema,
      );
    } catch (err) {
      return this.fallback('executive_summary', err, {
        summary: 'Executive summary unavailable',
        key_metrics: {},
        highlights: [],
        concerns: ['Unable to generate summary'],
        recommendations: ['Try again later'],
      });
    }
  }

  async summarizeEmail(email: AnalyzableEmail): Promise<EmailSummary> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(ANALYST_SYSTEM, emailSummaryPrompt(email)),
          temperature: 0.3,
          maxTokens: 300,
        },
        EmailSummarySchema,
      );
    } catch (err) {
      return this.fallback('email_summary', err, {
        summary: truncate(email.bodyText, 200),
        key_points: [],
        action_required: false,
        urgency: 'low' as const,
      });
    }
  }

  async analyzeThread(messages: ThreadMessage[]): Promise<ThreadAnalysis | null> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(ANALYST_SYSTEM, threadAnalysisPrompt(messages)),
          temperature: 0.3,
          maxTokens: 400,
        },
        ThreadAnalysisSchema,
      );
    } catch (err) {
      return this.fallback('thread', err, null);
    }
  }

  async analyzeSenderRelationship(profile: SenderProfileInput): Promise<SenderRelationship | null> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(ANALYST_SYSTEM, senderRelationshipPrompt(profile)),
          temperature: 0.2,
          maxTokens: 200,
        },
        SenderRelationshipSchema,
      );
    } catch (err) {
      return this.fallback('sender_relationship', err, null);
    }
  }

  async detectPatterns(input: PatternInput): Promise<PatternDetection> {
    try {
      return await this.askJson(
        {
          model: this.deps.models.analysis,
          messages: this.userPrompt(ANALYST_SYSTEM, patternDetectionPrompt(input)),
          temperature: 0.3,
          maxTokens: 600,
        },
        PatternDetectionSchema,
      );
    } catch (err) {
      return this.fallback('patterns', err, { patterns: [], confidence: 0 });
    }
  }
}
