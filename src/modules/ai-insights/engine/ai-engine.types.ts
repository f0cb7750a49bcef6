/**
 * src/modules/ai-insights/engine/ai-engine.types.ts
 *
 * Result shapes of the AI engine. They are the JSON contract with the model and are
 * stored as-is in jsonb (ai_insights.data, email_threads.ai_insights), hence snake_case.
 */

import { z } from 'zod';

const score = (min: number, max: number) =>
  z.coerce.number().transform((n) => Math.min(max, Math.max(min, n)));

const stringList = z.array(z.string()).catch([]);

export const EMAIL_CATEGORIES = [
  'work',
  'personal',
  'promotional',
  'notification',
  'spam',
  'newsletter',
] as const;

export const EmailClassificationSchema = z.object({
  category: z.string().min(1),
  confidence: score(0, 1),
});
export type EmailClassification = z.infer<typeof EmailClassificationSchema>;

export const SentimentSchema = z.object({
  sentiment: z.enum(['positive', 'negative', 'neutral']),
  score: score(-1, 1),
  confidence: score(0, 1),
});
export type SentimentResult = z.infer<typeof SentimentSchema>;

export const EmailContentAnalysisSchema = z.object({
  category: z.string().min(1),
  priority: z.string().min(1),
  sentiment: z.string().min(1),
  sentiment_score: score(-1, 1),
  key_topics: stringList,
  requires_action: z.boolean().catch(false),
  action_type: z.string().catch('none'),
  urgency_indicators: stringList,
  summary: z.string(),
  confidence_score: score(0, 1),
});
export type EmailContentAnalysis = z.infer<typeof EmailContentAnalysisSchema> & {
  error?: string;
};

export const ActionableInsightSchema = z.object({
  type: z.string(),
  title: z.string(),
  description: z.string(),
  impact: z.string().catch('medium'),
  action_items: stringList,
  metrics: z
    .object({
      emails_affected: z.coerce.number().catch(0),
      time_saved_minutes: z.coerce.number().catch(0),
    })
    .catch({ emails_affected: 0, time_saved_minutes: 0 }),
});
export type ActionableInsight = z.infer<typeof ActionableInsightSchema>;

export const ActionableInsightsSchema = z.object({
  insights: z.array(ActionableInsightSchema),
});

export const TrendAnalysisSchema = z.object({
  key_trends: stringList,
  sentiment_trend: z.string().catch('stable'),
  volume_trend: z.string().catch('stable'),
  notable_patterns: stringList,
  recommendations: stringList,
  risk_areas: stringList,
  confidence: z.string().catch('medium'),
});
export type TrendAnalysis = z.infer<typeof TrendAnalysisSchema>;

export const PeriodInsightsSchema = z.object({
  insights: z
    .array(
      z.object({
        type: z.string(),
        title: z.string(),
        description: z.string(),
        action: z.string().optional(),
      }),
    )
    .catch([]),
  summary: z.string(),
  recommendations: stringList,
});
export type PeriodInsights = z.infer<typeof PeriodInsightsSchema> & {
  metadata?: PeriodEmailSummary;
};

export type PeriodEmailSummary = {
  total_emails: number;
  categories: Record<string, number>;
  sentiments: Record<'positive' | 'neutral' | 'negative', number>;
  top_senders: Record<string, number>;
};

export const ExecutiveSummarySchema = z.object({
  summary: z.string(),
  key_metrics: z.record(z.unknown()).catch({}),
  highlights: stringList,
  concerns: stringList,
  recommendations: stringList,
});
export type ExecutiveSummary = z.infer<typeof ExecutiveSummarySchema>;

export const EmailSummarySchema = z.object({
  summary: z.string(),
  key_points: stringList,
  action_required: z.boolean().catch(false),
  urgency: z.enum(['low', 'medium', 'high']).catch('low'),
});
export type EmailSummary = z.infer<typeof EmailSummarySchema>;

export const ThreadAnalysisSchema = z.object({
  response_pattern: z.string(),
  conversation_tone: z.string(),
  key_topics: stringList,
  summary: z.string().catch(''),
  action_items: stringList,
});
export type ThreadAnalysis = z.infer<typeof ThreadAnalysisSchema>;

export const SenderRelationshipSchema = z.object({
  relationship_type: z.string(),
  importance_level: z.string(),
  suggested_action: z.string(),
  confidence: score(0, 1),
});
export type SenderRelationship = z.infer<typeof SenderRelationshipSchema>;

export const PatternDetectionSchema = z.object({
  patterns: z
    .array(
      z.object({
        type: z.string(),
        description: z.string(),
        recommendation: z.string().optional(),
      }),
    )
    .catch([]),
  confidence: score(0, 1),
});
export type PatternDetection = z.infer<typeof PatternDetectionSchema>;

/** What the engine needs from an email. Email domain objects satisfy it structurally. */
export type AnalyzableEmail = {
  subject: string | null;
  bodyText: string | null;
  senderEmail: string | null;
  hasAttachments: boolean;
};

/** Per-email facts fed to period summaries. */
export type InsightEmail = {
  category: string | null;
  sentiment: string | null;
  senderEmail: string | null;
};

/** Per-email facts fed to actionable insights. */
export type ActionableEmailFacts = {
  category: string | null;
  priority: string | null;
  requiresAction: boolean;
};

export type ThreadMessage = {
  senderEmail: string | null;
  subject: string | null;
  bodyText: string | null;
  receivedDate: Date | null;
};

export type SenderProfileInput = {
  senderEmail: string;
  senderName: string | null;
  totalEmails: number;
  readRate: number;
  avgSentiment: number | null;
  categories: Record<string, number>;
};

export type PatternInput = {
  totalEmails: number;
  hourlyDistribution: Record<number, number>;
  weekdayDistribution: Record<string, number>;
  categories: Record<string, number>;
  topSenders: Record<string, number>;
};
