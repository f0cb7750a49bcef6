/**
 * src/modules/ai-insights/ai-insights.types.ts
 */

export const INSIGHT_TYPES = [
  'daily_summary',
  'weekly_summary',
  'email_patterns',
  'executive_summary',
  'trend_prediction',
  'custom',
] as const;

export type InsightType = (typeof INSIGHT_TYPES)[number];

export type AiInsight = {
  id: string;
  userId: string;
  insightType: string;
  timePeriod: string;
  data: Record<string, unknown>;
  confidenceScore: number | null;
  generatedAt: Date;
};

export type NewAiInsight = {
  userId: string;
  insightType: InsightType;
  timePeriod: string;
  data: Record<string, unknown>;
  confidenceScore: number | null;
};

export type SenderProfile = {
  userId: string;
  senderEmail: string;
  senderName: string | null;
  totalEmails: number;
  relationshipType: string | null;
  importanceLevel: string | null;
  avgSentiment: number | null;
  suggestedAction: string | null;
  confidenceScore: number | null;
};
