/**
 * src/modules/ai-insights/ai-insights.presenter.ts
 */

import type { AiInsight } from './ai-insights.types';

export type AiInsightResponse = {
  id: string;
  type: string;
  time_period: string;
  data: Record<string, unknown>;
  confidence_score: number | null;
  generated_at: string;
};

export function toInsightResponse(insight: AiInsight): AiInsightResponse {
  return {
    id: insight.id,
    type: insight.insightType,
    time_period: insight.timePeriod,
    data: insight.data,
    confidence_score: insight.confidenceScore,
    generated_at: insight.generatedAt.toISOString(),
  };
}
