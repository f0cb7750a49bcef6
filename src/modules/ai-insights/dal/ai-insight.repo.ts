/**
 * src/modules/ai-insights/dal/ai-insight.repo.ts
 *
 * WHY:
 * - Stored AI results: period insights (ai_insights) and per-sender profiles (sender_analytics).
 *
 * RULES:
 * - sender_analytics is keyed by (user_id, sender_email): re-analysis overwrites.
 * - No AppError. No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { toJson } from '../../../shared/db/db';
import type { AiInsight, NewAiInsight, SenderProfile } from '../ai-insights.types';
import { selectInsightHistorySql, type AiInsightRow } from './ai-insight.query-sql';

export interface AiInsightRepo {
  insert(input: NewAiInsight): Promise<AiInsight>;
  listHistory(userId: string, limit: number, insightType: string | null): Promise<AiInsight[]>;
}

export interface SenderProfileRepo {
  upsert(profile: SenderProfile): Promise<void>;
}

function toAiInsight(row: AiInsightRow): AiInsight {
  return {
    id: row.id,
    userId: row.user_id,
    insightType: row.insight_type,
    timePeriod: row.time_period,
    data: row.data,
    confidenceScore: row.confidence_score,
    generatedAt: row.generated_at,
  };
}

export class KyselyAiInsightRepo implements AiInsightRepo {
  constructor(private readonly db: DbExecutor) {}

  async insert(input: NewAiInsight): Promise<AiInsight> {
    const row = await this.db
      .insertInto('ai_insights')
      .values({
        user_id: input.userId,
        insight_type: input.insightType,
        time_period: input.timePeriod,
        data: toJson(input.data),
        confidence_score: input.confidenceScore,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toAiInsight(row);
  }

  async listHistory(
    userId: string,
    limit: number,
    insightType: string | null,
  ): Promise<AiInsight[]> {
    const rows = await selectInsightHistorySql(this.db, userId, limit, insightType);
    return rows.map(toAiInsight);
  }
}

export class KyselySenderProfileRepo implements SenderProfileRepo {
  constructor(private readonly db: DbExecutor) {}

  async upsert(profile: SenderProfile): Promise<void> {
    const updatable = {
      sender_name: profile.senderName,
      total_emails: profile.totalEmails,
      relationship_type: profile.relationshipType,
      importance_level: profile.importanceLevel,
      avg_sentiment: profile.avgSentiment,
      suggested_action: profile.suggestedAction,
      confidence_score: profile.confidenceScore,
    };

    await this.db
      .insertInto('sender_analytics')
      .values({ user_id: profile.userId, sender_email: profile.senderEmail, ...updatable })
      .onConflict((oc) =>
        oc.columns(['user_id', 'sender_email']).doUpdateSet({ ...updatable, analyzed_at: new Date() }),
      )
      .execute();
  }
}
