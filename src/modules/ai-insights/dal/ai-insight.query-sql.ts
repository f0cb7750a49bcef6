/**
 * src/modules/ai-insights/dal/ai-insight.query-sql.ts
 */

import type { Selectable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { AiInsightsTable } from '../../../shared/db/schema';

export type AiInsightRow = Selectable<AiInsightsTable>;

export async function selectInsightHistorySql(
  db: DbExecutor,
  userId: string,
  limit: number,
  insightType: string | null,
): Promise<AiInsightRow[]> {
  let q = db.selectFrom('ai_insights').selectAll().where('user_id', '=', userId);
  if (insightType) q = q.where('insight_type', '=', insightType);
  return q.orderBy('generated_at', 'desc').limit(limit).execute();
}
