/**
 * src/modules/ai-insights/index.ts
 *
 * Public surface of the AI insights module.
 */

export type { AiInsight, NewAiInsight, SenderProfile, InsightType } from './ai-insights.types';
export type { AiInsightRepo, SenderProfileRepo } from './dal/ai-insight.repo';
export { KyselyAiInsightRepo, KyselySenderProfileRepo } from './dal/ai-insight.repo';
export { AiEngine, type AiEngineModels } from './engine/ai-engine';
export { AiInsightsService } from './ai-insights.service';
export { AiJobsService } from './ai-jobs.service';
export { createAiInsightsModule, type AiInsightsModule } from './ai-insights.module';
