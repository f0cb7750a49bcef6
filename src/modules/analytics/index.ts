/**
 * src/modules/analytics/index.ts
 *
 * Public surface of the analytics module.
 */

export { AnalyticsService } from './analytics.service';
export { createAnalyticsModule, type AnalyticsModule } from './analytics.module';
export { isImportant } from './aggregations/overview.aggregation';
