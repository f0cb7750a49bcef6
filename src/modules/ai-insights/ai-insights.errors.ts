/**
 * src/modules/ai-insights/ai-insights.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AiInsightErrors = {
  emailNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Email not found', meta);
  },

  batchEmailsNotFound(meta?: AppErrorMeta) {
    return AppError.badRequest("Some emails not found or don't belong to user", meta);
  },

  noAnalyzedEmailsInPeriod(meta?: AppErrorMeta) {
    return AppError.notFound('No analyzed emails found in the specified period', meta);
  },

  noAnalyzedEmailsForTrends(meta?: AppErrorMeta) {
    return AppError.notFound('No analyzed emails found for trend analysis', meta);
  },

  executiveSummaryRequiresPlan(meta?: AppErrorMeta) {
    return AppError.forbidden('Executive summary requires Professional or Enterprise plan', meta);
  },
} as const;
