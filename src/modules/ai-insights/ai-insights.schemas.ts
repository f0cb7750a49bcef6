/**
 * src/modules/ai-insights/ai-insights.schemas.ts
 */

import { z } from 'zod';

import { INSIGHT_TYPES } from './ai-insights.types';

export const analyzeSingleSchema = z.object({
  email_id: z.string().uuid(),
});

export const analyzeBatchSchema = z.object({
  email_ids: z.array(z.string().uuid()).min(1).max(100),
});

export const insightsSummaryQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(30).default(7),
});

export const classifySchema = z.object({
  email_ids: z.array(z.string().uuid()).min(1).max(200).optional(),
  categories: z.array(z.string().trim().min(1).max(50)).min(1).max(20),
  days: z.coerce.number().int().min(1).max(30).default(7),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export type ClassifyInput = z.infer<typeof classifySchema>;

export const sentimentQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(30),
  sender_filter: z.string().trim().min(1).max(255).optional(),
});

export const trendsQuerySchema = z.object({
  days: z.coerce.number().int().min(7).max(90).default(30),
});

export const executiveSummarySchema = z.object({
  days: z.coerce.number().int().min(7).max(90).default(30),
});

export const generateInsightsSchema = z.object({
  time_period: z.enum(['daily', 'weekly', 'monthly']).default('weekly'),
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
  insight_type: z.enum(INSIGHT_TYPES).optional(),
});

export const emailParamsSchema = z.object({
  id: z.string().uuid(),
});
