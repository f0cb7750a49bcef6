/**
 * src/modules/analytics/analytics.schemas.ts
 */

import { z } from 'zod';

const days = z.coerce.number().int().min(1).max(365).default(30);

export const windowQuerySchema = z.object({ days });

export const sendersQuerySchema = z.object({
  days,
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const timeSeriesQuerySchema = z.object({
  days,
  granularity: z.enum(['hour', 'day', 'week']).default('day'),
});

export const volumeQuerySchema = z.object({
  days,
  period: z.enum(['daily', 'weekly', 'monthly']).default('daily'),
});
