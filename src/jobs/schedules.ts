/**
 * src/jobs/schedules.ts
 *
 * Recurring jobs. Cron patterns are evaluated in UTC (see BullMqQueue.schedule).
 */

import type { QueueMessage } from '../shared/messaging/queue';

export type JobSchedule = {
  id: string;
  cron: string;
  message: QueueMessage;
};

export const JOB_SCHEDULES: readonly JobSchedule[] = [
  {
    id: 'email-incremental-sync',
    cron: '0 * * * *',
    message: { type: 'email.incremental-sync' },
  },
  {
    id: 'email-reprocess-failed',
    cron: '0 3 * * *',
    message: { type: 'email.reprocess-failed', hoursBack: 24 },
  },
  {
    id: 'ai-daily-insights',
    cron: '0 6 * * *',
    message: { type: 'ai.daily-insights' },
  },
  {
    id: 'ai-weekly-insights',
    cron: '0 7 * * 1',
    message: { type: 'ai.weekly-insights' },
  },
  {
    id: 'billing-reset-monthly-usage',
    cron: '0 0 1 * *',
    message: { type: 'billing.reset-monthly-usage' },
  },
];
