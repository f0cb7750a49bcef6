/**
 * src/jobs/job-runner.ts
 *
 * WHY:
 * - One dispatch point from a queue message to the service method that handles it.
 * - Used by the BullMQ worker and by tests (InMemQueue.drain + runJob), so both run
 *   exactly the same code path.
 *
 * RULES:
 * - The switch is exhaustive over QueueMessage: adding a message type without a
 *   handler is a compile error.
 * - Handlers throw to request a retry; the transport decides whether one is left.
 */

import type { Logger } from '../shared/logger/logger';
import type { QueueMessage } from '../shared/messaging/queue';
import type { AiJobsService } from '../modules/ai-insights';
import type { EmailSyncService } from '../modules/emails';
import type { SubscriptionService } from '../modules/subscriptions';

export type JobHandlers = {
  emailSyncService: EmailSyncService;
  aiJobsService: AiJobsService;
  subscriptionService: SubscriptionService;
};

export type JobResult =
  | number
  | boolean
  | string[]
  | Record<string, number>
  | { [key: string]: number | string | null };

function assertNever(value: never): never {
  throw new Error(`Unhandled job type: ${JSON.stringify(value)}`);
}

export async function runJob(handlers: JobHandlers, message: QueueMessage): Promise<JobResult> {
  const { emailSyncService, aiJobsService, subscriptionService } = handlers;

  switch (message.type) {
    case 'email.sync-user':
      return emailSyncService.syncUser(message);
    case 'email.process-batch':
      return emailSyncService.processBatch(message);
    case 'email.incremental-sync':
      return emailSyncService.incrementalSync();
    case 'email.bulk-sync':
      return emailSyncService.bulkSync(message);
    case 'email.update-stats':
      return emailSyncService.updateStats(message);
    case 'email.reprocess-failed':
      return emailSyncService.reprocessFailed(message);

    case 'ai.process-emails':
      return aiJobsService.processEmails(message);
    case 'ai.analyze-batch':
      return aiJobsService.analyzeBatch(message);
    case 'ai.analyze-threads':
      return aiJobsService.analyzeThreads(message);
    case 'ai.daily-insights':
      return aiJobsService.dailyInsights();
    case 'ai.weekly-insights':
      return aiJobsService.weeklyInsights();
    case 'ai.detect-patterns':
      return aiJobsService.detectPatterns(message);
    case 'ai.sender-relationships':
      return aiJobsService.senderRelationships(message);

    case 'billing.reset-monthly-usage':
      return subscriptionService.resetMonthlyUsage();

    default:
      return assertNever(message);
  }
}

export type JobRun = {
  jobId: string | undefined;
  /** 1-based attempt number. */
  attempt: number;
  message: QueueMessage;
};

/**
 * runJob plus the worker's log lines: `job.<type>.start`, then `job.<type>.done` or
 * `job.<type>.failed`. Errors are rethrown so the transport can retry.
 */
export async function runLoggedJob(
  handlers: JobHandlers,
  run: JobRun,
  logger: Logger,
): Promise<JobResult> {
  const { type } = run.message;
  const meta = { flow: type, jobId: run.jobId, attempt: run.attempt };
  const startedAt = Date.now();

  logger.info(`job.${type}.start`, meta);
  try {
    const result = await runJob(handlers, run.message);
    logger.info(`job.${type}.done`, { ...meta, durationMs: Date.now() - startedAt, result });
    return result;
  } catch (err) {
    logger.error(`job.${type}.failed`, { ...meta, durationMs: Date.now() - startedAt, err });
    throw err;
  }
}

export function jobHandlersFrom(deps: {
  emails: { emailSyncService: EmailSyncService };
  ai: { aiJobsService: AiJobsService };
  subscriptions: { subscriptionService: SubscriptionService };
}): JobHandlers {
  return {
    emailSyncService: deps.emails.emailSyncService,
    aiJobsService: deps.ai.aiJobsService,
    subscriptionService: deps.subscriptions.subscriptionService,
  };
}
