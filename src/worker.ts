/**
 * src/worker.ts
 *
 * WHY:
 * - Entrypoint for background processing (sync, AI analysis, insights, billing resets).
 * - Shares the dependency graph with the API (buildDeps), so services behave the same
 *   whether a request or a job calls them.
 *
 * RULES:
 * - Recurring schedules are upserted on start (idempotent by id).
 * - Every job logs job.<type>.start and job.<type>.done or job.<type>.failed.
 * - SIGINT/SIGTERM: stop taking jobs, let running ones finish, then close infra.
 */

import { Worker, type Job } from 'bullmq';

import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { logger } from './shared/logger/logger';
import {
  BullMqQueue,
  JOB_QUEUE_NAME,
  createRedisConnection,
} from './shared/messaging/bullmq-queue';
import type { QueueMessage } from './shared/messaging/queue';
import { jobHandlersFrom, runLoggedJob } from './jobs/job-runner';
import { JOB_SCHEDULES } from './jobs/schedules';

async function main(): Promise<void> {
  const config = buildConfig();
  const deps = await buildDeps(config);
  const handlers = jobHandlersFrom(deps);

  const connection = createRedisConnection(config.redisUrl);
  const scheduler = new BullMqQueue(connection);

  for (const schedule of JOB_SCHEDULES) {
    await scheduler.schedule(schedule.id, schedule.cron, schedule.message);
  }

  const worker = new Worker<QueueMessage>(
    JOB_QUEUE_NAME,
    (job: Job<QueueMessage>) =>
      runLoggedJob(
        handlers,
        { jobId: job.id, attempt: job.attemptsMade + 1, message: job.data },
        logger,
      ),
    { connection, concurrency: config.worker.concurrency },
  );

  worker.on('error', (err) => {
    logger.error('worker.error', { err });
  });

  logger.info('worker.started', {
    queue: JOB_QUEUE_NAME,
    concurrency: config.worker.concurrency,
    schedules: JOB_SCHEDULES.length,
  });

  const shutdown = async (signal: string) => {
    logger.info('worker.shutdown', { signal });
    await worker.close();
    await scheduler.close();
    await connection.quit();
    await deps.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('worker.fatal_startup_error', { err });
  process.exit(1);
});
