/**
 * src/shared/messaging/bullmq-queue.ts
 *
 * WHY:
 * - Production transport for background jobs: BullMQ over Redis.
 * - One queue for every job type; the job name is the message `type`, the data is the
 *   message itself, so the worker can dispatch on the same discriminated union.
 *
 * RETRIES:
 * - attempts + exponential backoff come from retry-policy.ts (per job type).
 *   BullMQ's exponential backoff waits delay * 2^(attemptsMade - 1).
 *
 * SCHEDULES:
 * - schedule() upserts a job scheduler (idempotent by id), so restarting the worker
 *   never duplicates repeatable jobs.
 */

import { Queue as BullQueue, type JobsOptions } from 'bullmq';
import IORedis from 'ioredis';

import type { Queue, QueueMessage, QueueMessageType } from './queue';
import { retryPolicyFor } from './retry-policy';
import { logger } from '../logger/logger';

export const JOB_QUEUE_NAME = 'emailmind-jobs';

const RETENTION = {
  removeOnComplete: { count: 500, age: 24 * 3600 },
  removeOnFail: { count: 1000, age: 7 * 24 * 3600 },
} satisfies JobsOptions;

export function jobOptionsFor(type: QueueMessageType): JobsOptions {
  const policy = retryPolicyFor(type);

  if (policy.attempts <= 1) {
    return { ...RETENTION, attempts: 1 };
  }

  return {
    ...RETENTION,
    attempts: policy.attempts,
    backoff: { type: 'exponential', delay: policy.baseDelaySeconds * 1000 },
  };
}

/**
 * BullMQ requires `maxRetriesPerRequest: null` on connections used by workers.
 */
export function createRedisConnection(redisUrl: string): IORedis {
  const connection = new IORedis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });

  connection.on('error', (err: Error) => {
    logger.error('queue.redis_error', { flow: 'queue', message: err.message });
  });

  return connection;
}

export class BullMqQueue implements Queue {
  private readonly queue: BullQueue<QueueMessage>;

  constructor(connection: IORedis) {
    this.queue = new BullQueue<QueueMessage>(JOB_QUEUE_NAME, { connection });
  }

  async enqueue(message: QueueMessage): Promise<void> {
    const job = await this.queue.add(message.type, message, jobOptionsFor(message.type));

    logger.debug('queue.enqueued', { flow: 'queue', jobId: job.id, type: message.type });
  }

  async schedule(schedulerId: string, cronPattern: string, message: QueueMessage): Promise<void> {
    await this.queue.upsertJobScheduler(
      schedulerId,
      { pattern: cronPattern, tz: 'UTC' },
      { name: message.type, data: message, opts: RETENTION },
    );

    logger.info('queue.schedule_upserted', {
      flow: 'queue',
      schedulerId,
      cronPattern,
      type: message.type,
    });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}
