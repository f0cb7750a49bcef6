/**
 * src/shared/messaging/retry-policy.ts
 *
 * WHY:
 * - Background jobs that talk to providers (mail servers, LLM) fail transiently.
 * - Retry budget + exponential backoff is declared per job type, in one place.
 *
 * RULES:
 * - `attempts` counts the first run: 3 retries = 4 attempts.
 * - Delay before retry n (n = 1, 2, ...) is baseDelaySeconds * 2^(n-1).
 * - Job types not listed run once.
 */

import type { QueueMessageType } from './queue';

export type RetryPolicy = {
  attempts: number;
  baseDelaySeconds: number;
};

const NO_RETRY: RetryPolicy = { attempts: 1, baseDelaySeconds: 0 };

export const JOB_RETRY_POLICIES: Partial<Record<QueueMessageType, RetryPolicy>> = {
  'email.sync-user': { attempts: 4, baseDelaySeconds: 60 },
  'email.process-batch': { attempts: 3, baseDelaySeconds: 30 },
  'ai.process-emails': { attempts: 4, baseDelaySeconds: 60 },
  'ai.analyze-batch': { attempts: 3, baseDelaySeconds: 60 },
};

export function retryPolicyFor(type: QueueMessageType): RetryPolicy {
  return JOB_RETRY_POLICIES[type] ?? NO_RETRY;
}

/** Seconds to wait before retry number `retry` (1-based). */
export function retryDelaySeconds(policy: RetryPolicy, retry: number): number {
  if (retry < 1) return 0;
  return policy.baseDelaySeconds * 2 ** (retry - 1);
}
