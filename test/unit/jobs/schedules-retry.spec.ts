import { describe, it, expect } from 'vitest';
import { JOB_SCHEDULES } from '../../../src/jobs/schedules';
import { retryDelaySeconds, retryPolicyFor } from '../../../src/shared/messaging/retry-policy';

describe('retry policy', () => {
  it('retries provider-facing jobs and runs the rest once', () => {
    expect(retryPolicyFor('email.sync-user')).toEqual({ attempts: 4, baseDelaySeconds: 60 });
    expect(retryPolicyFor('ai.analyze-batch')).toEqual({ attempts: 3, baseDelaySeconds: 60 });
    expect(retryPolicyFor('billing.reset-monthly-usage')).toEqual({
      attempts: 1,
      baseDelaySeconds: 0,
    });
  });

  it('runs the per-user insight sweeps once', () => {
    const once = { attempts: 1, baseDelaySeconds: 0 };

    expect(retryPolicyFor('ai.daily-insights')).toEqual(once);
    expect(retryPolicyFor('ai.weekly-insights')).toEqual(once);
  });

  it('doubles the delay on each retry', () => {
    const policy = retryPolicyFor('email.sync-user');

    expect(retryDelaySeconds(policy, 1)).toBe(60);
    expect(retryDelaySeconds(policy, 2)).toBe(120);
    expect(retryDelaySeconds(policy, 3)).toBe(240);
    expect(retryDelaySeconds(policy, 0)).toBe(0);
  });
});

describe('job schedules', () => {
  it('has unique ids', () => {
    const ids = JOB_SCHEDULES.map((s) => s.id);
    expect(new Set(ids).size).toBe(ids.length);
  });

  it('runs the recurring jobs on their UTC cadence', () => {
    const byType = new Map(JOB_SCHEDULES.map((s) => [s.message.type, s.cron]));

    expect(byType.get('email.incremental-sync')).toBe('0 * * * *');
    expect(byType.get('ai.daily-insights')).toBe('0 6 * * *');
    expect(byType.get('ai.weekly-insights')).toBe('0 7 * * 1');
    expect(byType.get('billing.reset-monthly-usage')).toBe('0 0 1 * *');
  });
});
