import { describe, it, expect, vi } from 'vitest';
import type { Email } from '../../src/modules/emails';
import { jobHandlersFrom, runJob, runLoggedJob } from '../../src/jobs/job-runner';
import { logger } from '../../src/shared/logger/logger';
import type { QueueMessage } from '../../src/shared/messaging/queue';
import { buildTestApp, readJson, registerUser, type TestApp } from '../helpers/build-test-app';

/**
 * Scheduled and fan-out jobs, run through the same runJob() dispatch the worker uses.
 *
 * NOW is a Wednesday: yesterday is 2024-05-14 and the last complete week is
 * Monday 2024-05-06 to Sunday 2024-05-12.
 */

const NOW = new Date('2024-05-15T09:00:00.000Z');
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

async function setup() {
  const t = await buildTestApp({ now: () => NOW });
  const run = (message: QueueMessage) => runJob(jobHandlersFrom(t.deps), message);
  return { t, run };
}

function seedEmail(t: TestApp, userId: string, overrides: Partial<Email> = {}): Email {
  return t.repos.emailRepo.seed({
    userId,
    subject: 'Status update',
    senderEmail: 'boss@example.com',
    receivedDate: new Date(NOW.getTime() - 2 * HOUR_MS),
    ...overrides,
  });
}

describe('ai.daily-insights', () => {
  it("stores yesterday's summary for users with mail and queues thread analysis", async () => {
    const { t, run } = await setup();

    try {
      const busy = await registerUser(t, 'busy@example.com');
      await registerUser(t, 'quiet@example.com');
      seedEmail(t, busy.userId, {
        aiCategory: 'work',
        receivedDate: new Date('2024-05-14T10:00:00.000Z'),
      });
      seedEmail(t, busy.userId, { receivedDate: new Date('2024-05-15T08:00:00.000Z') });
      t.chat.onJson('email productivity and analytics expert', {
        insights: [{ type: 'volume', title: 'Light day', description: 'One email.' }],
        summary: 'A quiet day',
        recommendations: ['Keep notifications off'],
      });

      expect(await run({ type: 'ai.daily-insights' })).toBe(1);

      expect(t.repos.insightRepo.rows).toHaveLength(1);
      const stored = t.repos.insightRepo.rows[0];
      expect(stored?.userId).toBe(busy.userId);
      expect(stored?.insightType).toBe('daily_summary');
      expect(stored?.timePeriod).toBe('2024-05-14');
      expect(stored?.data['summary']).toBe('A quiet day');

      expect(t.queue.drain()).toEqual([{ type: 'ai.analyze-threads', userId: busy.userId }]);
    } finally {
      await t.close();
    }
  });

  it('keeps going past a failing user, then fails the run', async () => {
    const { t, run } = await setup();

    try {
      const first = await registerUser(t, 'first@example.com');
      const second = await registerUser(t, 'second@example.com');
      for (const user of [first, second]) {
        seedEmail(t, user.userId, { receivedDate: new Date('2024-05-14T10:00:00.000Z') });
      }
      t.chat.onJson('email productivity and analytics expert', {
        insights: [],
        summary: 'Steady',
        recommendations: [],
      });
      vi.spyOn(t.repos.insightRepo, 'insert').mockRejectedValueOnce(new Error('db down'));

      await expect(run({ type: 'ai.daily-insights' })).rejects.toThrow(
        'ai.daily-insights failed for 1 user(s)',
      );

      expect(t.repos.insightRepo.rows.map((r) => r.userId)).toEqual([second.userId]);
    } finally {
      await t.close();
    }
  });
});

describe('ai.weekly-insights', () => {
  it('stores the last complete week and queues pattern and sender analysis', async () => {
    const { t, run } = await setup();

    try {
      const { userId } = await registerUser(t);
      seedEmail(t, userId, { receivedDate: new Date('2024-05-08T10:00:00.000Z') });

      expect(await run({ type: 'ai.weekly-insights' })).toBe(1);

      const stored = t.repos.insightRepo.rows[0];
      expect(stored?.insightType).toBe('weekly_summary');
      expect(stored?.timePeriod).toBe('2024-05-06/2024-05-12');
      // No scripted answer: the engine's fallback is what gets stored.
      expect(stored?.data['insights']).toEqual([]);

      expect(t.queue.drain()).toEqual([
        { type: 'ai.detect-patterns', userId },
        { type: 'ai.sender-relationships', userId },
      ]);
    } finally {
      await t.close();
    }
  });
});

describe('ai.detect-patterns', () => {
  it('skips users with fewer than ten recent emails', async () => {
    const { t, run } = await setup();

    try {
      const { userId } = await registerUser(t);
      for (let i = 0; i < 9; i += 1) seedEmail(t, userId);

      expect(await run({ type: 'ai.detect-patterns', userId })).toBe(false);
      expect(t.repos.insightRepo.rows).toHaveLength(0);
      expect(t.chat.calls).toHaveLength(0);
    } finally {
      await t.close();
    }
  });

  it('stores the detected patterns for the last 30 days', async () => {
    const { t, run } = await setup();

    try {
      const { userId } = await registerUser(t);
      for (let i = 0; i < 10; i += 1) {
        seedEmail(t, userId, { receivedDate: new Date(NOW.getTime() - i * DAY_MS - HOUR_MS) });
      }
      seedEmail(t, userId, { receivedDate: new Date(NOW.getTime() - 40 * DAY_MS) });
      t.chat.onJson('expert email analyst', {
        patterns: [{ type: 'peak_hours', description: 'Most mail arrives at 08:00.' }],
        confidence: 0.7,
      });

      expect(await run({ type: 'ai.detect-patterns', userId })).toBe(true);

      const stored = t.repos.insightRepo.rows[0];
      expect(stored?.insightType).toBe('email_patterns');
      expect(stored?.timePeriod).toBe('last_30_days');
      expect(stored?.confidenceScore).toBe(0.7);
      expect(stored?.data['patterns']).toEqual([
        { type: 'peak_hours', description: 'Most mail arrives at 08:00.' },
      ]);

      const prompt = t.chat.calls[0]?.messages.find((m) => m.role === 'user')?.content ?? '';
      expect(prompt).toContain('Total emails: 10\n');
    } finally {
      await t.close();
    }
  });
});

describe('ai.sender-relationships', () => {
  it('profiles senders with at least three emails', async () => {
    const { t, run } = await setup();

    try {
      const { userId } = await registerUser(t);
      seedEmail(t, userId, { senderName: 'The Boss', aiSentimentScore: 0.5, isRead: true });
      seedEmail(t, userId, { aiSentimentScore: 0.3 });
      seedEmail(t, userId);
      seedEmail(t, userId, { senderEmail: 'friend@example.com' });
      seedEmail(t, userId, { senderEmail: 'friend@example.com' });
      t.chat.onJson('expert email analyst', {
        relationship_type: 'manager',
        importance_level: 'high',
        suggested_action: 'prioritize',
        confidence: 0.8,
      });

      expect(await run({ type: 'ai.sender-relationships', userId })).toBe(1);

      expect([...t.repos.senderProfileRepo.rows.values()]).toEqual([
        {
          userId,
          senderEmail: 'boss@example.com',
          senderName: 'The Boss',
          totalEmails: 3,
          relationshipType: 'manager',
          importanceLevel: 'high',
          avgSentiment: 0.4,
          suggestedAction: 'prioritize',
          confidenceScore: 0.8,
        },
      ]);
    } finally {
      await t.close();
    }
  });

  it('stores nothing when the model is unavailable', async () => {
    const { t, run } = await setup();

    try {
      const { userId } = await registerUser(t);
      for (let i = 0; i < 3; i += 1) seedEmail(t, userId);

      expect(await run({ type: 'ai.sender-relationships', userId })).toBe(0);
      expect(t.repos.senderProfileRepo.rows.size).toBe(0);
    } finally {
      await t.close();
    }
  });
});

describe('ai.analyze-threads', () => {
  it('analyzes recently updated threads with at least two emails', async () => {
    const { t, run } = await setup();

    try {
      const { userId } = await registerUser(t);

      const input = { userId, providerThreadId: 'thr-1', subject: 'Plan', participants: [] };
      await t.repos.threadRepo.upsertByProviderId(input);
      const thread = await t.repos.threadRepo.upsertByProviderId(input);
      seedEmail(t, userId, { threadId: thread.id, bodyText: 'Can we meet?' });
      seedEmail(t, userId, { threadId: thread.id, bodyText: 'Tuesday works.' });

      const single = await t.repos.threadRepo.upsertByProviderId({
        userId,
        providerThreadId: 'thr-2',
        subject: 'Solo',
        participants: [],
      });

      t.chat.on('expert email analyst', (req) => {
        const prompt = req.messages.find((m) => m.role === 'user')?.content ?? '';
        if (!prompt.includes('Tuesday works.')) throw new Error('unexpected prompt');
        return JSON.stringify({
          response_pattern: 'quick',
          conversation_tone: 'friendly',
          key_topics: ['meeting'],
          summary: 'Scheduling a meeting',
          action_items: ['Send invite'],
        });
      });

      expect(await run({ type: 'ai.analyze-threads', userId })).toBe(1);

      const analyzed = t.repos.threadRepo.rows.get(thread.id);
      expect(analyzed?.responsePattern).toBe('quick');
      expect(analyzed?.conversationTone).toBe('friendly');
      expect(analyzed?.keyTopics).toEqual(['meeting']);
      expect(analyzed?.aiInsights).toEqual({
        summary: 'Scheduling a meeting',
        action_items: ['Send invite'],
      });
      expect(analyzed?.lastAnalyzedAt).toEqual(NOW);
      expect(t.repos.threadRepo.rows.get(single.id)?.lastAnalyzedAt).toBeNull();
    } finally {
      await t.close();
    }
  });
});

describe('email fan-out jobs', () => {
  it('incremental sync queues active users whose last sync is stale', async () => {
    const { t, run } = await setup();

    try {
      const never = await registerUser(t, 'never@example.com');
      const fresh = await registerUser(t, 'fresh@example.com');
      const stale = await registerUser(t, 'stale@example.com');
      const disabled = await registerUser(t, 'disabled@example.com');

      t.repos.userRepo.patch(fresh.userId, { lastEmailSyncAt: new Date(NOW.getTime() - 60_000) });
      t.repos.userRepo.patch(stale.userId, {
        lastEmailSyncAt: new Date(NOW.getTime() - 2 * HOUR_MS),
      });
      t.repos.userRepo.patch(disabled.userId, { emailSyncEnabled: false });

      expect(await run({ type: 'email.incremental-sync' })).toBe(2);
      expect(t.queue.drain()).toEqual([
        { type: 'email.sync-user', userId: never.userId },
        { type: 'email.sync-user', userId: stale.userId },
      ]);
    } finally {
      await t.close();
    }
  });

  it('bulk sync queues one sync per listed user', async () => {
    const { t, run } = await setup();

    try {
      expect(await run({ type: 'email.bulk-sync', userIds: ['u-1', 'u-2'] })).toBe(2);
      expect(t.queue.drain()).toEqual([
        { type: 'email.sync-user', userId: 'u-1' },
        { type: 'email.sync-user', userId: 'u-2' },
      ]);
    } finally {
      await t.close();
    }
  });

  it('update-stats recounts stored emails per account', async () => {
    const { t, run } = await setup();

    try {
      const { userId, headers } = await registerUser(t);
      const res = await t.app.inject({
        method: 'POST',
        url: '/api/v1/emails/accounts',
        headers,
        payload: { provider: 'gmail', email_address: 'me@example.com', access_token: 'test-token' },
      });
      expect(res.statusCode).toBe(201);
      const accountId = readJson<{ account_id: string }>(res).account_id;
      t.queue.drain();

      seedEmail(t, userId, { emailAccountId: accountId });
      seedEmail(t, userId, { emailAccountId: accountId });

      expect(await run({ type: 'email.update-stats', userId })).toEqual({ [accountId]: 2 });
      expect(t.repos.accountRepo.rows.get(accountId)?.totalEmails).toBe(2);
    } finally {
      await t.close();
    }
  });

  it('reprocess-failed re-queues unprocessed emails inside the window, per user', async () => {
    const { t, run } = await setup();

    try {
      const a = await registerUser(t, 'a@example.com');
      const b = await registerUser(t, 'b@example.com');

      const a1 = seedEmail(t, a.userId, { createdAt: new Date(NOW.getTime() - 3 * HOUR_MS) });
      const a2 = seedEmail(t, a.userId, { createdAt: new Date(NOW.getTime() - 2 * HOUR_MS) });
      const b1 = seedEmail(t, b.userId, { createdAt: new Date(NOW.getTime() - HOUR_MS) });
      seedEmail(t, a.userId, { createdAt: new Date(NOW.getTime() - HOUR_MS), isProcessed: true });
      seedEmail(t, b.userId, { createdAt: new Date(NOW.getTime() - 30 * HOUR_MS) });

      expect(await run({ type: 'email.reprocess-failed', hoursBack: 24 })).toBe(3);
      expect(t.queue.drain()).toEqual([
        { type: 'ai.process-emails', userId: a.userId, emailIds: [a1.id, a2.id] },
        { type: 'ai.process-emails', userId: b.userId, emailIds: [b1.id] },
      ]);

      expect(
        await run({ type: 'email.reprocess-failed', userId: b.userId, hoursBack: 48 }),
      ).toBe(2);
    } finally {
      await t.close();
    }
  });
});

describe('billing.reset-monthly-usage', () => {
  it('zeroes the API-call counters that were used', async () => {
    const { t, run } = await setup();

    try {
      const used = await registerUser(t, 'used@example.com');
      const idle = await registerUser(t, 'idle@example.com');
      t.repos.userRepo.patch(used.userId, { apiCallsThisMonth: 42 });

      expect(await run({ type: 'billing.reset-monthly-usage' })).toBe(1);
      expect((await t.repos.userRepo.findById(used.userId))?.apiCallsThisMonth).toBe(0);
      expect((await t.repos.userRepo.findById(idle.userId))?.apiCallsThisMonth).toBe(0);
    } finally {
      await t.close();
    }
  });
});

describe('job logging', () => {
  const message: QueueMessage = { type: 'billing.reset-monthly-usage' };
  const meta = { flow: 'billing.reset-monthly-usage', jobId: 'job-1', attempt: 2 };

  it('logs start and done with the job result', async () => {
    const { t } = await setup();
    const info = vi.spyOn(logger, 'info');

    try {
      const result = await runLoggedJob(
        jobHandlersFrom(t.deps),
        { jobId: 'job-1', attempt: 2, message },
        logger,
      );

      expect(result).toBe(0);
      expect(info).toHaveBeenCalledWith('job.billing.reset-monthly-usage.start', meta);
      expect(info).toHaveBeenCalledWith(
        'job.billing.reset-monthly-usage.done',
        expect.objectContaining({ ...meta, result: 0 }),
      );
    } finally {
      info.mockRestore();
      await t.close();
    }
  });

  it('logs failed and rethrows', async () => {
    const { t } = await setup();
    const error = vi.spyOn(logger, 'error');
    const boom = new Error('redis unavailable');
    vi.spyOn(t.deps.subscriptions.subscriptionService, 'resetMonthlyUsage').mockRejectedValueOnce(
      boom,
    );

    try {
      await expect(
        runLoggedJob(jobHandlersFrom(t.deps), { jobId: 'job-1', attempt: 2, message }, logger),
      ).rejects.toBe(boom);

      expect(error).toHaveBeenCalledWith(
        'job.billing.reset-monthly-usage.failed',
        expect.objectContaining({ ...meta, err: boom }),
      );
    } finally {
      error.mockRestore();
      await t.close();
    }
  });
});
