/**
 * src/modules/ai-insights/policies/period-metrics.policy.ts
 *
 * Aggregates handed to the model (executive summary, trend analysis) and returned
 * alongside its answer. Dates are bucketed in UTC.
 */

import { isImportant } from '../../analytics';
import type { EmailFacts } from '../../emails';

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/** Mean of the non-null scores, 2 dp; 0 when there are none. */
export function averageSentiment(scores: ReadonlyArray<number | null>): number {
  const present = scores.filter((s): s is number => s !== null);
  if (present.length === 0) return 0;
  return round2(present.reduce((a, b) => a + b, 0) / present.length);
}

export function categoryDistribution(
  emails: ReadonlyArray<Pick<EmailFacts, 'aiCategory'>>,
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const e of emails) increment(counts, e.aiCategory ?? 'uncategorized');
  return counts;
}

export function sentimentDistribution(
  emails: ReadonlyArray<Pick<EmailFacts, 'aiSentiment'>>,
): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const e of emails) increment(counts, e.aiSentiment ?? 'neutral');
  return counts;
}

export type PeriodMetrics = {
  total_emails: number;
  unread_emails: number;
  important_emails: number;
  emails_requiring_action: number;
  average_sentiment_score: number;
  category_distribution: Record<string, number>;
  top_senders: Array<{ sender: string; count: number }>;
};

export function periodMetrics(emails: readonly EmailFacts[]): PeriodMetrics {
  const senders: Record<string, number> = {};
  for (const e of emails) {
    if (e.senderEmail) increment(senders, e.senderEmail);
  }

  return {
    total_emails: emails.length,
    unread_emails: emails.filter((e) => !e.isRead).length,
    important_emails: emails.filter(isImportant).length,
    emails_requiring_action: emails.filter((e) => e.aiActionRequired === true).length,
    average_sentiment_score: averageSentiment(emails.map((e) => e.aiSentimentScore)),
    category_distribution: categoryDistribution(emails),
    top_senders: Object.entries(senders)
      .map(([sender, count]) => ({ sender, count }))
      .sort((a, b) => b.count - a.count || a.sender.localeCompare(b.sender))
      .slice(0, 5),
  };
}

export type DailyAggregate = {
  date: string;
  total_emails: number;
  average_sentiment_score: number;
  categories: Record<string, number>;
  sentiments: Record<string, number>;
};

/** One entry per UTC day that has emails, ascending. */
export function dailyAggregates(
  emails: ReadonlyArray<
    Pick<EmailFacts, 'receivedDate' | 'aiCategory' | 'aiSentiment' | 'aiSentimentScore'>
  >,
): DailyAggregate[] {
  const byDay = new Map<string, Array<(typeof emails)[number]>>();
  for (const e of emails) {
    if (!e.receivedDate) continue;
    const day = e.receivedDate.toISOString().slice(0, 10);
    const list = byDay.get(day) ?? [];
    list.push(e);
    byDay.set(day, list);
  }

  return [...byDay.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, dayEmails]) => ({
      date,
      total_emails: dayEmails.length,
      average_sentiment_score: averageSentiment(dayEmails.map((e) => e.aiSentimentScore)),
      categories: categoryDistribution(dayEmails),
      sentiments: sentimentDistribution(dayEmails),
    }));
}
