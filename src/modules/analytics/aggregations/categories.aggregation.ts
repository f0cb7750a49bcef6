/**
 * src/modules/analytics/aggregations/categories.aggregation.ts
 *
 * Category mix of the current window compared with the preceding window of equal length.
 */

import type { EmailFacts } from '../../emails';
import { mean, round2 } from './buckets';

export type CategoryTrend = {
  category: string;
  email_count: number;
  percentage: number;
  trend_percentage: number;
  avg_sentiment: number | null;
  unread_count: number;
};

export type CategoryTrends = {
  categories: CategoryTrend[];
  total_emails: number;
  date_range_days: number;
};

const UNCATEGORIZED = 'uncategorized';

function categoryOf(e: EmailFacts): string {
  return e.aiCategory ?? UNCATEGORIZED;
}

export function buildCategoryTrends(input: {
  current: readonly EmailFacts[];
  previous: readonly EmailFacts[];
  days: number;
}): CategoryTrends {
  const previousCounts = new Map<string, number>();
  for (const e of input.previous) {
    const c = categoryOf(e);
    previousCounts.set(c, (previousCounts.get(c) ?? 0) + 1);
  }

  const groups = new Map<string, EmailFacts[]>();
  for (const e of input.current) {
    const c = categoryOf(e);
    const list = groups.get(c) ?? [];
    list.push(e);
    groups.set(c, list);
  }

  const total = input.current.length;

  const categories = [...groups.entries()]
    .map(([category, emails]): CategoryTrend => {
      const count = emails.length;
      const prev = previousCounts.get(category) ?? 0;
      const avgSentiment = mean(
        emails.flatMap((e) => (e.aiSentimentScore === null ? [] : [e.aiSentimentScore])),
      );

      return {
        category,
        email_count: count,
        percentage: total > 0 ? round2((count / total) * 100) : 0,
        trend_percentage: prev > 0 ? round2(((count - prev) / prev) * 100) : 0,
        avg_sentiment: avgSentiment === null ? null : round2(avgSentiment),
        unread_count: emails.filter((e) => !e.isRead).length,
      };
    })
    .sort((a, b) => b.email_count - a.email_count || a.category.localeCompare(b.category));

  return { categories, total_emails: total, date_range_days: input.days };
}
