/**
 * src/modules/analytics/aggregations/overview.aggregation.ts
 */

import type { EmailFacts } from '../../emails';
import { countBy, mean, round2 } from './buckets';

export type AnalyticsOverview = {
  total_emails: number;
  unread_emails: number;
  important_emails: number;
  avg_response_time_hours: number;
  top_categories: Array<{ category: string; count: number }>;
  date_range_days: number;
};

export function isImportant(e: Pick<EmailFacts, 'priority' | 'isFlagged' | 'importance'>): boolean {
  return e.priority === 'high' || e.isFlagged || e.importance === 'high';
}

export function buildOverview(emails: readonly EmailFacts[], days: number): AnalyticsOverview {
  const responseMinutes = emails.flatMap((e) =>
    e.responseTimeMinutes === null ? [] : [e.responseTimeMinutes],
  );
  const avgMinutes = mean(responseMinutes);

  const categorized = emails.filter((e) => e.aiCategory !== null);
  const topCategories = [...countBy(categorized, (e) => e.aiCategory ?? '').entries()]
    .map(([category, count]) => ({ category, count }))
    .sort((a, b) => b.count - a.count || a.category.localeCompare(b.category))
    .slice(0, 5);

  return {
    total_emails: emails.length,
    unread_emails: emails.filter((e) => !e.isRead).length,
    important_emails: emails.filter(isImportant).length,
    avg_response_time_hours: avgMinutes === null ? 0 : round2(avgMinutes / 60),
    top_categories: topCategories,
    date_range_days: days,
  };
}
