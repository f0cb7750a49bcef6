/**
 * src/modules/analytics/aggregations/productivity.aggregation.ts
 */

import type { EmailFacts } from '../../emails';
import { DAY_NAMES, type DayName, maxOf, mean, median, minOf, round2 } from './buckets';

export type ResponseTimeStats = {
  avg_response_hours: number;
  median_response_hours: number;
  min_response_minutes: number;
  max_response_hours: number;
  total_responded_emails: number;
};

export type ProductivityPatterns = {
  hourly_distribution: Array<{ hour: number; count: number }>;
  weekly_distribution: Array<{ day: DayName; count: number }>;
  peak_hour: number | null;
  peak_day: DayName | null;
};

export type ProductivityReport = {
  response_times: ResponseTimeStats;
  patterns: ProductivityPatterns;
};

function responseTimeStats(emails: readonly EmailFacts[]): ResponseTimeStats {
  const minutes = emails.flatMap((e) =>
    e.responseTimeMinutes === null ? [] : [e.responseTimeMinutes],
  );
  if (minutes.length === 0) {
    return {
      avg_response_hours: 0,
      median_response_hours: 0,
      min_response_minutes: 0,
      max_response_hours: 0,
      total_responded_emails: 0,
    };
  }

  return {
    avg_response_hours: round2((mean(minutes) ?? 0) / 60),
    median_response_hours: round2((median(minutes) ?? 0) / 60),
    min_response_minutes: minOf(minutes) ?? 0,
    max_response_hours: round2((maxOf(minutes) ?? 0) / 60),
    total_responded_emails: minutes.length,
  };
}

/** First entry with the highest count; null for an empty list. */
function peakOf<K>(entries: ReadonlyArray<{ key: K; count: number }>): K | null {
  let best: { key: K; count: number } | null = null;
  for (const entry of entries) {
    if (!best || entry.count > best.count) best = entry;
  }
  return best ? best.key : null;
}

function patterns(emails: readonly EmailFacts[]): ProductivityPatterns {
  const hours = new Array<number>(24).fill(0);
  const weekdays = new Array<number>(7).fill(0);

  for (const e of emails) {
    if (!e.receivedDate) continue;
    const h = e.receivedDate.getUTCHours();
    const d = e.receivedDate.getUTCDay();
    hours[h] = (hours[h] ?? 0) + 1;
    weekdays[d] = (weekdays[d] ?? 0) + 1;
  }

  const hourly = hours
    .map((count, hour) => ({ hour, count }))
    .filter((h) => h.count > 0);

  const weekly = DAY_NAMES.map((day, i) => ({ day, count: weekdays[i] ?? 0 })).filter(
    (d) => d.count > 0,
  );

  return {
    hourly_distribution: hourly,
    weekly_distribution: weekly,
    peak_hour: peakOf(hourly.map((h) => ({ key: h.hour, count: h.count }))),
    peak_day: peakOf(weekly.map((d) => ({ key: d.day, count: d.count }))),
  };
}

export function buildProductivity(emails: readonly EmailFacts[]): ProductivityReport {
  return {
    response_times: responseTimeStats(emails),
    patterns: patterns(emails),
  };
}
