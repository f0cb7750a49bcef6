/**
 * src/modules/analytics/aggregations/time-series.aggregation.ts
 *
 * Volume buckets by hour / day / ISO week. Only non-empty buckets are returned
 * (a GROUP BY over the window), ascending.
 */

import type { EmailFacts } from '../../emails';
import { dayKey, hourKey, isoWeekKey, round2 } from './buckets';

export type Granularity = 'hour' | 'day' | 'week';

export type TimeSeriesPoint = {
  timestamp: string;
  total_emails: number;
  unread_emails: number;
  high_priority_emails: number;
};

export type TimeSeriesData = {
  data_points: TimeSeriesPoint[];
  granularity: Granularity;
  volume_trend_percentage: number;
  total_data_points: number;
};

const KEY_FNS: Record<Granularity, (d: Date) => string> = {
  hour: hourKey,
  day: dayKey,
  week: isoWeekKey,
};

/**
 * current = last 7 points (0 if fewer than 7), previous = points [-14, -7) (0 if fewer than 14).
 */
export function volumeTrendPercentage(points: readonly TimeSeriesPoint[]): number {
  const sum = (ps: readonly TimeSeriesPoint[]) => ps.reduce((acc, p) => acc + p.total_emails, 0);
  const current = points.length >= 7 ? sum(points.slice(-7)) : 0;
  const previous = points.length >= 14 ? sum(points.slice(-14, -7)) : 0;
  return previous > 0 ? round2(((current - previous) / previous) * 100) : 0;
}

export function buildTimeSeries(
  emails: readonly EmailFacts[],
  granularity: Granularity,
): TimeSeriesData {
  const keyOf = KEY_FNS[granularity];
  const buckets = new Map<string, TimeSeriesPoint>();

  for (const e of emails) {
    if (!e.receivedDate) continue;
    const timestamp = keyOf(e.receivedDate);
    const point = buckets.get(timestamp) ?? {
      timestamp,
      total_emails: 0,
      unread_emails: 0,
      high_priority_emails: 0,
    };
    point.total_emails += 1;
    if (!e.isRead) point.unread_emails += 1;
    if (e.priority === 'high') point.high_priority_emails += 1;
    buckets.set(timestamp, point);
  }

  // Keys are zero-padded, so lexical order is chronological.
  const dataPoints = [...buckets.values()].sort((a, b) => a.timestamp.localeCompare(b.timestamp));

  return {
    data_points: dataPoints,
    granularity,
    volume_trend_percentage: volumeTrendPercentage(dataPoints),
    total_data_points: dataPoints.length,
  };
}
