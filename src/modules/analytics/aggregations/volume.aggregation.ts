/**
 * src/modules/analytics/aggregations/volume.aggregation.ts
 */

import type { EmailFacts } from '../../emails';
import { dayKey, isoWeekKey, monthKey, round2 } from './buckets';

export type VolumePeriod = 'daily' | 'weekly' | 'monthly';

export type VolumePoint = { date: string; count: number };

export type VolumeReport = {
  period: VolumePeriod;
  total_emails: number;
  time_series: VolumePoint[];
  average_per_day: number;
  peak_day: VolumePoint | null;
};

const KEY_FNS: Record<VolumePeriod, (d: Date) => string> = {
  daily: dayKey,
  weekly: isoWeekKey,
  monthly: monthKey,
};

export function buildVolume(
  emails: readonly EmailFacts[],
  period: VolumePeriod,
  days: number,
): VolumeReport {
  const keyOf = KEY_FNS[period];
  const counts = new Map<string, number>();

  for (const e of emails) {
    if (!e.receivedDate) continue;
    const k = keyOf(e.receivedDate);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }

  const series = [...counts.entries()]
    .map(([date, count]) => ({ date, count }))
    .sort((a, b) => a.date.localeCompare(b.date));

  let peak: VolumePoint | null = null;
  for (const point of series) {
    if (!peak || point.count > peak.count) peak = point;
  }

  return {
    period,
    total_emails: emails.length,
    time_series: series,
    average_per_day: days > 0 ? round2(emails.length / days) : 0,
    peak_day: peak,
  };
}
