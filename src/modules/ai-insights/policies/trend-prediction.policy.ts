/**
 * src/modules/ai-insights/policies/trend-prediction.policy.ts
 *
 * Next-week volume prediction from the last 30 days of received emails.
 * Week-over-week change projected one week ahead.
 */

export type TrendPrediction =
  | {
      trend_direction: 'increasing' | 'decreasing';
      trend_percentage: number;
      predicted_next_week: number;
      confidence: number;
      recommendation: string;
    }
  | { error: string };

const DAY_MS = 24 * 60 * 60 * 1000;
const MIN_EMAILS = 7;
const MIN_DISTINCT_DAYS = 7;

export function predictEmailTrend(receivedDates: Date[], now: Date): TrendPrediction {
  const distinctDays = new Set(receivedDates.map((d) => d.toISOString().slice(0, 10)));

  if (receivedDates.length < MIN_EMAILS || distinctDays.size < MIN_DISTINCT_DAYS) {
    return { error: 'Insufficient data for trend analysis' };
  }

  const nowMs = now.getTime();
  const recentFrom = nowMs - 7 * DAY_MS;
  const previousFrom = nowMs - 14 * DAY_MS;

  let recent = 0;
  let previous = 0;
  for (const date of receivedDates) {
    const t = date.getTime();
    if (t >= recentFrom && t <= nowMs) recent += 1;
    else if (t >= previousFrom && t < recentFrom) previous += 1;
  }

  const direction = recent > previous ? 'increasing' : 'decreasing';
  const pct = previous > 0 ? (Math.abs(recent - previous) / previous) * 100 : 0;
  const factor = direction === 'increasing' ? 1 + pct / 100 : 1 - pct / 100;

  return {
    trend_direction: direction,
    trend_percentage: Math.round(pct * 10) / 10,
    predicted_next_week: Math.floor(recent * factor),
    confidence: Math.min(0.8, distinctDays.size / 30),
    recommendation: `Email volume is ${direction} by ${pct.toFixed(1)}%`,
  };
}
