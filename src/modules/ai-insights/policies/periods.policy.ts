/**
 * src/modules/ai-insights/policies/periods.policy.ts
 *
 * Reporting periods for the scheduled insight jobs. UTC throughout; `end` is inclusive
 * (last millisecond of the period) to match the repo's `received_date <= until`.
 */

export const DAY_NAMES_BY_INDEX = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

const DAY_MS = 24 * 60 * 60 * 1000;

export type ReportingPeriod = { start: Date; end: Date; label: string };

function startOfUtcDay(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Yesterday (UTC). Label: YYYY-MM-DD. */
export function previousUtcDay(now: Date): ReportingPeriod {
  const start = new Date(startOfUtcDay(now).getTime() - DAY_MS);
  return { start, end: new Date(start.getTime() + DAY_MS - 1), label: isoDate(start) };
}

/** The last complete Monday to Sunday week (UTC). Label: YYYY-MM-DD/YYYY-MM-DD. */
export function previousIsoWeek(now: Date): ReportingPeriod {
  const today = startOfUtcDay(now);
  const sinceMonday = (today.getUTCDay() + 6) % 7;
  const thisMonday = today.getTime() - sinceMonday * DAY_MS;
  const start = new Date(thisMonday - 7 * DAY_MS);
  const end = new Date(thisMonday - 1);
  return { start, end, label: `${isoDate(start)}/${isoDate(end)}` };
}
