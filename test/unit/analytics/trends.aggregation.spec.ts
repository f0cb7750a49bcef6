import { describe, it, expect } from 'vitest';
import { buildCategoryTrends } from '../../../src/modules/analytics/aggregations/categories.aggregation';
import { buildProductivity } from '../../../src/modules/analytics/aggregations/productivity.aggregation';
import {
  buildTimeSeries,
  volumeTrendPercentage,
  type TimeSeriesPoint,
} from '../../../src/modules/analytics/aggregations/time-series.aggregation';
import { buildVolume } from '../../../src/modules/analytics/aggregations/volume.aggregation';
import { at, facts } from '../../helpers/email-facts';

function point(total: number): TimeSeriesPoint {
  return { timestamp: 't', total_emails: total, unread_emails: 0, high_priority_emails: 0 };
}

describe('buildTimeSeries', () => {
  it('returns only non-empty buckets in ascending order', () => {
    const emails = [
      facts({ receivedDate: at('2024-05-03T09:10:00Z'), priority: 'high' }),
      facts({ receivedDate: at('2024-05-01T22:00:00Z'), isRead: true }),
      facts({ receivedDate: at('2024-05-03T18:00:00Z') }),
      facts({ receivedDate: null }),
    ];

    const series = buildTimeSeries(emails, 'day');

    expect(series.data_points).toEqual([
      { timestamp: '2024-05-01', total_emails: 1, unread_emails: 0, high_priority_emails: 0 },
      { timestamp: '2024-05-03', total_emails: 2, unread_emails: 2, high_priority_emails: 1 },
    ]);
    expect(series.granularity).toBe('day');
    expect(series.total_data_points).toBe(2);
    expect(series.volume_trend_percentage).toBe(0);
  });

  it('buckets by hour', () => {
    const series = buildTimeSeries([facts({ receivedDate: at('2024-05-03T09:59:00Z') })], 'hour');
    expect(series.data_points[0]?.timestamp).toBe('2024-05-03 09:00');
  });
});

describe('volumeTrendPercentage', () => {
  it('compares the last seven points with the seven before', () => {
    const points = [...Array.from({ length: 7 }, () => point(2)), ...Array.from({ length: 7 }, () => point(3))];
    expect(volumeTrendPercentage(points)).toBe(50);
  });

  it('is 0 with fewer than fourteen points', () => {
    expect(volumeTrendPercentage(Array.from({ length: 13 }, () => point(5)))).toBe(0);
  });
});

describe('buildCategoryTrends', () => {
  it('compares each category with the previous window', () => {
    const result = buildCategoryTrends({
      current: [
        facts({ aiCategory: 'work', aiSentimentScore: 0.2 }),
        facts({ aiCategory: 'work', isRead: true }),
        facts({ aiCategory: 'work' }),
        facts({ aiSentimentScore: -0.5 }),
      ],
      previous: [facts({ aiCategory: 'work' }), facts({ aiCategory: 'work' })],
      days: 7,
    });

    expect(result).toEqual({
      categories: [
        {
          category: 'work',
          email_count: 3,
          percentage: 75,
          trend_percentage: 50,
          avg_sentiment: 0.2,
          unread_count: 2,
        },
        {
          category: 'uncategorized',
          email_count: 1,
          percentage: 25,
          trend_percentage: 0,
          avg_sentiment: -0.5,
          unread_count: 1,
        },
      ],
      total_emails: 4,
      date_range_days: 7,
    });
  });
});

describe('buildProductivity', () => {
  it('reports response times in hours and activity peaks', () => {
    const report = buildProductivity([
      facts({ receivedDate: at('2024-05-13T09:00:00Z'), responseTimeMinutes: 30 }), // Monday
      facts({ receivedDate: at('2024-05-14T09:30:00Z'), responseTimeMinutes: 90 }), // Tuesday
      facts({ receivedDate: at('2024-05-14T15:00:00Z'), responseTimeMinutes: 240 }),
      facts({ receivedDate: at('2024-05-19T15:00:00Z') }), // Sunday
    ]);

    expect(report.response_times).toEqual({
      avg_response_hours: 2,
      median_response_hours: 1.5,
      min_response_minutes: 30,
      max_response_hours: 4,
      total_responded_emails: 3,
    });
    expect(report.patterns).toEqual({
      hourly_distribution: [
        { hour: 9, count: 2 },
        { hour: 15, count: 2 },
      ],
      weekly_distribution: [
        { day: 'Sunday', count: 1 },
        { day: 'Monday', count: 1 },
        { day: 'Tuesday', count: 2 },
      ],
      peak_hour: 9,
      peak_day: 'Tuesday',
    });
  });

  it('is all zeros and nulls without data', () => {
    expect(buildProductivity([])).toEqual({
      response_times: {
        avg_response_hours: 0,
        median_response_hours: 0,
        min_response_minutes: 0,
        max_response_hours: 0,
        total_responded_emails: 0,
      },
      patterns: { hourly_distribution: [], weekly_distribution: [], peak_hour: null, peak_day: null },
    });
  });

  it('handles hundreds of thousands of responded emails', () => {
    const emails = Array.from({ length: 300_000 }, (_, i) =>
      facts({ responseTimeMinutes: (i % 600) + 5 }),
    );

    const { response_times } = buildProductivity(emails);

    expect(response_times.min_response_minutes).toBe(5);
    expect(response_times.max_response_hours).toBe(10.07);
    expect(response_times.total_responded_emails).toBe(300_000);
  });
});

describe('buildVolume', () => {
  it('groups weekly by ISO week and averages over the window length', () => {
    const report = buildVolume(
      [
        facts({ receivedDate: at('2024-05-13T10:00:00Z') }),
        facts({ receivedDate: at('2024-05-19T10:00:00Z') }),
        facts({ receivedDate: at('2024-05-21T10:00:00Z') }),
      ],
      'weekly',
      14,
    );

    expect(report).toEqual({
      period: 'weekly',
      total_emails: 3,
      time_series: [
        { date: '2024-05-13', count: 2 },
        { date: '2024-05-20', count: 1 },
      ],
      average_per_day: 0.21,
      peak_day: { date: '2024-05-13', count: 2 },
    });
  });

  it('has no peak when empty', () => {
    expect(buildVolume([], 'monthly', 30).peak_day).toBeNull();
  });
});
