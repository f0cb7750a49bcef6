import { describe, it, expect } from 'vitest';
import { buildOverview } from '../../../src/modules/analytics/aggregations/overview.aggregation';
import { buildSenderStats } from '../../../src/modules/analytics/aggregations/senders.aggregation';
import { at, facts } from '../../helpers/email-facts';

describe('buildOverview', () => {
  it('summarizes the window', () => {
    const emails = [
      facts({ aiCategory: 'work', responseTimeMinutes: 30, isRead: true }),
      facts({ aiCategory: 'work', responseTimeMinutes: 90, priority: 'high' }),
      facts({ aiCategory: 'newsletter', isFlagged: true }),
      facts({ aiCategory: 'alerts' }),
      facts({ isRead: true }),
    ];

    expect(buildOverview(emails, 30)).toEqual({
      total_emails: 5,
      unread_emails: 3,
      important_emails: 2,
      avg_response_time_hours: 1,
      top_categories: [
        { category: 'work', count: 2 },
        { category: 'alerts', count: 1 },
        { category: 'newsletter', count: 1 },
      ],
      date_range_days: 30,
    });
  });

  it('reports zero response time when nothing was answered', () => {
    expect(buildOverview([facts()], 7).avg_response_time_hours).toBe(0);
  });

  it('keeps the top five categories', () => {
    const emails = ['a', 'b', 'c', 'd', 'e', 'f'].map((c) => facts({ aiCategory: c }));
    expect(buildOverview(emails, 7).top_categories.map((c) => c.category)).toEqual([
      'a',
      'b',
      'c',
      'd',
      'e',
    ]);
  });
});

describe('buildSenderStats', () => {
  it('groups by address and display name, busiest first', () => {
    const emails = [
      facts({
        senderEmail: 'news@shop.example',
        senderName: 'Shop',
        aiCategory: 'promotional',
        receivedDate: at('2024-05-01T10:00:00Z'),
      }),
      facts({
        senderEmail: 'news@shop.example',
        senderName: 'Shop',
        aiCategory: 'promotional',
        isRead: true,
        aiSentimentScore: 0.5,
        receivedDate: at('2024-05-03T10:00:00Z'),
      }),
      facts({
        senderEmail: 'news@shop.example',
        senderName: 'Shop',
        aiCategory: 'newsletter',
        aiSentimentScore: 0.2,
      }),
      facts({ senderEmail: 'ann@example.com', isRead: true }),
      facts({ senderEmail: null }),
    ];

    expect(buildSenderStats(emails, 20)).toEqual([
      {
        sender_email: 'news@shop.example',
        sender_name: 'Shop',
        total_emails: 3,
        unread_emails: 2,
        open_rate: 0.33,
        avg_sentiment: 0.35,
        last_email_date: '2024-05-03T10:00:00.000Z',
        primary_category: 'promotional',
      },
      {
        sender_email: 'ann@example.com',
        sender_name: 'ann@example.com',
        total_emails: 1,
        unread_emails: 0,
        open_rate: 1,
        avg_sentiment: null,
        last_email_date: null,
        primary_category: 'uncategorized',
      },
    ]);
  });

  it('treats different display names of one address as separate senders', () => {
    const emails = [
      facts({ senderEmail: 'team@example.com', senderName: 'Support' }),
      facts({ senderEmail: 'team@example.com', senderName: 'Billing' }),
    ];
    expect(buildSenderStats(emails, 20)).toHaveLength(2);
  });

  it('applies the limit after sorting', () => {
    const emails = [
      facts({ senderEmail: 'b@example.com' }),
      facts({ senderEmail: 'a@example.com' }),
      facts({ senderEmail: 'c@example.com' }),
      facts({ senderEmail: 'c@example.com' }),
    ];
    expect(buildSenderStats(emails, 2).map((s) => s.sender_email)).toEqual([
      'c@example.com',
      'a@example.com',
    ]);
  });

  it('finds the latest email across a very large sender group', () => {
    const emails = Array.from({ length: 300_000 }, (_, i) =>
      facts({
        senderEmail: 'bulk@example.com',
        receivedDate: at(i === 150_000 ? '2024-06-01T00:00:00Z' : '2024-01-01T00:00:00Z'),
      }),
    );

    const [stats] = buildSenderStats(emails, 20);

    expect(stats?.total_emails).toBe(300_000);
    expect(stats?.last_email_date).toBe('2024-06-01T00:00:00.000Z');
  });
});
