import { describe, it, expect } from 'vitest';
import { canUseExecutiveSummary } from '../../../src/modules/ai-insights/policies/executive-summary-access.policy';
import {
  findUnsubscribeCandidates,
  type UnsubscribeEmailFacts,
} from '../../../src/modules/ai-insights/policies/unsubscribe-candidates.policy';

function fromSender(
  sender: string,
  count: number,
  opened: number,
  category: string | null,
): UnsubscribeEmailFacts[] {
  return Array.from({ length: count }, (_, i) => ({
    senderEmail: sender,
    aiCategory: category,
    isRead: i < opened,
  }));
}

describe('findUnsubscribeCandidates', () => {
  it('flags unread bulk senders with more than five emails', () => {
    const out = findUnsubscribeCandidates(fromSender('deals@shop.example', 10, 0, 'promotional'));

    expect(out).toEqual([
      {
        sender: 'deals@shop.example',
        email_count: 10,
        open_rate: 0,
        recommendation_reason: 'Low engagement: 0.0% open rate over 10 emails',
        confidence: 0.5,
      },
    ]);
  });

  it('caps confidence at 0.9', () => {
    const [top] = findUnsubscribeCandidates(fromSender('news@paper.example', 40, 0, 'newsletter'));
    expect(top?.confidence).toBe(0.9);
  });

  it('skips senders at exactly five emails or a 10% open rate', () => {
    const emails = [
      ...fromSender('five@example.com', 5, 0, 'promotional'),
      ...fromSender('opened@example.com', 10, 1, 'promotional'),
    ];
    expect(findUnsubscribeCandidates(emails)).toEqual([]);
  });

  it('skips senders whose main category is not bulk mail', () => {
    const emails = [
      ...fromSender('boss@work.example', 6, 0, 'work'),
      ...fromSender('boss@work.example', 2, 0, 'promotional'),
      ...fromSender('unknown@example.com', 8, 0, null),
    ];
    expect(findUnsubscribeCandidates(emails)).toEqual([]);
  });

  it('orders by confidence and keeps the top ten', () => {
    const emails: UnsubscribeEmailFacts[] = [];
    for (let i = 0; i < 12; i += 1) {
      emails.push(...fromSender(`s${i}@example.com`, 6 + i, 0, 'promotional'));
    }

    const out = findUnsubscribeCandidates(emails);

    expect(out).toHaveLength(10);
    expect(out[0]?.sender).toBe('s11@example.com');
    expect(out[9]?.sender).toBe('s2@example.com');
  });
});

describe('canUseExecutiveSummary', () => {
  it('is limited to professional and enterprise', () => {
    expect(canUseExecutiveSummary('professional')).toBe(true);
    expect(canUseExecutiveSummary('enterprise')).toBe(true);
    expect(canUseExecutiveSummary('starter')).toBe(false);
    expect(canUseExecutiveSummary('free_trial')).toBe(false);
  });
});
