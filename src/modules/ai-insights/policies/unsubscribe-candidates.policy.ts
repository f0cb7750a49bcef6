/**
 * src/modules/ai-insights/policies/unsubscribe-candidates.policy.ts
 *
 * Low-engagement bulk senders the user could unsubscribe from.
 *
 * RULES:
 * - Pure function over the user's recent emails (caller passes the 90-day window).
 * - A sender qualifies when its most frequent category is promotional/newsletter,
 *   it sent more than 5 emails and fewer than 10% of them were read.
 * - confidence = min(0.9, (1 - open_rate) * (count / 20)); top 10 by confidence.
 */

export type UnsubscribeEmailFacts = {
  senderEmail: string | null;
  aiCategory: string | null;
  isRead: boolean;
};

export type UnsubscribeCandidate = {
  sender: string;
  email_count: number;
  open_rate: number;
  recommendation_reason: string;
  confidence: number;
};

const BULK_CATEGORIES = new Set(['promotional', 'newsletter']);
const MIN_EMAILS_EXCLUSIVE = 5;
const MAX_OPEN_RATE = 0.1;
const MAX_CANDIDATES = 10;

type SenderTally = { count: number; opened: number; categories: Map<string, number> };

function mostFrequent(categories: Map<string, number>): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const [category, count] of categories) {
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

export function findUnsubscribeCandidates(emails: UnsubscribeEmailFacts[]): UnsubscribeCandidate[] {
  const tallies = new Map<string, SenderTally>();

  for (const email of emails) {
    if (!email.senderEmail) continue;

    let tally = tallies.get(email.senderEmail);
    if (!tally) {
      tally = { count: 0, opened: 0, categories: new Map() };
      tallies.set(email.senderEmail, tally);
    }

    tally.count += 1;
    if (email.isRead) tally.opened += 1;
    if (email.aiCategory) {
      tally.categories.set(email.aiCategory, (tally.categories.get(email.aiCategory) ?? 0) + 1);
    }
  }

  const candidates: UnsubscribeCandidate[] = [];

  for (const [sender, tally] of tallies) {
    const category = mostFrequent(tally.categories);
    if (!category || !BULK_CATEGORIES.has(category)) continue;

    const openRate = tally.opened / tally.count;
    if (tally.count <= MIN_EMAILS_EXCLUSIVE || openRate >= MAX_OPEN_RATE) continue;

    candidates.push({
      sender,
      email_count: tally.count,
      open_rate: openRate,
      recommendation_reason: `Low engagement: ${(openRate * 100).toFixed(1)}% open rate over ${tally.count} emails`,
      confidence: Math.min(0.9, (1 - openRate) * (tally.count / 20)),
    });
  }

  candidates.sort((a, b) => b.confidence - a.confidence);
  return candidates.slice(0, MAX_CANDIDATES);
}
