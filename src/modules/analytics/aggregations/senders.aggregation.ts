/**
 * src/modules/analytics/aggregations/senders.aggregation.ts
 *
 * Per (sender_email, sender_name) statistics. Emails without a sender address are excluded.
 */

import type { EmailFacts } from '../../emails';
import { maxOf, mean, mode, round2 } from './buckets';

export type SenderStats = {
  sender_email: string;
  sender_name: string;
  total_emails: number;
  unread_emails: number;
  open_rate: number;
  avg_sentiment: number | null;
  last_email_date: string | null;
  primary_category: string;
};

type SenderGroup = {
  senderEmail: string;
  senderName: string | null;
  emails: EmailFacts[];
};

export function buildSenderStats(emails: readonly EmailFacts[], limit: number): SenderStats[] {
  const groups = new Map<string, SenderGroup>();

  for (const e of emails) {
    if (!e.senderEmail) continue;
    const key = `${e.senderEmail}\u0000${e.senderName ?? ''}`;
    const group = groups.get(key) ?? { senderEmail: e.senderEmail, senderName: e.senderName, emails: [] };
    group.emails.push(e);
    groups.set(key, group);
  }

  return [...groups.values()]
    .map((g): SenderStats => {
      const total = g.emails.length;
      const read = g.emails.filter((e) => e.isRead).length;
      const scores = g.emails.flatMap((e) => (e.aiSentimentScore === null ? [] : [e.aiSentimentScore]));
      const avgSentiment = mean(scores);
      const lastMs = maxOf(
        g.emails.flatMap((e) => (e.receivedDate ? [e.receivedDate.getTime()] : [])),
      );
      const categories = g.emails.flatMap((e) => (e.aiCategory ? [e.aiCategory] : []));

      return {
        sender_email: g.senderEmail,
        sender_name: g.senderName ?? g.senderEmail,
        total_emails: total,
        unread_emails: total - read,
        open_rate: round2(read / total),
        avg_sentiment: avgSentiment === null ? null : round2(avgSentiment),
        last_email_date: lastMs === null ? null : new Date(lastMs).toISOString(),
        primary_category: mode(categories) ?? 'uncategorized',
      };
    })
    .sort((a, b) => b.total_emails - a.total_emails || a.sender_email.localeCompare(b.sender_email))
    .slice(0, limit);
}
