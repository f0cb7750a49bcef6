/**
 * src/modules/ai-insights/engine/prompts.ts
 *
 * Prompt builders. Pure string functions so they can be reviewed (and tested) without a model.
 * Content is truncated before it reaches the model to stay inside token budgets.
 */

import {
  EMAIL_CATEGORIES,
  type ActionableEmailFacts,
  type AnalyzableEmail,
  type PatternInput,
  type PeriodEmailSummary,
  type SenderProfileInput,
  type ThreadMessage,
} from './ai-engine.types';

export function truncate(text: string | null | undefined, max: number): string {
  if (!text) return '';
  return text.length > max ? text.slice(0, max) : text;
}

export function classifyEmailPrompt(email: AnalyzableEmail): string {
  return `Classify this email into one of these categories:
- work: Professional/business emails
- personal: Personal correspondence
- promotional: Marketing/promotional content
- notification: System notifications/alerts
- spam: Unwanted/spam emails
- newsletter: Newsletters/subscriptions

Email Subject: ${email.subject ?? ''}
Email Content: ${truncate(email.bodyText, 500)}

Return only the category name (one of: ${EMAIL_CATEGORIES.join(', ')}) and a confidence score (0-1) in JSON format:
{"category": "category_name", "confidence": 0.95}`;
}

export function sentimentPrompt(text: string): string {
  return `Analyze the sentiment of this email text.

Text: ${truncate(text, 512)}

Return JSON: {"sentiment": "positive|negative|neutral", "score": <float -1.0..1.0>, "confidence": <float 0.0..1.0>}`;
}

export function importancePrompt(email: AnalyzableEmail): string {
  return `Score this email's importance from 0.0 to 1.0 based on:
- Sender authority and relationship
- Subject urgency and relevance
- Content importance
- Attachments presence

Sender: ${email.senderEmail ?? ''}
Subject: ${email.subject ?? ''}
Has Attachments: ${email.hasAttachments}
Content: ${truncate(email.bodyText, 1000)}

Return only a number between 0.0 and 1.0:`;
}

export function contentAnalysisPrompt(email: AnalyzableEmail): string {
  return `Analyze the following email and provide insights in JSON format:

Subject: ${email.subject ?? ''}
Content: ${truncate(email.bodyText, 2000)}

Please provide analysis in the following JSON structure:
{
  "category": "one of: work, personal, promotional, support, notification, urgent, newsletter",
  "priority": "one of: low, medium, high, urgent",
  "sentiment": "one of: positive, neutral, negative",
  "sentiment_score": "float between -1.0 and 1.0",
  "key_topics": ["topic1", "topic2", "topic3"],
  "requires_action": true/false,
  "action_type": "one of: reply, schedule, forward, archive, delete, follow_up, none",
  "urgency_indicators": ["indicator1", "indicator2"],
  "summary": "brief 2-sentence summary",
  "confidence_score": "float between 0.0 and 1.0"
}

Be precise and consistent with the categories and priorities.`;
}

export function actionableInsightsPrompt(emails: ActionableEmailFacts[]): string {
  const actionRequired = emails.filter((e) => e.requiresAction).length;

  return `Based on email analysis data for ${emails.length} emails, generate actionable insights:

Email Categories: ${JSON.stringify(emails.map((e) => e.category ?? 'unknown'))}
Priorities: ${JSON.stringify(emails.map((e) => e.priority ?? 'medium'))}
Action Required: ${actionRequired} emails

Generate 5 actionable insights in JSON format:
{
  "insights": [
    {
      "type": "productivity" | "priority" | "time_management" | "communication" | "organization",
      "title": "Brief insight title",
      "description": "Detailed description with specific recommendations",
      "impact": "high" | "medium" | "low",
      "action_items": ["specific action 1", "specific action 2"],
      "metrics": {"emails_affected": number, "time_saved_minutes": number}
    }
  ]
}`;
}

export function trendAnalysisPrompt(summary: Record<string, unknown>): string {
  return `Analyze email trends and provide insights in JSON format:

Data summary: ${JSON.stringify(summary)}

Provide analysis in this JSON structure:
{
  "key_trends": ["trend description 1", "trend description 2"],
  "sentiment_trend": "improving|declining|stable",
  "volume_trend": "increasing|decreasing|stable",
  "notable_patterns": ["pattern 1", "pattern 2"],
  "recommendations": ["recommendation 1", "recommendation 2"],
  "risk_areas": ["risk 1", "risk 2"],
  "confidence": "high|medium|low"
}`;
}

export function customClassificationPrompt(email: AnalyzableEmail, categories: string[]): string {
  return `Classify this email into one of these categories: ${categories.join(', ')}

Subject: ${email.subject ?? 'No subject'}
Content: ${truncate(email.bodyText, 500)}

Return only the category name that best fits this email.`;
}

export function periodInsightsPrompt(summary: PeriodEmailSummary, periodLabel: string): string {
  const topSenders = Object.fromEntries(Object.entries(summary.top_senders).slice(0, 5));

  return `Analyze these email patterns and provide 3-5 actionable insights:

Email Summary for ${periodLabel}:
- Total emails: ${summary.total_emails}
- Categories: ${JSON.stringify(summary.categories)}
- Sentiment distribution: ${JSON.stringify(summary.sentiments)}
- Top senders: ${JSON.stringify(topSenders)}

Provide insights in this JSON format:
{
  "insights": [
    {"type": "productivity", "title": "Insight Title", "description": "Detailed insight", "action": "Recommended action"}
  ],
  "summary": "Overall summary of email patterns",
  "recommendations": ["recommendation1", "recommendation2"]
}`;
}

export function executiveSummaryPrompt(
  metrics: Record<string, unknown>,
  periodLabel: string,
): string {
  return `Create an executive summary for email activity over the past ${periodLabel}.

Measured activity: ${JSON.stringify(metrics)}

Structure the response as JSON with:
{
  "summary": "Two or three sentence overview",
  "key_metrics": {"total_emails": number, "important_emails": number, "response_rate": "percentage", "avg_response_time": "hours"},
  "highlights": ["Key highlight 1", "Key highlight 2"],
  "concerns": ["Concern 1", "Concern 2"],
  "recommendations": ["Recommendation 1", "Recommendation 2"]
}`;
}

export function emailSummaryPrompt(email: AnalyzableEmail): string {
  return `Summarize this email in 2-3 sentences, highlighting key points and any required actions:

Subject: ${email.subject ?? ''}
From: ${email.senderEmail ?? ''}
Content: ${truncate(email.bodyText, 1000)}

Format as JSON:
{
  "summary": "Brief summary",
  "key_points": ["point1", "point2", "point3"],
  "action_required": true/false,
  "urgency": "low/medium/high"
}`;
}

export function threadAnalysisPrompt(messages: ThreadMessage[]): string {
  const transcript = messages
    .map(
      (m, i) =>
        `#${i + 1} From: ${m.senderEmail ?? 'unknown'} | Date: ${m.receivedDate?.toISOString() ?? 'unknown'}\n` +
        `Subject: ${m.subject ?? ''}\n${truncate(m.bodyText, 400)}`,
    )
    .join('\n---\n');

  return `Analyze this email conversation thread:

${transcript}

Return JSON:
{
  "response_pattern": "quick|delayed|sporadic|one_sided",
  "conversation_tone": "formal|casual|friendly|tense|neutral",
  "key_topics": ["topic1", "topic2"],
  "summary": "One sentence summary of the conversation",
  "action_items": ["open item 1"]
}`;
}

export function senderRelationshipPrompt(profile: SenderProfileInput): string {
  return `Characterize the user's relationship with this email sender:

Sender: ${profile.senderName ?? ''} <${profile.senderEmail}>
Emails received (90 days): ${profile.totalEmails}
Read rate: ${profile.readRate.toFixed(2)}
Average sentiment: ${profile.avgSentiment ?? 'unknown'}
Categories: ${JSON.stringify(profile.categories)}

Return JSON:
{
  "relationship_type": "colleague|client|vendor|friend|family|service|marketing|unknown",
  "importance_level": "high|medium|low",
  "suggested_action": "prioritize|keep|filter|unsubscribe",
  "confidence": <float 0.0..1.0>
}`;
}

export function patternDetectionPrompt(input: PatternInput): string {
  return `Detect recurring patterns in this user's email activity over the last 30 days:

Total emails: ${input.totalEmails}
Emails by hour (UTC): ${JSON.stringify(input.hourlyDistribution)}
Emails by weekday: ${JSON.stringify(input.weekdayDistribution)}
Categories: ${JSON.stringify(input.categories)}
Top senders: ${JSON.stringify(input.topSenders)}

Return JSON:
{
  "patterns": [
    {"type": "timing|sender|category|volume", "description": "What happens", "recommendation": "What to do"}
  ],
  "confidence": <float 0.0..1.0>
}`;
}
