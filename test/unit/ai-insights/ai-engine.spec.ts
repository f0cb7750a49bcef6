import { describe, it, expect } from 'vitest';
import { AiEngine } from '../../../src/modules/ai-insights';
import { summarizeForInsights } from '../../../src/modules/ai-insights/engine/ai-engine';
import { logger } from '../../../src/shared/logger/logger';
import { ScriptedChatClient } from '../../helpers/fakes';

const email = {
  subject: 'Quarterly report',
  bodyText: 'Please review the attached numbers by Friday.',
  senderEmail: 'boss@example.com',
  hasAttachments: true,
};

function engineWith(chat: ScriptedChatClient) {
  return new AiEngine({
    chat,
    logger,
    models: { analysis: 'analysis-model', classifier: 'classifier-model' },
  });
}

describe('AiEngine', () => {
  it('classifies with the classifier model and clamps confidence', async () => {
    const chat = new ScriptedChatClient().onJson('classification expert', {
      category: 'work',
      confidence: 1.7,
    });

    const result = await engineWith(chat).classifyEmail(email);

    expect(result).toEqual({ category: 'work', confidence: 1 });
    expect(chat.calls[0]?.model).toBe('classifier-model');
    expect(chat.calls[0]?.json).toBe(true);
  });

  it('falls back when the provider fails', async () => {
    const engine = engineWith(new ScriptedChatClient());

    expect(await engine.classifyEmail(email)).toEqual({ category: 'unknown', confidence: 0 });
    expect(await engine.analyzeSentiment('hi')).toEqual({
      sentiment: 'neutral',
      score: 0,
      confidence: 0,
    });
    expect(await engine.scoreImportance(email)).toBe(0.5);
    expect(await engine.analyzeThread([])).toBeNull();
    expect(await engine.classifyCustom(email, ['a', 'b'])).toBeNull();
  });

  it('falls back when the answer is not the expected JSON', async () => {
    const chat = new ScriptedChatClient().on('sentiment analysis expert', '{"sentiment":"angry"}');

    expect(await engineWith(chat).analyzeSentiment('grr')).toEqual({
      sentiment: 'neutral',
      score: 0,
      confidence: 0,
    });
  });

  it('clamps importance scores into [0, 1]', async () => {
    const chat = new ScriptedChatClient().on('importance scoring expert', ' 1.4\n');
    expect(await engineWith(chat).scoreImportance(email)).toBe(1);
  });

  it('treats a non-numeric importance answer as a failure', async () => {
    const chat = new ScriptedChatClient().on('importance scoring expert', 'very important');
    expect(await engineWith(chat).scoreImportance(email)).toBe(0.5);
  });

  it('reports the error inside the content-analysis fallback', async () => {
    const result = await engineWith(new ScriptedChatClient()).analyzeEmailContent(email);

    expect(result.category).toBe('uncategorized');
    expect(result.summary).toBe('Analysis unavailable');
    expect(result.error).toBe('scripted chat: no answer');
  });

  it('summarizes the email body when the summary call fails', async () => {
    const result = await engineWith(new ScriptedChatClient()).summarizeEmail(email);

    expect(result).toEqual({
      summary: 'Please review the attached numbers by Friday.',
      key_points: [],
      action_required: false,
      urgency: 'low',
    });
  });

  it('does not call the model for an empty period', async () => {
    const chat = new ScriptedChatClient();
    const result = await engineWith(chat).generateInsights([], 'weekly');

    expect(result).toEqual({ insights: [], summary: 'No emails to analyze', recommendations: [] });
    expect(chat.calls).toHaveLength(0);
  });
});

describe('summarizeForInsights', () => {
  it('counts categories, sentiments and senders (busiest sender first)', () => {
    const summary = summarizeForInsights([
      { category: 'work', sentiment: 'positive', senderEmail: 'a@example.com' },
      { category: null, sentiment: 'mixed', senderEmail: 'b@example.com' },
      { category: 'work', sentiment: null, senderEmail: 'b@example.com' },
    ]);

    expect(summary.total_emails).toBe(3);
    expect(summary.categories).toEqual({ work: 2, unknown: 1 });
    expect(summary.sentiments).toEqual({ positive: 1, neutral: 1, negative: 0 });
    expect(Object.keys(summary.top_senders)).toEqual(['b@example.com', 'a@example.com']);
  });
});
