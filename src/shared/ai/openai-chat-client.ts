/**
 * src/shared/ai/openai-chat-client.ts
 *
 * WHY:
 * - Production ChatClient over the official OpenAI SDK (chat completions).
 *
 * RULES:
 * - The SDK retries transient failures itself (maxRetries); we do not wrap it again.
 * - Never log prompts or completions: they contain email content.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type { ChatClient, ChatCompletionRequest, ChatMessage } from './chat-client';

function toOpenAiMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAiChatClient implements ChatClient {
  private readonly client: OpenAI;

  constructor(apiKey: string, opts?: { timeoutMs?: number; maxRetries?: number }) {
    this.client = new OpenAI({
      apiKey,
      timeout: opts?.timeoutMs ?? 30_000,
      maxRetries: opts?.maxRetries ?? 2,
    });
  }

  async complete(req: ChatCompletionRequest): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: req.model,
      messages: req.messages.map(toOpenAiMessage),
      temperature: req.temperature,
      max_tokens: req.maxTokens,
      ...(req.json ? { response_format: { type: 'json_object' as const } } : {}),
    });

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new Error('OpenAI returned an empty completion');
    }

    return content.trim();
  }
}
