/**
 * src/shared/ai/chat-client.ts
 *
 * WHY:
 * - The AI engine talks to an LLM through this port, never to a vendor SDK directly.
 * - Tests script answers with a fake; production uses OpenAiChatClient.
 *
 * RULES:
 * - complete() returns the raw assistant text. Parsing belongs to the caller.
 * - Implementations throw on any provider failure; callers own fallbacks.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ChatCompletionRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON object answer. */
  json?: boolean;
};

export interface ChatClient {
  complete(req: ChatCompletionRequest): Promise<string>;
}

export class ChatUnavailableError extends Error {
  constructor() {
    super('AI provider is not configured');
    this.name = 'ChatUnavailableError';
  }
}

/** Used when OPENAI_API_KEY is empty: every call fails, the engine answers with fallbacks. */
export class DisabledChatClient implements ChatClient {
  complete(_req: ChatCompletionRequest): Promise<string> {
    return Promise.reject(new ChatUnavailableError());
  }
}
