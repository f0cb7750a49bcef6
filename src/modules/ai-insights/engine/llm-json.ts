/**
 * src/modules/ai-insights/engine/llm-json.ts
 *
 * WHY:
 * - Models wrap JSON in ``` fences or add a sentence around it despite instructions.
 * - Every engine answer goes through one parser + a zod schema, so a malformed answer
 *   becomes an exception the engine turns into its fallback.
 */

import type { z } from 'zod';

const FENCE_RE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

export class LlmJsonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LlmJsonError';
  }
}

export function extractJsonText(raw: string): string {
  const trimmed = raw.trim();

  const fenced = FENCE_RE.exec(trimmed);
  if (fenced?.[1] !== undefined) return fenced[1];

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start >= 0 && end > start) return trimmed.slice(start, end + 1);

  return trimmed;
}

export function parseLlmJson<S extends z.ZodTypeAny>(raw: string, schema: S): z.output<S> {
  let value: unknown;
  try {
    value = JSON.parse(extractJsonText(raw));
  } catch {
    throw new LlmJsonError('AI answer is not valid JSON');
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new LlmJsonError(
      `AI answer does not match the expected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
    );
  }
  return parsed.data;
}
