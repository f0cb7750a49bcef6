import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  LlmJsonError,
  extractJsonText,
  parseLlmJson,
} from '../../../src/modules/ai-insights/engine/llm-json';

describe('extractJsonText', () => {
  it('unwraps ```json fences', () => {
    expect(extractJsonText('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('cuts the object out of surrounding prose', () => {
    expect(extractJsonText('Sure! Here it is: {"a": 1} Hope this helps.')).toBe('{"a": 1}');
  });

  it('returns plain text unchanged when there is no object', () => {
    expect(extractJsonText('  0.7 ')).toBe('0.7');
  });
});

describe('parseLlmJson', () => {
  const schema = z.object({ category: z.string(), confidence: z.coerce.number() });

  it('parses and validates', () => {
    expect(parseLlmJson('{"category":"work","confidence":"0.9"}', schema)).toEqual({
      category: 'work',
      confidence: 0.9,
    });
  });

  it('rejects invalid JSON', () => {
    expect(() => parseLlmJson('not json', schema)).toThrow(LlmJsonError);
    expect(() => parseLlmJson('not json', schema)).toThrow('AI answer is not valid JSON');
  });

  it('rejects a shape mismatch', () => {
    expect(() => parseLlmJson('{"confidence": 1}', schema)).toThrow(
      /^AI answer does not match the expected shape/,
    );
  });
});
