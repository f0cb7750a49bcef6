/**
 * src/shared/http/parse-input.ts
 *
 * WHY:
 * - Every controller validates body/query/params with zod the same way.
 * - One helper keeps the error message + issues meta identical across modules.
 */

import type { z } from 'zod';
import { AppError } from './errors';

type InputKind = 'body' | 'query' | 'params';

const MESSAGES: Record<InputKind, string> = {
  body: 'Invalid request body',
  query: 'Invalid query',
  params: 'Invalid path parameters',
};

export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  kind: InputKind = 'body',
): z.output<S> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw AppError.validationError(MESSAGES[kind], {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
