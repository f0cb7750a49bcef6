/**
 * src/modules/auth/helpers/email-key.ts
 *
 * PII-safe identifiers for logs and rate-limit keys: raw emails never reach Redis or logs.
 */

import { createHash } from 'node:crypto';

export function emailKey(email: string): string {
  return createHash('sha256').update(email.toLowerCase()).digest('hex').slice(0, 32);
}

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
