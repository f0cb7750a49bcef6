/**
 * src/modules/emails/policies/email-action.policy.ts
 *
 * WHY:
 * - The action route takes a free-form path segment; this maps it to a concrete change.
 *
 * RULES:
 * - Pure. Unknown action → null (controller answers 400 "Invalid action").
 * - `delete` removes the row; everything else is a flag patch.
 */

import type { EmailUpdate } from '../email.types';

export const EMAIL_ACTIONS = [
  'mark_read',
  'mark_unread',
  'mark_important',
  'flag',
  'unflag',
  'archive',
  'unarchive',
  'delete',
] as const;

export type EmailAction = (typeof EMAIL_ACTIONS)[number];

export type EmailActionPlan = { kind: 'update'; patch: EmailUpdate } | { kind: 'delete' };

export function isEmailAction(value: string): value is EmailAction {
  return (EMAIL_ACTIONS as readonly string[]).includes(value);
}

export function planEmailAction(action: string): EmailActionPlan | null {
  if (!isEmailAction(action)) return null;

  switch (action) {
    case 'mark_read':
      return { kind: 'update', patch: { isRead: true } };
    case 'mark_unread':
      return { kind: 'update', patch: { isRead: false } };
    case 'mark_important':
      return { kind: 'update', patch: { importance: 'high' } };
    case 'flag':
      return { kind: 'update', patch: { isFlagged: true } };
    case 'unflag':
      return { kind: 'update', patch: { isFlagged: false } };
    case 'archive':
      return { kind: 'update', patch: { isArchived: true } };
    case 'unarchive':
      return { kind: 'update', patch: { isArchived: false } };
    case 'delete':
      return { kind: 'delete' };
  }
}
