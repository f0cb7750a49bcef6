/**
 * src/modules/emails/email.errors.ts
 *
 * WHY:
 * - Emails module owns its error semantics.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const EmailErrors = {
  accountAlreadyConnected(meta?: AppErrorMeta) {
    return AppError.conflict('Email account already connected', meta);
  },

  accountNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Email account not found', meta);
  },

  missingCredentials(message: string, meta?: AppErrorMeta) {
    return AppError.validationError(message, meta);
  },

  emailNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Email not found', meta);
  },

  invalidAction(meta?: AppErrorMeta) {
    return AppError.badRequest('Invalid action', meta);
  },
} as const;
