/**
 * src/modules/auth/policies/login-gating.policy.ts
 *
 * WHY:
 * - Login has several failure reasons; the client only ever sees two of them.
 * - Keeping the decision pure makes every branch unit-testable.
 *
 * RULES:
 * - Unknown email and wrong password map to the SAME error (no account enumeration).
 * - The inactive check runs only after the password is proven: a deactivated account
 *   is not revealed to someone without its password.
 */

import type { AppError } from '../../../shared/http/errors';
import { AuthErrors } from '../auth.errors';

export type LoginGatingInput = {
  userFound: boolean;
  passwordValid: boolean;
  isActive: boolean;
};

export type LoginGatingFailure = {
  reason: 'user_not_found' | 'wrong_password' | 'inactive';
  error: AppError;
};

export function getLoginGatingFailure(input: LoginGatingInput): LoginGatingFailure | null {
  if (!input.userFound) {
    return { reason: 'user_not_found', error: AuthErrors.invalidCredentials() };
  }
  if (!input.passwordValid) {
    return { reason: 'wrong_password', error: AuthErrors.invalidCredentials() };
  }
  if (!input.isActive) {
    return { reason: 'inactive', error: AuthErrors.inactiveUser() };
  }
  return null;
}
