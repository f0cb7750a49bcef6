/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response types for register/login.
 *
 * RULES:
 * - Never include raw passwords or hashes in response types.
 */

import type { UserResponse } from '../users';

export type AuthResult = {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
  user: UserResponse;
};

export type RequestMeta = {
  ip: string;
  requestId: string;
};
