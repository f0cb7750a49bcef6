/**
 * src/modules/auth/helpers/build-auth-result.ts
 *
 * Issues the access token and shapes the register/login response.
 */

import type { AccessTokenService } from '../../../shared/security/access-token';
import { toUserResponse, type User } from '../../users';
import type { AuthResult } from '../auth.types';

export async function buildAuthResult(tokens: AccessTokenService, user: User): Promise<AuthResult> {
  const issued = await tokens.issue({ userId: user.id, email: user.email });

  return {
    access_token: issued.token,
    token_type: 'bearer',
    expires_in: issued.expiresInSeconds,
    user: toUserResponse(user),
  };
}
