/**
 * src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Credential checks are decided by a pure policy; the flow only gathers facts.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Rate limit at the start (before any DB work).
 * - The password is verified even for an unknown email (same timing profile).
 */

import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { AccessTokenService } from '../../../../shared/security/access-token';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';

import type { UserRepo } from '../../../users';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import type { AuthResult, RequestMeta } from '../../auth.types';
import { buildAuthResult } from '../../helpers/build-auth-result';
import { emailDomain, emailKey } from '../../helpers/email-key';
import { getLoginGatingFailure } from '../../policies/login-gating.policy';

// bcrypt hash of a random string; compared against when the email is unknown.
const DUMMY_HASH = '$2b$04$CwTycUXWue0Thq9StjUM0uJ8.7pG0J8e3s6rJ1Xf2N3xQhZ5lY8dK';

export type LoginParams = RequestMeta & {
  email: string;
  password: string;
};

export async function executeLoginFlow(
  deps: {
    userRepo: UserRepo;
    passwordHasher: PasswordHasher;
    tokens: AccessTokenService;
    logger: Logger;
    rateLimiter: RateLimiter;
  },
  params: LoginParams,
): Promise<AuthResult> {
  const email = params.email.toLowerCase();
  const key = emailKey(email);

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey: key,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${key}`,
    ...AUTH_RATE_LIMITS.login.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const user = await deps.userRepo.findByEmail(email);
  const passwordValid = await deps.passwordHasher.verify(
    params.password,
    user?.passwordHash ?? DUMMY_HASH,
  );

  const failure = getLoginGatingFailure({
    userFound: user !== undefined,
    passwordValid: user !== undefined && passwordValid,
    isActive: user?.isActive ?? false,
  });

  if (failure || !user) {
    deps.logger.info({
      msg: 'auth.login.failed',
      flow: 'auth.login',
      requestId: params.requestId,
      emailKey: key,
      reason: failure?.reason ?? 'user_not_found',
    });
    throw failure?.error ?? new Error('auth.login: gating passed without a user');
  }

  deps.logger.info({
    msg: 'auth.login.success',
    flow: 'auth.login',
    requestId: params.requestId,
    userId: user.id,
  });

  return buildAuthResult(deps.tokens, user);
}
