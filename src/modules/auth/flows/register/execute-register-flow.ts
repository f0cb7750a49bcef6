/**
 * src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin while isolating orchestration.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Rate limit at the start (before any DB work).
 * - Never log raw emails or passwords: emailKey + emailDomain only.
 */

import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { AccessTokenService } from '../../../../shared/security/access-token';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';

import type { UserRepo } from '../../../users';
import { AuthErrors } from '../../auth.errors';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import type { AuthResult, RequestMeta } from '../../auth.types';
import { buildAuthResult } from '../../helpers/build-auth-result';
import { emailDomain, emailKey } from '../../helpers/email-key';

export type RegisterParams = RequestMeta & {
  email: string;
  password: string;
  fullName: string | null;
};

export async function executeRegisterFlow(
  deps: {
    userRepo: UserRepo;
    passwordHasher: PasswordHasher;
    tokens: AccessTokenService;
    logger: Logger;
    rateLimiter: RateLimiter;
  },
  params: RegisterParams,
): Promise<AuthResult> {
  const email = params.email.toLowerCase();
  const key = emailKey(email);

  deps.logger.info({
    msg: 'auth.register.start',
    flow: 'auth.register',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey: key,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:email:${key}`,
    ...AUTH_RATE_LIMITS.register.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `register:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.register.perIp,
  });

  const existing = await deps.userRepo.findByEmail(email);
  if (existing) {
    deps.logger.info({
      msg: 'auth.register.duplicate',
      flow: 'auth.register',
      requestId: params.requestId,
      emailKey: key,
    });
    throw AuthErrors.alreadyRegistered();
  }

  const passwordHash = await deps.passwordHasher.hash(params.password);
  const user = await deps.userRepo.insert({ email, passwordHash, fullName: params.fullName });

  deps.logger.info({
    msg: 'auth.register.success',
    flow: 'auth.register',
    requestId: params.requestId,
    userId: user.id,
  });

  return buildAuthResult(deps.tokens, user);
}
