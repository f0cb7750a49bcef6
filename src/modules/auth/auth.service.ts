/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point for register, login and "who am I".
 * - Register/login orchestration lives in flows/; the service stays thin.
 *
 * RULES:
 * - Never store/log raw passwords or tokens.
 * - Rate limit at the start of each flow (before any DB work).
 */

import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { AccessTokenService } from '../../shared/security/access-token';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';

import { toUserResponse, type UserRepo, type UserResponse } from '../users';

import { AuthErrors } from './auth.errors';
import type { AuthResult } from './auth.types';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';

export type AuthServiceDeps = {
  userRepo: UserRepo;
  passwordHasher: PasswordHasher;
  tokens: AccessTokenService;
  logger: Logger;
  rateLimiter: RateLimiter;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  async register(params: RegisterParams): Promise<AuthResult> {
    return executeRegisterFlow(this.deps, params);
  }

  async login(params: LoginParams): Promise<AuthResult> {
    return executeLoginFlow(this.deps, params);
  }

  async me(userId: string): Promise<UserResponse> {
    const user = await this.deps.userRepo.findById(userId);
    if (!user || !user.isActive) {
      throw AuthErrors.userUnavailable();
    }
    return toUserResponse(user);
  }
}
