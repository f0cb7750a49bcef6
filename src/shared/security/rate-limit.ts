/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Brute-force protection on the credential endpoints:
 *   - login attempts: 5 / 15min per email, 20 / 15min per IP
 *   - registrations: 5 / 15min per email, 20 / 15min per IP
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: "rl" })
 * - await limiter.hitOrThrow({ key: "login:ip:1.2.3.4", limit: 20, windowSeconds: 900 })
 * - const allowed = await limiter.hitOrSkip({ key: "...", limit: 3, windowSeconds: 3600 })
 *
 * TWO MODES:
 * - hitOrThrow: increments counter → throws RateLimitError if over limit (HTTP 429).
 * - hitOrSkip: increments counter → returns false if over limit (no throw). For callers
 *   that degrade silently instead of failing the request.
 *
 * ATOMICITY:
 * - Both methods use INCR-then-check, not check-then-INCR. INCR is atomic in Redis,
 *   so two concurrent requests cannot both slip under the limit.
 *
 * DISABLING:
 * - Pass `disabled: true` in opts to skip all checks (used in tests via di.ts).
 * - Never check NODE_ENV here; the composition root decides that.
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export type RateLimitRule = { limit: number; windowSeconds: number };

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  async hitOrThrow(input: { key: string } & RateLimitRule): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    if (current > input.limit) {
      throw new RateLimitError(fullKey, input.limit, input.windowSeconds);
    }
  }

  async hitOrSkip(input: { key: string } & RateLimitRule): Promise<boolean> {
    if (this.opts?.disabled) return true;

    const fullKey = this.buildKey(input.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: input.windowSeconds });

    return current <= input.limit;
  }
}
