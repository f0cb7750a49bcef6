/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the API and the worker.
 * - Creates infra clients ONCE (db, redis, queue, vendor SDKs) and shares them.
 * - Keeps modules testable: composeDeps() takes the infra as a value, so tests hand
 *   in in-memory repos, cache and queue plus fake vendor ports.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (rate limits off in test, AI disabled without a key)
 *   belong HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';
import { createKyselyRepos, type AppRepos } from './repos';

import { createDb } from '../shared/db/db';
import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import { AccessTokenService } from '../shared/security/access-token';
import { EncryptionService } from '../shared/security/encryption';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { BullMqQueue, createRedisConnection } from '../shared/messaging/bullmq-queue';
import type { Queue } from '../shared/messaging/queue';

import { DisabledChatClient, type ChatClient } from '../shared/ai/chat-client';
import { OpenAiChatClient } from '../shared/ai/openai-chat-client';

import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';
import {
  createSubscriptionModule,
  StripeBillingGateway,
  type BillingGateway,
  type SubscriptionModule,
} from '../modules/subscriptions';
import {
  createEmailModule,
  ProviderMailFetcher,
  type EmailModule,
  type MailFetcher,
} from '../modules/emails';
import { createAnalyticsModule, type AnalyticsModule } from '../modules/analytics';
import { AiEngine, createAiInsightsModule, type AiInsightsModule } from '../modules/ai-insights';

/** Everything that talks to the outside world. */
export type AppInfra = {
  repos: AppRepos;
  cache: Cache;
  queue: Queue;
  chat: ChatClient;
  billing: BillingGateway;
  fetcher: MailFetcher;
  close: () => Promise<void>;
};

export type AppDeps = {
  logger: Logger;
  cache: Cache;
  queue: Queue;
  repos: AppRepos;

  rateLimiter: RateLimiter;
  passwordHasher: PasswordHasher;
  tokens: AccessTokenService;
  encryption: EncryptionService;

  // modules
  auth: AuthModule;
  subscriptions: SubscriptionModule;
  emails: EmailModule;
  analytics: AnalyticsModule;
  ai: AiInsightsModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildInfra(config: AppConfig): Promise<AppInfra> {
  const db = createDb(config.databaseUrl);

  // Redis is mandatory (cache / rate limits + job queue)
  const redis = await RedisCache.connect(config.redisUrl);
  const queueConnection = createRedisConnection(config.redisUrl);
  const queue = new BullMqQueue(queueConnection);

  const chat: ChatClient = config.openai.apiKey
    ? new OpenAiChatClient(config.openai.apiKey)
    : new DisabledChatClient();

  return {
    repos: createKyselyRepos(db),
    cache: redis,
    queue,
    chat,
    billing: new StripeBillingGateway({
      secretKey: config.stripe.secretKey,
      webhookSecret: config.stripe.webhookSecret,
    }),
    fetcher: new ProviderMailFetcher(config.gmail),
    close: async () => {
      await queue.close();
      await queueConnection.quit();
      await redis.close();
      await db.destroy();
    },
  };
}

export function composeDeps(
  config: AppConfig,
  infra: AppInfra,
  opts: { passwordHasher?: PasswordHasher; now?: () => Date } = {},
): AppDeps {
  const { repos, cache, queue } = infra;
  const now = opts.now;

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const passwordHasher =
    opts.passwordHasher ?? new BcryptPasswordHasher({ cost: config.bcryptCost });
  const tokens = new AccessTokenService(config.auth.secretKey, {
    algorithm: config.auth.algorithm,
    expireMinutes: config.auth.accessTokenExpireMinutes,
  });
  const encryption = new EncryptionService(config.encryptionKeyBase64);

  const engine = new AiEngine({
    chat: infra.chat,
    logger,
    models: { analysis: config.openai.model, classifier: config.openai.classifierModel },
  });

  // modules (no HTTP / no business logic here)
  const auth = createAuthModule({
    userRepo: repos.userRepo,
    passwordHasher,
    tokens,
    logger,
    rateLimiter,
  });

  const subscriptions = createSubscriptionModule({
    subscriptionRepo: repos.subscriptionRepo,
    userRepo: repos.userRepo,
    billing: infra.billing,
    priceIds: config.stripe.priceIds,
    logger,
  });

  const emails = createEmailModule({
    userRepo: repos.userRepo,
    emailRepo: repos.emailRepo,
    accountRepo: repos.accountRepo,
    threadRepo: repos.threadRepo,
    usageGuard: subscriptions.usageGuard,
    fetcher: infra.fetcher,
    encryption,
    queue,
    logger,
    now,
  });

  const analytics = createAnalyticsModule({ emailRepo: repos.emailRepo, now });

  const ai = createAiInsightsModule({
    userRepo: repos.userRepo,
    emailRepo: repos.emailRepo,
    threadRepo: repos.threadRepo,
    insightRepo: repos.insightRepo,
    senderProfileRepo: repos.senderProfileRepo,
    engine,
    usageGuard: subscriptions.usageGuard,
    queue,
    logger,
    now,
  });

  return {
    logger,
    cache,
    queue,
    repos,
    rateLimiter,
    passwordHasher,
    tokens,
    encryption,
    auth,
    subscriptions,
    emails,
    analytics,
    ai,
    close: infra.close,
  };
}

export async function buildDeps(config: AppConfig): Promise<AppDeps> {
  return composeDeps(config, await buildInfra(config));
}
