/**
 * src/app/repos.ts
 *
 * WHY:
 * - The repository set every module is built from, in one type.
 * - Production builds it over Kysely; tests pass in-memory implementations
 *   of the same interfaces.
 */

import type { DbExecutor } from '../shared/db/db';
import {
  KyselyAiInsightRepo,
  KyselySenderProfileRepo,
  type AiInsightRepo,
  type SenderProfileRepo,
} from '../modules/ai-insights';
import {
  KyselyEmailAccountRepo,
  KyselyEmailRepo,
  KyselyEmailThreadRepo,
  type EmailAccountRepo,
  type EmailRepo,
  type EmailThreadRepo,
} from '../modules/emails';
import { KyselySubscriptionRepo, type SubscriptionRepo } from '../modules/subscriptions';
import { KyselyUserRepo, type UserRepo } from '../modules/users';

export type AppRepos = {
  userRepo: UserRepo;
  subscriptionRepo: SubscriptionRepo;
  accountRepo: EmailAccountRepo;
  emailRepo: EmailRepo;
  threadRepo: EmailThreadRepo;
  insightRepo: AiInsightRepo;
  senderProfileRepo: SenderProfileRepo;
};

export function createKyselyRepos(db: DbExecutor): AppRepos {
  return {
    userRepo: new KyselyUserRepo(db),
    subscriptionRepo: new KyselySubscriptionRepo(db),
    accountRepo: new KyselyEmailAccountRepo(db),
    emailRepo: new KyselyEmailRepo(db),
    threadRepo: new KyselyEmailThreadRepo(db),
    insightRepo: new KyselyAiInsightRepo(db),
    senderProfileRepo: new KyselySenderProfileRepo(db),
  };
}
