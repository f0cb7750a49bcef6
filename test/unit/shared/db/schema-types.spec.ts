import { describe, it, expectTypeOf } from 'vitest';
import type { Insertable, Selectable, Updateable } from 'kysely';
import type {
  AiInsightsTable,
  EmailThreadsTable,
  EmailsTable,
  SubscriptionsTable,
  UsersTable,
} from '../../../../src/shared/db/schema';

/**
 * Column typing checks. These assertions are verified by `tsc --noEmit` (the test tree is
 * part of the type-check); at run time they only need to load.
 */

describe('db schema column types', () => {
  it('selects generated timestamps as Date', () => {
    expectTypeOf<Selectable<EmailsTable>['created_at']>().toEqualTypeOf<Date>();
    expectTypeOf<Selectable<AiInsightsTable>['generated_at']>().toEqualTypeOf<Date>();
  });

  it('selects nullable timestamps as Date | null', () => {
    expectTypeOf<Selectable<EmailsTable>['received_date']>().toEqualTypeOf<Date | null>();
    expectTypeOf<Selectable<UsersTable>['last_email_sync_at']>().toEqualTypeOf<Date | null>();
    expectTypeOf<Selectable<SubscriptionsTable>['current_period_end']>().toEqualTypeOf<
      Date | null
    >();
  });

  it('keeps generated scalars and unions intact', () => {
    expectTypeOf<Selectable<UsersTable>['is_active']>().toEqualTypeOf<boolean>();
    expectTypeOf<Selectable<UsersTable>['subscription_tier']>().toEqualTypeOf<
      'free_trial' | 'starter' | 'professional' | 'enterprise'
    >();
  });

  it('reads jsonb as parsed values and writes strings', () => {
    expectTypeOf<Selectable<EmailThreadsTable>['ai_insights']>().toEqualTypeOf<Record<
      string,
      unknown
    > | null>();
    expectTypeOf<Updateable<EmailThreadsTable>['ai_insights']>().toEqualTypeOf<
      string | null | undefined
    >();
  });

  it('makes defaulted columns optional on insert', () => {
    expectTypeOf<{
      email: string;
      password_hash: string;
      full_name: null;
      stripe_customer_id: null;
    }>().toMatchTypeOf<Insertable<UsersTable>>();
  });
});
