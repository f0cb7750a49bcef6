/**
 * src/modules/emails/policies/sync-window.policy.ts
 *
 * WHY:
 * - Where a sync starts, how much it fetches and how it is batched are decisions,
 *   not plumbing. Kept pure so they are unit-testable.
 */

export const SYNC_MAX_MESSAGES = 500;
export const SYNC_BATCH_SIZE = 50;
export const SYNC_DEFAULT_LOOKBACK_DAYS = 30;
export const INCREMENTAL_SYNC_STALE_SECONDS = 3600;

const DAY_MS = 24 * 60 * 60 * 1000;

/** last sync → configured start date → 30 days back. */
export function syncSince(
  account: { lastSyncAt: Date | null; syncFromDate: Date | null },
  now: Date,
): Date {
  return (
    account.lastSyncAt ??
    account.syncFromDate ??
    new Date(now.getTime() - SYNC_DEFAULT_LOOKBACK_DAYS * DAY_MS)
  );
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) throw new Error('chunk size must be >= 1');
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export function staleSyncCutoff(now: Date): Date {
  return new Date(now.getTime() - INCREMENTAL_SYNC_STALE_SECONDS * 1000);
}
