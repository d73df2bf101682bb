// pattern: Functional Core
import type { FilterResult, Subscription } from "./types";

/** Creation and first fetch closer than this count as the same event. */
export const NEVER_FETCHED_TOLERANCE_MS = 60_000;

/**
 * A subscription counts as never fetched when it has no last-fetch time, or
 * when that time lies within the tolerance of its creation time.
 */
export function isNeverFetched(subscription: Subscription): boolean {
  const { createdAt, lastFetchedAt } = subscription;
  if (lastFetchedAt === null) {
    return true;
  }
  if (createdAt === null) {
    return false;
  }
  return (
    Math.abs(lastFetchedAt.getTime() - createdAt.getTime()) <
    NEVER_FETCHED_TOLERANCE_MS
  );
}

export function excludeNeverFetched(
  subscriptions: ReadonlyArray<Subscription>,
): FilterResult {
  const kept = subscriptions.filter((s) => !isNeverFetched(s));
  return {
    subscriptions: kept,
    removedCount: subscriptions.length - kept.length,
  };
}
