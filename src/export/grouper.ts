// pattern: Functional Core
import type { FolderGroup, Subscription } from "./types";

export const UNCATEGORIZED = "Uncategorized";

/**
 * Partitions subscriptions by folder, keeping folders in first-seen order and
 * subscriptions in input order within each folder. Absent or empty folders
 * land in the Uncategorized bucket.
 */
export function groupByFolder(
  subscriptions: ReadonlyArray<Subscription>,
): ReadonlyArray<FolderGroup> {
  const groupMap = new Map<string, Array<Subscription>>();

  for (const subscription of subscriptions) {
    const folder = subscription.folder || UNCATEGORIZED;
    const group = groupMap.get(folder) ?? [];
    group.push(subscription);
    groupMap.set(folder, group);
  }

  return Array.from(groupMap.entries()).map(([name, members]) => ({
    name,
    wrapped: name !== UNCATEGORIZED,
    subscriptions: members,
  }));
}
