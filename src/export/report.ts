// pattern: Functional Core
import { formatUtcDate } from "./dates";
import type { Subscription } from "./types";

/**
 * Human-readable lines for one subscription, populated fields only, in a
 * fixed order.
 */
export function formatSubscription(sub: Subscription): ReadonlyArray<string> {
  const lines = [`Name: ${sub.name}`];

  if (sub.url) lines.push(`URL: ${sub.url}`);
  if (sub.folder) lines.push(`Folder: ${sub.folder}`);
  if (sub.description) lines.push(`Description: ${sub.description}`);
  if (sub.newsletterEmail) lines.push(`Newsletter email: ${sub.newsletterEmail}`);
  if (sub.createdAt) lines.push(`Created at: ${formatUtcDate(sub.createdAt)}`);
  if (sub.lastFetchedAt) {
    lines.push(`Last fetched at: ${formatUtcDate(sub.lastFetchedAt)}`);
  }
  if (sub.refreshedAt) lines.push(`Refreshed at: ${formatUtcDate(sub.refreshedAt)}`);
  if (sub.count !== null) lines.push(`Count: ${sub.count}`);
  if (sub.icon) lines.push(`Icon: ${sub.icon}`);
  if (sub.isPrivate !== null) lines.push(`Is private: ${sub.isPrivate}`);
  if (sub.autoAddToLibrary !== null) {
    lines.push(`Auto add to library: ${sub.autoAddToLibrary}`);
  }
  if (sub.fetchContent !== null) lines.push(`Fetch content: ${sub.fetchContent}`);
  if (sub.failedAt) lines.push(`Failed at: ${formatUtcDate(sub.failedAt)}`);

  return lines;
}
