// pattern: Functional Core
import { formatLocalDate } from "./dates";
import type { FolderGroup } from "./types";

export function opmlTitle(exportedAt: Date): string {
  return `Omnivore RSS Subscriptions Export - ${formatLocalDate(exportedAt)}`;
}

/**
 * Renders folder groups as an OPML 2.0 document. Wrapped groups become a
 * folder outline; the Uncategorized group's feeds sit directly in the body.
 * Subscriptions without a URL are left out.
 *
 * Attribute values are interpolated verbatim, not XML-escaped: a name or URL
 * containing `<`, `&` or `"` yields a malformed document.
 */
export function renderOpml(
  groups: ReadonlyArray<FolderGroup>,
  exportedAt: Date,
): string {
  const lines: Array<string> = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<opml version="2.0">',
    "  <head>",
    `    <title>${opmlTitle(exportedAt)}</title>`,
    "  </head>",
    "  <body>",
  ];

  for (const group of groups) {
    if (group.wrapped) {
      lines.push(`    <outline text="${group.name}" title="${group.name}">`);
    }

    for (const sub of group.subscriptions) {
      if (sub.url) {
        lines.push(
          `      <outline type="rss" text="${sub.name}" title="${sub.name}" xmlUrl="${sub.url}"/>`,
        );
      }
    }

    if (group.wrapped) {
      lines.push("    </outline>");
    }
  }

  lines.push("  </body>", "</opml>");
  return lines.join("\n");
}

export function countFeedOutlines(groups: ReadonlyArray<FolderGroup>): number {
  return groups.reduce(
    (total, group) =>
      total + group.subscriptions.filter((s) => Boolean(s.url)).length,
    0,
  );
}
