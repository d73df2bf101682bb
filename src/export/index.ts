export {
  fetchSubscriptions,
  parseSubscriptionsResponse,
  endpointUrl,
  SUBSCRIPTIONS_QUERY,
} from "./client";
export {
  excludeNeverFetched,
  isNeverFetched,
  NEVER_FETCHED_TOLERANCE_MS,
} from "./filter";
export { groupByFolder, UNCATEGORIZED } from "./grouper";
export { renderOpml, opmlTitle, countFeedOutlines } from "./opml";
export { writeOpml, exportFileName } from "./writer";
export { formatSubscription } from "./report";
export { createConsoleReporter } from "./reporter";
export type { Reporter, LineSink } from "./reporter";
export { runExport } from "./exporter";
export type { ExportDeps } from "./exporter";
export type {
  Subscription,
  FilterResult,
  FolderGroup,
  ExportOptions,
  ExportResult,
} from "./types";
