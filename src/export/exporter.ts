// pattern: Imperative Shell
import type { Logger } from "pino";
import type { ExportConfig } from "../config";
import { fetchSubscriptions } from "./client";
import { excludeNeverFetched } from "./filter";
import { groupByFolder } from "./grouper";
import { countFeedOutlines, renderOpml } from "./opml";
import type { Reporter } from "./reporter";
import type { ExportOptions, ExportResult } from "./types";
import { writeOpml } from "./writer";

export type ExportDeps = {
  readonly config: ExportConfig;
  readonly options: ExportOptions;
  readonly reporter: Reporter;
  readonly logger: Logger;
  readonly outputDir: string;
  readonly now: Date;
};

/**
 * Runs one export: fetch, optionally drop never-fetched subscriptions,
 * report, group by folder and write the OPML file. The file is only written
 * after a fully successful fetch; any failure propagates to the caller.
 */
export async function runExport(deps: ExportDeps): Promise<ExportResult> {
  const { config, options, reporter, logger } = deps;

  reporter.fetching();
  const fetched = await fetchSubscriptions(config, logger);
  logger.info({ fetchedCount: fetched.length }, "subscriptions fetched");

  let subscriptions = fetched;
  let removedCount = 0;
  if (options.excludeUnfetched) {
    const filtered = excludeNeverFetched(fetched);
    subscriptions = filtered.subscriptions;
    removedCount = filtered.removedCount;
    logger.info({ removedCount }, "never-fetched subscriptions excluded");
    if (removedCount > 0) {
      reporter.filtered(removedCount);
    }
  }

  reporter.subscriptions(subscriptions);

  const groups = groupByFolder(subscriptions);
  const opml = renderOpml(groups, deps.now);
  const outputPath = writeOpml(deps.outputDir, deps.now, opml);
  const exportedFeedCount = countFeedOutlines(groups);

  logger.info(
    { outputPath, folderCount: groups.length, exportedFeedCount },
    "opml export written",
  );
  reporter.exported(outputPath);

  return {
    outputPath,
    fetchedCount: fetched.length,
    removedCount,
    exportedFeedCount,
  };
}
