// pattern: Imperative Shell
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { errorMessage } from "../errors";
import { formatLocalDateStamp } from "./dates";

export function exportFileName(exportedAt: Date): string {
  return `omnivore_rss_export_${formatLocalDateStamp(exportedAt)}.opml`;
}

/**
 * Writes the document into `outputDir`, replacing any existing file of the
 * same name, and returns the path written.
 */
export function writeOpml(
  outputDir: string,
  exportedAt: Date,
  opml: string,
): string {
  const outputPath = join(outputDir, exportFileName(exportedAt));
  try {
    writeFileSync(outputPath, opml, "utf-8");
  } catch (err) {
    throw new Error(`failed to write OPML to ${outputPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return outputPath;
}
