// pattern: Imperative Shell
import { parseArgs } from "node:util";
import type { Logger } from "pino";
import { loadConfig } from "./config";
import { runExport } from "./export";
import type { ExportOptions, ExportResult, Reporter } from "./export";

export function parseCliArgs(argv: ReadonlyArray<string>): ExportOptions {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      "exclude-unfetched": { type: "boolean", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return { excludeUnfetched: values["exclude-unfetched"] ?? false };
}

export type CliDeps = {
  readonly reporter: Reporter;
  readonly createLogger: (level: string) => Logger;
  readonly outputDir: string;
  readonly now: Date;
};

/**
 * Parses arguments and configuration, then runs the export. Configuration
 * is validated before any network call is made.
 */
export async function runCli(
  argv: ReadonlyArray<string>,
  env: Readonly<Record<string, string | undefined>>,
  deps: CliDeps,
): Promise<ExportResult> {
  const options = parseCliArgs(argv);
  const config = loadConfig(env);
  const logger = deps.createLogger(config.logLevel);

  logger.debug(
    { host: config.host, excludeUnfetched: options.excludeUnfetched },
    "config loaded",
  );

  return runExport({
    config,
    options,
    reporter: deps.reporter,
    logger,
    outputDir: deps.outputDir,
    now: deps.now,
  });
}
