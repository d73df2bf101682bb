import "dotenv/config";
import pino from "pino";
import { runCli } from "./cli";
import { errorMessage } from "./errors";
import { createConsoleReporter } from "./export";
import { createLogger } from "./logger";

async function main(): Promise<void> {
  await runCli(process.argv.slice(2), process.env, {
    reporter: createConsoleReporter(),
    createLogger: (level) => createLogger(level, pino.destination(2)),
    outputDir: ".",
    now: new Date(),
  });
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  console.error(err);
  process.exit(1);
});
