// pattern: Imperative Shell
import { formatSubscription } from "./report";
import type { Subscription } from "./types";

/**
 * Receives progress of an export run. Purely observational.
 */
export type Reporter = {
  readonly fetching: () => void;
  readonly filtered: (removedCount: number) => void;
  readonly subscriptions: (subscriptions: ReadonlyArray<Subscription>) => void;
  readonly exported: (outputPath: string) => void;
};

export type LineSink = (line: string) => void;

/**
 * Creates a reporter that writes plain text lines, to the console unless
 * another sink is given.
 */
export function createConsoleReporter(
  write: LineSink = (line) => console.log(line),
): Reporter {
  return {
    fetching() {
      write("Fetching subscriptions...");
    },
    filtered(removedCount) {
      write(`\nFiltered out ${removedCount} never-fetched subscriptions`);
    },
    subscriptions(subscriptions) {
      write(`\nFound ${subscriptions.length} RSS subscriptions:`);
      for (const sub of subscriptions) {
        write(`\n${formatSubscription(sub).join("\n")}`);
      }
    },
    exported(outputPath) {
      write(`\nExported subscriptions to ${outputPath}`);
    },
  };
}
