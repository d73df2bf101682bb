import pino from "pino";

/**
 * Creates a configured pino logger instance for structured JSON output.
 *
 * - Returns log level as string label (not numeric) for readability
 * - ISO 8601 timestamps
 * - Writes to the given destination; the CLI passes stderr so the
 *   subscription report on stdout is not interleaved with log lines
 *
 * @param level - Minimum level to emit
 * @param destination - Stream to write to, stdout when omitted
 */
export function createLogger(
  level: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
