import { ConfigurationError } from "../errors";
import { envSchema, REQUIRED_ENV_VARS } from "./schema";
import type { ExportConfig } from "./schema";

/**
 * Builds the export configuration from an environment record. Every missing
 * required variable is reported in one error, so nothing downstream ever
 * runs against a partial configuration.
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>>,
): ExportConfig {
  const result = envSchema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues;
  const missing = REQUIRED_ENV_VARS.filter((name) =>
    issues.some((i) => i.path[0] === name),
  );

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(", ")}`,
      missing,
    );
  }

  const details = issues
    .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
    .join("\n");
  throw new ConfigurationError(`invalid configuration:\n${details}`);
}

export type { ExportConfig };
