import { z } from "zod";

export const REQUIRED_ENV_VARS = [
  "OMNIVORE_API_TOKEN",
  "OMNIVORE_HOST",
  "OMNIVORE_GRAPH_QL_PATH",
] as const;

const requiredVar = z.string().trim().min(1);

export const envSchema = z
  .object({
    OMNIVORE_API_TOKEN: requiredVar,
    OMNIVORE_HOST: requiredVar,
    OMNIVORE_GRAPH_QL_PATH: requiredVar,
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("warn"),
  })
  .transform((env) => ({
    apiToken: env.OMNIVORE_API_TOKEN,
    host: env.OMNIVORE_HOST,
    graphqlPath: env.OMNIVORE_GRAPH_QL_PATH,
    logLevel: env.LOG_LEVEL,
  }));

export type ExportConfig = Readonly<z.infer<typeof envSchema>>;
