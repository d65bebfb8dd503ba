import { z } from "zod";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  HOST: z.string().nonempty().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  // Passed straight to body-parser, e.g. "100kb" or "1mb".
  JSON_BODY_LIMIT: z.string().nonempty().default("100kb"),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface Config {
  host: string;
  port: number;
  jsonBodyLimit: string;
  logLevel: LogLevel;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const env = envSchema.parse(source);
  return {
    host: env.HOST,
    port: env.PORT,
    jsonBodyLimit: env.JSON_BODY_LIMIT,
    // Jest sets NODE_ENV=test; keep test output quiet unless asked otherwise.
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info"),
  };
}

const config = loadConfig();

export default config;
