/**
 * Runtime Configuration
 *
 * Environment-driven settings for the HTTP server and the tool layer,
 * validated once at startup.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const runtimeConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  SLIDE_LIBRARY_PATH: z.string().min(1).optional(),
  DECK_OUTPUT_DIR: z.string().min(1).default("output"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_DIR: z.string().min(1).optional(),
});

export type LogLevelSetting = typeof LOG_LEVELS[number];

export type RuntimeConfig = {
  port: number;
  slideLibraryPath?: string;
  deckOutputDir: string;
  logLevel: LogLevelSetting;
  logDir?: string;
};

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = runtimeConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${fromZodError(parsed.error).message}`);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    slideLibraryPath: data.SLIDE_LIBRARY_PATH,
    deckOutputDir: data.DECK_OUTPUT_DIR,
    logLevel: data.LOG_LEVEL,
    logDir: data.LOG_DIR,
  };
}
