/**
 * Environment configuration
 */

import { z } from "zod";
import { DEFAULT_SITE_BASE_URL } from "./client/types.js";
import { DEFAULT_TIMEOUT_MS } from "./client/transport.js";
import { PocketConfigError } from "./utils/errors.js";

function requiredSecret(name: string) {
  return z.string().refine((value) => value.trim().length > 0, `${name} is required`);
}

const envSchema = z.object({
  POCKET_CONSUMER_KEY: requiredSecret("POCKET_CONSUMER_KEY"),
  POCKET_ACCESS_TOKEN: requiredSecret("POCKET_ACCESS_TOKEN"),
  POCKET_BASE_URL: z.string().url().default(DEFAULT_SITE_BASE_URL),
  POCKET_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface PocketConfig {
  consumerKey: string;
  accessToken: string;
  baseUrl: string;
  timeoutMs: number;
  logLevel: "debug" | "info" | "warn" | "error";
}

/**
 * Read configuration from environment variables
 *
 * @throws PocketConfigError listing every missing or invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PocketConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new PocketConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const config = parsed.data;
  return {
    consumerKey: config.POCKET_CONSUMER_KEY,
    accessToken: config.POCKET_ACCESS_TOKEN,
    baseUrl: config.POCKET_BASE_URL,
    timeoutMs: config.POCKET_TIMEOUT_MS,
    logLevel: config.LOG_LEVEL,
  };
}
