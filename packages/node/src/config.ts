/**
 * @ledgerline/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const BooleanFlag = z.enum(["true", "false"]).transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Persistence
  STORE_DRIVER: z.enum(["memory", "sqlite"]).default("memory"),
  DATABASE_PATH: z.string().min(1).default("ledgerline.db"),

  // Domain defaults
  DEFAULT_CURRENCY: z
    .string()
    .regex(/^[A-Z]{3}$/, "must be a three-letter currency code")
    .default("USD"),
  ALERT_WARNING_PERCENT: z.coerce.number().min(0).max(100).default(75),
  SEED_DEFAULT_ACCOUNTS: BooleanFlag.default("true"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
