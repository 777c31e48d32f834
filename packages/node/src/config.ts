/**
 * @rightsline/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Domain defaults
  BASE_CURRENCY: z.string().min(3).max(3).default("USD"),
  PAYOUT_DECIMALS: z.coerce.number().int().min(0).max(6).default(2),
  SPLIT_EPSILON: z
    .string()
    .regex(/^\d+(\.\d+)?$/, "SPLIT_EPSILON must be a non-negative decimal")
    .default("0.001"),
  EXPIRY_HORIZON_DAYS: z.coerce.number().int().min(0).default(90),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
