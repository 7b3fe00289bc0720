/**
 * @multicustody/node: Configuration.
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
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // XRPL
  XRPL_URL: z.string().url().default("wss://s.altnet.rippletest.net:51233"),
  MULTISIG_ACCOUNT: z.string().min(1),
  SIGNER_SEED: z.string().min(1),
  FEE_DROPS: z.string().regex(/^\d+$/, "FEE_DROPS must be a whole number of drops").optional(),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(15).default(6),

  // Coordinator
  STORE_PATH: z.string().min(1).default("./data/pending.json"),
  EXPIRY_WINDOW_MS: z.coerce.number().int().min(60_000).default(3_600_000),
  RECONCILE_INTERVAL_MS: z.coerce.number().int().min(1_000).default(60_000),
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
