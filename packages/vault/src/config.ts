/**
 * @ballast/vault — Configuration.
 *
 * Loads and validates engine configuration from environment variables
 * using Zod.
 */

import { z } from "zod";
import { DEFAULT_MIN_OWNER_BPS, DEFAULT_VAULT_PARAMS } from "./types.js";
import type { AccountabilityPolicy, VaultParams } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

const bps = (fallback: number) => z.coerce.number().int().min(0).max(10_000).default(fallback);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Rebalancing
  BALLAST_DRIFT_TOLERANCE_BPS: bps(DEFAULT_VAULT_PARAMS.driftToleranceBps),
  BALLAST_VALUE_LOSS_BPS: bps(DEFAULT_VAULT_PARAMS.valueLossBps),
  BALLAST_QUOTE_SLIPPAGE_BPS: bps(DEFAULT_VAULT_PARAMS.quoteSlippageBps),

  // Accountability
  BALLAST_MIN_OWNER_BPS: bps(DEFAULT_MIN_OWNER_BPS),

  // Initial fee split
  BALLAST_OWNER_FEE_BPS: bps(DEFAULT_VAULT_PARAMS.ownerFeeBps),
  BALLAST_CALLER_FEE_BPS: bps(DEFAULT_VAULT_PARAMS.callerFeeBps),

  // Persistence
  BALLAST_STATE_DIR: z.string().min(1).optional(),
});

export type EngineConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  return ConfigSchema.parse(env);
}

/**
 * Engine parameters described by a loaded configuration.
 */
export function toVaultParams(config: EngineConfig): {
  readonly params: VaultParams;
  readonly accountability: AccountabilityPolicy;
} {
  return {
    params: {
      driftToleranceBps: config.BALLAST_DRIFT_TOLERANCE_BPS,
      valueLossBps: config.BALLAST_VALUE_LOSS_BPS,
      quoteSlippageBps: config.BALLAST_QUOTE_SLIPPAGE_BPS,
      ownerFeeBps: config.BALLAST_OWNER_FEE_BPS,
      callerFeeBps: config.BALLAST_CALLER_FEE_BPS,
    },
    accountability: { minOwnerBps: config.BALLAST_MIN_OWNER_BPS },
  };
}
