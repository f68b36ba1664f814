/**
 * @ballast/vault — Value-rebalancing vault engine.
 *
 * Holders deposit accepted assets for shares and redeem shares for a
 * pro-rata slice of what the vault holds. Anyone holding shares can
 * trigger a rebalance that pulls the vault back to its target
 * allocation through the best-quoting venue; the gain or loss is then
 * settled as fee shares or a manager penalty.
 *
 * Design rules:
 * - Every mutating call is all-or-nothing
 * - No floating point; bigint fixed point throughout
 * - A manager below the accountability threshold loses privileges
 * - State is persisted with an integrity hash and refused if tampered
 */

// Engine
export { VaultEngine } from "./vault-engine.js";
export type { VaultEngineOptions, RestoreOptions, VenueRegistration } from "./vault-engine.js";

// Building blocks
export { TargetAllocation } from "./allocation.js";
export { isAccountable } from "./accountability.js";
export { driftedAssets, isWithinTolerance, planDriftCorrection } from "./drift.js";
export type { Seller, Buyer, PlannedLeg, DriftPlan } from "./drift.js";
export { HoldingsBook } from "./holdings.js";
export { QuoteRouter, selectBestQuote } from "./quote-router.js";
export type { QuoteRouterOptions } from "./quote-router.js";
export { planSettlement } from "./settlement.js";
export type { SettlementInput } from "./settlement.js";
export { acceptedAssets, priceAsset, valueHoldings, weightBps } from "./valuation.js";
export type { PricedAsset } from "./valuation.js";
export { VenueRegistry } from "./venue-registry.js";
export type { PersistedVenue } from "./venue-registry.js";

// Errors
export { VaultError, isVaultError } from "./errors.js";
export type { VaultErrorCode, VaultErrorDetails } from "./errors.js";

// Persistence
export {
  InMemoryKeyValueStore,
  FileKeyValueStore,
  VaultStateRepository,
  VaultStateRecordSchema,
  computeStateHash,
} from "./state-store.js";
export type { KeyValueStore, VaultStateRecord, StoredVaultState } from "./state-store.js";

// Configuration & logging
export { ConfigSchema, loadConfig, toVaultParams } from "./config.js";
export type { EngineConfig } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";

// Types
export {
  SCALE,
  INITIAL_PRICE,
  WEIGHT_SUM,
  DEFAULT_VAULT_PARAMS,
  DEFAULT_MIN_OWNER_BPS,
} from "./types.js";
export type {
  VaultParams,
  AccountabilityPolicy,
  VenueSettings,
  VenueHandles,
  VenueConfig,
  VenueQuote,
  BestQuote,
  AssetValuation,
  Valuation,
  AllocationLine,
  DepositReceipt,
  Payout,
  PendingTransfer,
  RedeemReceipt,
  TradeRecord,
  FeeSettlement,
  RebalanceReport,
  LifetimeTotals,
} from "./types.js";
