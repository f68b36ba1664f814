/**
 * Vault Types
 *
 * Domain types for the rebalancing vault engine.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts are bigint in memory and base-10 strings when persisted
 * - USD amounts carry USD_DECIMALS, shares carry SHARE_DECIMALS
 */

import type {
  AssetId,
  Bps,
  HolderId,
  ShareAmount,
  UsdValue,
  VenueExecutor,
  VenueQuoter,
} from "@ballast/types";

// =============================================================================
// Constants
// =============================================================================

/** Share amounts are 18-decimal fixed point. */
export const SCALE = 10n ** 18n;

/** Share price a fresh (or fully redeemed) vault starts at: $1.00. */
export const INITIAL_PRICE: UsdValue = 100_000_000n;

/** Target weights are integer percentages summing to this. */
export const WEIGHT_SUM = 100;

// =============================================================================
// Parameters
// =============================================================================

/**
 * Tunables fixed at construction.
 * Fee split values are the initial state; the manager may change them.
 */
export interface VaultParams {
  /** Max |actual − target| weight before trading, in bps of total value. */
  readonly driftToleranceBps: Bps;
  /** Max drop in total value one rebalance may cause, in bps. */
  readonly valueLossBps: Bps;
  /** Downward allowance applied to the winning quote, in bps. */
  readonly quoteSlippageBps: Bps;
  readonly ownerFeeBps: Bps;
  readonly callerFeeBps: Bps;
}

export const DEFAULT_VAULT_PARAMS: VaultParams = {
  driftToleranceBps: 200,
  valueLossBps: 50,
  quoteSlippageBps: 500,
  ownerFeeBps: 0,
  callerFeeBps: 0,
};

/**
 * Manager accountability policy. A vault built without one never
 * gates its manager.
 */
export interface AccountabilityPolicy {
  readonly minOwnerBps: Bps;
}

export const DEFAULT_MIN_OWNER_BPS: Bps = 500;

// =============================================================================
// Venues
// =============================================================================

export interface VenueSettings {
  readonly feeTier: number;
  readonly enabled: boolean;
  /** False if the venue only trades the wrapped form of native currency. */
  readonly tradesNative: boolean;
}

export interface VenueHandles {
  readonly executor: VenueExecutor;
  readonly quoter: VenueQuoter;
}

export interface VenueConfig extends VenueSettings, VenueHandles {
  readonly id: number;
}

/** A venue's answer for one quote round. null means "no quote". */
export interface VenueQuote {
  readonly venueId: number;
  readonly amountOut: bigint | null;
  readonly error?: string;
}

export interface BestQuote {
  readonly venueId: number;
  readonly amountOut: bigint;
}

// =============================================================================
// Valuation & Allocation
// =============================================================================

export interface AssetValuation {
  readonly asset: AssetId;
  readonly units: bigint;
  readonly price: UsdValue;
  readonly decimals: number;
  readonly value: UsdValue;
}

export interface Valuation {
  readonly assets: readonly AssetValuation[];
  readonly total: UsdValue;
}

export interface AllocationLine {
  readonly asset: AssetId;
  readonly units: bigint;
  readonly value: UsdValue;
  /** Share of total vault value, in bps. */
  readonly weightBps: number;
  /** Target share, in bps (0 for assets outside the table). */
  readonly targetBps: number;
}

// =============================================================================
// Operation results
// =============================================================================

export interface DepositReceipt {
  readonly holder: HolderId;
  readonly asset: AssetId;
  readonly amount: bigint;
  readonly valueUsd: UsdValue;
  readonly sharesMinted: ShareAmount;
  readonly sharePrice: UsdValue;
}

export interface Payout {
  readonly asset: AssetId;
  readonly amount: bigint;
}

/**
 * A transfer the vault owes but has not delivered. Its amount is
 * already out of the holdings book.
 */
export interface PendingTransfer {
  readonly to: HolderId;
  readonly asset: AssetId;
  readonly amount: bigint;
}

export interface RedeemReceipt {
  readonly holder: HolderId;
  readonly sharesBurned: ShareAmount;
  readonly payouts: readonly Payout[];
  readonly sharePrice: UsdValue;
}

export interface TradeRecord {
  readonly venueId: number | "external";
  readonly assetIn: AssetId;
  readonly assetOut: AssetId;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  readonly quotedOut: bigint | null;
  readonly minAmountOut: bigint | null;
  readonly wrapped: boolean;
}

export interface FeeSettlement {
  readonly baseline: UsdValue;
  readonly valueAfter: UsdValue;
  readonly gain: UsdValue;
  readonly loss: UsdValue;
  readonly platformShares: ShareAmount;
  readonly ownerShares: ShareAmount;
  readonly callerShares: ShareAmount;
  readonly penaltyShares: ShareAmount;
}

export interface RebalanceReport {
  readonly trigger: HolderId;
  readonly traded: boolean;
  readonly trades: readonly TradeRecord[];
  readonly valueBefore: UsdValue;
  readonly valueAfter: UsdValue;
  readonly settlement: FeeSettlement;
  readonly sharePrice: UsdValue;
}

export interface LifetimeTotals {
  readonly totalDepositValue: UsdValue;
  readonly totalWithdrawValue: UsdValue;
}
