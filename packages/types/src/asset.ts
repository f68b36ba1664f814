/**
 * Asset & Unit Types
 *
 * Primitive identifiers and fixed-point scalars shared by every
 * Ballast package.
 *
 * Rules:
 * - All amounts are bigint (no floating point anywhere)
 * - USD values carry USD_DECIMALS implied decimals
 * - Share amounts carry SHARE_DECIMALS implied decimals
 */

/** Opaque asset identifier (token address, symbol, ...). */
export type AssetId = string;

/** Opaque identity of a share holder, manager, or platform account. */
export type HolderId = string;

/** USD amount, fixed-point with USD_DECIMALS decimals. */
export type UsdValue = bigint;

/** Share amount, fixed-point with SHARE_DECIMALS decimals. */
export type ShareAmount = bigint;

/** Basis points (1/10000th). */
export type Bps = number;

/** Reserved identifier for the chain's native currency. */
export const NATIVE_ASSET: AssetId = "native";

export const USD_DECIMALS = 8;
export const SHARE_DECIMALS = 18;

/**
 * Static description of an asset, owned by the oracle registry.
 */
export interface AssetInfo {
  readonly id: AssetId;
  readonly symbol: string;
  /** Native unit precision (e.g. 6 for USDC, 18 for ETH). */
  readonly decimals: number;
}

/**
 * One row of a target allocation table.
 * Weight is an integer percentage of total vault value.
 */
export interface AllocationWeight {
  readonly asset: AssetId;
  readonly weight: number;
}
