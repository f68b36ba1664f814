/**
 * Venue Types
 *
 * Trading venues are opaque external counterparties. Each venue is a
 * quoter/executor pair; quoters are best-effort and may fail.
 */

import type { AssetId } from "./asset.js";

export interface QuoteRequest {
  readonly assetIn: AssetId;
  readonly assetOut: AssetId;
  readonly amountIn: bigint;
  /** Venue-specific fee tier (e.g. 3000 for a 0.3% pool). */
  readonly feeTier: number;
}

/**
 * Best-effort price quoter.
 * May return null (no liquidity) or throw; either means "no quote".
 */
export interface VenueQuoter {
  quote(request: QuoteRequest): bigint | null;
}

export interface SwapOrder extends QuoteRequest {
  /** Minimum acceptable output; the executor must not fill below it. */
  readonly minAmountOut: bigint;
}

export interface VenueExecutor {
  /** Execute the swap and return the amount of assetOut received. */
  swap(order: SwapOrder): bigint;
}

/** One leg reported by an external route aggregator. */
export interface RouteFill {
  readonly assetIn: AssetId;
  readonly assetOut: AssetId;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
}

/**
 * Aggregator that executes a caller-supplied opaque route against the
 * vault's holdings and reports the resulting fills.
 */
export interface ExternalRouter {
  execute(
    routeData: Uint8Array,
    holdings: ReadonlyMap<AssetId, bigint>,
  ): readonly RouteFill[];
}

/**
 * Converts between native currency and its wrapped token 1:1.
 */
export interface NativeWrapper {
  readonly wrappedAsset: AssetId;
  wrap(amount: bigint): bigint;
  unwrap(amount: bigint): bigint;
}
