/**
 * Valuation — mark vault holdings to market through the oracle.
 *
 * A zero price or an unknown asset is a hard failure, never a
 * silently skipped asset.
 */

import { mulDiv, toUsdValue, BPS_DENOM } from "@ballast/ledger";
import type { AssetId, PriceOracle, UsdValue } from "@ballast/types";
import { VaultError } from "./errors.js";
import type { HoldingsBook } from "./holdings.js";
import type { AssetValuation, Valuation } from "./types.js";

export interface PricedAsset {
  readonly price: UsdValue;
  readonly decimals: number;
}

/**
 * Price and precision of an accepted asset.
 * Throws INVALID_ASSET if the asset is not accepted, unknown, or unpriced.
 */
export function priceAsset(oracle: PriceOracle, asset: AssetId): PricedAsset {
  if (!oracle.isAssetAccepted(asset)) {
    throw new VaultError("INVALID_ASSET", `Asset "${asset}" is not accepted`, { asset });
  }
  const info = oracle.getAsset(asset);
  if (info === undefined) {
    throw new VaultError("INVALID_ASSET", `Asset "${asset}" is not registered`, { asset });
  }
  const price = oracle.getPrice(asset);
  if (price <= 0n) {
    throw new VaultError("INVALID_ASSET", `Asset "${asset}" has no price`, {
      asset,
      price: price.toString(),
    });
  }
  return { price, decimals: info.decimals };
}

/**
 * Distinct accepted assets, in registry order.
 */
export function acceptedAssets(oracle: PriceOracle): readonly AssetId[] {
  return [...new Set(oracle.getAcceptedAssetList())];
}

/**
 * Value every accepted asset the vault could hold.
 */
export function valueHoldings(oracle: PriceOracle, holdings: HoldingsBook): Valuation {
  const assets: AssetValuation[] = [];
  let total = 0n;

  for (const asset of acceptedAssets(oracle)) {
    const units = holdings.balanceOf(asset);
    const { price, decimals } = priceAsset(oracle, asset);
    const value = toUsdValue(units, price, decimals);
    assets.push({ asset, units, price, decimals, value });
    total += value;
  }

  return { assets, total };
}

/** Share of total in bps, rounded down. 0 when total is 0. */
export function weightBps(value: UsdValue, total: UsdValue): number {
  if (total === 0n) return 0;
  return Number(mulDiv(value, BPS_DENOM, total));
}
