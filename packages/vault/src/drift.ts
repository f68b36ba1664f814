/**
 * Drift correction planning.
 *
 * Classifies each valued asset against its target weight and matches
 * overweight sellers with underweight buyers in a single proportional
 * pass:
 *
 *   amountIn(s → b) = excessUnits(s) · deficit(b) / max(Σ deficit, Σ excess)
 *
 * The max() in the denominator keeps every seller within its excess and
 * every buyer within its deficit when rounding leaves Σ excess a few
 * units above Σ deficit. The plan is not globally optimal; whatever drift
 * remains is corrected by a later call.
 */

import { BPS_DENOM, absBigInt, fromUsdValue, maxBigInt, mulDiv } from "@ballast/ledger";
import type { AssetId, UsdValue } from "@ballast/types";
import type { TargetAllocation } from "./allocation.js";
import type { Valuation } from "./types.js";

export interface Seller {
  readonly asset: AssetId;
  readonly excessUsd: UsdValue;
  readonly excessUnits: bigint;
}

export interface Buyer {
  readonly asset: AssetId;
  readonly deficitUsd: UsdValue;
}

export interface PlannedLeg {
  readonly assetIn: AssetId;
  readonly assetOut: AssetId;
  readonly amountIn: bigint;
  /** USD value of the leg at oracle prices. */
  readonly valueUsd: UsdValue;
}

export interface DriftPlan {
  readonly sellers: readonly Seller[];
  readonly buyers: readonly Buyer[];
  readonly totalExcess: UsdValue;
  readonly totalDeficit: UsdValue;
  readonly legs: readonly PlannedLeg[];
}

/**
 * Assets whose weight is more than toleranceBps away from target.
 * Compared exactly as |value·10000 − targetBps·total| > tolerance·total.
 * An empty vault has no drift.
 */
export function driftedAssets(
  valuation: Valuation,
  allocation: TargetAllocation,
  toleranceBps: number,
): readonly AssetId[] {
  const total = valuation.total;
  if (total === 0n) return [];

  const limit = BigInt(toleranceBps) * total;
  const seen = new Set<AssetId>();
  const drifted: AssetId[] = [];

  const check = (asset: AssetId, value: UsdValue): void => {
    seen.add(asset);
    const deviation = absBigInt(value * BPS_DENOM - BigInt(allocation.targetBps(asset)) * total);
    if (deviation > limit) drifted.push(asset);
  };

  for (const a of valuation.assets) check(a.asset, a.value);
  for (const asset of allocation.assets) {
    if (!seen.has(asset)) check(asset, 0n);
  }

  return drifted;
}

export function isWithinTolerance(
  valuation: Valuation,
  allocation: TargetAllocation,
  toleranceBps: number,
): boolean {
  return driftedAssets(valuation, allocation, toleranceBps).length === 0;
}

/**
 * Build the seller×buyer trade plan for a valuation.
 */
export function planDriftCorrection(valuation: Valuation, allocation: TargetAllocation): DriftPlan {
  const total = valuation.total;
  const sellers: Seller[] = [];
  const buyers: Buyer[] = [];
  let totalExcess = 0n;
  let totalDeficit = 0n;

  for (const a of valuation.assets) {
    const target = mulDiv(total, BigInt(allocation.targetBps(a.asset)), BPS_DENOM);
    if (a.value > target) {
      const excessUsd = a.value - target;
      sellers.push({
        asset: a.asset,
        excessUsd,
        excessUnits: fromUsdValue(excessUsd, a.price, a.decimals),
      });
      totalExcess += excessUsd;
    } else if (a.value < target) {
      const deficitUsd = target - a.value;
      buyers.push({ asset: a.asset, deficitUsd });
      totalDeficit += deficitUsd;
    }
  }

  const legs: PlannedLeg[] = [];
  const denom = maxBigInt(totalDeficit, totalExcess);

  if (denom > 0n) {
    for (const s of sellers) {
      for (const b of buyers) {
        const amountIn = mulDiv(s.excessUnits, b.deficitUsd, denom);
        if (amountIn === 0n) continue;
        legs.push({
          assetIn: s.asset,
          assetOut: b.asset,
          amountIn,
          valueUsd: mulDiv(s.excessUsd, b.deficitUsd, denom),
        });
      }
    }
  }

  return { sellers, buyers, totalExcess, totalDeficit, legs };
}
