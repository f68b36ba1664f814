/**
 * Runtime Type Guards
 *
 * Narrowing functions for Ballast domain types.
 * These enable safe runtime validation at system boundaries
 * (admin inputs, persisted state, external integrations).
 */

import type { AllocationWeight, AssetInfo, Bps } from "./asset.js";
import type { RouteFill } from "./venue.js";

const INTEGER_STRING = /^\d+$/;

// =============================================================================
// Scalar guards
// =============================================================================

export function isAssetId(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function isBps(value: unknown): value is Bps {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 10_000
  );
}

/** A non-negative base-10 integer string, as persisted bigints are stored. */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && INTEGER_STRING.test(value);
}

// =============================================================================
// Structure guards
// =============================================================================

export function isAssetInfo(value: unknown): value is AssetInfo {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAssetId(v.id) &&
    typeof v.symbol === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0 &&
    v.decimals <= 36
  );
}

export function isAllocationWeight(value: unknown): value is AllocationWeight {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAssetId(v.asset) &&
    typeof v.weight === "number" &&
    Number.isInteger(v.weight)
  );
}

export function isRouteFill(value: unknown): value is RouteFill {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAssetId(v.assetIn) &&
    isAssetId(v.assetOut) &&
    typeof v.amountIn === "bigint" &&
    typeof v.amountOut === "bigint" &&
    v.amountIn >= 0n &&
    v.amountOut >= 0n
  );
}
