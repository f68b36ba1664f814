/**
 * @ballast/ledger — Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Amounts are unsigned native units, USD
 * values at 8 decimals and shares at 18.
 *
 * Rules:
 * - No floating-point operations
 * - Division always rounds toward zero unless "up" is requested
 * - Basis points live in [0, 10000]
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

export type Rounding = "down" | "up";

export const BPS_DENOM = 10_000n;

// ─── Integer helpers ─────────────────────────────────────────────────────

export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) {
    throw new LedgerError("INVALID_AMOUNT", `pow10 exponent must be a non-negative integer, got ${String(exp)}`);
  }
  return 10n ** BigInt(exp);
}

/**
 * a·b/denom with a single rounding step.
 */
export function mulDiv(a: bigint, b: bigint, denom: bigint, rounding: Rounding = "down"): bigint {
  if (denom === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  const product = a * b;
  const q = product / denom;
  if (rounding === "down" || product % denom === 0n) {
    return q;
  }
  return q + 1n;
}

export function assertBps(bps: number): bigint {
  if (!Number.isInteger(bps) || bps < 0 || bps > 10_000) {
    throw new LedgerError("INVALID_BPS", `Basis points must be an integer in [0, 10000], got ${String(bps)}`);
  }
  return BigInt(bps);
}

/** bps/10000 of amount, rounded down. */
export function bpsOf(amount: bigint, bps: number): bigint {
  return mulDiv(amount, assertBps(bps), BPS_DENOM);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

export function absBigInt(x: bigint): bigint {
  return x < 0n ? -x : x;
}

// ─── Price conversions ───────────────────────────────────────────────────

/**
 * USD value of `amount` native units at `price` (USD per whole unit).
 */
export function toUsdValue(amount: bigint, price: bigint, decimals: number): bigint {
  return mulDiv(amount, price, pow10(decimals));
}

/**
 * Native units worth `usd` at `price`, rounded down.
 */
export function fromUsdValue(usd: bigint, price: bigint, decimals: number): bigint {
  if (price <= 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "Cannot convert USD to units at a zero price");
  }
  return mulDiv(usd, pow10(decimals), price);
}
