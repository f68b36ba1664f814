/**
 * @ballast/ledger — Share ledger and fixed-point arithmetic.
 *
 * A pure TypeScript share ledger with zero runtime dependencies.
 * Enforces:
 * - Σ balances == totalSupply after every write
 * - Balances never go negative
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Fail-closed: invalid writes throw, never silently succeed
 * - The ledger is mutated only by its owning vault engine
 */

// Core ledger
export { ShareLedger } from "./share-ledger.js";

// Fixed-point arithmetic
export {
  BPS_DENOM,
  pow10,
  mulDiv,
  assertBps,
  bpsOf,
  minBigInt,
  maxBigInt,
  absBigInt,
  toUsdValue,
  fromUsdValue,
} from "./fixed-point.js";
export type { Rounding } from "./fixed-point.js";

// Types
export type {
  ShareBalance,
  SupplyChange,
  ShareLedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
