/**
 * @ballast/ledger — Types for the share ledger.
 *
 * Rules:
 * - Balances are unsigned: a burn can never take a holder below zero
 * - Σ balances == totalSupply at every observable point
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { HolderId, ShareAmount } from "@ballast/types";

// ─── Ledger Types ────────────────────────────────────────────────────────

/** A single holder's position. */
export interface ShareBalance {
  readonly holder: HolderId;
  readonly shares: ShareAmount;
}

/** Result of a mint or burn. */
export interface SupplyChange {
  readonly holder: HolderId;
  readonly amount: ShareAmount;
  readonly balanceAfter: ShareAmount;
  readonly totalSupplyAfter: ShareAmount;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the share ledger.
 * Amounts are base-10 strings so the snapshot survives JSON.
 */
export interface ShareLedgerSnapshot {
  readonly version: 1;
  readonly balances: readonly { readonly holder: HolderId; readonly shares: string }[];
  readonly totalSupply: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_HOLDER"
  | "INVALID_BPS"
  | "INSUFFICIENT_SHARES"
  | "DIVISION_BY_ZERO"
  | "SUPPLY_MISMATCH";

/**
 * Structured error from the ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
