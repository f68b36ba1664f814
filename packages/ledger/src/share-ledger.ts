/**
 * @ballast/ledger — Share ledger.
 *
 * Per-holder share balances and total supply for one vault.
 *
 * API surface:
 * - mint() / burn() — the only writes
 * - balanceOf() / totalSupply — reads
 * - holders() — every holder with a non-zero balance
 * - snapshot() / fromSnapshot() / restore() — persistence and rollback
 *
 * There is NO transfer(). Shares move only through the vault engine.
 */

import type { HolderId, ShareAmount } from "@ballast/types";
import { isAssetId, isUintString } from "@ballast/types";
import type { ShareBalance, ShareLedgerSnapshot, SupplyChange } from "./types.js";
import { LedgerError } from "./types.js";

export class ShareLedger {
  private readonly _balances: Map<HolderId, ShareAmount> = new Map();
  private _totalSupply: ShareAmount = 0n;

  // ─── Reads ───────────────────────────────────────────────────────────

  get totalSupply(): ShareAmount {
    return this._totalSupply;
  }

  balanceOf(holder: HolderId): ShareAmount {
    return this._balances.get(holder) ?? 0n;
  }

  /**
   * Every holder with a non-zero balance, in first-mint order.
   */
  holders(): readonly ShareBalance[] {
    return [...this._balances.entries()].map(([holder, shares]) => ({ holder, shares }));
  }

  get holderCount(): number {
    return this._balances.size;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Mint shares to a holder. Amount must be positive.
   */
  mint(holder: HolderId, amount: ShareAmount): SupplyChange {
    this.assertHolder(holder);
    if (amount <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Mint amount must be positive, got ${amount.toString()}`);
    }

    const balanceAfter = this.balanceOf(holder) + amount;
    this._balances.set(holder, balanceAfter);
    this._totalSupply += amount;

    return { holder, amount, balanceAfter, totalSupplyAfter: this._totalSupply };
  }

  /**
   * Burn shares from a holder. Amount must be positive and covered
   * by the holder's balance. Holders reaching zero are removed.
   */
  burn(holder: HolderId, amount: ShareAmount): SupplyChange {
    this.assertHolder(holder);
    if (amount <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Burn amount must be positive, got ${amount.toString()}`);
    }

    const balance = this.balanceOf(holder);
    if (amount > balance) {
      throw new LedgerError(
        "INSUFFICIENT_SHARES",
        `Holder "${holder}" has ${balance.toString()} shares, cannot burn ${amount.toString()}`,
      );
    }

    const balanceAfter = balance - amount;
    if (balanceAfter === 0n) {
      this._balances.delete(holder);
    } else {
      this._balances.set(holder, balanceAfter);
    }
    this._totalSupply -= amount;

    return { holder, amount, balanceAfter, totalSupplyAfter: this._totalSupply };
  }

  // ─── Snapshot (Persistence & Rollback) ───────────────────────────────

  snapshot(): ShareLedgerSnapshot {
    return {
      version: 1,
      balances: this.holders().map((b) => ({ holder: b.holder, shares: b.shares.toString() })),
      totalSupply: this._totalSupply.toString(),
    };
  }

  /**
   * Replace the ledger's contents with a snapshot.
   * Validates that Σ balances equals the recorded supply.
   */
  restore(snapshot: ShareLedgerSnapshot): void {
    const balances = new Map<HolderId, ShareAmount>();
    let sum = 0n;

    for (const entry of snapshot.balances) {
      if (!isAssetId(entry.holder) || !isUintString(entry.shares)) {
        throw new LedgerError("INVALID_AMOUNT", `Malformed snapshot balance for "${String(entry.holder)}"`);
      }
      const shares = BigInt(entry.shares);
      if (shares === 0n) continue;
      balances.set(entry.holder, shares);
      sum += shares;
    }

    if (!isUintString(snapshot.totalSupply) || BigInt(snapshot.totalSupply) !== sum) {
      throw new LedgerError(
        "SUPPLY_MISMATCH",
        `Snapshot total supply ${String(snapshot.totalSupply)} does not equal sum of balances ${sum.toString()}`,
      );
    }

    this._balances.clear();
    for (const [holder, shares] of balances) {
      this._balances.set(holder, shares);
    }
    this._totalSupply = sum;
  }

  static fromSnapshot(snapshot: ShareLedgerSnapshot): ShareLedger {
    const ledger = new ShareLedger();
    ledger.restore(snapshot);
    return ledger;
  }

  private assertHolder(holder: HolderId): void {
    if (!isAssetId(holder)) {
      throw new LedgerError("INVALID_HOLDER", `Invalid holder id: "${String(holder)}"`);
    }
  }
}
