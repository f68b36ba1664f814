/**
 * Holdings Book — the vault's physical per-asset balances.
 *
 * Every custody movement (deposit, payout, trade, sweep) is recorded
 * here. Balances never go negative.
 */

import type { AssetId } from "@ballast/types";
import { VaultError } from "./errors.js";

export class HoldingsBook {
  private _balances: Map<AssetId, bigint> = new Map();

  balanceOf(asset: AssetId): bigint {
    return this._balances.get(asset) ?? 0n;
  }

  credit(asset: AssetId, amount: bigint): void {
    if (amount < 0n) {
      throw new VaultError("ZERO_AMOUNT", `Cannot credit a negative amount of "${asset}"`);
    }
    if (amount === 0n) return;
    this._balances.set(asset, this.balanceOf(asset) + amount);
  }

  debit(asset: AssetId, amount: bigint): void {
    if (amount < 0n) {
      throw new VaultError("ZERO_AMOUNT", `Cannot debit a negative amount of "${asset}"`);
    }
    if (amount === 0n) return;
    const balance = this.balanceOf(asset);
    if (amount > balance) {
      throw new VaultError("INSUFFICIENT_BALANCE", `Vault holds ${balance.toString()} of "${asset}", needs ${amount.toString()}`, {
        asset,
        held: balance.toString(),
        requested: amount.toString(),
      });
    }
    if (amount === balance) {
      this._balances.delete(asset);
    } else {
      this._balances.set(asset, balance - amount);
    }
  }

  /** Read-only copy of every non-zero balance. */
  view(): ReadonlyMap<AssetId, bigint> {
    return new Map(this._balances);
  }

  assets(): readonly AssetId[] {
    return [...this._balances.keys()];
  }

  snapshot(): readonly { readonly asset: AssetId; readonly amount: string }[] {
    return [...this._balances.entries()].map(([asset, amount]) => ({ asset, amount: amount.toString() }));
  }

  restore(rows: readonly { readonly asset: AssetId; readonly amount: string }[]): void {
    const next = new Map<AssetId, bigint>();
    for (const row of rows) {
      const amount = BigInt(row.amount);
      if (amount < 0n) {
        throw new VaultError("STATE_CORRUPTED", `Negative holding for "${row.asset}"`);
      }
      if (amount > 0n) next.set(row.asset, amount);
    }
    this._balances = next;
  }
}
