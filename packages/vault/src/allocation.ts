/**
 * Target Allocation — the desired value split across assets.
 *
 * Rules:
 * - Non-empty
 * - Integer weights, each > 0
 * - Weights sum to exactly WEIGHT_SUM
 * - No duplicate assets
 *
 * A table that breaks any rule is rejected wholesale.
 */

import type { AllocationWeight, AssetId } from "@ballast/types";
import { isAllocationWeight } from "@ballast/types";
import { VaultError } from "./errors.js";
import { WEIGHT_SUM } from "./types.js";

export class TargetAllocation {
  private readonly _weights: ReadonlyMap<AssetId, number>;

  private constructor(weights: ReadonlyMap<AssetId, number>) {
    this._weights = weights;
  }

  /**
   * Validate a table and build an allocation from it.
   * Throws VaultError("ALLOCATION_INVALID") on the first broken rule.
   */
  static from(table: readonly AllocationWeight[]): TargetAllocation {
    if (table.length === 0) {
      throw new VaultError("ALLOCATION_INVALID", "Target allocation must not be empty");
    }

    const weights = new Map<AssetId, number>();
    let sum = 0;

    for (const row of table) {
      if (!isAllocationWeight(row)) {
        throw new VaultError("ALLOCATION_INVALID", "Malformed allocation row", {
          row: JSON.stringify(row),
        });
      }
      if (row.weight <= 0) {
        throw new VaultError("ALLOCATION_INVALID", `Weight for "${row.asset}" must be positive`, {
          asset: row.asset,
          weight: String(row.weight),
        });
      }
      if (weights.has(row.asset)) {
        throw new VaultError("ALLOCATION_INVALID", `Duplicate asset "${row.asset}" in allocation`, {
          asset: row.asset,
        });
      }
      weights.set(row.asset, row.weight);
      sum += row.weight;
    }

    if (sum !== WEIGHT_SUM) {
      throw new VaultError(
        "ALLOCATION_INVALID",
        `Allocation weights sum to ${String(sum)}, expected ${String(WEIGHT_SUM)}`,
        { sum: String(sum) },
      );
    }

    return new TargetAllocation(weights);
  }

  /** Target weight in percent; 0 for assets outside the table. */
  weightOf(asset: AssetId): number {
    return this._weights.get(asset) ?? 0;
  }

  /** Target weight in basis points. */
  targetBps(asset: AssetId): number {
    return this.weightOf(asset) * (10_000 / WEIGHT_SUM);
  }

  has(asset: AssetId): boolean {
    return this._weights.has(asset);
  }

  get assets(): readonly AssetId[] {
    return [...this._weights.keys()];
  }

  get size(): number {
    return this._weights.size;
  }

  toTable(): readonly AllocationWeight[] {
    return [...this._weights.entries()].map(([asset, weight]) => ({ asset, weight }));
  }
}
