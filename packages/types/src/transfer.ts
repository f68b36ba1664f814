/**
 * Transfer Gateway
 *
 * Physically moves assets between holders and the vault's custody.
 * Both calls are synchronous and throw on failure.
 */

import type { AssetId, HolderId } from "./asset.js";

export interface TransferGateway {
  /** Move `amount` of `asset` from `from` into vault custody. */
  pull(from: HolderId, asset: AssetId, amount: bigint): void;

  /** Move `amount` of `asset` out of vault custody to `to`. */
  push(to: HolderId, asset: AssetId, amount: bigint): void;
}
