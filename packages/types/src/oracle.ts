/**
 * Price Oracle & Asset Registry
 *
 * The external authority that decides which assets a vault may hold,
 * what they are worth, whether the platform is running, and what
 * the platform charges on gains.
 */

import type { AssetId, AssetInfo, HolderId, UsdValue } from "./asset.js";

export interface PriceOracle {
  /** False halts every mutating vault call. */
  isPlatformOperational(): boolean;

  isAssetAccepted(asset: AssetId): boolean;

  /**
   * USD price of one whole unit of the asset (USD_DECIMALS).
   * Zero means "no price" and must be treated as a hard failure.
   */
  getPrice(asset: AssetId): UsdValue;

  getAsset(asset: AssetId): AssetInfo | undefined;

  getAcceptedAssetList(): readonly AssetId[];

  /** Platform cut (USD) of a raw USD gain. */
  computeFee(rawValue: UsdValue): UsdValue;

  /** Account that receives platform fee shares. */
  platformAccount(): HolderId;
}
