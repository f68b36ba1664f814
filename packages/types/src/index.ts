/**
 * @ballast/types — Shared domain types for the Ballast vault stack.
 *
 * These types are used across all Ballast packages:
 * - Asset identifiers and fixed-point scalars
 * - Oracle / registry contract
 * - Venue quoter, executor, route aggregator, native wrapper
 * - Transfer gateway
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - External collaborators are interfaces only; implementations live elsewhere
 */

// Asset & unit types
export type {
  AssetId,
  HolderId,
  UsdValue,
  ShareAmount,
  Bps,
  AssetInfo,
  AllocationWeight,
} from "./asset.js";
export { NATIVE_ASSET, USD_DECIMALS, SHARE_DECIMALS } from "./asset.js";

// Oracle
export type { PriceOracle } from "./oracle.js";

// Venues
export type {
  QuoteRequest,
  VenueQuoter,
  SwapOrder,
  VenueExecutor,
  RouteFill,
  ExternalRouter,
  NativeWrapper,
} from "./venue.js";

// Transfers
export type { TransferGateway } from "./transfer.js";

// Runtime type guards
export {
  isAssetId,
  isBps,
  isUintString,
  isAssetInfo,
  isAllocationWeight,
  isRouteFill,
} from "./guards.js";
