/**
 * Vault errors.
 *
 * Every failure a vault operation can raise is a VaultError with a
 * stable code. Details are flat string maps (bigints stringified) so
 * callers can log them or decide whether a retry is worthwhile.
 */

export type VaultErrorCode =
  | "PLATFORM_HALTED"
  | "INVALID_ASSET"
  | "ZERO_AMOUNT"
  | "ZERO_SHARES"
  | "INSUFFICIENT_BALANCE"
  | "ALLOCATION_INVALID"
  | "NO_QUOTE_AVAILABLE"
  | "VALUE_LOSS_EXCEEDED"
  | "ALLOCATION_OUT_OF_TOLERANCE"
  | "UNACCOUNTABLE"
  | "UNAUTHORIZED"
  | "PAUSED"
  | "REBALANCE_PAUSED"
  | "REENTRANT_CALL"
  | "SLIPPAGE_EXCEEDED"
  | "NO_TARGET_ALLOCATION"
  | "SWEEP_FORBIDDEN"
  | "INVALID_VENUE"
  | "INVALID_FEE_SPLIT"
  | "STATE_CORRUPTED"
  | "TRANSFER_PENDING";

export type VaultErrorDetails = Readonly<Record<string, string>>;

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly details: VaultErrorDetails;

  constructor(code: VaultErrorCode, message: string, details: VaultErrorDetails = {}) {
    super(message);
    this.name = "VaultError";
    this.code = code;
    this.details = details;
  }
}

export function isVaultError(err: unknown, code?: VaultErrorCode): err is VaultError {
  return err instanceof VaultError && (code === undefined || err.code === code);
}
