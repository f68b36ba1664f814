/**
 * Manager accountability gate.
 *
 * A manager is accountable while their own stake is at least
 * minOwnerBps of total supply. Privileged calls and fee/penalty
 * exposure are suspended while they are not.
 */

import { BPS_DENOM } from "@ballast/ledger";
import type { ShareAmount } from "@ballast/types";
import type { AccountabilityPolicy } from "./types.js";

/**
 * managerShares·BPS_DENOM/totalSupply ≥ minOwnerBps.
 * Vacuously true at supply 0, and always true without a policy.
 */
export function isAccountable(
  managerShares: ShareAmount,
  totalSupply: ShareAmount,
  policy: AccountabilityPolicy | undefined,
): boolean {
  if (policy === undefined || totalSupply === 0n) {
    return true;
  }
  return managerShares * BPS_DENOM >= BigInt(policy.minOwnerBps) * totalSupply;
}
