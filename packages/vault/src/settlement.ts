/**
 * Fee & Penalty Settlement.
 *
 * Splits a rebalance's value change between the platform, the manager
 * and the caller who triggered it:
 *
 * Gain:
 * - platform: computeFee(gain), capped at the gain
 * - manager:  ownerFeeBps of the gain, only while accountable
 * - caller:   callerFeeBps of the gain, always
 *
 * Loss:
 * - manager burns (ownerFeeBps + callerFeeBps) of the loss, only while
 *   accountable, capped at the manager's balance
 *
 * USD amounts convert to shares at the post-operation share price
 * (valueAfter / supply before any fee shares are minted).
 */

import { bpsOf, minBigInt, mulDiv } from "@ballast/ledger";
import type { ShareAmount, UsdValue } from "@ballast/types";
import { SCALE } from "./types.js";
import type { FeeSettlement } from "./types.js";

export interface SettlementInput {
  readonly baseline: UsdValue;
  readonly valueAfter: UsdValue;
  readonly totalSupply: ShareAmount;
  readonly managerShares: ShareAmount;
  readonly managerAccountable: boolean;
  readonly ownerFeeBps: number;
  readonly callerFeeBps: number;
  /** Platform fee policy, applied to the raw gain. */
  readonly platformFee: (gain: UsdValue) => UsdValue;
}

export function planSettlement(input: SettlementInput): FeeSettlement {
  const { baseline, valueAfter, totalSupply } = input;
  const gain = valueAfter > baseline ? valueAfter - baseline : 0n;
  const loss = baseline > valueAfter ? baseline - valueAfter : 0n;

  const none: FeeSettlement = {
    baseline,
    valueAfter,
    gain,
    loss,
    platformShares: 0n,
    ownerShares: 0n,
    callerShares: 0n,
    penaltyShares: 0n,
  };

  if (totalSupply === 0n || (gain === 0n && loss === 0n)) {
    return none;
  }

  const postPrice = mulDiv(valueAfter, SCALE, totalSupply);
  const toShares = (usd: UsdValue): ShareAmount => (postPrice === 0n ? 0n : mulDiv(usd, SCALE, postPrice));

  if (gain > 0n) {
    const platformUsd = minBigInt(input.platformFee(gain), gain);
    return {
      ...none,
      platformShares: platformUsd > 0n ? toShares(platformUsd) : 0n,
      ownerShares: input.managerAccountable ? toShares(bpsOf(gain, input.ownerFeeBps)) : 0n,
      callerShares: toShares(bpsOf(gain, input.callerFeeBps)),
    };
  }

  if (!input.managerAccountable) {
    return none;
  }

  const penaltyUsd = bpsOf(loss, input.ownerFeeBps + input.callerFeeBps);
  if (penaltyUsd === 0n) {
    return none;
  }
  const uncapped = postPrice === 0n ? input.managerShares : toShares(penaltyUsd);
  return { ...none, penaltyShares: minBigInt(uncapped, input.managerShares) };
}
