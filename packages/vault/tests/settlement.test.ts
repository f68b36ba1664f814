import { describe, it, expect } from "vitest";
import { planSettlement } from "../src/settlement.js";
import type { SettlementInput } from "../src/settlement.js";
import { SCALE } from "../src/types.js";

const USD = 10n ** 8n;

function input(overrides: Partial<SettlementInput> = {}): SettlementInput {
  return {
    baseline: 1000n * USD,
    valueAfter: 1000n * USD,
    totalSupply: 1000n * SCALE,
    managerShares: 100n * SCALE,
    managerAccountable: true,
    ownerFeeBps: 1000,
    callerFeeBps: 500,
    platformFee: () => 0n,
    ...overrides,
  };
}

describe("planSettlement", () => {
  it("settles nothing when value is unchanged", () => {
    expect(planSettlement(input())).toEqual({
      baseline: 1000n * USD,
      valueAfter: 1000n * USD,
      gain: 0n,
      loss: 0n,
      platformShares: 0n,
      ownerShares: 0n,
      callerShares: 0n,
      penaltyShares: 0n,
    });
  });

  it("settles nothing with no shares outstanding", () => {
    const result = planSettlement(input({ valueAfter: 1100n * USD, totalSupply: 0n }));
    expect(result.gain).toBe(100n * USD);
    expect(result.ownerShares).toBe(0n);
    expect(result.callerShares).toBe(0n);
  });

  it("splits a gain at the post-operation price", () => {
    const result = planSettlement(input({ valueAfter: 1100n * USD, platformFee: (gain) => gain / 10n }));

    expect(result.platformShares).toBe(9_090_909_090_909_090_909n);
    expect(result.ownerShares).toBe(9_090_909_090_909_090_909n);
    expect(result.callerShares).toBe(4_545_454_545_454_545_454n);
    expect(result.penaltyShares).toBe(0n);
  });

  it("caps the platform fee at the gain", () => {
    const result = planSettlement(input({ valueAfter: 1100n * USD, platformFee: (gain) => gain * 2n }));
    expect(result.platformShares).toBe(90_909_090_909_090_909_090n);
  });

  it("pays the caller but not an unaccountable manager", () => {
    const result = planSettlement(input({ valueAfter: 1100n * USD, managerAccountable: false }));
    expect(result.ownerShares).toBe(0n);
    expect(result.callerShares).toBe(4_545_454_545_454_545_454n);
  });

  it("penalizes an accountable manager on a loss", () => {
    // 15% of a $4 loss at $0.996/share
    const result = planSettlement(input({ valueAfter: 996n * USD }));
    expect(result.loss).toBe(4n * USD);
    expect(result.penaltyShares).toBe(602_409_638_554_216_867n);
  });

  it("caps the penalty at the manager's balance", () => {
    const result = planSettlement(input({ valueAfter: 500n * USD, managerShares: 1n }));
    expect(result.penaltyShares).toBe(1n);
  });

  it("waives the penalty while the manager is unaccountable", () => {
    const result = planSettlement(input({ valueAfter: 500n * USD, managerAccountable: false }));
    expect(result.loss).toBe(500n * USD);
    expect(result.penaltyShares).toBe(0n);
  });

  it("burns the manager's whole balance when all value is lost", () => {
    const result = planSettlement(input({ valueAfter: 0n }));
    expect(result.penaltyShares).toBe(100n * SCALE);
  });

  it("charges no penalty with a zero fee split", () => {
    const result = planSettlement(input({ valueAfter: 900n * USD, ownerFeeBps: 0, callerFeeBps: 0 }));
    expect(result.penaltyShares).toBe(0n);
  });
});
