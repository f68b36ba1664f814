/**
 * Tests for VaultEngine rebalancing.
 *
 * Covers:
 * - Drift correction through the best-quoting venue
 * - Value-loss and post-trade tolerance checks (with rollback)
 * - Fee and penalty settlement
 * - External-route rebalances and manager swaps
 * - Native currency wrapping
 */

import { describe, it, expect } from "vitest";
import { VaultEngine } from "../src/vault-engine.js";
import type { VaultEngineOptions } from "../src/vault-engine.js";
import { SCALE } from "../src/types.js";
import { catchVaultError } from "./helpers/errors.js";
import {
  FakeOracle,
  FakeTransfers,
  FakeWrapper,
  OracleVenue,
  ScriptedRouter,
  UNIT,
  handlesFor,
  stableOracle,
} from "./helpers/fakes.js";

const USD = 10n ** 8n;

function vault(
  overrides: Partial<VaultEngineOptions> = {},
  oracle: FakeOracle = stableOracle(),
): { oracle: FakeOracle; engine: VaultEngine } {
  const engine = new VaultEngine({
    vaultId: "v1",
    manager: "manager",
    oracle,
    transfers: new FakeTransfers(),
    targetAllocation: [
      { asset: "usda", weight: 50 },
      { asset: "usdb", weight: 50 },
    ],
    ...overrides,
  });
  return { oracle, engine };
}

function addVenue(engine: VaultEngine, oracle: FakeOracle, id: number, haircutBps = 0n): OracleVenue {
  const venue = new OracleVenue(oracle);
  venue.haircutBps = haircutBps;
  engine.configureVenue("manager", id, { feeTier: 3000, enabled: true, tradesNative: true, ...handlesFor(venue) });
  return venue;
}

/** 700 usda held by the manager, 300 usdb by alice. */
function seventyThirty(overrides: Partial<VaultEngineOptions> = {}): { oracle: FakeOracle; engine: VaultEngine } {
  const built = vault(overrides);
  built.engine.deposit("manager", "usda", 700n * UNIT);
  built.engine.deposit("alice", "usdb", 300n * UNIT);
  return built;
}

// =============================================================================
// Best-quote rebalancing
// =============================================================================

describe("rebalanceByBestQuote", () => {
  it("does not trade a balanced vault", () => {
    const { oracle, engine } = vault();
    const venue = addVenue(engine, oracle, 0);
    engine.deposit("alice", "usda", 1000n * UNIT);
    engine.deposit("bob", "usdb", 1000n * UNIT);

    const report = engine.rebalanceByBestQuote("alice");

    expect(report.traded).toBe(false);
    expect(report.trades).toEqual([]);
    expect(report.valueBefore).toBe(2000n * USD);
    expect(report.valueAfter).toBe(2000n * USD);
    expect(report.settlement.gain).toBe(0n);
    expect(report.settlement.loss).toBe(0n);
    expect(venue.orders).toEqual([]);
  });

  it("corrects a 70/30 split through a venue filling at 0.98", () => {
    const { oracle, engine } = seventyThirty({ params: { ownerFeeBps: 1000, callerFeeBps: 500 } });
    const venue = addVenue(engine, oracle, 0, 200n);

    const report = engine.rebalanceByBestQuote("alice");

    expect(report.trades).toEqual([
      {
        venueId: 0,
        assetIn: "usda",
        assetOut: "usdb",
        amountIn: 200n * UNIT,
        amountOut: 196n * UNIT,
        quotedOut: 196n * UNIT,
        minAmountOut: 186_200_000n,
        wrapped: false,
      },
    ]);
    expect(venue.orders).toEqual([
      { assetIn: "usda", assetOut: "usdb", amountIn: 200n * UNIT, feeTier: 3000, minAmountOut: 186_200_000n },
    ]);
    expect(engine.holdingsOf("usda")).toBe(500n * UNIT);
    expect(engine.holdingsOf("usdb")).toBe(496n * UNIT);
    expect(report.valueAfter).toBe(996n * USD);
    expect(engine.currentAllocation().map((l) => l.weightBps)).toEqual([5020, 4979]);
  });

  it("burns a penalty from an accountable manager on a loss", () => {
    const { oracle, engine } = seventyThirty({ params: { ownerFeeBps: 1000, callerFeeBps: 500 } });
    addVenue(engine, oracle, 0, 200n);

    const report = engine.rebalanceByBestQuote("alice");

    expect(report.settlement.loss).toBe(4n * USD);
    expect(report.settlement.penaltyShares).toBe(602_409_638_554_216_867n);
    expect(engine.balanceOf("manager")).toBe(699_397_590_361_445_783_133n);
    expect(engine.balanceOf("alice")).toBe(300n * SCALE);
    expect(report.sharePrice).toBe(99_660_036n);
    expect(engine.sharePrice()).toBe(99_660_036n);
  });

  it("reverts when the value loss exceeds the budget", () => {
    const { oracle, engine } = seventyThirty();
    addVenue(engine, oracle, 0, 300n);

    const err = catchVaultError(() => engine.rebalanceByBestQuote("alice"));

    expect(err.code).toBe("VALUE_LOSS_EXCEEDED");
    expect(err.details).toEqual({
      valueBefore: (1000n * USD).toString(),
      valueAfter: (994n * USD).toString(),
      budgetBps: "50",
    });
    expect(engine.holdingsOf("usda")).toBe(700n * UNIT);
    expect(engine.holdingsOf("usdb")).toBe(300n * UNIT);
    expect(engine.balanceOf("manager")).toBe(700n * SCALE);
  });

  it("reverts when the allocation is still out of tolerance", () => {
    const { oracle, engine } = seventyThirty({ params: { driftToleranceBps: 10, valueLossBps: 10_000 } });
    const venue = addVenue(engine, oracle, 0);
    venue.fillBps = 9600n;

    const err = catchVaultError(() => engine.rebalanceByBestQuote("alice"));

    expect(err.code).toBe("ALLOCATION_OUT_OF_TOLERANCE");
    expect(err.details["assets"]).toBe("usda,usdb");
    expect(engine.holdingsOf("usdb")).toBe(300n * UNIT);
  });

  it("reverts when the venue fills below the minimum output", () => {
    const { oracle, engine } = seventyThirty();
    const venue = addVenue(engine, oracle, 0);
    venue.fillBps = 9000n;

    const err = catchVaultError(() => engine.rebalanceByBestQuote("alice"));

    expect(err.code).toBe("SLIPPAGE_EXCEEDED");
    expect(err.details).toEqual({ venueId: "0", received: "180000000", minAmountOut: "190000000" });
    expect(engine.holdingsOf("usda")).toBe(700n * UNIT);
  });

  it("fails when no venue quotes", () => {
    const { engine } = seventyThirty();
    expect(catchVaultError(() => engine.rebalanceByBestQuote("alice")).code).toBe("NO_QUOTE_AVAILABLE");
  });

  it("skips venues whose quoter fails", () => {
    const { oracle, engine } = seventyThirty();
    const broken = addVenue(engine, oracle, 0);
    broken.failQuotes = true;
    const silent = addVenue(engine, oracle, 1);
    silent.quoteOverride = null;
    addVenue(engine, oracle, 2);

    const report = engine.rebalanceByBestQuote("alice");

    expect(report.trades.map((t) => t.venueId)).toEqual([2]);
    expect(broken.orders).toEqual([]);
  });

  it("fails when every quoter fails", () => {
    const { oracle, engine } = seventyThirty();
    addVenue(engine, oracle, 0).failQuotes = true;
    addVenue(engine, oracle, 1).failQuotes = true;

    const err = catchVaultError(() => engine.rebalanceByBestQuote("alice"));
    expect(err.code).toBe("NO_QUOTE_AVAILABLE");
    expect(err.details["venues"]).toBe("0:quoter offline,1:quoter offline");
  });

  it("routes to the best quote and breaks ties by lowest id", () => {
    const { oracle, engine } = seventyThirty();
    const first = addVenue(engine, oracle, 0);
    const second = addVenue(engine, oracle, 1);

    engine.rebalanceByBestQuote("alice");

    expect(first.orders.length).toBe(1);
    expect(second.orders).toEqual([]);
  });

  it("ignores disabled venues", () => {
    const { oracle, engine } = seventyThirty();
    const disabled = new OracleVenue(oracle);
    engine.configureVenue("manager", 0, { feeTier: 500, enabled: false, tradesNative: true, ...handlesFor(disabled) });
    addVenue(engine, oracle, 1, 100n);

    const report = engine.rebalanceByBestQuote("alice");

    expect(report.trades.map((t) => [t.venueId, t.amountOut])).toEqual([[1, 198n * UNIT]]);
    expect(disabled.orders).toEqual([]);
  });

  it("requires the caller to hold shares", () => {
    const { oracle, engine } = seventyThirty();
    addVenue(engine, oracle, 0);
    const err = catchVaultError(() => engine.rebalanceByBestQuote("carol"));
    expect(err.code).toBe("INSUFFICIENT_BALANCE");
  });

  it("respects both pause flags", () => {
    const { oracle, engine } = seventyThirty();
    addVenue(engine, oracle, 0);

    engine.pauseRebalancing("manager");
    expect(catchVaultError(() => engine.rebalanceByBestQuote("alice")).code).toBe("REBALANCE_PAUSED");
    engine.unpauseRebalancing("manager");

    engine.pause("manager");
    expect(catchVaultError(() => engine.rebalanceByBestQuote("alice")).code).toBe("PAUSED");
  });

  it("requires a target allocation", () => {
    const { engine } = vault({ targetAllocation: undefined });
    engine.deposit("alice", "usda", UNIT);
    expect(catchVaultError(() => engine.rebalanceByBestQuote("alice")).code).toBe("NO_TARGET_ALLOCATION");
  });
});

// =============================================================================
// Settlement
// =============================================================================

describe("fee settlement", () => {
  function balancedWithGain(
    overrides: Partial<VaultEngineOptions> = {},
  ): { oracle: FakeOracle; engine: VaultEngine } {
    const built = vault({ params: { ownerFeeBps: 1000, callerFeeBps: 500 }, ...overrides });
    built.oracle.feeBps = 1000n;
    built.engine.deposit("manager", "usda", 500n * UNIT);
    built.engine.deposit("alice", "usdb", 500n * UNIT);
    built.oracle.setPrice("usda", 110_000_000n);
    built.oracle.setPrice("usdb", 110_000_000n);
    return built;
  }

  it("mints platform, manager and caller shares on a gain", () => {
    const { engine } = balancedWithGain();

    const report = engine.rebalanceByBestQuote("alice");

    expect(report.traded).toBe(false);
    expect(report.settlement).toEqual({
      baseline: 1000n * USD,
      valueAfter: 1100n * USD,
      gain: 100n * USD,
      loss: 0n,
      platformShares: 9_090_909_090_909_090_909n,
      ownerShares: 9_090_909_090_909_090_909n,
      callerShares: 4_545_454_545_454_545_454n,
      penaltyShares: 0n,
    });
    expect(engine.balanceOf("platform")).toBe(9_090_909_090_909_090_909n);
    expect(engine.balanceOf("manager")).toBe(500n * SCALE + 9_090_909_090_909_090_909n);
    expect(engine.balanceOf("alice")).toBe(500n * SCALE + 4_545_454_545_454_545_454n);
    expect(engine.sharePrice()).toBe(107_555_555n);
  });

  it("settles nothing on a second identical rebalance", () => {
    const { engine } = balancedWithGain();
    engine.rebalanceByBestQuote("alice");
    const supply = engine.totalSupply();

    const report = engine.rebalanceByBestQuote("alice");

    expect(report.settlement.gain).toBe(0n);
    expect(report.settlement.platformShares).toBe(0n);
    expect(engine.totalSupply()).toBe(supply);
  });

  it("withholds the manager's cut while unaccountable", () => {
    const built = vault({
      params: { ownerFeeBps: 1000, callerFeeBps: 500 },
      accountability: { minOwnerBps: 500 },
    });
    built.engine.deposit("alice", "usda", 500n * UNIT);
    built.engine.deposit("bob", "usdb", 500n * UNIT);
    built.oracle.setPrice("usda", 110_000_000n);
    built.oracle.setPrice("usdb", 110_000_000n);

    const report = built.engine.rebalanceByBestQuote("alice");

    expect(report.settlement.ownerShares).toBe(0n);
    expect(report.settlement.callerShares).toBe(4_545_454_545_454_545_454n);
    expect(built.engine.balanceOf("manager")).toBe(0n);
  });
});

// =============================================================================
// External routes & manager swaps
// =============================================================================

describe("rebalanceByExternalRoute", () => {
  it("applies the router's fills under the same checks", () => {
    const router = new ScriptedRouter();
    const { engine } = seventyThirty({ externalRouter: router });
    router.fills = [{ assetIn: "usda", assetOut: "usdb", amountIn: 200n * UNIT, amountOut: 199n * UNIT }];
    const route = new Uint8Array([0xde, 0xad]);

    const report = engine.rebalanceByExternalRoute("alice", route);

    expect(router.calls).toEqual([route]);
    expect(report.trades).toEqual([
      {
        venueId: "external",
        assetIn: "usda",
        assetOut: "usdb",
        amountIn: 200n * UNIT,
        amountOut: 199n * UNIT,
        quotedOut: null,
        minAmountOut: null,
        wrapped: false,
      },
    ]);
    expect(report.valueAfter).toBe(999n * USD);
    expect(engine.holdingsOf("usdb")).toBe(499n * UNIT);
  });

  it("requires a configured router", () => {
    const { engine } = seventyThirty();
    expect(catchVaultError(() => engine.rebalanceByExternalRoute("alice", new Uint8Array())).code).toBe(
      "INVALID_VENUE",
    );
  });

  it("rolls back fills that overspend the vault", () => {
    const router = new ScriptedRouter();
    const { engine } = seventyThirty({ externalRouter: router });
    router.fills = [
      { assetIn: "usdb", assetOut: "usda", amountIn: 100n * UNIT, amountOut: 100n * UNIT },
      { assetIn: "usda", assetOut: "usdb", amountIn: 900n * UNIT, amountOut: 900n * UNIT },
    ];

    const err = catchVaultError(() => engine.rebalanceByExternalRoute("alice", new Uint8Array()));

    expect(err.code).toBe("INSUFFICIENT_BALANCE");
    expect(engine.holdingsOf("usda")).toBe(700n * UNIT);
    expect(engine.holdingsOf("usdb")).toBe(300n * UNIT);
  });

  it("rejects malformed fills", () => {
    const router = new ScriptedRouter();
    const { engine } = seventyThirty({ externalRouter: router });
    router.fills = [{ assetIn: "usda", assetOut: "usda", amountIn: UNIT, amountOut: UNIT }];

    expect(catchVaultError(() => engine.rebalanceByExternalRoute("alice", new Uint8Array())).code).toBe(
      "INVALID_VENUE",
    );
  });
});

describe("managerSwap", () => {
  function managed(): { router: ScriptedRouter; engine: VaultEngine } {
    const router = new ScriptedRouter();
    const { engine } = vault({ targetAllocation: undefined, externalRouter: router });
    engine.deposit("manager", "usda", 1000n * UNIT);
    return { router, engine };
  }

  it("trades at the manager's discretion without a target allocation", () => {
    const { router, engine } = managed();
    router.fills = [{ assetIn: "usda", assetOut: "usdb", amountIn: 900n * UNIT, amountOut: 898n * UNIT }];

    const report = engine.managerSwap("manager", new Uint8Array([1]));

    expect(report.trigger).toBe("manager");
    expect(engine.holdingsOf("usda")).toBe(100n * UNIT);
    expect(engine.holdingsOf("usdb")).toBe(898n * UNIT);
  });

  it("is restricted to the manager", () => {
    const { engine } = managed();
    expect(catchVaultError(() => engine.managerSwap("alice", new Uint8Array())).code).toBe("UNAUTHORIZED");
  });

  it("is bounded by the value-loss budget", () => {
    const { router, engine } = managed();
    router.fills = [{ assetIn: "usda", assetOut: "usdb", amountIn: 100n * UNIT, amountOut: 90n * UNIT }];

    expect(catchVaultError(() => engine.managerSwap("manager", new Uint8Array())).code).toBe(
      "VALUE_LOSS_EXCEEDED",
    );
    expect(engine.holdingsOf("usda")).toBe(1000n * UNIT);
  });
});

// =============================================================================
// Native currency
// =============================================================================

describe("native currency", () => {
  function nativeVault(wrapper: FakeWrapper | undefined): { oracle: FakeOracle; engine: VaultEngine } {
    const oracle = stableOracle()
      .addAsset("native", 18, 2000n * USD)
      .addAsset("wnative", 18, 2000n * USD, false);
    const built = vault(
      {
        nativeWrapper: wrapper,
        targetAllocation: [
          { asset: "native", weight: 50 },
          { asset: "usdb", weight: 50 },
        ],
      },
      oracle,
    );
    const venue = new OracleVenue(oracle);
    built.engine.configureVenue("manager", 0, { feeTier: 3000, enabled: true, tradesNative: false, ...handlesFor(venue) });
    built.engine.depositNative("alice", 10n ** 18n);
    built.engine.deposit("bob", "usdb", 1000n * UNIT);
    return built;
  }

  it("wraps native currency for venues that only trade the wrapped token", () => {
    const wrapper = new FakeWrapper();
    const { engine } = nativeVault(wrapper);

    const report = engine.rebalanceByBestQuote("alice");

    expect(report.trades).toEqual([
      {
        venueId: 0,
        assetIn: "native",
        assetOut: "usdb",
        amountIn: 250_000_000_000_000_000n,
        amountOut: 500n * UNIT,
        quotedOut: 500n * UNIT,
        minAmountOut: 475n * UNIT,
        wrapped: true,
      },
    ]);
    expect(wrapper.wrapped).toBe(250_000_000_000_000_000n);
    expect(engine.holdingsOf("native")).toBe(750_000_000_000_000_000n);
    expect(engine.holdingsOf("usdb")).toBe(1500n * UNIT);
  });

  it("cannot reach wrapped-only venues without a wrapper", () => {
    const { engine } = nativeVault(undefined);
    const err = catchVaultError(() => engine.rebalanceByBestQuote("alice"));
    expect(err.code).toBe("NO_QUOTE_AVAILABLE");
    expect(err.details["venues"]).toBe("0:native currency unsupported");
  });
});
