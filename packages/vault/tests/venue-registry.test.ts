import { describe, it, expect, beforeEach } from "vitest";
import { VenueRegistry } from "../src/venue-registry.js";
import { catchVaultError } from "./helpers/errors.js";
import { OracleVenue, handlesFor, stableOracle } from "./helpers/fakes.js";

describe("VenueRegistry", () => {
  let registry: VenueRegistry;
  const handles = handlesFor(new OracleVenue(stableOracle()));

  beforeEach(() => {
    registry = new VenueRegistry();
  });

  it("appends venues at the next id", () => {
    registry.configure(0, { feeTier: 500, enabled: true, tradesNative: true }, handles);
    registry.configure(1, { feeTier: 3000, enabled: false, tradesNative: false }, handles);

    expect(registry.count).toBe(2);
    expect(registry.settings()).toEqual([
      { id: 0, feeTier: 500, enabled: true, tradesNative: true },
      { id: 1, feeTier: 3000, enabled: false, tradesNative: false },
    ]);
    expect(registry.enabled().map((v) => v.id)).toEqual([0]);
  });

  it("replaces an existing venue in place", () => {
    registry.configure(0, { feeTier: 500, enabled: true, tradesNative: true }, handles);
    registry.configure(0, { feeTier: 100, enabled: false, tradesNative: true }, handles);

    expect(registry.count).toBe(1);
    expect(registry.get(0).feeTier).toBe(100);
  });

  it("rejects ids that would leave a gap", () => {
    const err = catchVaultError(() => registry.configure(1, { feeTier: 500, enabled: true, tradesNative: true }, handles));
    expect(err.code).toBe("INVALID_VENUE");
    expect(err.message).toBe("Venue id 1 out of range; next id is 0");
  });

  it("rejects negative or fractional fee tiers", () => {
    expect(
      catchVaultError(() => registry.configure(0, { feeTier: -1, enabled: true, tradesNative: true }, handles)).code,
    ).toBe("INVALID_VENUE");
    expect(
      catchVaultError(() => registry.configure(0, { feeTier: 0.5, enabled: true, tradesNative: true }, handles)).code,
    ).toBe("INVALID_VENUE");
  });

  it("throws for unknown venues", () => {
    expect(catchVaultError(() => registry.get(0)).code).toBe("INVALID_VENUE");
  });

  it("rolls back to a checkpoint", () => {
    registry.configure(0, { feeTier: 500, enabled: true, tradesNative: true }, handles);
    const checkpoint = registry.checkpoint();
    registry.configure(1, { feeTier: 3000, enabled: true, tradesNative: true }, handles);
    registry.configure(0, { feeTier: 100, enabled: false, tradesNative: true }, handles);

    registry.rollback(checkpoint);

    expect(registry.settings()).toEqual([{ id: 0, feeTier: 500, enabled: true, tradesNative: true }]);
  });
});
