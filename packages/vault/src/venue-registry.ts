/**
 * Venue Registry — the vault's table of trading venues.
 *
 * Venue ids are dense: a venue is configured either by replacing an
 * existing id or by appending at id === count. The table is owned by
 * one engine instance; nothing here is process-wide.
 */

import { VaultError } from "./errors.js";
import type { VenueConfig, VenueHandles, VenueSettings } from "./types.js";

export interface PersistedVenue extends VenueSettings {
  readonly id: number;
}

export class VenueRegistry {
  private _venues: readonly VenueConfig[] = [];

  get count(): number {
    return this._venues.length;
  }

  /**
   * Add (id === count) or replace (id < count) a venue.
   */
  configure(id: number, settings: VenueSettings, handles: VenueHandles): VenueConfig {
    if (!Number.isInteger(id) || id < 0 || id > this._venues.length) {
      throw new VaultError(
        "INVALID_VENUE",
        `Venue id ${String(id)} out of range; next id is ${String(this._venues.length)}`,
        { venueId: String(id) },
      );
    }
    if (!Number.isInteger(settings.feeTier) || settings.feeTier < 0) {
      throw new VaultError("INVALID_VENUE", `Venue fee tier must be a non-negative integer`, {
        venueId: String(id),
        feeTier: String(settings.feeTier),
      });
    }

    const config: VenueConfig = {
      id,
      feeTier: settings.feeTier,
      enabled: settings.enabled,
      tradesNative: settings.tradesNative,
      executor: handles.executor,
      quoter: handles.quoter,
    };

    const next = [...this._venues];
    next[id] = config;
    this._venues = next;
    return config;
  }

  get(id: number): VenueConfig {
    const venue = this._venues[id];
    if (venue === undefined) {
      throw new VaultError("INVALID_VENUE", `Unknown venue ${String(id)}`, { venueId: String(id) });
    }
    return venue;
  }

  list(): readonly VenueConfig[] {
    return this._venues;
  }

  enabled(): readonly VenueConfig[] {
    return this._venues.filter((v) => v.enabled);
  }

  /** Settings without handles, for persistence. */
  settings(): readonly PersistedVenue[] {
    return this._venues.map((v) => ({
      id: v.id,
      feeTier: v.feeTier,
      enabled: v.enabled,
      tradesNative: v.tradesNative,
    }));
  }

  // ─── Rollback ────────────────────────────────────────────────────────

  checkpoint(): readonly VenueConfig[] {
    return this._venues;
  }

  rollback(checkpoint: readonly VenueConfig[]): void {
    this._venues = checkpoint;
  }
}
