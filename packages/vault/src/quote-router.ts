/**
 * Quote Router — best-quote venue selection and execution.
 *
 * Rules:
 * - Every enabled venue is asked; a quoter that throws or returns
 *   nothing yields a per-venue null, never an aborted call
 * - Highest quote wins; ties go to the lowest venue id
 * - The winner executes with minAmountOut = quote·(1 − slippage)
 * - Native currency is wrapped/unwrapped for venues that only trade
 *   the wrapped token
 */

import { BPS_DENOM, assertBps, mulDiv } from "@ballast/ledger";
import type { AssetId, NativeWrapper } from "@ballast/types";
import { NATIVE_ASSET } from "@ballast/types";
import type { Logger } from "pino";
import { VaultError } from "./errors.js";
import type { HoldingsBook } from "./holdings.js";
import type { VenueRegistry } from "./venue-registry.js";
import type { BestQuote, TradeRecord, VenueConfig, VenueQuote } from "./types.js";

export interface QuoteRouterOptions {
  readonly venues: VenueRegistry;
  readonly slippageBps: number;
  readonly logger: Logger;
  readonly wrapper?: NativeWrapper | undefined;
}

interface VenuePair {
  readonly assetIn: AssetId;
  readonly assetOut: AssetId;
}

/**
 * Pick the highest positive quote. Ties keep the earlier (lower id) venue.
 */
export function selectBestQuote(quotes: readonly VenueQuote[]): BestQuote | undefined {
  let best: BestQuote | undefined;
  for (const q of quotes) {
    if (q.amountOut === null || q.amountOut <= 0n) continue;
    if (best === undefined || q.amountOut > best.amountOut) {
      best = { venueId: q.venueId, amountOut: q.amountOut };
    }
  }
  return best;
}

export class QuoteRouter {
  private readonly venues: VenueRegistry;
  private readonly slippageBps: bigint;
  private readonly logger: Logger;
  private readonly wrapper: NativeWrapper | undefined;

  constructor(options: QuoteRouterOptions) {
    this.venues = options.venues;
    this.slippageBps = assertBps(options.slippageBps);
    this.logger = options.logger;
    this.wrapper = options.wrapper;
  }

  /**
   * Ask every enabled venue for a quote. Never throws on quoter failure.
   */
  collectQuotes(assetIn: AssetId, assetOut: AssetId, amountIn: bigint): readonly VenueQuote[] {
    return this.venues.enabled().map((venue) => this.quoteVenue(venue, assetIn, assetOut, amountIn));
  }

  bestQuote(assetIn: AssetId, assetOut: AssetId, amountIn: bigint): BestQuote | undefined {
    return selectBestQuote(this.collectQuotes(assetIn, assetOut, amountIn));
  }

  /**
   * Trade amountIn of assetIn for assetOut on the best venue, moving
   * the vault's holdings accordingly.
   */
  execute(holdings: HoldingsBook, assetIn: AssetId, assetOut: AssetId, amountIn: bigint): TradeRecord {
    if (assetIn === assetOut) {
      throw new VaultError("INVALID_ASSET", `Cannot trade "${assetIn}" for itself`, { asset: assetIn });
    }
    if (amountIn <= 0n) {
      throw new VaultError("ZERO_AMOUNT", "Trade amount must be positive");
    }

    const quotes = this.collectQuotes(assetIn, assetOut, amountIn);
    const best = selectBestQuote(quotes);
    if (best === undefined) {
      throw new VaultError("NO_QUOTE_AVAILABLE", `No venue quoted ${assetIn} → ${assetOut}`, {
        assetIn,
        assetOut,
        amountIn: amountIn.toString(),
        venues: quotes.map((q) => `${String(q.venueId)}:${q.error ?? String(q.amountOut)}`).join(","),
      });
    }

    const venue = this.venues.get(best.venueId);
    const pair = this.venuePair(venue, assetIn, assetOut);
    if (pair === undefined) {
      throw new VaultError("INVALID_VENUE", `Venue ${String(venue.id)} cannot trade native currency`);
    }
    const wrapped = pair.assetIn !== assetIn || pair.assetOut !== assetOut;
    const minAmountOut = mulDiv(best.amountOut, BPS_DENOM - this.slippageBps, BPS_DENOM);

    holdings.debit(assetIn, amountIn);
    const wrapsIn = pair.assetIn !== assetIn;
    const swapIn = wrapsIn ? this.requireWrapper().wrap(amountIn) : amountIn;

    let received: bigint;
    try {
      received = venue.executor.swap({
        assetIn: pair.assetIn,
        assetOut: pair.assetOut,
        amountIn: swapIn,
        feeTier: venue.feeTier,
        minAmountOut,
      });
    } catch (err) {
      // The venue took nothing; custody goes back to native currency.
      if (wrapsIn) this.requireWrapper().unwrap(swapIn);
      throw err;
    }

    if (received < minAmountOut) {
      throw new VaultError("SLIPPAGE_EXCEEDED", `Venue ${String(venue.id)} filled below the minimum output`, {
        venueId: String(venue.id),
        received: received.toString(),
        minAmountOut: minAmountOut.toString(),
      });
    }

    const amountOut = pair.assetOut !== assetOut ? this.requireWrapper().unwrap(received) : received;
    holdings.credit(assetOut, amountOut);

    this.logger.debug(
      { venueId: venue.id, assetIn, assetOut, amountIn: amountIn.toString(), amountOut: amountOut.toString() },
      "Trade executed",
    );

    return {
      venueId: venue.id,
      assetIn,
      assetOut,
      amountIn,
      amountOut,
      quotedOut: best.amountOut,
      minAmountOut,
      wrapped,
    };
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private quoteVenue(venue: VenueConfig, assetIn: AssetId, assetOut: AssetId, amountIn: bigint): VenueQuote {
    const pair = this.venuePair(venue, assetIn, assetOut);
    if (pair === undefined) {
      return { venueId: venue.id, amountOut: null, error: "native currency unsupported" };
    }

    try {
      const amountOut = venue.quoter.quote({
        assetIn: pair.assetIn,
        assetOut: pair.assetOut,
        amountIn,
        feeTier: venue.feeTier,
      });
      return { venueId: venue.id, amountOut };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ venueId: venue.id, assetIn, assetOut, err: message }, "Quoter failed; skipping venue");
      return { venueId: venue.id, amountOut: null, error: message };
    }
  }

  /**
   * The asset ids a venue actually trades for this pair, or undefined
   * if it would need a wrapper the vault does not have.
   */
  private venuePair(venue: VenueConfig, assetIn: AssetId, assetOut: AssetId): VenuePair | undefined {
    if (venue.tradesNative || (assetIn !== NATIVE_ASSET && assetOut !== NATIVE_ASSET)) {
      return { assetIn, assetOut };
    }
    if (this.wrapper === undefined) {
      return undefined;
    }
    const wrappedAsset = this.wrapper.wrappedAsset;
    return {
      assetIn: assetIn === NATIVE_ASSET ? wrappedAsset : assetIn,
      assetOut: assetOut === NATIVE_ASSET ? wrappedAsset : assetOut,
    };
  }

  private requireWrapper(): NativeWrapper {
    if (this.wrapper === undefined) {
      throw new VaultError("INVALID_VENUE", "Native wrapping requested but no wrapper is configured");
    }
    return this.wrapper;
  }
}
