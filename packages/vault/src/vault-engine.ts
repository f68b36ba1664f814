/**
 * Vault Engine — share accounting and rebalancing for one vault.
 *
 * Composes:
 * - ShareLedger (holder shares, total supply)
 * - HoldingsBook (physical per-asset balances)
 * - TargetAllocation + drift planner (what to trade)
 * - QuoteRouter over the VenueRegistry (where to trade)
 * - Fee settlement + accountability gate (who gains or pays)
 *
 * Every mutating call runs as one unit of work. State is checkpointed on
 * entry and restored on any error before the commit, and custody pulled
 * in during the call is refunded. Once the state change is persisted,
 * outbound transfers are pushed; a push that fails leaves the commit in
 * place and the undelivered transfers owed. A second mutating call
 * arriving while one is in flight is rejected.
 */

import {
  BPS_DENOM,
  ShareLedger,
  assertBps,
  mulDiv,
  toUsdValue,
} from "@ballast/ledger";
import type { ShareLedgerSnapshot } from "@ballast/ledger";
import type {
  AllocationWeight,
  AssetId,
  ExternalRouter,
  HolderId,
  NativeWrapper,
  PriceOracle,
  ShareAmount,
  TransferGateway,
  UsdValue,
} from "@ballast/types";
import { NATIVE_ASSET, isBps, isRouteFill } from "@ballast/types";
import type { Logger } from "pino";
import { isAccountable } from "./accountability.js";
import { TargetAllocation } from "./allocation.js";
import { driftedAssets, isWithinTolerance, planDriftCorrection } from "./drift.js";
import { VaultError } from "./errors.js";
import { HoldingsBook } from "./holdings.js";
import { silentLogger } from "./logger.js";
import { QuoteRouter } from "./quote-router.js";
import { planSettlement } from "./settlement.js";
import type { VaultStateRecord, VaultStateRepository } from "./state-store.js";
import { acceptedAssets, priceAsset, valueHoldings, weightBps } from "./valuation.js";
import { VenueRegistry } from "./venue-registry.js";
import type { PersistedVenue } from "./venue-registry.js";
import {
  DEFAULT_VAULT_PARAMS,
  INITIAL_PRICE,
  SCALE,
} from "./types.js";
import type {
  AccountabilityPolicy,
  AllocationLine,
  BestQuote,
  DepositReceipt,
  FeeSettlement,
  LifetimeTotals,
  Payout,
  PendingTransfer,
  RebalanceReport,
  RedeemReceipt,
  TradeRecord,
  VaultParams,
  VenueConfig,
  VenueHandles,
  VenueQuote,
  VenueSettings,
} from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface VaultEngineOptions {
  readonly vaultId: string;
  readonly manager: HolderId;
  readonly oracle: PriceOracle;
  readonly transfers: TransferGateway;
  readonly params?: Partial<VaultParams>;
  /** Omit for a manager-driven vault (no drift rebalancing). */
  readonly targetAllocation?: readonly AllocationWeight[];
  /** Omit to never gate the manager. */
  readonly accountability?: AccountabilityPolicy;
  readonly externalRouter?: ExternalRouter;
  readonly nativeWrapper?: NativeWrapper;
  readonly repository?: VaultStateRepository;
  readonly logger?: Logger;
}

export interface RestoreOptions extends VaultEngineOptions {
  readonly repository: VaultStateRepository;
  /** Venue handles by venue id; settings come from the stored record. */
  readonly venues?: readonly VenueHandles[];
}

export type VenueRegistration = VenueSettings & VenueHandles;

interface EngineState {
  readonly sharePrice: UsdValue;
  readonly totalDepositValue: UsdValue;
  readonly totalWithdrawValue: UsdValue;
  /** Total value at the last settlement, moved by deposits and redemptions. */
  readonly lastSettledValue: UsdValue;
  readonly paused: boolean;
  readonly swapPaused: boolean;
  readonly ownerFeeBps: number;
  readonly callerFeeBps: number;
  readonly pendingTransfers: readonly PendingTransfer[];
}

interface Checkpoint {
  readonly ledger: ShareLedgerSnapshot;
  readonly holdings: ReturnType<HoldingsBook["snapshot"]>;
  readonly state: EngineState;
  readonly allocation: TargetAllocation | undefined;
  readonly venues: readonly VenueConfig[];
}

interface DeliveryFailure {
  readonly undelivered: readonly PendingTransfer[];
  readonly error: unknown;
}

/**
 * Custody movements of one unit of work. Pulls reach the gateway at
 * once; sends wait for the commit.
 */
class TransferBatch {
  readonly pulled: PendingTransfer[] = [];
  readonly outbound: PendingTransfer[] = [];
  private readonly gateway: TransferGateway;

  constructor(gateway: TransferGateway) {
    this.gateway = gateway;
  }

  pull(from: HolderId, asset: AssetId, amount: bigint): void {
    this.gateway.pull(from, asset, amount);
    this.pulled.push({ to: from, asset, amount });
  }

  send(to: HolderId, asset: AssetId, amount: bigint): void {
    this.outbound.push({ to, asset, amount });
  }
}

// =============================================================================
// Vault Engine
// =============================================================================

export class VaultEngine {
  readonly vaultId: string;
  readonly manager: HolderId;

  private readonly oracle: PriceOracle;
  private readonly transfers: TransferGateway;
  private readonly params: VaultParams;
  private readonly accountability: AccountabilityPolicy | undefined;
  private readonly externalRouter: ExternalRouter | undefined;
  private readonly repository: VaultStateRepository | undefined;
  private readonly logger: Logger;

  private readonly ledger = new ShareLedger();
  private readonly holdings = new HoldingsBook();
  private readonly venueRegistry = new VenueRegistry();
  private readonly router: QuoteRouter;

  private allocation: TargetAllocation | undefined;
  private state: EngineState;
  private inFlight: string | undefined;
  private priceMarked = false;

  constructor(options: VaultEngineOptions) {
    const params: VaultParams = { ...DEFAULT_VAULT_PARAMS, ...options.params };
    assertBps(params.driftToleranceBps);
    assertBps(params.valueLossBps);
    assertBps(params.quoteSlippageBps);
    assertFeeSplit(params.ownerFeeBps, params.callerFeeBps);
    if (options.accountability !== undefined) {
      assertBps(options.accountability.minOwnerBps);
    }

    this.vaultId = options.vaultId;
    this.manager = options.manager;
    this.oracle = options.oracle;
    this.transfers = options.transfers;
    this.params = params;
    this.accountability = options.accountability;
    this.externalRouter = options.externalRouter;
    this.repository = options.repository;
    this.logger = (options.logger ?? silentLogger()).child({ vaultId: options.vaultId });

    this.allocation =
      options.targetAllocation !== undefined
        ? this.acceptedAllocation(options.targetAllocation)
        : undefined;

    this.router = new QuoteRouter({
      venues: this.venueRegistry,
      slippageBps: params.quoteSlippageBps,
      logger: this.logger,
      wrapper: options.nativeWrapper,
    });

    this.state = {
      sharePrice: INITIAL_PRICE,
      totalDepositValue: 0n,
      totalWithdrawValue: 0n,
      lastSettledValue: 0n,
      paused: false,
      swapPaused: false,
      ownerFeeBps: params.ownerFeeBps,
      callerFeeBps: params.callerFeeBps,
      pendingTransfers: [],
    };
  }

  /**
   * Rebuild an engine from its stored record.
   * Venue handles are re-bound by id from `options.venues`.
   */
  static restore(options: RestoreOptions): VaultEngine {
    const record = options.repository.load(options.vaultId);
    if (record === undefined) {
      throw new VaultError("STATE_CORRUPTED", `No stored state for vault "${options.vaultId}"`, {
        vaultId: options.vaultId,
      });
    }
    if (record.manager !== options.manager) {
      throw new VaultError("STATE_CORRUPTED", `Stored manager does not match for vault "${options.vaultId}"`, {
        vaultId: options.vaultId,
        stored: record.manager,
      });
    }

    const engine = new VaultEngine({
      ...options,
      targetAllocation: undefined,
      params: {
        ...options.params,
        ownerFeeBps: record.ownerFeeBps,
        callerFeeBps: record.callerFeeBps,
      },
    });

    // Stored tables were checked when set; an asset the oracle has since
    // dropped must not make the vault unrecoverable.
    engine.allocation = record.allocation === null ? undefined : TargetAllocation.from(record.allocation);
    engine.ledger.restore(record.ledger);
    engine.holdings.restore(record.holdings);
    engine.restoreVenues(record.venues, options.venues ?? []);
    engine.state = {
      sharePrice: BigInt(record.sharePrice),
      totalDepositValue: BigInt(record.totalDepositValue),
      totalWithdrawValue: BigInt(record.totalWithdrawValue),
      lastSettledValue: BigInt(record.lastSettledValue),
      paused: record.paused,
      swapPaused: record.swapPaused,
      ownerFeeBps: record.ownerFeeBps,
      callerFeeBps: record.callerFeeBps,
      pendingTransfers: record.pendingTransfers.map((t) => ({ to: t.to, asset: t.asset, amount: BigInt(t.amount) })),
    };
    return engine;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Holder operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Deposit `amount` native units of an accepted asset for shares.
   */
  deposit(holder: HolderId, asset: AssetId, amount: bigint): DepositReceipt {
    return this.mutate("deposit", (batch) => {
      this.requireNotPaused();
      if (amount <= 0n) {
        throw new VaultError("ZERO_AMOUNT", "Deposit amount must be positive", { asset });
      }

      const { price, decimals } = priceAsset(this.oracle, asset);
      const valueUsd = toUsdValue(amount, price, decimals);
      const supply = this.ledger.totalSupply;
      // Every accepted asset must price before custody moves.
      const valueBefore = valueHoldings(this.oracle, this.holdings).total;

      let sharesMinted: ShareAmount;
      if (supply === 0n) {
        this.state = { ...this.state, sharePrice: INITIAL_PRICE, lastSettledValue: 0n };
        sharesMinted = mulDiv(valueUsd, SCALE, INITIAL_PRICE);
      } else if (valueBefore === 0n) {
        throw new VaultError("ZERO_SHARES", "Vault has outstanding shares but no value", {
          totalSupply: supply.toString(),
        });
      } else {
        // valueUsd·SCALE/sharePrice at full precision
        sharesMinted = mulDiv(valueUsd, supply, valueBefore);
      }

      if (sharesMinted === 0n) {
        throw new VaultError("ZERO_SHARES", "Deposit is too small to mint a share", {
          asset,
          amount: amount.toString(),
          valueUsd: valueUsd.toString(),
        });
      }

      batch.pull(holder, asset, amount);
      this.holdings.credit(asset, amount);
      this.ledger.mint(holder, sharesMinted);
      this.state = {
        ...this.state,
        totalDepositValue: this.state.totalDepositValue + valueUsd,
        lastSettledValue: this.state.lastSettledValue + valueUsd,
      };
      const sharePrice = this.markToMarket();

      this.logger.info(
        { holder, asset, amount: amount.toString(), shares: sharesMinted.toString() },
        "Deposit committed",
      );

      return { holder, asset, amount, valueUsd, sharesMinted, sharePrice };
    });
  }

  depositNative(holder: HolderId, amount: bigint): DepositReceipt {
    return this.deposit(holder, NATIVE_ASSET, amount);
  }

  /**
   * Burn shares for a pro-rata slice of every accepted asset the vault
   * physically holds. No prices are read to size the payout.
   */
  redeem(holder: HolderId, shareAmount: ShareAmount): RedeemReceipt {
    return this.mutate("redeem", (batch) => {
      if (shareAmount <= 0n) {
        throw new VaultError("ZERO_AMOUNT", "Redeem amount must be positive");
      }
      const balance = this.ledger.balanceOf(holder);
      if (shareAmount > balance) {
        throw new VaultError("INSUFFICIENT_BALANCE", `Holder "${holder}" cannot redeem more shares than held`, {
          holder,
          requested: shareAmount.toString(),
          balance: balance.toString(),
        });
      }

      const supply = this.ledger.totalSupply;
      const payouts: Payout[] = [];
      let withdrawValue = 0n;
      for (const asset of acceptedAssets(this.oracle)) {
        const amount = mulDiv(this.holdings.balanceOf(asset), shareAmount, supply);
        if (amount === 0n) continue;
        const { price, decimals } = priceAsset(this.oracle, asset);
        withdrawValue += toUsdValue(amount, price, decimals);
        payouts.push({ asset, amount });
      }

      // Burn first: a reentrant redeemer must see the reduced supply.
      this.ledger.burn(holder, shareAmount);
      for (const payout of payouts) {
        this.holdings.debit(payout.asset, payout.amount);
        batch.send(holder, payout.asset, payout.amount);
      }

      this.state = {
        ...this.state,
        totalWithdrawValue: this.state.totalWithdrawValue + withdrawValue,
        lastSettledValue: mulDiv(this.state.lastSettledValue, supply - shareAmount, supply),
      };
      const sharePrice = this.markToMarket();

      this.logger.info(
        { holder, shares: shareAmount.toString(), payouts: payouts.length },
        "Redeem committed",
      );

      return { holder, sharesBurned: shareAmount, payouts, sharePrice };
    });
  }

  /**
   * Correct drift from the target allocation by trading through the
   * best-quoting venue for each seller×buyer leg.
   */
  rebalanceByBestQuote(caller: HolderId): RebalanceReport {
    return this.mutate("rebalanceByBestQuote", () => {
      const allocation = this.requireRebalanceable(caller);
      const before = valueHoldings(this.oracle, this.holdings);
      const trades: TradeRecord[] = [];

      if (!isWithinTolerance(before, allocation, this.params.driftToleranceBps)) {
        const plan = planDriftCorrection(before, allocation);
        this.logger.debug(
          {
            sellers: plan.sellers.length,
            buyers: plan.buyers.length,
            totalDeficit: plan.totalDeficit.toString(),
          },
          "Drift correction planned",
        );
        for (const leg of plan.legs) {
          trades.push(this.router.execute(this.holdings, leg.assetIn, leg.assetOut, leg.amountIn));
        }
      }

      return this.completeRebalance(caller, before.total, trades, allocation);
    });
  }

  /**
   * Rebalance along a caller-supplied aggregator route. Same value-loss,
   * allocation and fee rules as rebalanceByBestQuote.
   */
  rebalanceByExternalRoute(caller: HolderId, routeData: Uint8Array): RebalanceReport {
    return this.mutate("rebalanceByExternalRoute", () => {
      const allocation = this.requireRebalanceable(caller);
      const before = valueHoldings(this.oracle, this.holdings);
      const trades = this.applyRoute(routeData);
      return this.completeRebalance(caller, before.total, trades, allocation);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Manager operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Discretionary manager trade along an aggregator route. Bounded by
   * the value-loss budget but not by the target allocation.
   */
  managerSwap(caller: HolderId, routeData: Uint8Array): RebalanceReport {
    return this.mutate("managerSwap", () => {
      this.requireManager(caller);
      this.requireAccountable("managerSwap");
      this.requireNotPaused();
      this.requireSwapsEnabled();
      const before = valueHoldings(this.oracle, this.holdings);
      const trades = this.applyRoute(routeData);
      return this.completeRebalance(this.manager, before.total, trades, undefined);
    });
  }

  updateTargetAllocation(caller: HolderId, table: readonly AllocationWeight[]): readonly AllocationWeight[] {
    return this.mutate("updateTargetAllocation", () => {
      this.requireManager(caller);
      this.requireAccountable("updateTargetAllocation");
      const next = this.acceptedAllocation(table);
      this.allocation = next;
      this.logger.info({ assets: next.size }, "Target allocation updated");
      return next.toTable();
    });
  }

  configureVenue(caller: HolderId, id: number, registration: VenueRegistration): VenueConfig {
    return this.mutate("configureVenue", () => {
      this.requireManager(caller);
      const venue = this.venueRegistry.configure(id, registration, registration);
      this.logger.info(
        { venueId: id, feeTier: venue.feeTier, enabled: venue.enabled },
        "Venue configured",
      );
      return venue;
    });
  }

  setFeeSplit(caller: HolderId, ownerFeeBps: number, callerFeeBps: number): void {
    this.mutate("setFeeSplit", () => {
      this.requireManager(caller);
      assertFeeSplit(ownerFeeBps, callerFeeBps);
      this.state = { ...this.state, ownerFeeBps, callerFeeBps };
    });
  }

  pause(caller: HolderId): void {
    this.mutate("pause", () => {
      this.requireManager(caller);
      this.requireAccountable("pause");
      this.state = { ...this.state, paused: true };
    });
  }

  unpause(caller: HolderId): void {
    this.mutate("unpause", () => {
      this.requireManager(caller);
      this.state = { ...this.state, paused: false };
    });
  }

  pauseRebalancing(caller: HolderId): void {
    this.mutate("pauseRebalancing", () => {
      this.requireManager(caller);
      this.requireAccountable("pauseRebalancing");
      this.state = { ...this.state, swapPaused: true };
    });
  }

  unpauseRebalancing(caller: HolderId): void {
    this.mutate("unpauseRebalancing", () => {
      this.requireManager(caller);
      this.state = { ...this.state, swapPaused: false };
    });
  }

  /**
   * Send residual holdings of a non-accepted asset out of the vault.
   */
  sweep(caller: HolderId, asset: AssetId, amount: bigint, to: HolderId): void {
    this.mutate("sweep", (batch) => {
      this.requireManager(caller);
      if (this.oracle.isAssetAccepted(asset)) {
        throw new VaultError("SWEEP_FORBIDDEN", `Accepted asset "${asset}" cannot be swept`, { asset });
      }
      if (amount <= 0n) {
        throw new VaultError("ZERO_AMOUNT", "Sweep amount must be positive", { asset });
      }
      this.holdings.debit(asset, amount);
      batch.send(to, asset, amount);
      this.logger.info({ asset, amount: amount.toString(), to }, "Residual swept");
    });
  }

  /**
   * Retry transfers left undelivered by earlier calls. Anyone may call.
   */
  deliverPendingTransfers(): readonly PendingTransfer[] {
    return this.mutate("deliverPendingTransfers", (batch) => {
      const owed = this.state.pendingTransfers;
      this.state = { ...this.state, pendingTransfers: [] };
      for (const transfer of owed) {
        batch.send(transfer.to, transfer.asset, transfer.amount);
      }
      return owed;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  currentTotalValue(): UsdValue {
    return valueHoldings(this.oracle, this.holdings).total;
  }

  currentAllocation(): readonly AllocationLine[] {
    const valuation = valueHoldings(this.oracle, this.holdings);
    return valuation.assets.map((a) => ({
      asset: a.asset,
      units: a.units,
      value: a.value,
      weightBps: weightBps(a.value, valuation.total),
      targetBps: this.allocation?.targetBps(a.asset) ?? 0,
    }));
  }

  sharePrice(): UsdValue {
    return this.state.sharePrice;
  }

  totalSupply(): ShareAmount {
    return this.ledger.totalSupply;
  }

  balanceOf(holder: HolderId): ShareAmount {
    return this.ledger.balanceOf(holder);
  }

  holdingsOf(asset: AssetId): bigint {
    return this.holdings.balanceOf(asset);
  }

  lifetimeTotals(): LifetimeTotals {
    return {
      totalDepositValue: this.state.totalDepositValue,
      totalWithdrawValue: this.state.totalWithdrawValue,
    };
  }

  feeSplit(): { readonly ownerFeeBps: number; readonly callerFeeBps: number } {
    return { ownerFeeBps: this.state.ownerFeeBps, callerFeeBps: this.state.callerFeeBps };
  }

  isPaused(): boolean {
    return this.state.paused;
  }

  isRebalancePaused(): boolean {
    return this.state.swapPaused;
  }

  pendingTransfers(): readonly PendingTransfer[] {
    return this.state.pendingTransfers;
  }

  isAccountable(): boolean {
    return isAccountable(this.ledger.balanceOf(this.manager), this.ledger.totalSupply, this.accountability);
  }

  targetAllocation(): readonly AllocationWeight[] | undefined {
    return this.allocation?.toTable();
  }

  venues(): readonly PersistedVenue[] {
    return this.venueRegistry.settings();
  }

  quotes(assetIn: AssetId, assetOut: AssetId, amountIn: bigint): readonly VenueQuote[] {
    return this.router.collectQuotes(assetIn, assetOut, amountIn);
  }

  getBestQuote(assetIn: AssetId, assetOut: AssetId, amountIn: bigint): BestQuote | undefined {
    return this.router.bestQuote(assetIn, assetOut, amountIn);
  }

  /**
   * Serializable record of the full vault state.
   */
  snapshot(): VaultStateRecord {
    return {
      version: 1,
      vaultId: this.vaultId,
      manager: this.manager,
      ledger: {
        version: 1,
        balances: this.ledger.snapshot().balances.map((b) => ({ ...b })),
        totalSupply: this.ledger.totalSupply.toString(),
      },
      holdings: this.holdings.snapshot().map((h) => ({ ...h })),
      allocation: this.allocation?.toTable().map((w) => ({ ...w })) ?? null,
      venues: this.venueRegistry.settings().map((v) => ({ ...v })),
      sharePrice: this.state.sharePrice.toString(),
      totalDepositValue: this.state.totalDepositValue.toString(),
      totalWithdrawValue: this.state.totalWithdrawValue.toString(),
      lastSettledValue: this.state.lastSettledValue.toString(),
      paused: this.state.paused,
      swapPaused: this.state.swapPaused,
      ownerFeeBps: this.state.ownerFeeBps,
      callerFeeBps: this.state.callerFeeBps,
      pendingTransfers: this.state.pendingTransfers.map((t) => ({
        to: t.to,
        asset: t.asset,
        amount: t.amount.toString(),
      })),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Unit of work
  // ───────────────────────────────────────────────────────────────────────

  private mutate<T>(operation: string, work: (batch: TransferBatch) => T): T {
    if (this.inFlight !== undefined) {
      throw new VaultError("REENTRANT_CALL", `${operation} rejected: ${this.inFlight} is in progress`, {
        operation,
        inFlight: this.inFlight,
      });
    }

    this.inFlight = operation;
    try {
      const batch = new TransferBatch(this.transfers);
      const result = this.commit(operation, batch, work);
      this.deliver(operation, batch.outbound);
      return result;
    } finally {
      this.inFlight = undefined;
    }
  }

  /**
   * Run the work and persist it, or restore the checkpoint and refund
   * whatever was pulled in.
   */
  private commit<T>(operation: string, batch: TransferBatch, work: (batch: TransferBatch) => T): T {
    this.priceMarked = false;
    const checkpoint = this.checkpoint();

    try {
      if (!this.oracle.isPlatformOperational()) {
        throw new VaultError("PLATFORM_HALTED", "Platform is not operational", { operation });
      }
      const result = work(batch);
      if (!this.priceMarked) this.markToMarket();
      this.repository?.save(this.snapshot());
      return result;
    } catch (err) {
      this.rollback(checkpoint);
      this.logger.warn(
        {
          operation,
          code: err instanceof VaultError ? err.code : undefined,
          err: errorMessage(err),
        },
        "Operation reverted",
      );
      this.refund(operation, batch.pulled);
      throw err;
    }
  }

  private refund(operation: string, pulled: readonly PendingTransfer[]): void {
    const failure = this.pushAll(pulled);
    if (failure === undefined) return;
    this.logger.error(
      { operation, undelivered: failure.undelivered.length, err: errorMessage(failure.error) },
      "Refund left undelivered",
    );
    this.owe(failure.undelivered);
  }

  /**
   * Push committed sends in order. The commit stands if one fails; it
   * and the sends after it are kept as pending transfers.
   */
  private deliver(operation: string, outbound: readonly PendingTransfer[]): void {
    const failure = this.pushAll(outbound);
    if (failure === undefined) return;

    this.owe(failure.undelivered);
    const cause = errorMessage(failure.error);
    this.logger.error(
      { operation, undelivered: failure.undelivered.length, err: cause },
      "Transfers left undelivered",
    );
    throw new VaultError(
      "TRANSFER_PENDING",
      `${operation} committed but ${String(failure.undelivered.length)} transfer(s) were not delivered`,
      { operation, undelivered: String(failure.undelivered.length), cause },
    );
  }

  private pushAll(transfers: readonly PendingTransfer[]): DeliveryFailure | undefined {
    for (const [index, transfer] of transfers.entries()) {
      try {
        this.transfers.push(transfer.to, transfer.asset, transfer.amount);
      } catch (error) {
        return { undelivered: transfers.slice(index), error };
      }
    }
    return undefined;
  }

  private owe(transfers: readonly PendingTransfer[]): void {
    this.state = { ...this.state, pendingTransfers: [...this.state.pendingTransfers, ...transfers] };
    this.repository?.save(this.snapshot());
  }

  private checkpoint(): Checkpoint {
    return {
      ledger: this.ledger.snapshot(),
      holdings: this.holdings.snapshot(),
      state: this.state,
      allocation: this.allocation,
      venues: this.venueRegistry.checkpoint(),
    };
  }

  private rollback(checkpoint: Checkpoint): void {
    this.ledger.restore(checkpoint.ledger);
    this.holdings.restore(checkpoint.holdings);
    this.state = checkpoint.state;
    this.allocation = checkpoint.allocation;
    this.venueRegistry.rollback(checkpoint.venues);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private completeRebalance(
    trigger: HolderId,
    valueBefore: UsdValue,
    trades: readonly TradeRecord[],
    allocation: TargetAllocation | undefined,
  ): RebalanceReport {
    const after = valueHoldings(this.oracle, this.holdings);

    if ((valueBefore - after.total) * BPS_DENOM > BigInt(this.params.valueLossBps) * valueBefore) {
      throw new VaultError("VALUE_LOSS_EXCEEDED", "Rebalance lost more value than the budget allows", {
        valueBefore: valueBefore.toString(),
        valueAfter: after.total.toString(),
        budgetBps: String(this.params.valueLossBps),
      });
    }

    if (allocation !== undefined) {
      const drifted = driftedAssets(after, allocation, this.params.driftToleranceBps);
      if (drifted.length > 0) {
        throw new VaultError("ALLOCATION_OUT_OF_TOLERANCE", "Allocation is still outside tolerance after trading", {
          assets: drifted.join(","),
          valueBefore: valueBefore.toString(),
          valueAfter: after.total.toString(),
        });
      }
    }

    const settlement = this.settle(trigger, after.total);
    this.state = { ...this.state, lastSettledValue: after.total };
    const sharePrice = this.markToMarket(after.total);

    this.logger.info(
      {
        trigger,
        trades: trades.length,
        valueBefore: valueBefore.toString(),
        valueAfter: after.total.toString(),
        gain: settlement.gain.toString(),
        loss: settlement.loss.toString(),
      },
      "Rebalance committed",
    );

    return {
      trigger,
      traded: trades.length > 0,
      trades,
      valueBefore,
      valueAfter: after.total,
      settlement,
      sharePrice,
    };
  }

  private settle(trigger: HolderId, valueAfter: UsdValue): FeeSettlement {
    const totalSupply = this.ledger.totalSupply;
    const managerShares = this.ledger.balanceOf(this.manager);

    const settlement = planSettlement({
      baseline: this.state.lastSettledValue,
      valueAfter,
      totalSupply,
      managerShares,
      managerAccountable: isAccountable(managerShares, totalSupply, this.accountability),
      ownerFeeBps: this.state.ownerFeeBps,
      callerFeeBps: this.state.callerFeeBps,
      platformFee: (gain) => this.oracle.computeFee(gain),
    });

    if (settlement.platformShares > 0n) {
      this.ledger.mint(this.oracle.platformAccount(), settlement.platformShares);
    }
    if (settlement.ownerShares > 0n) {
      this.ledger.mint(this.manager, settlement.ownerShares);
    }
    if (settlement.callerShares > 0n) {
      this.ledger.mint(trigger, settlement.callerShares);
    }
    if (settlement.penaltyShares > 0n) {
      this.ledger.burn(this.manager, settlement.penaltyShares);
    }

    return settlement;
  }

  private applyRoute(routeData: Uint8Array): TradeRecord[] {
    if (this.externalRouter === undefined) {
      throw new VaultError("INVALID_VENUE", "No external router is configured");
    }

    const fills = this.externalRouter.execute(routeData, this.holdings.view());
    const trades: TradeRecord[] = [];

    for (const fill of fills) {
      if (!isRouteFill(fill) || fill.assetIn === fill.assetOut) {
        throw new VaultError("INVALID_VENUE", "External router reported a malformed fill");
      }
      this.holdings.debit(fill.assetIn, fill.amountIn);
      this.holdings.credit(fill.assetOut, fill.amountOut);
      trades.push({
        venueId: "external",
        assetIn: fill.assetIn,
        assetOut: fill.assetOut,
        amountIn: fill.amountIn,
        amountOut: fill.amountOut,
        quotedOut: null,
        minAmountOut: null,
        wrapped: false,
      });
    }

    return trades;
  }

  /**
   * Recompute the share price from total value and supply.
   * Values current holdings unless the caller already has the total.
   */
  private markToMarket(totalValue?: UsdValue): UsdValue {
    const total = totalValue ?? valueHoldings(this.oracle, this.holdings).total;
    const supply = this.ledger.totalSupply;
    const sharePrice = supply === 0n ? INITIAL_PRICE : mulDiv(total, SCALE, supply);
    this.state = { ...this.state, sharePrice };
    this.priceMarked = true;
    return sharePrice;
  }

  private restoreVenues(settings: readonly PersistedVenue[], handles: readonly VenueHandles[]): void {
    const ordered = [...settings].sort((a, b) => a.id - b.id);
    for (const venue of ordered) {
      const bound = handles[venue.id];
      if (bound === undefined) {
        throw new VaultError("INVALID_VENUE", `No handles supplied for stored venue ${String(venue.id)}`, {
          venueId: String(venue.id),
        });
      }
      this.venueRegistry.configure(venue.id, venue, bound);
    }
  }

  private acceptedAllocation(table: readonly AllocationWeight[]): TargetAllocation {
    const allocation = TargetAllocation.from(table);
    for (const asset of allocation.assets) {
      if (!this.oracle.isAssetAccepted(asset)) {
        throw new VaultError("INVALID_ASSET", `Allocation asset "${asset}" is not accepted`, { asset });
      }
    }
    return allocation;
  }

  private requireRebalanceable(caller: HolderId): TargetAllocation {
    if (this.allocation === undefined) {
      throw new VaultError("NO_TARGET_ALLOCATION", "Vault has no target allocation to rebalance toward");
    }
    this.requireNotPaused();
    this.requireSwapsEnabled();
    if (this.ledger.balanceOf(caller) === 0n) {
      throw new VaultError("INSUFFICIENT_BALANCE", "Only share holders may trigger a rebalance", {
        holder: caller,
      });
    }
    return this.allocation;
  }

  private requireManager(caller: HolderId): void {
    if (caller !== this.manager) {
      throw new VaultError("UNAUTHORIZED", `"${caller}" is not the vault manager`, { caller });
    }
  }

  private requireAccountable(operation: string): void {
    if (!this.isAccountable()) {
      throw new VaultError("UNACCOUNTABLE", `Manager stake is below the accountability threshold for ${operation}`, {
        operation,
        managerShares: this.ledger.balanceOf(this.manager).toString(),
        totalSupply: this.ledger.totalSupply.toString(),
      });
    }
  }

  private requireNotPaused(): void {
    if (this.state.paused) {
      throw new VaultError("PAUSED", "Vault is paused");
    }
  }

  private requireSwapsEnabled(): void {
    if (this.state.swapPaused) {
      throw new VaultError("REBALANCE_PAUSED", "Rebalancing is paused");
    }
  }
}

function assertFeeSplit(ownerFeeBps: number, callerFeeBps: number): void {
  if (!isBps(ownerFeeBps) || !isBps(callerFeeBps) || ownerFeeBps + callerFeeBps > 10_000) {
    throw new VaultError("INVALID_FEE_SPLIT", "Fee split must be two bps values summing to at most 10000", {
      ownerFeeBps: String(ownerFeeBps),
      callerFeeBps: String(callerFeeBps),
    });
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
