/**
 * Vault State Store.
 *
 * Durable vault state lives in a key-value store, one record per vault
 * instance under "vault:<vaultId>". Each record is saved with a SHA-256
 * hash of its canonical JSON; a record whose hash no longer matches is
 * refused on load.
 *
 * Implementations:
 * - InMemoryKeyValueStore — tests and development
 * - FileKeyValueStore — one JSON file per key
 */

import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import { isUintString } from "@ballast/types";
import { VaultError } from "./errors.js";

// =============================================================================
// Key-Value Stores
// =============================================================================

export interface KeyValueStore {
  get(key: string): string | undefined;
  set(key: string, value: string): void;
  delete(key: string): void;
  has(key: string): boolean;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly _entries = new Map<string, string>();

  get(key: string): string | undefined {
    return this._entries.get(key);
  }

  set(key: string, value: string): void {
    this._entries.set(key, value);
  }

  delete(key: string): void {
    this._entries.delete(key);
  }

  has(key: string): boolean {
    return this._entries.has(key);
  }
}

/**
 * Stores each key as <baseDir>/<sanitized key>.json.
 */
export class FileKeyValueStore implements KeyValueStore {
  private readonly _baseDir: string;

  constructor(baseDir: string) {
    this._baseDir = baseDir;
    mkdirSync(this._baseDir, { recursive: true });
  }

  get(key: string): string | undefined {
    const path = this._path(key);
    if (!existsSync(path)) {
      return undefined;
    }
    return readFileSync(path, "utf-8");
  }

  set(key: string, value: string): void {
    writeFileSync(this._path(key), value, "utf-8");
  }

  delete(key: string): void {
    const path = this._path(key);
    if (existsSync(path)) {
      unlinkSync(path);
    }
  }

  has(key: string): boolean {
    return existsSync(this._path(key));
  }

  get baseDir(): string {
    return this._baseDir;
  }

  private _path(key: string): string {
    const safe = key.replace(/[^a-zA-Z0-9_.-]/g, "_");
    return join(this._baseDir, `${safe}.json`);
  }
}

// =============================================================================
// Record Schema
// =============================================================================

const Uint = z.string().refine(isUintString, { message: "expected a non-negative integer string" });
const Bps = z.number().int().min(0).max(10_000);

export const VaultStateRecordSchema = z.object({
  version: z.literal(1),
  vaultId: z.string().min(1),
  manager: z.string().min(1),
  ledger: z.object({
    version: z.literal(1),
    balances: z.array(z.object({ holder: z.string().min(1), shares: Uint })),
    totalSupply: Uint,
  }),
  holdings: z.array(z.object({ asset: z.string().min(1), amount: Uint })),
  allocation: z.array(z.object({ asset: z.string().min(1), weight: z.number().int() })).nullable(),
  venues: z.array(
    z.object({
      id: z.number().int().min(0),
      feeTier: z.number().int().min(0),
      enabled: z.boolean(),
      tradesNative: z.boolean(),
    }),
  ),
  sharePrice: Uint,
  totalDepositValue: Uint,
  totalWithdrawValue: Uint,
  lastSettledValue: Uint,
  paused: z.boolean(),
  swapPaused: z.boolean(),
  ownerFeeBps: Bps,
  callerFeeBps: Bps,
  pendingTransfers: z.array(z.object({ to: z.string().min(1), asset: z.string().min(1), amount: Uint })),
});

export type VaultStateRecord = z.infer<typeof VaultStateRecordSchema>;

const StoredEnvelopeSchema = z.object({
  record: z.unknown(),
  stateHash: z.string().min(1),
  savedAt: z.string(),
});

export interface StoredVaultState {
  readonly record: VaultStateRecord;
  readonly stateHash: string;
  readonly savedAt: string;
}

/**
 * SHA-256 of the canonical JSON form of a record.
 */
export function computeStateHash(record: unknown): string {
  return createHash("sha256").update(canonicalize(record)).digest("hex");
}

// =============================================================================
// Repository
// =============================================================================

export class VaultStateRepository {
  private readonly store: KeyValueStore;

  constructor(store: KeyValueStore) {
    this.store = store;
  }

  static keyFor(vaultId: string): string {
    return `vault:${vaultId}`;
  }

  save(record: VaultStateRecord): StoredVaultState {
    const stored: StoredVaultState = {
      record,
      stateHash: computeStateHash(record),
      savedAt: new Date().toISOString(),
    };
    this.store.set(VaultStateRepository.keyFor(record.vaultId), JSON.stringify(stored));
    return stored;
  }

  /**
   * Load and verify a vault's record.
   *
   * @returns undefined if the vault has never been saved
   * @throws VaultError("STATE_CORRUPTED") on parse, hash or schema failure
   */
  load(vaultId: string): VaultStateRecord | undefined {
    const raw = this.store.get(VaultStateRepository.keyFor(vaultId));
    if (raw === undefined) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new VaultError("STATE_CORRUPTED", `Stored state for "${vaultId}" is not valid JSON`, {
        vaultId,
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    const envelope = StoredEnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new VaultError("STATE_CORRUPTED", `Stored state for "${vaultId}" is malformed`, { vaultId });
    }

    if (computeStateHash(envelope.data.record) !== envelope.data.stateHash) {
      throw new VaultError("STATE_CORRUPTED", `Stored state for "${vaultId}" failed its integrity check`, {
        vaultId,
      });
    }

    const record = VaultStateRecordSchema.safeParse(envelope.data.record);
    if (!record.success) {
      throw new VaultError("STATE_CORRUPTED", `Stored state for "${vaultId}" does not match the record schema`, {
        vaultId,
        issues: record.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      });
    }
    if (record.data.vaultId !== vaultId) {
      throw new VaultError("STATE_CORRUPTED", `Stored state under "${vaultId}" belongs to "${record.data.vaultId}"`, {
        vaultId,
      });
    }

    return record.data;
  }

  has(vaultId: string): boolean {
    return this.store.has(VaultStateRepository.keyFor(vaultId));
  }

  delete(vaultId: string): void {
    this.store.delete(VaultStateRepository.keyFor(vaultId));
  }
}
