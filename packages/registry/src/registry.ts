/**
 * @swapledger/registry: Core AssetRegistry class.
 *
 * Maps asset ids to `(owner, emitter, data)`. Issuance is open to any
 * principal; retraction is reserved for the emitter; ownership changes
 * only through the internal `transfer` primitive used by settlement.
 *
 * API surface:
 * - issue(): Record a new asset, emitter = caller
 * - retract(): Delete an asset (emitter only)
 * - transfer(): Move an asset to a new owner (internal, unchecked)
 * - get() / ownerOf(): Pure lookups, undefined when absent
 * - inventoryOf() / balanceOf(): Per-principal index queries
 * - auditIndices(): Recompute the index and report drift
 * - snapshot() / fromSnapshot(): Persistence
 */

import type { Asset, AssetId, Principal } from "@swapledger/types";
import { isAsset, isPrincipal, normalizeHexData } from "@swapledger/types";
import { LEDGER_EVENTS, assetStreamId } from "@swapledger/event-store";
import type { EventJournal } from "@swapledger/event-store";
import { InventoryIndex } from "./inventory.js";
import type { AssetRegistryOptions, RegistrySnapshot } from "./types.js";
import { RegistryError } from "./types.js";

/** Actor recorded when `transfer` runs outside a caller's operation. */
const REGISTRY_ACTOR = "registry";

/**
 * Asset registry.
 *
 * Every mutation updates the asset table and the inventory index in the
 * same synchronous call, inside a journal unit, so the notification is
 * committed only once the change is complete.
 */
export class AssetRegistry {
  private readonly _assets = new Map<AssetId, Asset>();
  private readonly _inventory = new InventoryIndex();
  private readonly _journal: EventJournal;
  private readonly _clock: () => string;
  private _lastAssetId = 0;

  constructor(journal: EventJournal, options?: AssetRegistryOptions) {
    this._journal = journal;
    this._clock = options?.clock ?? (() => journal.now());
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Issue a new asset to `owner`. The caller becomes its emitter.
   *
   * `data` is accepted in any hex casing, with or without `0x`, and
   * stored in canonical lowercase form.
   */
  issue(caller: Principal, owner: Principal, data: string): Asset {
    assertPrincipal(caller, "caller");
    assertPrincipal(owner, "owner");
    const canonical = normalizeHexData(data);
    if (canonical === undefined) {
      throw new RegistryError(
        "INVALID_INPUT",
        `Asset data must be even-length hex, got "${data}"`,
      );
    }

    return this._journal.transact(caller, () => {
      const asset: Asset = {
        id: this._lastAssetId + 1,
        owner,
        emitter: caller,
        data: canonical,
        issuedAt: this._clock(),
      };

      this._journal.record(
        "registry",
        assetStreamId(asset.id),
        LEDGER_EVENTS.ASSET_ISSUED,
        { assetId: asset.id, owner, emitter: caller, data: canonical },
        "no_stream",
      );

      this._lastAssetId = asset.id;
      this._assets.set(asset.id, asset);
      this._inventory.add(owner, asset.id);
      return asset;
    });
  }

  /**
   * Retract (burn) an asset. Only its emitter may do so.
   *
   * An absent asset has no emitter, so retracting one is UNAUTHORIZED
   * for every caller.
   *
   * @returns The record as it was before deletion
   */
  retract(caller: Principal, assetId: AssetId): Asset {
    const asset = this._assets.get(assetId);
    if (asset === undefined || asset.emitter !== caller) {
      throw new RegistryError(
        "UNAUTHORIZED",
        `Caller "${caller}" is not the emitter of asset ${assetId}`,
      );
    }

    return this._journal.transact(caller, () => {
      this._journal.record(
        "registry",
        assetStreamId(assetId),
        LEDGER_EVENTS.ASSET_RETRACTED,
        { assetId },
      );

      this._assets.delete(assetId);
      this._inventory.remove(asset.owner, assetId);
      return asset;
    });
  }

  /**
   * Move an asset to `newOwner`.
   *
   * @internal Settlement is the only caller. No ownership check happens
   * here; the caller must already have validated the current owner.
   * Not exposed by the Exchange facade or the HTTP node.
   */
  transfer(assetId: AssetId, newOwner: Principal): Asset {
    const asset = this._assets.get(assetId);
    if (asset === undefined) {
      throw new RegistryError("UNKNOWN_ASSET", `Asset ${assetId} does not exist`);
    }

    return this._journal.transact(REGISTRY_ACTOR, () => {
      this._journal.record(
        "registry",
        assetStreamId(assetId),
        LEDGER_EVENTS.ASSET_MOVED,
        { assetId, previousOwner: asset.owner, newOwner },
      );

      const moved: Asset = { ...asset, owner: newOwner };
      this._assets.set(assetId, moved);
      this._inventory.move(asset.owner, newOwner, assetId);
      return moved;
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get(assetId: AssetId): Asset | undefined {
    return this._assets.get(assetId);
  }

  ownerOf(assetId: AssetId): Principal | undefined {
    return this._assets.get(assetId)?.owner;
  }

  /** Ids currently owned by `principal`, ascending. */
  inventoryOf(principal: Principal): readonly AssetId[] {
    return this._inventory.idsOf(principal);
  }

  balanceOf(principal: Principal): number {
    return this._inventory.countOf(principal);
  }

  /** Number of live (issued and not retracted) assets. */
  get size(): number {
    return this._assets.size;
  }

  /** Highest id ever allocated, or 0. */
  get lastAssetId(): number {
    return this._lastAssetId;
  }

  /** All live assets in id order. */
  getAll(): readonly Asset[] {
    return [...this._assets.values()].sort((a, b) => a.id - b.id);
  }

  /**
   * Recompute every inventory from the asset table and compare it with
   * the maintained index.
   *
   * @returns One line per discrepancy; empty when consistent
   */
  auditIndices(): readonly string[] {
    const expected = new Map<Principal, AssetId[]>();
    for (const asset of this.getAll()) {
      const ids = expected.get(asset.owner) ?? [];
      ids.push(asset.id);
      expected.set(asset.owner, ids);
    }

    const problems: string[] = [];
    const principals = new Set([...expected.keys(), ...this._inventory.owners()]);
    for (const principal of principals) {
      const want = (expected.get(principal) ?? []).join(",");
      const have = this._inventory.idsOf(principal).join(",");
      if (want !== have) {
        problems.push(`inventory of "${principal}": expected [${want}], indexed [${have}]`);
      }
    }
    return problems;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): RegistrySnapshot {
    return {
      version: 1,
      lastAssetId: this._lastAssetId,
      assets: this.getAll(),
      createdAt: this._clock(),
    };
  }

  /**
   * Restore a registry from a snapshot. Indices are rebuilt, not read.
   *
   * @throws RegistryError INVALID_SNAPSHOT on malformed or inconsistent input
   */
  static fromSnapshot(
    snapshot: RegistrySnapshot,
    journal: EventJournal,
    options?: AssetRegistryOptions,
  ): AssetRegistry {
    if (snapshot.version !== 1) {
      throw new RegistryError(
        "INVALID_SNAPSHOT",
        `Unsupported registry snapshot version ${String(snapshot.version)}`,
      );
    }

    const registry = new AssetRegistry(journal, options);
    for (const asset of snapshot.assets) {
      if (!isAsset(asset)) {
        throw new RegistryError("INVALID_SNAPSHOT", "Snapshot contains a malformed asset");
      }
      if (asset.id > snapshot.lastAssetId) {
        throw new RegistryError(
          "INVALID_SNAPSHOT",
          `Asset ${asset.id} is above lastAssetId ${snapshot.lastAssetId}`,
        );
      }
      if (registry._assets.has(asset.id)) {
        throw new RegistryError("INVALID_SNAPSHOT", `Duplicate asset ${asset.id}`);
      }
      registry._assets.set(asset.id, asset);
      registry._inventory.add(asset.owner, asset.id);
    }
    registry._lastAssetId = snapshot.lastAssetId;
    return registry;
  }
}

function assertPrincipal(value: Principal, field: string): void {
  if (!isPrincipal(value)) {
    throw new RegistryError("INVALID_INPUT", `${field} must be a non-empty principal`);
  }
}

