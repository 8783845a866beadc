/**
 * @swapledger/registry: Per-principal inventory index.
 *
 * Derived from the asset table and updated in the same call as every
 * ownership change. Never recomputed per query.
 */

import type { AssetId, Principal } from "@swapledger/types";

export class InventoryIndex {
  private readonly _byOwner = new Map<Principal, Set<AssetId>>();

  add(owner: Principal, assetId: AssetId): void {
    let owned = this._byOwner.get(owner);
    if (owned === undefined) {
      owned = new Set();
      this._byOwner.set(owner, owned);
    }
    owned.add(assetId);
  }

  remove(owner: Principal, assetId: AssetId): void {
    const owned = this._byOwner.get(owner);
    if (owned === undefined) {
      return;
    }
    owned.delete(assetId);
    if (owned.size === 0) {
      this._byOwner.delete(owner);
    }
  }

  move(from: Principal, to: Principal, assetId: AssetId): void {
    this.remove(from, assetId);
    this.add(to, assetId);
  }

  /** Ids owned by the principal, ascending. */
  idsOf(owner: Principal): readonly AssetId[] {
    const owned = this._byOwner.get(owner);
    return owned === undefined ? [] : [...owned].sort((a, b) => a - b);
  }

  countOf(owner: Principal): number {
    return this._byOwner.get(owner)?.size ?? 0;
  }

  owners(): readonly Principal[] {
    return [...this._byOwner.keys()];
  }
}
