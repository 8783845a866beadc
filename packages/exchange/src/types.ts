/**
 * @swapledger/exchange: Types for the trade offer engine.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: every rejected call throws before any mutation
 */

import type { Asset, AssetId, Principal, TradeOffer } from "@swapledger/types";
import type { RegistrySnapshot } from "@swapledger/registry";

// ─── Settlement seam ─────────────────────────────────────────────────────

/**
 * What settlement needs from the asset registry: a current-owner read
 * and the unchecked transfer primitive.
 */
export interface SettlementLedger {
  ownerOf(assetId: AssetId): Principal | undefined;
  transfer(assetId: AssetId, newOwner: Principal): Asset;
}

/**
 * One asset that was not held by the party an offer says holds it.
 */
export interface OwnershipMismatch {
  readonly assetId: AssetId;

  /** "sender" for `myAssets`, "acceptor" for `theirAssets` */
  readonly side: "sender" | "acceptor";

  readonly expectedOwner: Principal;

  /** null when the asset does not exist */
  readonly actualOwner: Principal | null;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type ExchangeErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_STATE"
  | "OWNERSHIP_MISMATCH"
  | "INVALID_INPUT"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the trade offer engine.
 * Always thrown, and always before any mutation.
 */
export class ExchangeError extends Error {
  public readonly code: ExchangeErrorCode;

  /** Present for OWNERSHIP_MISMATCH */
  public readonly mismatches: readonly OwnershipMismatch[];

  constructor(
    code: ExchangeErrorCode,
    message: string,
    mismatches: readonly OwnershipMismatch[] = [],
  ) {
    super(message);
    this.name = "ExchangeError";
    this.code = code;
    this.mismatches = mismatches;
  }
}

// ─── Options ─────────────────────────────────────────────────────────────

export interface TradeOfferEngineOptions {
  /** Source of offer timestamps. Default: the journal's clock */
  readonly clock?: (() => string) | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface OfferBookSnapshot {
  readonly version: 1;
  readonly lastOfferId: number;
  readonly offers: readonly TradeOffer[];
  readonly createdAt: string;
}

export interface ExchangeSnapshot {
  readonly version: 1;
  readonly registry: RegistrySnapshot;
  readonly offerBook: OfferBookSnapshot;
  readonly createdAt: string;
}

