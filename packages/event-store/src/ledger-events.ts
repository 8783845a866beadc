/**
 * @swapledger/event-store: Ledger Domain Event Definitions.
 *
 * The notifications published by the asset registry and the trade
 * offer engine.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Streams:
 * - `asset-<id>` for registry events about one asset
 * - `offer-<id>` for exchange events about one offer
 */

import type {
  AssetId,
  HexData,
  OfferId,
  OfferRecipient,
  OfferState,
  Principal,
} from "@swapledger/types";
import {
  isAssetId,
  isAssetIdList,
  isHexData,
  isOfferRecipient,
  isOfferState,
  isPrincipal,
} from "@swapledger/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Types
// =============================================================================

export const LEDGER_EVENTS = {
  ASSET_ISSUED: "registry.asset.issued",
  ASSET_RETRACTED: "registry.asset.retracted",
  ASSET_MOVED: "registry.asset.moved",
  OFFER_CREATED: "exchange.offer.created",
  OFFER_STATE_CHANGED: "exchange.offer.state_changed",
} as const;

export type LedgerEventType = (typeof LEDGER_EVENTS)[keyof typeof LEDGER_EVENTS];

export function assetStreamId(assetId: AssetId): string {
  return `asset-${assetId}`;
}

export function offerStreamId(offerId: OfferId): string {
  return `offer-${offerId}`;
}

// =============================================================================
// Payloads
// =============================================================================

export interface AssetIssuedPayload {
  readonly assetId: AssetId;
  readonly owner: Principal;
  readonly emitter: Principal;
  readonly data: HexData;
}

export interface AssetRetractedPayload {
  readonly assetId: AssetId;
}

export interface AssetMovedPayload {
  readonly assetId: AssetId;
  readonly previousOwner: Principal;
  readonly newOwner: Principal;
}

export interface OfferCreatedPayload {
  readonly offerId: OfferId;
  readonly sender: Principal;
  readonly recipient: OfferRecipient;
  readonly myAssets: readonly AssetId[];
  readonly theirAssets: readonly AssetId[];
}

export interface OfferStateChangedPayload {
  readonly offerId: OfferId;
  readonly state: OfferState;
}

// =============================================================================
// Schemas
// =============================================================================

function field(payload: unknown, key: string): unknown {
  if (payload === null || typeof payload !== "object") {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(payload, key)?.value;
}

const SCHEMAS: readonly EventSchema[] = [
  {
    type: LEDGER_EVENTS.ASSET_ISSUED,
    version: 1,
    description: "A principal issued a new asset to an owner",
    source: "registry",
    validate: (p) =>
      isAssetId(field(p, "assetId")) &&
      isPrincipal(field(p, "owner")) &&
      isPrincipal(field(p, "emitter")) &&
      isHexData(field(p, "data")),
  },
  {
    type: LEDGER_EVENTS.ASSET_RETRACTED,
    version: 1,
    description: "An emitter retracted one of its assets",
    source: "registry",
    validate: (p) => isAssetId(field(p, "assetId")),
  },
  {
    type: LEDGER_EVENTS.ASSET_MOVED,
    version: 1,
    description: "Settlement moved an asset to a new owner",
    source: "registry",
    validate: (p) =>
      isAssetId(field(p, "assetId")) &&
      isPrincipal(field(p, "previousOwner")) &&
      isPrincipal(field(p, "newOwner")),
  },
  {
    type: LEDGER_EVENTS.OFFER_CREATED,
    version: 1,
    description: "A principal sent a trade offer",
    source: "exchange",
    validate: (p) =>
      isAssetId(field(p, "offerId")) &&
      isPrincipal(field(p, "sender")) &&
      isOfferRecipient(field(p, "recipient")) &&
      isAssetIdList(field(p, "myAssets")) &&
      isAssetIdList(field(p, "theirAssets")),
  },
  {
    type: LEDGER_EVENTS.OFFER_STATE_CHANGED,
    version: 1,
    description: "A pending trade offer reached a terminal state",
    source: "exchange",
    validate: (p) =>
      isAssetId(field(p, "offerId")) && isOfferState(field(p, "state")),
  },
];

/**
 * Create a catalog with every ledger event registered.
 */
export function createLedgerCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
