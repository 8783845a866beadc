/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types.
 * Used at system boundaries (API inputs, restored snapshots, stored events).
 */

import type { Asset, AssetId, HexData, Principal } from "./asset.js";
import type { OfferRecipient, OfferState, TradeOffer } from "./offer.js";
import type { DomainEvent, EventMetadata } from "./event.js";

const HEX_DATA = /^0x(?:[0-9a-f]{2})*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Asset guards
// =============================================================================

export function isPrincipal(value: unknown): value is Principal {
  return typeof value === "string" && value.length > 0;
}

/** Positive safe integer. Shared by asset and offer ids. */
export function isAssetId(value: unknown): value is AssetId {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

/** Lowercase, even-length hex with a `0x` prefix. */
export function isHexData(value: unknown): value is HexData {
  return typeof value === "string" && HEX_DATA.test(value);
}

/**
 * Normalize hex input to the canonical lowercase form.
 * Returns undefined when the input is not even-length hex.
 */
export function normalizeHexData(value: string): HexData | undefined {
  const lowered = value.toLowerCase();
  const prefixed = lowered.startsWith("0x") ? lowered : `0x${lowered}`;
  return HEX_DATA.test(prefixed) ? prefixed : undefined;
}

export function isAsset(value: unknown): value is Asset {
  if (!isRecord(value)) return false;
  return (
    isAssetId(value.id) &&
    isPrincipal(value.owner) &&
    isPrincipal(value.emitter) &&
    isHexData(value.data) &&
    typeof value.issuedAt === "string"
  );
}

// =============================================================================
// Offer guards
// =============================================================================

const OFFER_STATES = new Set<string>(["pending", "cancelled", "accepted", "declined"]);

export function isOfferState(value: unknown): value is OfferState {
  return typeof value === "string" && OFFER_STATES.has(value);
}

export function isOfferRecipient(value: unknown): value is OfferRecipient {
  return value === null || isPrincipal(value);
}

export function isAssetIdList(value: unknown): value is readonly AssetId[] {
  return Array.isArray(value) && value.every(isAssetId);
}

export function isTradeOffer(value: unknown): value is TradeOffer {
  if (!isRecord(value)) return false;
  return (
    isAssetId(value.id) &&
    isPrincipal(value.sender) &&
    isOfferRecipient(value.recipient) &&
    isAssetIdList(value.myAssets) &&
    isAssetIdList(value.theirAssets) &&
    isOfferState(value.state) &&
    typeof value.createdAt === "string" &&
    typeof value.updatedAt === "string" &&
    (value.settledBy === undefined || isPrincipal(value.settledBy))
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["registry", "exchange"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
