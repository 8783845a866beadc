/**
 * @swapledger/types: Shared domain types for the SwapLedger stack.
 *
 * These types are used across all SwapLedger packages:
 * - Principals, assets and opaque asset data
 * - Trade offers and their lifecycle states
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Absent records are `undefined`, never zero-valued placeholders
 */

// Asset types
export type {
  Principal,
  AssetId,
  HexData,
  Asset,
} from "./asset.js";

// Offer types
export type {
  OfferId,
  OfferState,
  OfferRecipient,
  TradeOffer,
} from "./offer.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isPrincipal,
  isAssetId,
  isHexData,
  normalizeHexData,
  isAsset,
  isOfferState,
  isOfferRecipient,
  isAssetIdList,
  isTradeOffer,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
