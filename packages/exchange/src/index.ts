/**
 * @swapledger/exchange
 *
 * Trade offers between principals and their atomic settlement against
 * the asset registry.
 */

// Composition root
export { Exchange } from "./exchange.js";
export type { ExchangeOptions, IndexAudit } from "./exchange.js";

// Engine
export { TradeOfferEngine } from "./offer-engine.js";
export { OfferIndex } from "./offer-index.js";
export { findOwnershipMismatches, settle } from "./settlement.js";

// Types
export type {
  SettlementLedger,
  OwnershipMismatch,
  ExchangeErrorCode,
  TradeOfferEngineOptions,
  OfferBookSnapshot,
  ExchangeSnapshot,
} from "./types.js";
export { ExchangeError } from "./types.js";
