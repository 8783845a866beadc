/**
 * @swapledger/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for an append-only, multi-stream log
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventJournal for committing an operation's events after it succeeds
 * - EventCatalog for event schemas
 * - Ledger notification definitions (5 event types)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedEvent,
  ExpectedVersion,
  StreamAppend,
  AppendResult,
  ReadAllOptions,
  EventHandler,
  SubscriberErrorHandler,
  Subscription,
  EventLog,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError, checkExpectedVersion } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Unit of work
export { EventJournal } from "./journal.js";
export type { EventJournalOptions } from "./journal.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Ledger domain events
export {
  LEDGER_EVENTS,
  assetStreamId,
  offerStreamId,
  createLedgerCatalog,
} from "./ledger-events.js";
export type {
  LedgerEventType,
  AssetIssuedPayload,
  AssetRetractedPayload,
  AssetMovedPayload,
  OfferCreatedPayload,
  OfferStateChangedPayload,
} from "./ledger-events.js";
