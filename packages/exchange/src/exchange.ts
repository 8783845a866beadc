/**
 * Exchange: Composition root for one ledger.
 *
 * Owns exactly one AssetRegistry, one TradeOfferEngine and one event
 * store, wired through a shared EventJournal so every operation commits
 * its notifications as one unit. Callers never see the registry's
 * transfer primitive; ownership moves only through `acceptOffer`.
 *
 * The exchange is the only writer of its store. It is handed out as a
 * read-only EventLog, and a store passed in through the options must
 * still be empty.
 */

import type {
  Asset,
  AssetId,
  OfferId,
  OfferRecipient,
  Principal,
  TradeOffer,
} from "@swapledger/types";
import { assetStreamId, EventJournal, InMemoryEventStore } from "@swapledger/event-store";
import type {
  EventLog,
  EventStore,
  EventStoreIntegrityResult,
  StoredEvent,
  SubscriberErrorHandler,
} from "@swapledger/event-store";
import { AssetRegistry } from "@swapledger/registry";
import { TradeOfferEngine } from "./offer-engine.js";
import type { ExchangeSnapshot } from "./types.js";
import { ExchangeError } from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface ExchangeOptions {
  /** Source of every timestamp. Default: wall clock */
  readonly clock?: (() => string) | undefined;

  /** Source of event and correlation IDs. Default: randomUUID */
  readonly newId?: (() => string) | undefined;

  /** Store to publish into. Must hold no events. Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore | undefined;

  /** Passed to the default store. Ignored when `eventStore` is given. */
  readonly onSubscriberError?: SubscriberErrorHandler | undefined;
}

export interface IndexAudit {
  readonly consistent: boolean;
  readonly problems: readonly string[];
}

// =============================================================================
// Exchange
// =============================================================================

export class Exchange {
  readonly eventStore: EventLog;

  private readonly _registry: AssetRegistry;
  private readonly _offers: TradeOfferEngine;
  private readonly _clock: () => string;

  private constructor(
    build: (journal: EventJournal) => [AssetRegistry, TradeOfferEngine],
    options?: ExchangeOptions,
  ) {
    const store = ownedStore(options);
    this.eventStore = store;
    const journal = new EventJournal(store, {
      clock: options?.clock,
      newId: options?.newId,
    });
    this._clock = () => journal.now();
    const [registry, offers] = build(journal);
    this._registry = registry;
    this._offers = offers;
  }

  /**
   * @throws ExchangeError INVALID_INPUT if `options.eventStore` already holds events
   */
  static create(options?: ExchangeOptions): Exchange {
    return new Exchange((journal) => {
      const registry = new AssetRegistry(journal);
      return [registry, new TradeOfferEngine(registry, journal)];
    }, options);
  }

  /**
   * Restore registry and offer book. The event log is not part of a
   * snapshot; the restored exchange publishes into a new (or the given,
   * empty) store.
   */
  static fromSnapshot(snapshot: ExchangeSnapshot, options?: ExchangeOptions): Exchange {
    if (snapshot.version !== 1) {
      throw new ExchangeError(
        "INVALID_SNAPSHOT",
        `Unsupported exchange snapshot version ${String(snapshot.version)}`,
      );
    }

    return new Exchange((journal) => {
      const registry = AssetRegistry.fromSnapshot(snapshot.registry, journal);
      const offers = TradeOfferEngine.fromSnapshot(snapshot.offerBook, registry, journal);
      return [registry, offers];
    }, options);
  }

  // ─── Assets ────────────────────────────────────────────────────────

  issue(caller: Principal, owner: Principal, data: string): Asset {
    return this._registry.issue(caller, owner, data);
  }

  retract(caller: Principal, assetId: AssetId): Asset {
    return this._registry.retract(caller, assetId);
  }

  getAsset(assetId: AssetId): Asset | undefined {
    return this._registry.get(assetId);
  }

  inventoryOf(principal: Principal): readonly AssetId[] {
    return this._registry.inventoryOf(principal);
  }

  balanceOf(principal: Principal): number {
    return this._registry.balanceOf(principal);
  }

  /** Committed events about one asset, oldest first. Kept after retraction. */
  historyOf(assetId: AssetId): readonly StoredEvent[] {
    return this.eventStore.read(assetStreamId(assetId));
  }

  get assetCount(): number {
    return this._registry.size;
  }

  // ─── Offers ────────────────────────────────────────────────────────

  createOffer(
    caller: Principal,
    recipient: OfferRecipient,
    myAssets: readonly AssetId[],
    theirAssets: readonly AssetId[],
  ): TradeOffer {
    return this._offers.create(caller, recipient, myAssets, theirAssets);
  }

  cancelOffer(caller: Principal, offerId: OfferId): TradeOffer {
    return this._offers.cancel(caller, offerId);
  }

  declineOffer(caller: Principal, offerId: OfferId): TradeOffer {
    return this._offers.decline(caller, offerId);
  }

  acceptOffer(caller: Principal, offerId: OfferId): TradeOffer {
    return this._offers.accept(caller, offerId);
  }

  getOffer(offerId: OfferId): TradeOffer | undefined {
    return this._offers.get(offerId);
  }

  sentBy(principal: Principal): readonly OfferId[] {
    return this._offers.sentBy(principal);
  }

  receivedBy(principal: Principal): readonly OfferId[] {
    return this._offers.receivedBy(principal);
  }

  publicOffers(): readonly OfferId[] {
    return this._offers.publicOffers();
  }

  pendingFor(principal: Principal): readonly OfferId[] {
    return this._offers.pendingFor(principal);
  }

  get offerCount(): number {
    return this._offers.size;
  }

  // ─── Integrity ─────────────────────────────────────────────────────

  auditIndices(): IndexAudit {
    const problems = [...this._registry.auditIndices(), ...this._offers.auditIndices()];
    return { consistent: problems.length === 0, problems };
  }

  verifyEventLog(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  snapshot(): ExchangeSnapshot {
    return {
      version: 1,
      registry: this._registry.snapshot(),
      offerBook: this._offers.snapshot(),
      createdAt: this._clock(),
    };
  }
}

function ownedStore(options: ExchangeOptions | undefined): EventStore {
  const given = options?.eventStore;
  if (given === undefined) {
    return new InMemoryEventStore({
      clock: options?.clock,
      onSubscriberError: options?.onSubscriberError,
    });
  }
  if (given.globalPosition() > 0) {
    throw new ExchangeError(
      "INVALID_INPUT",
      `Event store already holds ${given.globalPosition()} events; an exchange needs an empty store`,
    );
  }
  return given;
}
