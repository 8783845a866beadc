/**
 * Trade Offer Engine: Offer lifecycle and atomic settlement.
 *
 * Manages the Create → {Cancel | Accept | Decline} flow for trade
 * offers between two principals, or between a sender and anyone for
 * public offers.
 *
 * Rules:
 * - Offers are never deleted and never amended
 * - Only pending offers may transition, and only once
 * - Authorization is checked before state
 * - Acceptance re-validates every asset's owner, then swaps all of them
 *   or none of them
 */

import type {
  AssetId,
  OfferId,
  OfferRecipient,
  OfferState,
  Principal,
  TradeOffer,
} from "@swapledger/types";
import {
  isAssetIdList,
  isOfferRecipient,
  isPrincipal,
  isTradeOffer,
} from "@swapledger/types";
import { LEDGER_EVENTS, offerStreamId } from "@swapledger/event-store";
import type { EventJournal } from "@swapledger/event-store";
import { OfferIndex } from "./offer-index.js";
import { findOwnershipMismatches, settle } from "./settlement.js";
import type {
  OfferBookSnapshot,
  SettlementLedger,
  TradeOfferEngineOptions,
} from "./types.js";
import { ExchangeError } from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<OfferState, readonly OfferState[]> = {
  pending: ["cancelled", "accepted", "declined"],
  cancelled: [],
  accepted: [],
  declined: [],
};

// =============================================================================
// Trade Offer Engine
// =============================================================================

export class TradeOfferEngine {
  private readonly _offers = new Map<OfferId, TradeOffer>();
  private readonly _index = new OfferIndex();
  private readonly _ledger: SettlementLedger;
  private readonly _journal: EventJournal;
  private readonly _clock: () => string;
  private _lastId = 0;

  constructor(
    ledger: SettlementLedger,
    journal: EventJournal,
    options?: TradeOfferEngineOptions,
  ) {
    this._ledger = ledger;
    this._journal = journal;
    this._clock = options?.clock ?? (() => journal.now());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Send a new offer. `recipient` null makes it public.
   *
   * Asset ids are not checked here: they may not exist yet or may belong
   * to anyone. Ownership is checked when the offer is accepted.
   */
  create(
    caller: Principal,
    recipient: OfferRecipient,
    myAssets: readonly AssetId[],
    theirAssets: readonly AssetId[],
  ): TradeOffer {
    if (!isPrincipal(caller)) {
      throw new ExchangeError("INVALID_INPUT", "caller must be a non-empty principal");
    }
    if (!isOfferRecipient(recipient)) {
      throw new ExchangeError("INVALID_INPUT", "recipient must be a principal or null");
    }
    if (!isAssetIdList(myAssets) || !isAssetIdList(theirAssets)) {
      throw new ExchangeError("INVALID_INPUT", "asset lists must contain positive integer ids");
    }

    return this._journal.transact(caller, () => {
      const now = this._clock();
      const offer: TradeOffer = {
        id: this._lastId + 1,
        sender: caller,
        recipient,
        myAssets: [...myAssets],
        theirAssets: [...theirAssets],
        state: "pending",
        createdAt: now,
        updatedAt: now,
      };

      this._journal.record(
        "exchange",
        offerStreamId(offer.id),
        LEDGER_EVENTS.OFFER_CREATED,
        {
          offerId: offer.id,
          sender: offer.sender,
          recipient: offer.recipient,
          myAssets: offer.myAssets,
          theirAssets: offer.theirAssets,
        },
        "no_stream",
      );

      this._lastId = offer.id;
      this._offers.set(offer.id, offer);
      this._index.record(offer.id, caller, recipient);
      return offer;
    });
  }

  /**
   * Withdraw a pending offer. Sender only.
   */
  cancel(caller: Principal, offerId: OfferId): TradeOffer {
    const offer = this.requireSender(caller, offerId);
    this.assertTransition(offer, "cancelled");

    return this._journal.transact(caller, () => this.transition(offer, "cancelled"));
  }

  /**
   * Refuse a pending offer. Recipient only, or anyone for a public offer.
   */
  decline(caller: Principal, offerId: OfferId): TradeOffer {
    const offer = this.requireRecipient(caller, offerId);
    this.assertTransition(offer, "declined");

    return this._journal.transact(caller, () => this.transition(offer, "declined", caller));
  }

  /**
   * Accept a pending offer and settle it.
   *
   * Every asset on both sides is checked against its current owner before
   * anything moves. Any mismatch rejects the whole call with
   * OWNERSHIP_MISMATCH; the offer stays pending and no asset moves.
   */
  accept(caller: Principal, offerId: OfferId): TradeOffer {
    const offer = this.requireRecipient(caller, offerId);
    this.assertTransition(offer, "accepted");

    const mismatches = findOwnershipMismatches(this._ledger, offer, caller);
    if (mismatches.length > 0) {
      const ids = mismatches.map((m) => m.assetId).join(", ");
      throw new ExchangeError(
        "OWNERSHIP_MISMATCH",
        `Offer ${offerId} cannot settle: assets not held as claimed: ${ids}`,
        mismatches,
      );
    }

    return this._journal.transact(caller, () => {
      settle(this._ledger, offer, caller);
      return this.transition(offer, "accepted", caller);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(offerId: OfferId): TradeOffer | undefined {
    return this._offers.get(offerId);
  }

  /** Offers sent by `principal`, in creation order. */
  sentBy(principal: Principal): readonly OfferId[] {
    return this._index.sentBy(principal);
  }

  /** Offers addressed to `principal` (not public ones), in creation order. */
  receivedBy(principal: Principal): readonly OfferId[] {
    return this._index.receivedBy(principal);
  }

  publicOffers(): readonly OfferId[] {
    return this._index.publicOffers();
  }

  /**
   * Pending offers `principal` may accept or decline: those addressed to
   * it plus public offers sent by others, in creation order.
   */
  pendingFor(principal: Principal): readonly OfferId[] {
    const publicFromOthers = this._index
      .publicOffers()
      .filter((id) => this._offers.get(id)?.sender !== principal);

    return [...this._index.receivedBy(principal), ...publicFromOthers]
      .filter((id) => this._offers.get(id)?.state === "pending")
      .sort((a, b) => a - b);
  }

  /** All offers in creation order, optionally filtered by state. */
  list(state?: OfferState): readonly TradeOffer[] {
    const all = [...this._offers.values()].sort((a, b) => a.id - b.id);
    return state === undefined ? all : all.filter((o) => o.state === state);
  }

  get size(): number {
    return this._offers.size;
  }

  get lastOfferId(): number {
    return this._lastId;
  }

  /**
   * Recompute the sent/received/public index from the offer table and
   * compare with the maintained one.
   *
   * @returns One line per discrepancy; empty when consistent
   */
  auditIndices(): readonly string[] {
    const expected = new OfferIndex();
    for (const offer of this.list()) {
      expected.record(offer.id, offer.sender, offer.recipient);
    }

    const problems: string[] = [];
    const compare = (label: string, want: readonly OfferId[], have: readonly OfferId[]) => {
      if (want.join(",") !== have.join(",")) {
        problems.push(`${label}: expected [${want.join(",")}], indexed [${have.join(",")}]`);
      }
    };

    for (const p of new Set([...expected.senders(), ...this._index.senders()])) {
      compare(`sent by "${p}"`, expected.sentBy(p), this._index.sentBy(p));
    }
    for (const p of new Set([...expected.recipients(), ...this._index.recipients()])) {
      compare(`received by "${p}"`, expected.receivedBy(p), this._index.receivedBy(p));
    }
    compare("public offers", expected.publicOffers(), this._index.publicOffers());
    return problems;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): OfferBookSnapshot {
    return {
      version: 1,
      lastOfferId: this._lastId,
      offers: this.list(),
      createdAt: this._clock(),
    };
  }

  /**
   * Restore an offer book. The index is rebuilt in id order.
   *
   * @throws ExchangeError INVALID_SNAPSHOT on malformed or inconsistent input
   */
  static fromSnapshot(
    snapshot: OfferBookSnapshot,
    ledger: SettlementLedger,
    journal: EventJournal,
    options?: TradeOfferEngineOptions,
  ): TradeOfferEngine {
    if (snapshot.version !== 1) {
      throw new ExchangeError(
        "INVALID_SNAPSHOT",
        `Unsupported offer book snapshot version ${String(snapshot.version)}`,
      );
    }

    const engine = new TradeOfferEngine(ledger, journal, options);
    const ordered = [...snapshot.offers].sort((a, b) => a.id - b.id);
    for (const offer of ordered) {
      if (!isTradeOffer(offer)) {
        throw new ExchangeError("INVALID_SNAPSHOT", "Snapshot contains a malformed offer");
      }
      if (offer.id > snapshot.lastOfferId) {
        throw new ExchangeError(
          "INVALID_SNAPSHOT",
          `Offer ${offer.id} is above lastOfferId ${snapshot.lastOfferId}`,
        );
      }
      if (engine._offers.has(offer.id)) {
        throw new ExchangeError("INVALID_SNAPSHOT", `Duplicate offer ${offer.id}`);
      }
      engine._offers.set(offer.id, offer);
      engine._index.record(offer.id, offer.sender, offer.recipient);
    }
    engine._lastId = snapshot.lastOfferId;
    return engine;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  /** An absent offer has no sender, so it fails like a foreign one. */
  private requireSender(caller: Principal, offerId: OfferId): TradeOffer {
    const offer = this._offers.get(offerId);
    if (offer === undefined || offer.sender !== caller) {
      throw new ExchangeError(
        "UNAUTHORIZED",
        `Caller "${caller}" is not the sender of offer ${offerId}`,
      );
    }
    return offer;
  }

  private requireRecipient(caller: Principal, offerId: OfferId): TradeOffer {
    const offer = this._offers.get(offerId);
    if (offer === undefined || (offer.recipient !== null && offer.recipient !== caller)) {
      throw new ExchangeError(
        "UNAUTHORIZED",
        `Caller "${caller}" is not the recipient of offer ${offerId}`,
      );
    }
    return offer;
  }

  private assertTransition(offer: TradeOffer, target: OfferState): void {
    const allowed = VALID_TRANSITIONS[offer.state];
    if (!allowed.includes(target)) {
      throw new ExchangeError(
        "INVALID_STATE",
        `Cannot transition offer ${offer.id} from '${offer.state}' to '${target}'`,
      );
    }
  }

  /** Must run inside a journal unit. */
  private transition(
    offer: TradeOffer,
    state: OfferState,
    settledBy?: Principal,
  ): TradeOffer {
    const base: TradeOffer = { ...offer, state, updatedAt: this._clock() };
    const updated: TradeOffer = settledBy !== undefined ? { ...base, settledBy } : base;

    this._journal.record(
      "exchange",
      offerStreamId(offer.id),
      LEDGER_EVENTS.OFFER_STATE_CHANGED,
      { offerId: offer.id, state },
    );
    this._offers.set(offer.id, updated);
    return updated;
  }
}
