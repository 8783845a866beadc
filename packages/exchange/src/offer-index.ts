/**
 * @swapledger/exchange: Per-principal offer index.
 *
 * Sent and received offer ids per principal, plus a bucket for public
 * offers, each in creation order. Appended to when an offer is created;
 * offers are never removed, so the lists only grow.
 */

import type { OfferId, OfferRecipient, Principal } from "@swapledger/types";

export class OfferIndex {
  private readonly _sent = new Map<Principal, OfferId[]>();
  private readonly _received = new Map<Principal, OfferId[]>();
  private readonly _public: OfferId[] = [];

  record(offerId: OfferId, sender: Principal, recipient: OfferRecipient): void {
    push(this._sent, sender, offerId);
    if (recipient === null) {
      this._public.push(offerId);
    } else {
      push(this._received, recipient, offerId);
    }
  }

  sentBy(principal: Principal): readonly OfferId[] {
    return [...(this._sent.get(principal) ?? [])];
  }

  receivedBy(principal: Principal): readonly OfferId[] {
    return [...(this._received.get(principal) ?? [])];
  }

  publicOffers(): readonly OfferId[] {
    return [...this._public];
  }

  senders(): readonly Principal[] {
    return [...this._sent.keys()];
  }

  recipients(): readonly Principal[] {
    return [...this._received.keys()];
  }
}

function push(map: Map<Principal, OfferId[]>, key: Principal, offerId: OfferId): void {
  const ids = map.get(key);
  if (ids === undefined) {
    map.set(key, [offerId]);
  } else {
    ids.push(offerId);
  }
}
