/**
 * Trade Offer Types
 *
 * A trade offer proposes swapping the sender's `myAssets` for the
 * acceptor's `theirAssets`. Offers reference assets by id and never
 * lock them; ownership is re-checked when the offer is accepted.
 */

import type { AssetId, Principal } from "./asset.js";

/** Positive integer, allocated from 1 upwards. */
export type OfferId = number;

/**
 * Offer lifecycle. Only `pending` has outgoing transitions.
 *
 * pending → cancelled (by sender)
 * pending → accepted  (by recipient, after settlement)
 * pending → declined  (by recipient)
 */
export type OfferState = "pending" | "cancelled" | "accepted" | "declined";

/**
 * Recipient of an offer. `null` marks a public offer that any
 * principal may accept or decline. No caller identity can equal `null`.
 */
export type OfferRecipient = Principal | null;

export interface TradeOffer {
  readonly id: OfferId;
  readonly sender: Principal;
  readonly recipient: OfferRecipient;

  /** Asset ids the sender gives, in declaration order. May repeat or be empty. */
  readonly myAssets: readonly AssetId[];

  /** Asset ids the sender asks for, in declaration order. May repeat or be empty. */
  readonly theirAssets: readonly AssetId[];

  readonly state: OfferState;
  readonly createdAt: string;
  readonly updatedAt: string;

  /** Principal that accepted or declined the offer */
  readonly settledBy?: Principal | undefined;
}
