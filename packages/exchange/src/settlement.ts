/**
 * @swapledger/exchange: Settlement of an accepted offer.
 *
 * Two phases, never interleaved:
 *
 * 1. findOwnershipMismatches() reads current owners and reports every
 *    asset not held by the party the offer assigns it to. Pure.
 * 2. settle() moves every asset to its new owner. Called only when
 *    phase 1 returned nothing, inside the same synchronous unit.
 */

import type { Principal, TradeOffer } from "@swapledger/types";
import type { OwnershipMismatch, SettlementLedger } from "./types.js";

/**
 * Check that the sender holds every `myAssets` id and the acceptor holds
 * every `theirAssets` id. Duplicate ids are reported once per side.
 */
export function findOwnershipMismatches(
  ledger: SettlementLedger,
  offer: TradeOffer,
  acceptor: Principal,
): readonly OwnershipMismatch[] {
  return [
    ...checkSide(ledger, offer.myAssets, offer.sender, "sender"),
    ...checkSide(ledger, offer.theirAssets, acceptor, "acceptor"),
  ];
}

function checkSide(
  ledger: SettlementLedger,
  assetIds: TradeOffer["myAssets"],
  expectedOwner: Principal,
  side: OwnershipMismatch["side"],
): OwnershipMismatch[] {
  const mismatches: OwnershipMismatch[] = [];
  const seen = new Set<number>();

  for (const assetId of assetIds) {
    if (seen.has(assetId)) continue;
    seen.add(assetId);

    const actualOwner = ledger.ownerOf(assetId);
    if (actualOwner !== expectedOwner) {
      mismatches.push({ assetId, side, expectedOwner, actualOwner: actualOwner ?? null });
    }
  }
  return mismatches;
}

/**
 * Swap the offer's assets: `myAssets` to the acceptor, then `theirAssets`
 * to the sender. An asset already held by its destination is not moved,
 * which covers duplicate ids and an offer accepted by its own sender.
 *
 * @returns Number of ownership moves performed
 */
export function settle(
  ledger: SettlementLedger,
  offer: TradeOffer,
  acceptor: Principal,
): number {
  let moves = 0;
  const legs: readonly [TradeOffer["myAssets"], Principal][] = [
    [offer.myAssets, acceptor],
    [offer.theirAssets, offer.sender],
  ];

  for (const [assetIds, destination] of legs) {
    for (const assetId of assetIds) {
      if (ledger.ownerOf(assetId) !== destination) {
        ledger.transfer(assetId, destination);
        moves++;
      }
    }
  }
  return moves;
}
