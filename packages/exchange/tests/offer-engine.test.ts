/**
 * Tests for the TradeOfferEngine.
 *
 * Covers:
 * - Offer creation (ids, input validation, indices, notifications)
 * - Cancel / decline / accept authorization and state rules
 * - All-or-nothing settlement
 * - Public offers and pendingFor
 * - Snapshot/restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import { EventJournal, InMemoryEventStore } from "@swapledger/event-store";
import type { OfferBookSnapshot } from "../src/types.js";
import { AssetRegistry } from "@swapledger/registry";
import { TradeOfferEngine } from "../src/offer-engine.js";
import { ExchangeError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const TS = "2024-03-01T12:00:00.000Z";

let store: InMemoryEventStore;
let journal: EventJournal;
let registry: AssetRegistry;
let engine: TradeOfferEngine;

beforeEach(() => {
  store = new InMemoryEventStore({ clock: () => TS });
  journal = new EventJournal(store, { clock: () => TS });
  registry = new AssetRegistry(journal);
  engine = new TradeOfferEngine(registry, journal);
});

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExchangeError) return err.code;
    throw err;
  }
  return undefined;
}

function eventTypes(): string[] {
  return store.readAll().map((e) => e.event.type);
}

// ─── Create ──────────────────────────────────────────────────────────────

describe("create", () => {
  it("stores a pending offer from the caller", () => {
    const offer = engine.create("alice", "bob", [1], [2]);

    expect(offer).toEqual({
      id: 1,
      sender: "alice",
      recipient: "bob",
      myAssets: [1],
      theirAssets: [2],
      state: "pending",
      createdAt: TS,
      updatedAt: TS,
    });
    expect(engine.get(1)).toEqual(offer);
  });

  it("allocates strictly increasing ids", () => {
    const a = engine.create("alice", "bob", [], []);
    const b = engine.create("bob", "alice", [], []);

    expect([a.id, b.id]).toEqual([1, 2]);
    expect(engine.lastOfferId).toBe(2);
    expect(engine.size).toBe(2);
  });

  it("does not check that the assets exist", () => {
    const offer = engine.create("alice", "bob", [41], [42]);
    expect(offer.state).toBe("pending");
  });

  it("copies the asset lists", () => {
    const mine = [1, 2];
    const offer = engine.create("alice", "bob", mine, []);
    mine.push(3);

    expect(offer.myAssets).toEqual([1, 2]);
  });

  it("rejects malformed input", () => {
    expect(codeOf(() => engine.create("", "bob", [], []))).toBe("INVALID_INPUT");
    expect(codeOf(() => engine.create("alice", "", [], []))).toBe("INVALID_INPUT");
    expect(codeOf(() => engine.create("alice", "bob", [0], []))).toBe("INVALID_INPUT");
    expect(codeOf(() => engine.create("alice", "bob", [], [1.5]))).toBe("INVALID_INPUT");
    expect(engine.size).toBe(0);
    expect(store.globalPosition()).toBe(0);
  });

  it("indexes sent, received and public offers", () => {
    engine.create("alice", "bob", [], []);
    engine.create("alice", null, [], []);
    engine.create("bob", "alice", [], []);

    expect(engine.sentBy("alice")).toEqual([1, 2]);
    expect(engine.receivedBy("bob")).toEqual([1]);
    expect(engine.receivedBy("alice")).toEqual([3]);
    expect(engine.publicOffers()).toEqual([2]);
    expect(engine.sentBy("carol")).toEqual([]);
  });

  it("publishes an offer-created notification", () => {
    engine.create("alice", null, [1], []);

    const [stored] = store.read("offer-1");
    expect(stored?.event.type).toBe("exchange.offer.created");
    expect(stored?.event.metadata.actor).toBe("alice");
    expect(stored?.event.payload).toEqual({
      offerId: 1,
      sender: "alice",
      recipient: null,
      myAssets: [1],
      theirAssets: [],
    });
  });
});

// ─── Cancel ──────────────────────────────────────────────────────────────

describe("cancel", () => {
  it("lets the sender withdraw a pending offer", () => {
    engine.create("alice", "bob", [], []);

    const cancelled = engine.cancel("alice", 1);

    expect(cancelled.state).toBe("cancelled");
    expect(cancelled.settledBy).toBeUndefined();
    expect(engine.get(1)?.state).toBe("cancelled");
    expect(eventTypes()).toEqual(["exchange.offer.created", "exchange.offer.state_changed"]);
  });

  it("rejects anyone but the sender", () => {
    engine.create("alice", "bob", [], []);

    expect(codeOf(() => engine.cancel("bob", 1))).toBe("UNAUTHORIZED");
    expect(engine.get(1)?.state).toBe("pending");
  });

  it("treats an absent offer as unauthorized", () => {
    expect(codeOf(() => engine.cancel("alice", 99))).toBe("UNAUTHORIZED");
  });

  it("rejects a second cancel", () => {
    engine.create("alice", "bob", [], []);
    engine.cancel("alice", 1);

    expect(codeOf(() => engine.cancel("alice", 1))).toBe("INVALID_STATE");
  });
});

// ─── Decline ─────────────────────────────────────────────────────────────

describe("decline", () => {
  it("lets the recipient refuse a pending offer", () => {
    engine.create("alice", "bob", [], []);

    const declined = engine.decline("bob", 1);

    expect(declined.state).toBe("declined");
    expect(declined.settledBy).toBe("bob");
  });

  it("rejects the sender of a directed offer", () => {
    engine.create("alice", "bob", [], []);
    expect(codeOf(() => engine.decline("alice", 1))).toBe("UNAUTHORIZED");
  });

  it("lets anyone decline a public offer", () => {
    engine.create("alice", null, [], []);
    expect(engine.decline("carol", 1).state).toBe("declined");
  });

  it("rejects a decline after accept", () => {
    engine.create("alice", "bob", [], []);
    engine.accept("bob", 1);

    expect(codeOf(() => engine.decline("bob", 1))).toBe("INVALID_STATE");
  });
});

// ─── Accept ──────────────────────────────────────────────────────────────

describe("accept", () => {
  beforeEach(() => {
    registry.issue("alice", "alice", "0x01"); // 1
    registry.issue("bob", "bob", "0x02"); // 2
  });

  it("swaps both sides and marks the offer accepted", () => {
    engine.create("alice", "bob", [1], [2]);

    const accepted = engine.accept("bob", 1);

    expect(accepted.state).toBe("accepted");
    expect(accepted.settledBy).toBe("bob");
    expect(registry.ownerOf(1)).toBe("bob");
    expect(registry.ownerOf(2)).toBe("alice");
  });

  it("commits moves and the state change under one correlation id", () => {
    engine.create("alice", "bob", [1], [2]);
    const before = store.globalPosition();

    engine.accept("bob", 1);

    const committed = store.readAll({ fromPosition: before + 1 });
    expect(committed.map((e) => e.event.type)).toEqual([
      "registry.asset.moved",
      "registry.asset.moved",
      "exchange.offer.state_changed",
    ]);
    expect(new Set(committed.map((e) => e.event.metadata.correlationId)).size).toBe(1);
    expect(committed.map((e) => e.event.metadata.actor)).toEqual(["bob", "bob", "bob"]);
  });

  it("rejects everything when any asset is not held as claimed", () => {
    registry.issue("carol", "carol", "0x03"); // 3
    engine.create("alice", "bob", [1], [2, 3]);
    const before = store.globalPosition();

    let caught: unknown;
    try {
      engine.accept("bob", 1);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ExchangeError);
    if (caught instanceof ExchangeError) {
      expect(caught.code).toBe("OWNERSHIP_MISMATCH");
      expect(caught.mismatches).toEqual([
        { assetId: 3, side: "acceptor", expectedOwner: "bob", actualOwner: "carol" },
      ]);
    }
    expect(engine.get(1)?.state).toBe("pending");
    expect(registry.ownerOf(1)).toBe("alice");
    expect(registry.ownerOf(2)).toBe("bob");
    expect(store.globalPosition()).toBe(before);
  });

  it("checks authorization before state", () => {
    engine.create("alice", "bob", [], []);
    engine.cancel("alice", 1);

    expect(codeOf(() => engine.accept("carol", 1))).toBe("UNAUTHORIZED");
    expect(codeOf(() => engine.accept("bob", 1))).toBe("INVALID_STATE");
  });

  it("settles at most one of two offers sharing an asset", () => {
    registry.issue("carol", "carol", "0x03"); // 3
    engine.create("alice", "bob", [1], [2]);
    engine.create("alice", "carol", [1], [3]);

    engine.accept("bob", 1);

    expect(codeOf(() => engine.accept("carol", 2))).toBe("OWNERSHIP_MISMATCH");
    expect(registry.ownerOf(1)).toBe("bob");
    expect(registry.ownerOf(3)).toBe("carol");
    expect(engine.get(2)?.state).toBe("pending");
  });

  it("lets anyone holding the requested assets accept a public offer", () => {
    engine.create("alice", null, [1], [2]);

    engine.accept("bob", 1);

    expect(registry.inventoryOf("bob")).toEqual([1]);
    expect(registry.inventoryOf("alice")).toEqual([2]);
  });

  it("accepts a sender's own public offer without moving anything", () => {
    registry.issue("alice", "alice", "0x03"); // 3
    engine.create("alice", null, [1], [3]);
    const before = store.globalPosition();

    expect(engine.accept("alice", 1).state).toBe("accepted");
    expect(registry.inventoryOf("alice")).toEqual([1, 3]);
    expect(store.readAll({ fromPosition: before + 1 }).map((e) => e.event.type)).toEqual([
      "exchange.offer.state_changed",
    ]);
  });
});

// ─── Queries ─────────────────────────────────────────────────────────────

describe("pendingFor", () => {
  it("lists received and others' public offers still pending", () => {
    engine.create("alice", "bob", [], []); // 1
    engine.create("carol", null, [], []); // 2
    engine.create("bob", null, [], []); // 3
    engine.create("alice", "bob", [], []); // 4
    engine.cancel("alice", 4);

    expect(engine.pendingFor("bob")).toEqual([1, 2]);
    expect(engine.pendingFor("dave")).toEqual([2, 3]);
  });
});

describe("list", () => {
  it("filters by state", () => {
    engine.create("alice", "bob", [], []);
    engine.create("alice", "bob", [], []);
    engine.cancel("alice", 2);

    expect(engine.list().map((o) => o.id)).toEqual([1, 2]);
    expect(engine.list("cancelled").map((o) => o.id)).toEqual([2]);
  });
});

describe("auditIndices", () => {
  it("reports no discrepancies after mixed operations", () => {
    engine.create("alice", "bob", [], []);
    engine.create("bob", null, [], []);
    engine.decline("carol", 2);

    expect(engine.auditIndices()).toEqual([]);
  });
});

// ─── Snapshot ────────────────────────────────────────────────────────────

describe("snapshot", () => {
  it("round-trips offers, indices and the id counter", () => {
    engine.create("alice", "bob", [1], []);
    engine.create("carol", null, [], [2]);
    engine.cancel("alice", 1);

    const restored = TradeOfferEngine.fromSnapshot(engine.snapshot(), registry, journal);

    expect(restored.get(1)).toEqual(engine.get(1));
    expect(restored.publicOffers()).toEqual([2]);
    expect(restored.receivedBy("bob")).toEqual([1]);
    expect(restored.create("bob", "alice", [], []).id).toBe(3);
  });

  it("rejects an offer above the id counter", () => {
    const snapshot: OfferBookSnapshot = {
      version: 1,
      lastOfferId: 0,
      offers: [
        {
          id: 1,
          sender: "alice",
          recipient: "bob",
          myAssets: [],
          theirAssets: [],
          state: "pending",
          createdAt: TS,
          updatedAt: TS,
        },
      ],
      createdAt: TS,
    };

    expect(codeOf(() => TradeOfferEngine.fromSnapshot(snapshot, registry, journal))).toBe(
      "INVALID_SNAPSHOT",
    );
  });

  it("rejects a malformed offer", () => {
    const snapshot: OfferBookSnapshot = JSON.parse(
      JSON.stringify({
        version: 1,
        lastOfferId: 1,
        offers: [{ id: 1, sender: "alice", recipient: "bob", state: "open" }],
        createdAt: TS,
      }),
    );

    expect(codeOf(() => TradeOfferEngine.fromSnapshot(snapshot, registry, journal))).toBe(
      "INVALID_SNAPSHOT",
    );
  });
});
