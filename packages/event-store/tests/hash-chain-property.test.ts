/**
 * Property-based tests for hash chain integrity.
 *
 * Uses fast-check to verify invariants:
 * 1. Any sequence of appends across streams → valid chain
 * 2. Removing any event after the first → broken chain
 * 3. Rewriting any payload → broken chain
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@swapledger/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDomainEvent: fc.Arbitrary<DomainEvent> = fc.record({
  type: fc.constantFrom("registry.asset.issued", "registry.asset.moved", "exchange.offer.created"),
  metadata: fc.record({
    eventId: fc.uuid(),
    timestamp: fc.constant("2024-03-01T12:00:00.000Z"),
    actor: fc.constantFrom("alice", "bob"),
    correlationId: fc.uuid(),
    source: fc.constantFrom("registry" as const, "exchange" as const),
  }),
  payload: fc.dictionary(fc.string({ minLength: 1, maxLength: 8 }), fc.integer()),
});

const arbAppends = fc.array(
  fc.tuple(fc.constantFrom("asset-1", "asset-2", "offer-1"), arbDomainEvent),
  { minLength: 2, maxLength: 20 },
);

function fill(appends: readonly [string, DomainEvent][]): InMemoryEventStore {
  const store = new InMemoryEventStore();
  for (const [streamId, event] of appends) {
    store.append(streamId, [event]);
  }
  return store;
}

// =============================================================================
// Tests
// =============================================================================

describe("hash chain property tests", () => {
  it("any sequence of appends produces a valid chain", () => {
    fc.assert(
      fc.property(arbAppends, (appends) => {
        const result = fill(appends).verifyIntegrity();

        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(appends.length);
      }),
      { numRuns: 50 },
    );
  });

  it("removing any event after the first breaks the chain", () => {
    fc.assert(
      fc.property(arbAppends, fc.nat(), (appends, pick) => {
        const events = fill(appends).readAll();
        const idx = 1 + (pick % (events.length - 1));
        const tampered = [...events.slice(0, idx), ...events.slice(idx + 1)];

        // Dropping the tail leaves a valid prefix; every other removal breaks a link
        const result = verifyHashChain(tampered);
        expect(result.valid).toBe(idx === events.length - 1);
      }),
      { numRuns: 50 },
    );
  });

  it("rewriting any payload breaks the chain at that position", () => {
    fc.assert(
      fc.property(arbAppends, fc.nat(), (appends, pick) => {
        const events = fill(appends).readAll();
        const idx = pick % events.length;
        const tampered = events.map((e, i) =>
          i === idx ? { ...e, event: { ...e.event, payload: { tampered: true } } } : e,
        );

        const result = verifyHashChain(tampered);
        expect(result.valid).toBe(false);
        expect(result.errors[0]?.position).toBe(idx + 1);
      }),
      { numRuns: 50 },
    );
  });
});
