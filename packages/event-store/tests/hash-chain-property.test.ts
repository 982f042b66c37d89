/**
 * Property-based tests for hash chain integrity.
 *
 * Uses fast-check to verify invariants:
 * 1. Any N events → valid chain
 * 2. Remove any event → breaks chain
 * 3. Modify any payload → breaks chain
 * 4. verifyIntegrity() is idempotent
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";
import type { DomainEvent } from "@quorum-vault/types";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDomainEvent: fc.Arbitrary<DomainEvent> = fc.record({
  type: fc.constantFrom(
    "wallet.funds.deposited",
    "wallet.transaction.submitted",
    "wallet.transaction.approved",
    "wallet.transaction.executed",
  ),
  metadata: fc.record({
    eventId: fc.uuid(),
    timestamp: fc.constant("2024-06-01T12:00:00.000Z"),
    actor: fc.hexaString({ minLength: 40, maxLength: 40 }).map((hex) => `0x${hex}`),
    correlationId: fc.nat({ max: 50 }).map((id) => `tx:${id}`),
    source: fc.constantFrom("wallet" as const, "registry" as const),
  }),
  payload: fc.dictionary(fc.string(), fc.jsonValue()),
});

// =============================================================================
// Tests
// =============================================================================

describe("hash chain property tests", () => {
  it("any N events produce a valid chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 20 }),
        (events) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          const result = store.verifyIntegrity();
          expect(result.valid).toBe(true);
          expect(result.errors).toHaveLength(0);
          expect(result.lastVerifiedPosition).toBe(events.length);
        },
      ),
      { numRuns: 50 },
    );
  });

  it("removing any event from the middle breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 3, maxLength: 10 }),
        fc.nat(),
        (events, removeIndex) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          const allEvents = store.readAll();
          // Not first, not last
          const idx = 1 + (removeIndex % (allEvents.length - 2));
          const tampered = [...allEvents.slice(0, idx), ...allEvents.slice(idx + 1)];

          const result = verifyHashChain(tampered);
          expect(result.valid).toBe(false);
          expect(result.errors.length).toBeGreaterThan(0);
        },
      ),
      { numRuns: 30 },
    );
  });

  it("modifying any event payload breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 2, maxLength: 8 }),
        fc.nat(),
        (events, modifyIndex) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          const idx = modifyIndex % events.length;
          const tampered = store.readAll().map((stored, i) =>
            i === idx
              ? {
                  ...stored,
                  event: {
                    ...stored.event,
                    payload: { ...stored.event.payload, tampered: true },
                  },
                }
              : stored,
          );

          const result = verifyHashChain(tampered);
          expect(result.valid).toBe(false);
        },
      ),
      { numRuns: 30 },
    );
  });

  it("verifyIntegrity is idempotent", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 10 }),
        (events) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          expect(store.verifyIntegrity()).toEqual(store.verifyIntegrity());
        },
      ),
      { numRuns: 30 },
    );
  });

  it("appending to separate streams still produces valid global chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 5 }),
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 5 }),
        (eventsA, eventsB) => {
          const store = new InMemoryEventStore();
          store.append("stream-a", eventsA);
          store.append("stream-b", eventsB);

          expect(store.verifyIntegrity().valid).toBe(true);
        },
      ),
      { numRuns: 30 },
    );
  });
});
