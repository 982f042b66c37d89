/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read: from version, max count, readAll
 * - Subscriptions: stream-specific, global, unsubscribe
 * - Errors: empty append, invalid stream ID, invalid version
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@quorum-vault/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import { GENESIS_HASH } from "../src/hash-chain.js";

// =============================================================================
// Helpers
// =============================================================================

let counter = 0;

function makeEvent(type: string, correlationId = "tx:0"): DomainEvent {
  counter++;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2024-01-01T00:00:00.000Z",
      actor: "test",
      correlationId,
      source: "wallet",
    },
    payload: { n: counter },
  };
}

function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();
    const result = store.append("wallet:a", [makeEvent("test.created")]);

    expect(result).toEqual({ streamId: "wallet:a", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("appends a batch with contiguous versions", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(2));
    const result = store.append("wallet:a", makeEvents(3));

    expect(result.fromVersion).toBe(3);
    expect(result.toVersion).toBe(5);
    expect(store.read("wallet:a").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(2));
    store.append("wallet:b", makeEvents(1));

    expect(store.readAll().map((e) => [e.streamId, e.globalPosition])).toEqual([
      ["wallet:a", 1],
      ["wallet:a", 2],
      ["wallet:b", 3],
    ]);
    expect(store.globalPosition()).toBe(3);
  });

  it("links the first event to the genesis hash", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(2));
    const [first, second] = store.read("wallet:a");

    expect(first?.previousHash).toBe(GENESIS_HASH);
    expect(second?.previousHash).toBe(first?.hash);
  });

  it("stamps appendedAt from the injected clock", () => {
    const store = new InMemoryEventStore(() => new Date("2024-05-01T12:00:00.000Z"));
    store.append("wallet:a", makeEvents(1));

    expect(store.read("wallet:a")[0]?.appendedAt).toBe("2024-05-01T12:00:00.000Z");
  });

  it("throws on empty append", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("wallet:a", [])).toThrow(EventStoreError);
  });

  it("throws on empty stream ID", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("", makeEvents(1))).toThrow(/non-empty/);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expected version", () => {
  it("accepts a matching version", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(2));
    expect(() =>
      store.append("wallet:a", makeEvents(1), { expectedVersion: 2 }),
    ).not.toThrow();
  });

  it("rejects a stale version", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(2));

    try {
      store.append("wallet:a", makeEvents(1), { expectedVersion: 1 });
      expect.unreachable("append should have failed");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      expect((err as EventStoreError).code).toBe("CONCURRENCY_CONFLICT");
    }
    expect(store.streamVersion("wallet:a")).toBe(2);
  });

  it("no_stream fails when the stream exists", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(1), { expectedVersion: "no_stream" });
    expect(() =>
      store.append("wallet:a", makeEvents(1), { expectedVersion: "no_stream" }),
    ).toThrow(/already exists/);
  });

  it("any skips the check", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(3));
    expect(store.append("wallet:a", makeEvents(1), { expectedVersion: "any" }).toVersion).toBe(4);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns empty for an unknown stream", () => {
    const store = new InMemoryEventStore();
    expect(store.read("wallet:none")).toEqual([]);
  });

  it("reads from a version with a max count", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(5));

    expect(
      store.read("wallet:a", { fromVersion: 2, maxCount: 2 }).map((e) => e.version),
    ).toEqual([2, 3]);
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();
    expect(() => store.read("wallet:a", { fromVersion: 0 })).toThrow(EventStoreError);
  });

  it("readAll honours fromPosition and maxCount", () => {
    const store = new InMemoryEventStore();
    store.append("wallet:a", makeEvents(4));

    expect(
      store.readAll({ fromPosition: 3, maxCount: 5 }).map((e) => e.globalPosition),
    ).toEqual([3, 4]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events in order after they are stored", () => {
    const store = new InMemoryEventStore();
    const seen: number[] = [];
    store.subscribe("wallet:a", (e) => {
      seen.push(e.version);
      expect(store.streamVersion("wallet:a")).toBeGreaterThanOrEqual(e.version);
    });

    store.append("wallet:a", makeEvents(2));
    store.append("wallet:b", makeEvents(1));

    expect(seen).toEqual([1, 2]);
  });

  it("delivers all streams to global subscribers", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribeAll(handler);

    store.append("wallet:a", makeEvents(1));
    store.append("wallet:b", makeEvents(2));

    expect(handler).toHaveBeenCalledTimes(3);
  });

  it("reports a throwing subscriber and keeps dispatching", () => {
    const failures: { message: string; version: number }[] = [];
    const store = new InMemoryEventStore(undefined, (error, event) => {
      failures.push({
        message: error instanceof Error ? error.message : String(error),
        version: event.version,
      });
    });
    const after = vi.fn();
    store.subscribe("wallet:a", (e) => {
      if (e.version === 1) {
        throw new Error("monitor down");
      }
    });
    store.subscribe("wallet:a", after);

    const result = store.append("wallet:a", makeEvents(2));

    expect(result.count).toBe(2);
    expect(store.streamVersion("wallet:a")).toBe(2);
    expect(after).toHaveBeenCalledTimes(2);
    expect(failures).toEqual([{ message: "monitor down", version: 1 }]);
  });

  it("stops delivering after unsubscribe", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const sub = store.subscribe("wallet:a", handler);

    store.append("wallet:a", makeEvents(1));
    sub.unsubscribe();
    store.append("wallet:a", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(1);
  });
});
