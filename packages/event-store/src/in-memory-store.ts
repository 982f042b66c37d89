/**
 * @quorum-vault/event-store — In-memory EventStore implementation.
 *
 * Holds the notification log in plain arrays. State is lost on process
 * exit; durable storage is a host concern.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch, after the batch is stored
 * - A throwing subscriber is reported, never rethrown to the appender
 */

import type { DomainEvent } from "@quorum-vault/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  HandlerErrorReporter,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly streams = new Map<string, StoredEvent[]>();
  private readonly globalLog: StoredEvent[] = [];
  private readonly streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly globalSubscribers = new Set<EventHandler>();
  private lastHash = GENESIS_HASH;

  constructor(
    private readonly clock: () => Date = () => new Date(),
    private readonly onHandlerError: HandlerErrorReporter = warnHandlerError,
  ) {}

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this.validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this.checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const appendedAt = this.clock().toISOString();
    const fromVersion = currentVersion + 1;
    const stored: StoredEvent[] = [];
    let previousHash = this.lastHash;

    events.forEach((event, i) => {
      const linked = linkEvent(
        {
          event,
          streamId,
          version: fromVersion + i,
          globalPosition: this.globalLog.length + i + 1,
          appendedAt,
        },
        previousHash,
      );
      previousHash = linked.hash;
      stored.push(linked);
    });

    // Commit the whole batch at once
    const stream = this.streams.get(streamId) ?? [];
    stream.push(...stored);
    this.streams.set(streamId, stream);
    this.globalLog.push(...stored);
    this.lastHash = previousHash;

    this.dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + stored.length - 1,
      count: stored.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this.validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (!Number.isInteger(fromVersion) || fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be an integer >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this.streams.get(streamId) ?? [];
    return window(stream, fromVersion - 1, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = Math.max(options?.fromPosition ?? 1, 1);
    return window(this.globalLog, fromPosition - 1, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this.validateStreamId(streamId);

    const subscribers = this.streamSubscribers.get(streamId) ?? new Set<EventHandler>();
    subscribers.add(handler);
    this.streamSubscribers.set(streamId, subscribers);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this.streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this.globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this.globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this.streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this.globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this.globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: AppendOptions["expectedVersion"],
  ): void {
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expected === "number" && currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this.streamSubscribers.get(streamId) ?? []),
      ...this.globalSubscribers,
    ];
    for (const handler of handlers) {
      for (const event of events) {
        try {
          handler(event);
        } catch (err) {
          this.onHandlerError(err, event);
        }
      }
    }
  }
}

function warnHandlerError(error: unknown, event: StoredEvent): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.emitWarning(
    `Subscriber failed on ${event.streamId}@${event.version} (${event.event.type}): ${reason}`,
    "EventHandlerWarning",
  );
}

function window(
  events: readonly StoredEvent[],
  start: number,
  maxCount: number | undefined,
): readonly StoredEvent[] {
  const end = maxCount !== undefined && maxCount >= 0 ? start + maxCount : undefined;
  return events.slice(start, end);
}
