/**
 * @quorum-vault/event-store — Core types.
 *
 * Defines the interfaces and types for the append-only notification log.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by a SHA-256 hash chain
 * - Subscriptions see committed events in order
 */

import type { DomainEvent } from "@quorum-vault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store, before it is linked into the chain.
 */
export interface UnlinkedEvent {
  /** The domain event */
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A persisted event, linked into the store's hash chain.
 */
export interface StoredEvent extends UnlinkedEvent {
  /** SHA-256 of this event's canonical content + previousHash */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH for the first */
  readonly previousHash: string;
}

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check (append regardless)
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  /** Version of the first event appended */
  readonly fromVersion: number;
  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;
  readonly count: number;
}

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;
  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

/**
 * Receives an error thrown by a subscriber. The event is already stored;
 * a failing subscriber never fails the append.
 */
export type HandlerErrorReporter = (error: unknown, event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose link verified */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - A batch is appended entirely or not at all
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the batch is empty or the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Read events from a single stream (empty if the stream doesn't exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Read events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /** Subscribe to new events on a specific stream. */
  subscribe(streamId: string, handler: EventHandler): Subscription;

  /** Subscribe to all new events across all streams. */
  subscribeAll(handler: EventHandler): Subscription;

  /** Current version of a stream, or 0 if it doesn't exist. */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty. */
  globalPosition(): number;

  /** Verify the hash chain across all stored events. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
