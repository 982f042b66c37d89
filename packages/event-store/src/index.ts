/**
 * @quorum-vault/event-store — Append-only notification log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests, development and single-process hosts
 * - SHA-256 hash chain for tamper evidence
 *
 * @packageDocumentation
 */

export type {
  UnlinkedEvent,
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  HandlerErrorReporter,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
