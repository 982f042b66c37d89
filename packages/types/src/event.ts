/**
 * Event Types
 *
 * Append-only notification architecture.
 * Every committed state change of a wallet is captured as a DomainEvent,
 * forming the audit trail external monitors subscribe to.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which transaction)
 * - Payloads are JSON-safe (amounts as decimal strings, bytes as hex)
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events (e.g., "tx:3") */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;
}

export type EventSource = "wallet" | "registry";

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "wallet.transaction.submitted") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
