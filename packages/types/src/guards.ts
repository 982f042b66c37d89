/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, event consumers).
 */

import type { TransactionId, TransactionStatus } from "./transaction.js";
import type { DomainEvent, EventMetadata } from "./event.js";
import { WALLET_EVENTS } from "./notifications.js";
import type { WalletEventType } from "./notifications.js";

// =============================================================================
// Transaction guards
// =============================================================================

const TRANSACTION_STATUSES = new Set<string>(["pending", "executed", "declined"]);

export function isTransactionStatus(value: unknown): value is TransactionStatus {
  return typeof value === "string" && TRANSACTION_STATUSES.has(value);
}

export function isTransactionId(value: unknown): value is TransactionId {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["wallet", "registry"]);
const WALLET_EVENT_TYPES = new Set<string>(Object.values(WALLET_EVENTS));

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

export function isWalletEventType(value: unknown): value is WalletEventType {
  return typeof value === "string" && WALLET_EVENT_TYPES.has(value);
}
