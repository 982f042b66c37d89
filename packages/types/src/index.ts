/**
 * @quorum-vault/types — Shared domain types for the quorum-vault stack.
 *
 * These types are used across all packages:
 * - Addresses (owner, destination and wallet identities)
 * - Transactions and their lifecycle
 * - Event architecture and wallet notifications
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Address types
export type { Address } from "./address.js";
export { ZERO_ADDRESS, isAddress, canonicalAddress } from "./address.js";

// Transaction types
export type {
  TransactionId,
  TransactionStatus,
  WalletTransaction,
  TransactionProposal,
  ExecutionResult,
} from "./transaction.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Notification definitions
export { WALLET_EVENTS } from "./notifications.js";
export type {
  WalletEventType,
  FundsDepositedPayload,
  TransactionSubmittedPayload,
  TransactionApprovedPayload,
  ApprovalRevokedPayload,
  TransactionExecutedPayload,
  TransactionDeclinedPayload,
  OwnersUpdatedPayload,
} from "./notifications.js";

// Runtime type guards
export {
  isTransactionStatus,
  isTransactionId,
  isEventMetadata,
  isDomainEvent,
  isWalletEventType,
} from "./guards.js";
