/**
 * Transaction Types
 *
 * A wallet transaction is a proposed action: a value transfer plus an
 * opaque payload forwarded to a destination once a quorum of owners
 * has approved it.
 *
 * Transactions are:
 * - Append-only (never deleted, ids never reused)
 * - Immutable in their core fields (destination, value, payload)
 * - Terminal once executed or declined
 */

import type { Address } from "./address.js";

/**
 * Sequential transaction identifier, equal to its index in the ledger.
 */
export type TransactionId = number;

/**
 * Lifecycle states of a transaction.
 *
 * pending → executed (quorum reached, collaborator succeeded)
 * pending → declined (declined through a quorum-approved self-call)
 */
export type TransactionStatus = "pending" | "executed" | "declined";

/**
 * A proposed action as stored by the ledger.
 */
export interface WalletTransaction {
  /** Sequential identifier (index in the ledger) */
  readonly id: TransactionId;

  /** Target of the transfer / call */
  readonly destination: Address;

  /** Amount of the underlying asset, 0 … 2^64 − 1 */
  readonly value: bigint;

  /** Opaque bytes forwarded to the destination */
  readonly payload: Uint8Array;

  /** Epoch milliseconds at execution; 0 while pending or when declined */
  readonly executionDate: number;

  /** Current lifecycle state */
  readonly status: TransactionStatus;
}

/**
 * Input for proposing a new transaction.
 */
export interface TransactionProposal {
  readonly destination: Address;
  readonly value: bigint;
  readonly payload?: Uint8Array | undefined;
}

/**
 * Result reported by an execution collaborator.
 */
export interface ExecutionResult {
  readonly success: boolean;
  readonly returnData: Uint8Array;
}
