/**
 * @quorum-vault/wallet domain types.
 *
 * The wallet operates two tightly coupled components:
 *
 * 1. Owner Registry — the owner set and approval threshold
 * 2. Transaction Ledger — append-only proposals, approval sets and the
 *    pending → executed | declined state machine
 *
 * Value leaves the wallet only through an Executable collaborator.
 */

import type {
  Address,
  ExecutionResult,
  TransactionId,
} from "@quorum-vault/types";
import type { EventStore } from "@quorum-vault/event-store";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * The capability that performs a transfer/call once a transaction executes.
 *
 * Synchronous: the wallet blocks until the collaborator reports. A
 * collaborator may call back into the wallet while it runs.
 */
export interface Executable {
  invoke(destination: Address, value: bigint, payload: Uint8Array): ExecutionResult;
}

/** Initial identity and governance of a wallet. */
export interface WalletConfig {
  /** The wallet's own address (destination of privileged self-calls) */
  readonly address: string;
  readonly owners: readonly string[];
  readonly threshold: number;
}

export interface WalletDependencies {
  readonly executor: Executable;
  /** Notification sink. Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore | undefined;
  /** Default: () => new Date() */
  readonly clock?: (() => Date) | undefined;
}

// =============================================================================
// Snapshots
// =============================================================================

export interface TransactionSnapshot {
  readonly id: TransactionId;
  readonly destination: Address;
  /** Decimal string */
  readonly value: string;
  /** 0x-prefixed hex */
  readonly payload: string;
  readonly executionDate: number;
  readonly status: "pending" | "executed" | "declined";
  /** Owners whose approval flag is set, in approval order */
  readonly approvers: readonly Address[];
}

/** JSON-safe export of a wallet's full state. */
export interface WalletSnapshot {
  readonly version: 1;
  readonly address: Address;
  readonly owners: readonly Address[];
  readonly threshold: number;
  readonly transactions: readonly TransactionSnapshot[];
}

// =============================================================================
// Errors
// =============================================================================

export type WalletErrorCode =
  // Authorization
  | "NOT_OWNER"
  | "UNAUTHORIZED_CALLER"
  // Not found
  | "TRANSACTION_NOT_FOUND"
  // State conflict
  | "ALREADY_APPROVED"
  | "NOT_APPROVED"
  | "ALREADY_EXECUTED"
  | "ALREADY_DECLINED"
  | "INSUFFICIENT_APPROVALS"
  | "PENDING_TRANSACTIONS_EXIST"
  // Validation
  | "EMPTY_OWNER_SET"
  | "INVALID_THRESHOLD"
  | "ZERO_ADDRESS_OWNER"
  | "DUPLICATE_OWNER"
  | "INVALID_ADDRESS"
  | "INVALID_VALUE"
  | "INVALID_PAYLOAD"
  | "ZERO_DEPOSIT_VALUE"
  | "INVALID_SELF_CALL"
  | "INVALID_SNAPSHOT"
  // Resource
  | "OVERFLOW"
  // Downstream
  | "EXECUTION_FAILED";

export class WalletError extends Error {
  public readonly code: WalletErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: WalletErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "WalletError";
    this.code = code;
    this.details = details;
  }
}

/**
 * The execution collaborator (or a privileged self-call) reported failure.
 * `returnData` is the collaborator's raw output; for self-calls it is the
 * canonical JSON `{"code":…,"message":…}` of the inner error, which is also
 * attached as `cause`.
 */
export class ExecutionFailedError extends WalletError {
  public readonly transactionId: TransactionId;
  public readonly returnData: Uint8Array;

  constructor(
    transactionId: TransactionId,
    returnData: Uint8Array,
    message: string,
    options?: ErrorOptions,
  ) {
    super(
      "EXECUTION_FAILED",
      message,
      { transactionId, returnData: `0x${Buffer.from(returnData).toString("hex")}` },
      options,
    );
    this.name = "ExecutionFailedError";
    this.transactionId = transactionId;
    this.returnData = returnData;
  }
}
