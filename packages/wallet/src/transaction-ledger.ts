/**
 * Transaction Ledger — append-only proposals and their approval sets.
 *
 * Each record keeps immutable core fields (destination, value, payload)
 * plus a mutable status and the set of owners who currently approve it.
 * Every mutation is recorded in the journal.
 *
 * Rules:
 * - Ids are sequential and equal to the record's index; never reused
 * - Records are never deleted
 * - pending → executed | declined; terminal states accept no mutation
 * - approvalCount(id) is the size of the approval set, so it always
 *   equals the number of owners flagged as approving
 * - pendingCount() equals the number of records with status "pending"
 */

import type {
  Address,
  TransactionId,
  TransactionStatus,
  WalletTransaction,
} from "@quorum-vault/types";
import type { Journal } from "./journal.js";
import { WalletError } from "./types.js";
import { assertUint64, nextTransactionId } from "./uint64.js";

// =============================================================================
// Internal record
// =============================================================================

interface LedgerRecord {
  readonly id: TransactionId;
  readonly destination: Address;
  readonly value: bigint;
  readonly payload: Uint8Array;
  executionDate: number;
  status: TransactionStatus;
  approvals: Set<Address>;
}

/** Record shape accepted when rebuilding a ledger from a snapshot. */
export interface LedgerRecordInput {
  readonly destination: Address;
  readonly value: bigint;
  readonly payload: Uint8Array;
  readonly executionDate: number;
  readonly status: TransactionStatus;
  readonly approvers: readonly Address[];
}

// =============================================================================
// Transaction Ledger
// =============================================================================

export class TransactionLedger {
  private readonly records: LedgerRecord[] = [];
  private pending = 0;

  constructor(private readonly journal: Journal) {}

  /**
   * Rebuild a ledger from exported records, in id order.
   */
  static fromRecords(records: readonly LedgerRecordInput[], journal: Journal): TransactionLedger {
    const ledger = new TransactionLedger(journal);
    for (const input of records) {
      ledger.records.push({
        id: nextTransactionId(ledger.records.length),
        destination: input.destination,
        value: assertUint64(input.value),
        payload: new Uint8Array(input.payload),
        executionDate: input.executionDate,
        status: input.status,
        approvals: new Set(input.approvers),
      });
      if (input.status === "pending") {
        ledger.pending++;
      }
    }
    return ledger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Append
  // ───────────────────────────────────────────────────────────────────────

  append(destination: Address, value: bigint, payload: Uint8Array): TransactionId {
    const id = nextTransactionId(this.records.length);

    this.records.push({
      id,
      destination,
      value: assertUint64(value),
      payload: new Uint8Array(payload),
      executionDate: 0,
      status: "pending",
      approvals: new Set(),
    });
    this.pending++;

    this.journal.record(() => {
      this.records.pop();
      this.pending--;
    });
    return id;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Approvals
  // ───────────────────────────────────────────────────────────────────────

  addApproval(id: TransactionId, owner: Address): number {
    const record = this.requirePending(id);
    if (record.approvals.has(owner)) {
      throw new WalletError(
        "ALREADY_APPROVED",
        `${owner} has already approved transaction ${id}`,
        { transactionId: id, owner },
      );
    }

    record.approvals.add(owner);
    this.journal.record(() => {
      record.approvals.delete(owner);
    });
    return record.approvals.size;
  }

  removeApproval(id: TransactionId, owner: Address): number {
    const record = this.requirePending(id);
    if (!record.approvals.has(owner)) {
      throw new WalletError(
        "NOT_APPROVED",
        `${owner} has not approved transaction ${id}`,
        { transactionId: id, owner },
      );
    }

    const before = record.approvals;
    record.approvals = new Set([...before].filter((a) => a !== owner));
    this.journal.record(() => {
      record.approvals = before;
    });
    return record.approvals.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Terminal transitions
  // ───────────────────────────────────────────────────────────────────────

  markExecuted(id: TransactionId, executionDate: number): void {
    const record = this.requirePending(id);
    record.status = "executed";
    record.executionDate = executionDate;
    this.pending--;

    this.journal.record(() => {
      record.status = "pending";
      record.executionDate = 0;
      this.pending++;
    });
  }

  markDeclined(id: TransactionId): void {
    const record = this.requirePending(id);
    record.status = "declined";
    this.pending--;

    this.journal.record(() => {
      record.status = "pending";
      this.pending++;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(id: TransactionId): WalletTransaction {
    return toTransaction(this.require(id));
  }

  status(id: TransactionId): TransactionStatus {
    return this.require(id).status;
  }

  approvalCount(id: TransactionId): number {
    return this.require(id).approvals.size;
  }

  hasApproved(id: TransactionId, owner: Address): boolean {
    return this.require(id).approvals.has(owner);
  }

  /** Owners currently approving, in approval order. */
  approvers(id: TransactionId): readonly Address[] {
    return [...this.require(id).approvals];
  }

  /**
   * Lazy view of up to `limit` transactions starting at `start`.
   *
   * Bounds are fixed when the view is created; each iteration starts over.
   * Empty when `start` is out of range or `limit` is not positive.
   */
  range(start: number, limit: number): Iterable<WalletTransaction> {
    const valid =
      Number.isInteger(start) &&
      Number.isInteger(limit) &&
      start >= 0 &&
      start < this.records.length &&
      limit > 0;
    const from = valid ? start : 0;
    const to = valid ? Math.min(start + limit, this.records.length) : 0;
    const records = this.records;

    return {
      *[Symbol.iterator]() {
        for (let i = from; i < to; i++) {
          const record = records[i];
          if (record !== undefined) {
            yield toTransaction(record);
          }
        }
      },
    };
  }

  get count(): number {
    return this.records.length;
  }

  pendingCount(): number {
    return this.pending;
  }

  /**
   * Assert the transaction exists and is pending.
   */
  assertPending(id: TransactionId): void {
    this.requirePending(id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private require(id: TransactionId): LedgerRecord {
    const record = Number.isInteger(id) ? this.records[id] : undefined;
    if (record === undefined) {
      throw new WalletError(
        "TRANSACTION_NOT_FOUND",
        `Transaction ${String(id)} not found`,
        { transactionId: id },
      );
    }
    return record;
  }

  private requirePending(id: TransactionId): LedgerRecord {
    const record = this.require(id);
    if (record.status === "executed") {
      throw new WalletError(
        "ALREADY_EXECUTED",
        `Transaction ${id} has already been executed`,
        { transactionId: id },
      );
    }
    if (record.status === "declined") {
      throw new WalletError(
        "ALREADY_DECLINED",
        `Transaction ${id} has been declined`,
        { transactionId: id },
      );
    }
    return record;
  }
}

function toTransaction(record: LedgerRecord): WalletTransaction {
  return {
    id: record.id,
    destination: record.destination,
    value: record.value,
    payload: new Uint8Array(record.payload),
    executionDate: record.executionDate,
    status: record.status,
  };
}
