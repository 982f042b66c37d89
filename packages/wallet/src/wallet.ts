/**
 * QuorumWallet — the transaction lifecycle and quorum engine.
 *
 * Every state-changing call names its caller. Owners propose, approve,
 * revoke and execute; the wallet itself (through quorum-approved
 * self-calls) declines transactions and replaces the owner set.
 *
 * Rules:
 * - Each operation is all-or-nothing: on any error the journal rolls
 *   state back and its buffered notifications are discarded
 * - Notifications are appended to the event store only when the
 *   outermost operation commits
 * - execute() finalizes the transaction before control passes to the
 *   collaborator; a call back into the wallet during that time joins the
 *   running operation and sees the transaction as executed
 * - decline() and updateOwners() accept only the wallet's own address
 */

import { randomUUID } from "node:crypto";
import { canonicalAddress, WALLET_EVENTS } from "@quorum-vault/types";
import type {
  Address,
  DomainEvent,
  EventSource,
  TransactionId,
  TransactionProposal,
  TransactionStatus,
  WalletEventType,
  WalletTransaction,
} from "@quorum-vault/types";
import { InMemoryEventStore } from "@quorum-vault/event-store";
import type {
  EventHandler,
  EventStore,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "@quorum-vault/event-store";
import { toHex } from "./bytes.js";
import { decodeSelfCall, encodeErrorData } from "./self-call.js";
import { exportSnapshot, restoreWalletState } from "./snapshot.js";
import type { WalletState } from "./state.js";
import { createWalletState } from "./state.js";
import type {
  Executable,
  WalletConfig,
  WalletDependencies,
  WalletSnapshot,
} from "./types.js";
import { ExecutionFailedError, WalletError } from "./types.js";
import { assertUint64 } from "./uint64.js";

// =============================================================================
// Operation frame
// =============================================================================

interface OperationContext {
  emit(
    type: WalletEventType,
    actor: Address,
    correlationId: string,
    payload: Readonly<Record<string, unknown>>,
    source?: EventSource,
  ): void;
}

interface Frame {
  readonly events: DomainEvent[];
}

const EMPTY_PAYLOAD = new Uint8Array(0);

function txCorrelation(id: TransactionId): string {
  return `tx:${id}`;
}

// =============================================================================
// Quorum Wallet
// =============================================================================

export class QuorumWallet {
  private readonly executor: Executable;
  private readonly eventStore: EventStore;
  private readonly clock: () => Date;
  private frame: Frame | undefined;

  /**
   * Create a wallet with a fresh, empty ledger.
   */
  static create(config: WalletConfig, deps: WalletDependencies): QuorumWallet {
    return new QuorumWallet(createWalletState(config), deps);
  }

  /**
   * Rebuild a wallet from a snapshot produced by `snapshot()`.
   */
  static restore(snapshot: unknown, deps: WalletDependencies): QuorumWallet {
    return new QuorumWallet(restoreWalletState(snapshot), deps);
  }

  constructor(
    private readonly state: WalletState,
    deps: WalletDependencies,
  ) {
    this.executor = deps.executor;
    this.eventStore = deps.eventStore ?? new InMemoryEventStore();
    this.clock = deps.clock ?? (() => new Date());
  }

  get address(): Address {
    return this.state.address;
  }

  /** Stream the wallet's notifications are appended to. */
  get streamId(): string {
    return `wallet:${this.state.address}`;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Accept an incoming transfer with no payload. Anyone may deposit.
   */
  deposit(from: string, value: bigint): void {
    this.atomic((ctx) => {
      const sender = canonicalAddress(from);
      if (sender === undefined) {
        throw new WalletError("INVALID_ADDRESS", `Invalid sender address: "${from}"`);
      }
      if (value === 0n) {
        throw new WalletError("ZERO_DEPOSIT_VALUE", "Deposit value must be greater than zero");
      }
      assertUint64(value);

      ctx.emit(WALLET_EVENTS.FUNDS_DEPOSITED, sender, "deposit", {
        from: sender,
        value: value.toString(),
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle (owners)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Append a new pending transaction.
   */
  propose(caller: string, proposal: TransactionProposal): TransactionId {
    return this.atomic((ctx) => {
      const owner = this.requireOwner(caller);
      const destination = canonicalAddress(proposal.destination);
      if (destination === undefined) {
        throw new WalletError(
          "INVALID_ADDRESS",
          `Invalid destination address: "${proposal.destination}"`,
        );
      }
      const value = assertUint64(proposal.value);
      const payload = proposal.payload ?? EMPTY_PAYLOAD;

      const id = this.state.ledger.append(destination, value, payload);

      ctx.emit(WALLET_EVENTS.TRANSACTION_SUBMITTED, owner, txCorrelation(id), {
        transactionId: id,
        owner,
        destination,
        value: value.toString(),
        payload: toHex(payload),
      });
      return id;
    });
  }

  /**
   * Propose, then approve as the same caller.
   */
  proposeAndApprove(caller: string, proposal: TransactionProposal): TransactionId {
    return this.atomic(() => {
      const id = this.propose(caller, proposal);
      this.approve(caller, id);
      return id;
    });
  }

  /**
   * @returns The transaction's approval count after this approval
   */
  approve(caller: string, id: TransactionId): number {
    return this.atomic((ctx) => {
      const owner = this.requireOwner(caller);
      const count = this.state.ledger.addApproval(id, owner);

      ctx.emit(WALLET_EVENTS.TRANSACTION_APPROVED, owner, txCorrelation(id), {
        transactionId: id,
        owner,
      });
      return count;
    });
  }

  /**
   * Withdraw the caller's approval. Fails with NOT_APPROVED if the caller
   * has not approved.
   *
   * @returns The transaction's approval count after the revocation
   */
  revoke(caller: string, id: TransactionId): number {
    return this.atomic((ctx) => {
      const owner = this.requireOwner(caller);
      const count = this.state.ledger.removeApproval(id, owner);

      ctx.emit(WALLET_EVENTS.APPROVAL_REVOKED, owner, txCorrelation(id), {
        transactionId: id,
        owner,
      });
      return count;
    });
  }

  /**
   * Execute a transaction that has reached the threshold.
   *
   * @throws ExecutionFailedError if the collaborator or self-call fails;
   *         the transaction is then still pending
   */
  execute(caller: string, id: TransactionId): WalletTransaction {
    return this.atomic((ctx) => {
      const owner = this.requireOwner(caller);
      const { ledger, registry } = this.state;

      ledger.assertPending(id);
      const approvals = ledger.approvalCount(id);
      const required = registry.threshold();
      if (approvals < required) {
        throw new WalletError(
          "INSUFFICIENT_APPROVALS",
          `Transaction ${id} has ${approvals} of ${required} required approvals`,
          { transactionId: id, approvals, required },
        );
      }

      // Finalize before handing control to the collaborator
      ledger.markExecuted(id, this.clock().getTime());
      ctx.emit(WALLET_EVENTS.TRANSACTION_EXECUTED, owner, txCorrelation(id), {
        transactionId: id,
        owner,
      });

      const tx = ledger.get(id);
      if (tx.destination === this.state.address) {
        this.dispatchSelfCall(tx);
      } else {
        const result = this.executor.invoke(tx.destination, tx.value, tx.payload);
        if (!result.success) {
          throw new ExecutionFailedError(
            id,
            new Uint8Array(result.returnData),
            `Execution of transaction ${id} failed`,
          );
        }
      }

      return ledger.get(id);
    });
  }

  /**
   * Approve, then execute as the same caller.
   */
  approveAndExecute(caller: string, id: TransactionId): WalletTransaction {
    return this.atomic(() => {
      this.approve(caller, id);
      return this.execute(caller, id);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Privileged (self-call only)
  // ───────────────────────────────────────────────────────────────────────

  decline(caller: string, id: TransactionId): void {
    this.atomic((ctx) => {
      this.requireSelf(caller);
      this.state.ledger.markDeclined(id);

      ctx.emit(
        WALLET_EVENTS.TRANSACTION_DECLINED,
        this.state.address,
        txCorrelation(id),
        { transactionId: id },
      );
    });
  }

  updateOwners(caller: string, owners: readonly string[], threshold: number): void {
    this.atomic((ctx) => {
      this.requireSelf(caller);
      const updated = this.state.registry.replace(
        owners,
        threshold,
        this.state.ledger.pendingCount(),
      );

      ctx.emit(
        WALLET_EVENTS.OWNERS_UPDATED,
        this.state.address,
        "registry",
        { owners: [...updated], threshold },
        "registry",
      );
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isOwner(identity: string): boolean {
    return this.state.registry.isOwner(identity);
  }

  owners(): readonly Address[] {
    return this.state.registry.owners();
  }

  threshold(): number {
    return this.state.registry.threshold();
  }

  get(id: TransactionId): WalletTransaction {
    return this.state.ledger.get(id);
  }

  status(id: TransactionId): TransactionStatus {
    return this.state.ledger.status(id);
  }

  approvalCount(id: TransactionId): number {
    return this.state.ledger.approvalCount(id);
  }

  hasApproved(id: TransactionId, owner: string): boolean {
    const address = canonicalAddress(owner);
    if (address === undefined) {
      this.state.ledger.status(id);
      return false;
    }
    return this.state.ledger.hasApproved(id, address);
  }

  approvers(id: TransactionId): readonly Address[] {
    return this.state.ledger.approvers(id);
  }

  getRange(start: number, limit: number): Iterable<WalletTransaction> {
    return this.state.ledger.range(start, limit);
  }

  pendingCount(): number {
    return this.state.ledger.pendingCount();
  }

  count(): number {
    return this.state.ledger.count;
  }

  snapshot(): WalletSnapshot {
    return exportSnapshot(this.state);
  }

  /** Committed notifications of this wallet, oldest first. */
  events(options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(this.streamId, options);
  }

  /** Receive each notification as it is committed. */
  subscribe(handler: EventHandler): Subscription {
    return this.eventStore.subscribe(this.streamId, handler);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireOwner(caller: string): Address {
    const address = canonicalAddress(caller);
    if (address === undefined || !this.state.registry.isOwner(address)) {
      throw new WalletError("NOT_OWNER", `'${caller}' is not an owner`, { caller });
    }
    return address;
  }

  private requireSelf(caller: string): void {
    if (canonicalAddress(caller) !== this.state.address) {
      throw new WalletError(
        "UNAUTHORIZED_CALLER",
        `'${caller}' may not call a privileged operation; only the wallet itself can`,
        { caller },
      );
    }
  }

  /**
   * Run a quorum-approved transaction addressed to the wallet itself.
   * An empty payload deposits the value; a privileged call must carry none.
   * Inner failures surface as EXECUTION_FAILED wrapping the inner error.
   */
  private dispatchSelfCall(tx: WalletTransaction): void {
    try {
      if (tx.payload.length === 0) {
        this.deposit(this.state.address, tx.value);
        return;
      }
      const call = decodeSelfCall(tx.payload);
      if (tx.value !== 0n) {
        throw new WalletError(
          "INVALID_SELF_CALL",
          `Privileged self-call "${call.kind}" must carry zero value, got ${tx.value}`,
          { kind: call.kind, value: tx.value.toString() },
        );
      }
      switch (call.kind) {
        case "update_owners":
          this.updateOwners(this.state.address, call.owners, call.threshold);
          break;
        case "decline":
          this.decline(this.state.address, call.transactionId);
          break;
      }
    } catch (err) {
      if (err instanceof WalletError) {
        throw new ExecutionFailedError(
          tx.id,
          encodeErrorData(err),
          `Execution of transaction ${tx.id} failed: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }
  }

  /**
   * Run `operation` all-or-nothing. A call made while another operation is
   * running (from the collaborator) joins it behind a savepoint.
   */
  private atomic<T>(operation: (ctx: OperationContext) => T): T {
    const outermost = this.frame === undefined;
    const frame: Frame = this.frame ?? { events: [] };
    this.frame = frame;

    const savepoint = this.state.journal.mark();
    const eventMark = frame.events.length;
    const ctx: OperationContext = {
      emit: (type, actor, correlationId, payload, source = "wallet") => {
        frame.events.push({
          type,
          metadata: {
            eventId: randomUUID(),
            timestamp: this.clock().toISOString(),
            actor,
            correlationId,
            source,
          },
          payload,
        });
      },
    };

    let result: T;
    try {
      result = operation(ctx);
    } catch (err) {
      this.state.journal.rollbackTo(savepoint);
      frame.events.length = eventMark;
      if (outermost) {
        this.frame = undefined;
      }
      throw err;
    }

    if (outermost) {
      this.state.journal.commit();
      this.frame = undefined;
      if (frame.events.length > 0) {
        // Committed; the store reports subscriber failures instead of throwing
        this.eventStore.append(this.streamId, frame.events);
      }
    }
    return result;
  }
}
