/**
 * WalletService — the hosted wallet and its collaborators.
 *
 * Owns one QuorumWallet, the BalanceExecutor that carries out its
 * transfers and the event store that holds its notifications. Translates
 * the HTTP layer's JSON-safe inputs (decimal strings, hex) into wallet
 * calls and shapes results for responses.
 *
 * Deposits credit the executor, so executed transfers spend what was
 * deposited.
 */

import type { Logger } from "pino";
import type {
  Address,
  TransactionId,
  TransactionProposal,
  WalletTransaction,
} from "@quorum-vault/types";
import { InMemoryEventStore } from "@quorum-vault/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@quorum-vault/event-store";
import {
  BalanceExecutor,
  QuorumWallet,
  addUint64,
  encodeSelfCall,
  fromHex,
  parseUint64,
  toHex,
} from "@quorum-vault/wallet";
import type { SelfCall } from "@quorum-vault/wallet";

// =============================================================================
// Config & Views
// =============================================================================

export interface WalletServiceConfig {
  readonly address: string;
  readonly owners: readonly string[];
  readonly threshold: number;
}

export interface WalletServiceOptions {
  /** Receives every committed notification at debug level */
  readonly logger?: Logger | undefined;
  readonly clock?: (() => Date) | undefined;
}

/** JSON shape of a transaction in API responses. */
export interface TransactionView {
  readonly id: TransactionId;
  readonly destination: Address;
  /** Decimal string */
  readonly value: string;
  /** 0x-prefixed hex */
  readonly payload: string;
  /** Epoch milliseconds; 0 unless executed */
  readonly executionDate: number;
  readonly status: WalletTransaction["status"];
  readonly approvals: number;
}

export interface ApprovalsView {
  readonly transactionId: TransactionId;
  readonly approvals: number;
  readonly threshold: number;
  readonly approvers: readonly Address[];
}

export interface WalletSummary {
  readonly address: Address;
  readonly owners: readonly Address[];
  readonly threshold: number;
  readonly transactionCount: number;
  readonly pendingCount: number;
  /** Executor balance, decimal string */
  readonly balance: string;
}

export interface ProposalInput {
  readonly destination: string;
  readonly value: string;
  readonly payload?: string | undefined;
  readonly approve: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class WalletService {
  readonly wallet: QuorumWallet;
  readonly executor: BalanceExecutor;
  readonly eventStore: InMemoryEventStore;

  constructor(config: WalletServiceConfig, options: WalletServiceOptions = {}) {
    const clock = options.clock ?? (() => new Date());
    const logger = options.logger;
    this.executor = new BalanceExecutor();
    this.eventStore =
      logger !== undefined
        ? new InMemoryEventStore(clock, (err, stored) => {
            logger.error(
              { err, type: stored.event.type, version: stored.version },
              "Notification subscriber failed",
            );
          })
        : new InMemoryEventStore(clock);
    this.wallet = QuorumWallet.create(config, {
      executor: this.executor,
      eventStore: this.eventStore,
      clock,
    });

    if (logger !== undefined) {
      this.wallet.subscribe((stored) => {
        logger.debug(
          {
            type: stored.event.type,
            version: stored.version,
            correlationId: stored.event.metadata.correlationId,
          },
          "Wallet notification committed",
        );
      });
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────

  summary(): WalletSummary {
    return {
      address: this.wallet.address,
      owners: this.wallet.owners(),
      threshold: this.wallet.threshold(),
      transactionCount: this.wallet.count(),
      pendingCount: this.wallet.pendingCount(),
      balance: this.executor.balance.toString(),
    };
  }

  getTransaction(id: TransactionId): TransactionView {
    return this.toView(this.wallet.get(id));
  }

  listTransactions(start: number, limit: number): TransactionView[] {
    return [...this.wallet.getRange(start, limit)].map((tx) => this.toView(tx));
  }

  approvals(id: TransactionId): ApprovalsView {
    return {
      transactionId: id,
      approvals: this.wallet.approvalCount(id),
      threshold: this.wallet.threshold(),
      approvers: this.wallet.approvers(id),
    };
  }

  readEvents(options: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  verifyEvents(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Commands ────────────────────────────────────────────────────

  deposit(from: string, rawValue: string): void {
    const value = parseUint64(rawValue);
    // Fail before the notification if the balance cannot hold it
    addUint64(this.executor.balance, value);
    this.wallet.deposit(from, value);
    this.executor.credit(value);
  }

  propose(caller: string, input: ProposalInput): TransactionView {
    return this.submit(
      caller,
      {
        destination: input.destination,
        value: parseUint64(input.value),
        payload: input.payload !== undefined ? fromHex(input.payload) : undefined,
      },
      input.approve,
    );
  }

  /**
   * Propose a transaction from the wallet to itself carrying `call`.
   */
  proposeSelfCall(caller: string, call: SelfCall, approve: boolean): TransactionView {
    return this.submit(
      caller,
      { destination: this.wallet.address, value: 0n, payload: encodeSelfCall(call) },
      approve,
    );
  }

  approve(caller: string, id: TransactionId): TransactionView {
    this.wallet.approve(caller, id);
    return this.getTransaction(id);
  }

  revoke(caller: string, id: TransactionId): TransactionView {
    this.wallet.revoke(caller, id);
    return this.getTransaction(id);
  }

  execute(caller: string, id: TransactionId): TransactionView {
    return this.toView(this.wallet.execute(caller, id));
  }

  approveAndExecute(caller: string, id: TransactionId): TransactionView {
    return this.toView(this.wallet.approveAndExecute(caller, id));
  }

  // ─── Private ─────────────────────────────────────────────────────

  private submit(
    caller: string,
    proposal: TransactionProposal,
    approve: boolean,
  ): TransactionView {
    const id = approve
      ? this.wallet.proposeAndApprove(caller, proposal)
      : this.wallet.propose(caller, proposal);
    return this.getTransaction(id);
  }

  private toView(tx: WalletTransaction): TransactionView {
    return {
      id: tx.id,
      destination: tx.destination,
      value: tx.value.toString(),
      payload: toHex(tx.payload),
      executionDate: tx.executionDate,
      status: tx.status,
      approvals: this.wallet.approvalCount(tx.id),
    };
  }
}
