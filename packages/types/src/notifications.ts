/**
 * Wallet Notification Definitions
 *
 * Naming convention: `wallet.<entity>.<action>`.
 * Each notification type defines the payload it carries.
 */

import type { Address } from "./address.js";
import type { TransactionId } from "./transaction.js";

export const WALLET_EVENTS = {
  FUNDS_DEPOSITED: "wallet.funds.deposited",
  TRANSACTION_SUBMITTED: "wallet.transaction.submitted",
  TRANSACTION_APPROVED: "wallet.transaction.approved",
  APPROVAL_REVOKED: "wallet.approval.revoked",
  TRANSACTION_EXECUTED: "wallet.transaction.executed",
  TRANSACTION_DECLINED: "wallet.transaction.declined",
  OWNERS_UPDATED: "wallet.owners.updated",
} as const;

export type WalletEventType = (typeof WALLET_EVENTS)[keyof typeof WALLET_EVENTS];

export interface FundsDepositedPayload {
  readonly from: Address;
  /** Decimal string */
  readonly value: string;
}

export interface TransactionSubmittedPayload {
  readonly transactionId: TransactionId;
  readonly owner: Address;
  readonly destination: Address;
  /** Decimal string */
  readonly value: string;
  /** 0x-prefixed hex */
  readonly payload: string;
}

export interface TransactionApprovedPayload {
  readonly transactionId: TransactionId;
  readonly owner: Address;
}

export interface ApprovalRevokedPayload {
  readonly transactionId: TransactionId;
  readonly owner: Address;
}

export interface TransactionExecutedPayload {
  readonly transactionId: TransactionId;
  readonly owner: Address;
}

export interface TransactionDeclinedPayload {
  readonly transactionId: TransactionId;
}

export interface OwnersUpdatedPayload {
  readonly owners: readonly Address[];
  readonly threshold: number;
}
