/**
 * @quorum-vault/wallet — Multi-party authorization ledger.
 *
 * Provides:
 * - QuorumWallet: propose / approve / revoke / execute with an M-of-N quorum
 * - Privileged self-calls for declining transactions and replacing owners
 * - BalanceExecutor: in-memory execution collaborator
 * - JSON-safe snapshots
 *
 * @packageDocumentation
 */

export { QuorumWallet } from "./wallet.js";

export type {
  Executable,
  WalletConfig,
  WalletDependencies,
  TransactionSnapshot,
  WalletSnapshot,
  WalletErrorCode,
} from "./types.js";
export { WalletError, ExecutionFailedError } from "./types.js";

export { OwnerRegistry, validateOwnerSet } from "./owner-registry.js";
export { TransactionLedger } from "./transaction-ledger.js";
export type { LedgerRecordInput } from "./transaction-ledger.js";
export { Journal } from "./journal.js";
export type { Undo } from "./journal.js";

export type { SelfCall, UpdateOwnersCall, DeclineCall } from "./self-call.js";
export { encodeSelfCall, decodeSelfCall, isSelfCall, encodeErrorData } from "./self-call.js";

export { BalanceExecutor, failure } from "./executors.js";
export type { DestinationHandler, TransferRecord } from "./executors.js";

export { toHex, fromHex, utf8Encode, utf8Decode } from "./bytes.js";
export {
  MAX_UINT64,
  MAX_TRANSACTION_ID,
  assertUint64,
  parseUint64,
  addUint64,
} from "./uint64.js";
