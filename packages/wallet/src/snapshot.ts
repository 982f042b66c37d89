/**
 * Wallet snapshots — export and restore of the full wallet state.
 *
 * Snapshots are JSON-safe: values as decimal strings, payloads as hex.
 * Restore validates both shape and the ledger invariants before any
 * state is built.
 */

import { z } from "zod";
import { canonicalAddress } from "@quorum-vault/types";
import type { Address } from "@quorum-vault/types";
import { fromHex, toHex } from "./bytes.js";
import { Journal } from "./journal.js";
import { OwnerRegistry } from "./owner-registry.js";
import type { WalletState } from "./state.js";
import { walletAddress } from "./state.js";
import { TransactionLedger } from "./transaction-ledger.js";
import type { LedgerRecordInput } from "./transaction-ledger.js";
import type { TransactionSnapshot, WalletSnapshot } from "./types.js";
import { WalletError } from "./types.js";
import { parseUint64 } from "./uint64.js";

const TransactionSnapshotSchema = z.object({
  id: z.number().int().nonnegative(),
  destination: z.string(),
  value: z.string(),
  payload: z.string(),
  executionDate: z.number().int().nonnegative(),
  status: z.enum(["pending", "executed", "declined"]),
  approvers: z.array(z.string()),
});

const WalletSnapshotSchema = z.object({
  version: z.literal(1),
  address: z.string(),
  owners: z.array(z.string()),
  threshold: z.number().int(),
  transactions: z.array(TransactionSnapshotSchema),
});

// =============================================================================
// Export
// =============================================================================

export function exportSnapshot(state: WalletState): WalletSnapshot {
  const { ledger } = state;
  const transactions: TransactionSnapshot[] = [];
  for (const tx of ledger.range(0, ledger.count)) {
    transactions.push({
      id: tx.id,
      destination: tx.destination,
      value: tx.value.toString(),
      payload: toHex(tx.payload),
      executionDate: tx.executionDate,
      status: tx.status,
      approvers: ledger.approvers(tx.id),
    });
  }

  return {
    version: 1,
    address: state.address,
    owners: state.registry.owners(),
    threshold: state.registry.threshold(),
    transactions,
  };
}

// =============================================================================
// Restore
// =============================================================================

/**
 * Build wallet state from an untrusted snapshot.
 *
 * @throws WalletError INVALID_SNAPSHOT (with the underlying error as cause)
 */
export function restoreWalletState(raw: unknown): WalletState {
  const parsed = WalletSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WalletError("INVALID_SNAPSHOT", "Snapshot does not match the expected shape", {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }

  const snapshot = parsed.data;
  try {
    const journal = new Journal();
    const registry = new OwnerRegistry(snapshot.owners, snapshot.threshold, journal);
    const records = snapshot.transactions.map((tx, index) =>
      toRecordInput(tx, index, registry),
    );
    return {
      address: walletAddress(snapshot.address),
      registry,
      ledger: TransactionLedger.fromRecords(records, journal),
      journal,
    };
  } catch (err) {
    if (err instanceof WalletError && err.code !== "INVALID_SNAPSHOT") {
      throw new WalletError("INVALID_SNAPSHOT", `Invalid snapshot: ${err.message}`, err.details, {
        cause: err,
      });
    }
    throw err;
  }
}

function toRecordInput(
  tx: z.infer<typeof TransactionSnapshotSchema>,
  index: number,
  registry: OwnerRegistry,
): LedgerRecordInput {
  if (tx.id !== index) {
    throw new WalletError(
      "INVALID_SNAPSHOT",
      `Transaction at index ${index} has id ${tx.id}`,
      { index },
    );
  }

  const approvers = new Set<Address>();
  for (const raw of tx.approvers) {
    const approver = canonicalAddress(raw);
    if (approver === undefined || approvers.has(approver)) {
      throw new WalletError(
        "INVALID_SNAPSHOT",
        `Transaction ${tx.id} has an invalid or repeated approver "${raw}"`,
        { transactionId: tx.id },
      );
    }
    if (tx.status === "pending" && !registry.isOwner(approver)) {
      throw new WalletError(
        "INVALID_SNAPSHOT",
        `Pending transaction ${tx.id} is approved by non-owner ${approver}`,
        { transactionId: tx.id },
      );
    }
    approvers.add(approver);
  }

  if (tx.status === "pending" && tx.executionDate !== 0) {
    throw new WalletError(
      "INVALID_SNAPSHOT",
      `Pending transaction ${tx.id} has an execution date`,
      { transactionId: tx.id },
    );
  }

  const destination = canonicalAddress(tx.destination);
  if (destination === undefined) {
    throw new WalletError(
      "INVALID_ADDRESS",
      `Transaction ${tx.id} has an invalid destination "${tx.destination}"`,
      { transactionId: tx.id },
    );
  }

  return {
    destination,
    value: parseUint64(tx.value),
    payload: fromHex(tx.payload),
    executionDate: tx.executionDate,
    status: tx.status,
    approvers: [...approvers],
  };
}
