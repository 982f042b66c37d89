/**
 * Owner Registry — the identities that control a wallet.
 *
 * Holds the ordered owner list, an O(1) membership set and the approval
 * threshold. Replacement is all-or-nothing and recorded in the journal so
 * an enclosing operation can roll it back.
 *
 * Rules:
 * - The owner set is never empty and never contains duplicates
 * - The null identity is never an owner
 * - 1 ≤ threshold ≤ number of owners, after every update
 * - No replacement while any transaction is pending
 */

import { canonicalAddress, ZERO_ADDRESS } from "@quorum-vault/types";
import type { Address } from "@quorum-vault/types";
import type { Journal } from "./journal.js";
import { WalletError } from "./types.js";

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a proposed owner set and threshold.
 *
 * Checks run in a fixed order: empty set, threshold, pending transactions,
 * then each entry (malformed, null identity, duplicate) by index.
 *
 * @returns The owners in canonical (lower-case) form
 */
export function validateOwnerSet(
  owners: readonly string[],
  threshold: number,
  pendingCount = 0,
): readonly Address[] {
  if (owners.length === 0) {
    throw new WalletError("EMPTY_OWNER_SET", "Owner set must not be empty");
  }

  if (!Number.isInteger(threshold) || threshold < 1 || threshold > owners.length) {
    throw new WalletError(
      "INVALID_THRESHOLD",
      `Threshold must be between 1 and ${owners.length}, got ${threshold}`,
      { threshold, ownerCount: owners.length },
    );
  }

  if (pendingCount > 0) {
    throw new WalletError(
      "PENDING_TRANSACTIONS_EXIST",
      `Cannot change owners while ${pendingCount} transaction(s) are pending`,
      { pendingCount },
    );
  }

  const seen = new Set<Address>();
  owners.forEach((raw, index) => {
    const owner = canonicalAddress(raw);
    if (owner === undefined) {
      throw new WalletError(
        "INVALID_ADDRESS",
        `Owner at index ${index} is not a valid address: "${raw}"`,
        { index },
      );
    }
    if (owner === ZERO_ADDRESS) {
      throw new WalletError(
        "ZERO_ADDRESS_OWNER",
        `Owner at index ${index} is the zero address`,
        { index },
      );
    }
    if (seen.has(owner)) {
      throw new WalletError("DUPLICATE_OWNER", `Duplicate owner: ${owner}`, { owner });
    }
    seen.add(owner);
  });

  return [...seen];
}

// =============================================================================
// Owner Registry
// =============================================================================

export class OwnerRegistry {
  private ownerList: readonly Address[];
  private members: ReadonlySet<Address>;
  private required: number;

  constructor(
    owners: readonly string[],
    threshold: number,
    private readonly journal: Journal,
  ) {
    this.ownerList = validateOwnerSet(owners, threshold);
    this.members = new Set(this.ownerList);
    this.required = threshold;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isOwner(identity: string): boolean {
    const address = canonicalAddress(identity);
    return address !== undefined && this.members.has(address);
  }

  owners(): readonly Address[] {
    return [...this.ownerList];
  }

  threshold(): number {
    return this.required;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Replace every owner and the threshold in one step.
   *
   * @param pendingCount Current number of pending transactions
   * @returns The new owners in canonical form
   */
  replace(
    newOwners: readonly string[],
    newThreshold: number,
    pendingCount: number,
  ): readonly Address[] {
    const owners = validateOwnerSet(newOwners, newThreshold, pendingCount);

    const previous = {
      ownerList: this.ownerList,
      members: this.members,
      required: this.required,
    };
    this.journal.record(() => {
      this.ownerList = previous.ownerList;
      this.members = previous.members;
      this.required = previous.required;
    });

    this.ownerList = owners;
    this.members = new Set(owners);
    this.required = newThreshold;
    return owners;
  }
}
