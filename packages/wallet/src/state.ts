/**
 * Wallet state — the single owned struct every operation works on.
 *
 * Created once per wallet (fresh or from a snapshot) and mutated only
 * through the registry and ledger, both of which record into the shared
 * journal.
 */

import { canonicalAddress, ZERO_ADDRESS } from "@quorum-vault/types";
import type { Address } from "@quorum-vault/types";
import { Journal } from "./journal.js";
import { OwnerRegistry } from "./owner-registry.js";
import { TransactionLedger } from "./transaction-ledger.js";
import type { WalletConfig } from "./types.js";
import { WalletError } from "./types.js";

export interface WalletState {
  readonly address: Address;
  readonly registry: OwnerRegistry;
  readonly ledger: TransactionLedger;
  readonly journal: Journal;
}

export function createWalletState(config: WalletConfig): WalletState {
  const journal = new Journal();
  return {
    address: walletAddress(config.address),
    registry: new OwnerRegistry(config.owners, config.threshold, journal),
    ledger: new TransactionLedger(journal),
    journal,
  };
}

/**
 * Canonical wallet address; the null identity is rejected.
 */
export function walletAddress(raw: string): Address {
  const address = canonicalAddress(raw);
  if (address === undefined || address === ZERO_ADDRESS) {
    throw new WalletError("INVALID_ADDRESS", `Invalid wallet address: "${raw}"`);
  }
  return address;
}
