/**
 * Shared fixtures for wallet tests.
 */

import { InMemoryEventStore } from "@quorum-vault/event-store";
import { BalanceExecutor } from "../src/executors.js";
import { ExecutionFailedError, WalletError } from "../src/types.js";
import { QuorumWallet } from "../src/wallet.js";

export function addr(byte: string): string {
  return `0x${byte.repeat(20)}`;
}

export const OWNER_A = addr("a1");
export const OWNER_B = addr("b2");
export const OWNER_C = addr("c3");
export const OUTSIDER = addr("0e");
export const WALLET = addr("77");
export const DEST = addr("d0");

export const FIXED_TIME = new Date("2024-06-01T12:00:00.000Z");

export interface SetupOptions {
  readonly owners?: readonly string[];
  readonly threshold?: number;
  readonly balance?: bigint;
}

export function setup(options: SetupOptions = {}) {
  const executor = new BalanceExecutor(options.balance ?? 1_000n);
  const eventStore = new InMemoryEventStore(() => FIXED_TIME);
  const wallet = QuorumWallet.create(
    {
      address: WALLET,
      owners: options.owners ?? [OWNER_A, OWNER_B, OWNER_C],
      threshold: options.threshold ?? 2,
    },
    { executor, eventStore, clock: () => FIXED_TIME },
  );
  return { wallet, executor, eventStore };
}

export function eventTypes(wallet: QuorumWallet): string[] {
  return wallet.events().map((stored) => stored.event.type);
}

export function catchWalletError(fn: () => unknown): WalletError {
  try {
    fn();
  } catch (err) {
    if (err instanceof WalletError) {
      return err;
    }
    throw err;
  }
  throw new Error("Expected a WalletError to be thrown");
}

export function catchExecutionFailure(fn: () => unknown): ExecutionFailedError {
  const err = catchWalletError(fn);
  if (err instanceof ExecutionFailedError) {
    return err;
  }
  throw new Error(`Expected EXECUTION_FAILED, got ${err.code}`);
}
