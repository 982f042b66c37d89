/**
 * Execution collaborators.
 *
 * BalanceExecutor is an in-memory balance sheet for the wallet's asset:
 * deposits credit it, executed transfers debit it. Destinations can be
 * given handlers that model contracts; a handler may call back into the
 * wallet and may refuse the transfer.
 *
 * Rules:
 * - A transfer larger than the balance fails with "insufficient balance"
 * - A failed handler leaves the balance and transfer log as they were
 *   before the call, including anything a nested call changed
 */

import { canonicalAddress } from "@quorum-vault/types";
import type { Address, ExecutionResult } from "@quorum-vault/types";
import { utf8Encode } from "./bytes.js";
import type { Executable } from "./types.js";
import { WalletError } from "./types.js";
import { addUint64, assertUint64 } from "./uint64.js";

export type DestinationHandler = (value: bigint, payload: Uint8Array) => ExecutionResult;

export interface TransferRecord {
  readonly destination: Address;
  readonly value: bigint;
  readonly payload: Uint8Array;
}

const EMPTY = new Uint8Array(0);

export function failure(reason: string): ExecutionResult {
  return { success: false, returnData: utf8Encode(reason) };
}

export class BalanceExecutor implements Executable {
  private available: bigint;
  private readonly handlers = new Map<Address, DestinationHandler>();
  private readonly sent: TransferRecord[] = [];

  constructor(openingBalance = 0n) {
    this.available = assertUint64(openingBalance, "openingBalance");
  }

  get balance(): bigint {
    return this.available;
  }

  credit(value: bigint): void {
    this.available = addUint64(this.available, value);
  }

  /**
   * Attach a handler that runs whenever value or a payload is sent to
   * `destination`.
   */
  register(destination: string, handler: DestinationHandler): void {
    this.handlers.set(requireAddress(destination), handler);
  }

  transfers(): readonly TransferRecord[] {
    return [...this.sent];
  }

  invoke(destination: Address, value: bigint, payload: Uint8Array): ExecutionResult {
    if (value > this.available) {
      return failure("insufficient balance");
    }

    const saved = { available: this.available, sent: this.sent.length };
    this.available -= value;

    const restore = (): void => {
      this.available = saved.available;
      this.sent.length = saved.sent;
    };

    const handler = this.handlers.get(requireAddress(destination));
    let result: ExecutionResult;
    try {
      result = handler?.(value, payload) ?? { success: true, returnData: EMPTY };
    } catch (err) {
      restore();
      throw err;
    }
    if (!result.success) {
      restore();
      return result;
    }

    this.sent.push({ destination, value, payload: new Uint8Array(payload) });
    return result;
  }
}

function requireAddress(raw: string): Address {
  const address = canonicalAddress(raw);
  if (address === undefined) {
    throw new WalletError("INVALID_ADDRESS", `Invalid address: "${raw}"`);
  }
  return address;
}
