/**
 * @quorum-vault/wallet — Checked unsigned 64-bit arithmetic.
 *
 * Values are bigint internally and decimal strings at JSON boundaries.
 *
 * Rules:
 * - No floating-point operations
 * - Out-of-range results fail with OVERFLOW, never wrap
 * - Transaction ids live in 0 … MAX_TRANSACTION_ID
 */

import { WalletError } from "./types.js";

export const MAX_UINT64 = (1n << 64n) - 1n;

/** Largest transaction id representable as a plain number. */
export const MAX_TRANSACTION_ID = Number.MAX_SAFE_INTEGER;

/**
 * Assert that a value is within 0 … 2^64 − 1.
 */
export function assertUint64(value: bigint, label = "value"): bigint {
  if (value < 0n || value > MAX_UINT64) {
    throw new WalletError(
      "OVERFLOW",
      `${label} ${value.toString()} is outside the unsigned 64-bit range`,
      { [label]: value.toString() },
    );
  }
  return value;
}

/**
 * Parse a decimal string into a uint64.
 *
 * "0" → 0n
 * "18446744073709551615" → MAX_UINT64
 * "18446744073709551616" → OVERFLOW
 */
export function parseUint64(raw: string, label = "value"): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new WalletError("INVALID_VALUE", `${label} must be a decimal integer, got "${raw}"`);
  }
  return assertUint64(BigInt(raw), label);
}

/**
 * Checked addition.
 */
export function addUint64(a: bigint, b: bigint): bigint {
  return assertUint64(assertUint64(a) + assertUint64(b), "sum");
}

/**
 * The id the next appended transaction receives, given the ledger length.
 */
export function nextTransactionId(count: number): number {
  if (!Number.isSafeInteger(count) || count < 0 || count > MAX_TRANSACTION_ID) {
    throw new WalletError(
      "OVERFLOW",
      `Transaction id space exhausted at ${String(count)}`,
      { count },
    );
  }
  return count;
}
