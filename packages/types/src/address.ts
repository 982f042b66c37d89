/**
 * Address Types
 *
 * Identities that own, fund, or receive value from a wallet.
 * An address is `0x` followed by 40 hex digits. Comparisons are
 * case-insensitive; the canonical form is lower-case.
 */

/**
 * An account identity (e.g., "0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed").
 */
export type Address = string;

/**
 * The null identity. Never a valid owner.
 */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Whether a string is a well-formed address (any letter case).
 */
export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Canonical (lower-case) form of an address, or undefined if malformed.
 */
export function canonicalAddress(value: string): Address | undefined {
  return isAddress(value) ? value.toLowerCase() : undefined;
}
