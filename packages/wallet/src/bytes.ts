/**
 * Byte helpers for payloads and return data.
 *
 * Payloads cross JSON boundaries (notifications, snapshots, HTTP) as
 * 0x-prefixed lower-case hex.
 */

import { WalletError } from "./types.js";

const HEX_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function toHex(bytes: Uint8Array): string {
  return `0x${Buffer.from(bytes).toString("hex")}`;
}

/**
 * Parse 0x-prefixed hex into bytes.
 *
 * "0x" → empty payload
 * "0xdeadbeef" → 4 bytes
 */
export function fromHex(hex: string): Uint8Array {
  if (!HEX_PATTERN.test(hex)) {
    throw new WalletError("INVALID_PAYLOAD", `Invalid hex payload: "${hex}"`);
  }
  return new Uint8Array(Buffer.from(hex.slice(2), "hex"));
}

export function utf8Encode(text: string): Uint8Array {
  return encoder.encode(text);
}

/**
 * Strict UTF-8 decode.
 *
 * @throws TypeError on malformed input
 */
export function utf8Decode(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}
