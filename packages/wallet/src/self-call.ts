/**
 * Privileged self-calls.
 *
 * Administrative actions are ordinary transactions whose destination is
 * the wallet itself. Their payload encodes one of a closed set of
 * operations, dispatched internally once the transaction reaches quorum.
 *
 * Wire format: UTF-8 bytes of the RFC 8785 canonical JSON of the call.
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { Address, TransactionId } from "@quorum-vault/types";
import { utf8Decode, utf8Encode } from "./bytes.js";
import { WalletError } from "./types.js";

// =============================================================================
// Variants
// =============================================================================

export interface UpdateOwnersCall {
  readonly kind: "update_owners";
  readonly owners: readonly Address[];
  readonly threshold: number;
}

export interface DeclineCall {
  readonly kind: "decline";
  readonly transactionId: TransactionId;
}

export type SelfCall = UpdateOwnersCall | DeclineCall;

const SelfCallSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("update_owners"),
      owners: z.array(z.string()),
      threshold: z.number().int(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("decline"),
      transactionId: z.number().int().nonnegative(),
    })
    .strict(),
]);

// =============================================================================
// Codec
// =============================================================================

export function encodeSelfCall(call: SelfCall): Uint8Array {
  return utf8Encode(canonicalize(call));
}

/**
 * Decode a self-call payload.
 *
 * @throws WalletError INVALID_SELF_CALL if the bytes are not a known variant
 */
export function decodeSelfCall(payload: Uint8Array): SelfCall {
  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8Decode(payload));
  } catch (err) {
    throw new WalletError(
      "INVALID_SELF_CALL",
      "Self-call payload is not UTF-8 JSON",
      undefined,
      { cause: err },
    );
  }

  const result = SelfCallSchema.safeParse(parsed);
  if (!result.success) {
    throw new WalletError(
      "INVALID_SELF_CALL",
      "Self-call payload does not match a known operation",
      {
        issues: result.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      },
    );
  }
  return result.data;
}

/**
 * Whether a payload decodes to a known self-call.
 */
export function isSelfCall(payload: Uint8Array): boolean {
  try {
    decodeSelfCall(payload);
    return true;
  } catch (err) {
    if (err instanceof WalletError) {
      return false;
    }
    throw err;
  }
}

/**
 * Return data of a failed self-call: canonical JSON of the inner error.
 */
export function encodeErrorData(error: WalletError): Uint8Array {
  return utf8Encode(canonicalize({ code: error.code, message: error.message }));
}
