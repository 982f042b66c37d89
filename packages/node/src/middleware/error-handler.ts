/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Wallet and event-store errors map to HTTP
 * statuses by code; anything else is a 500 with a generic message.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { EventStoreError } from "@quorum-vault/event-store";
import type { EventStoreErrorCode } from "@quorum-vault/event-store";
import { WalletError } from "@quorum-vault/wallet";
import type { WalletErrorCode } from "@quorum-vault/wallet";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

const WALLET_STATUS: Record<WalletErrorCode, ErrorStatus> = {
  // Authorization
  NOT_OWNER: 403,
  UNAUTHORIZED_CALLER: 403,

  // Not found
  TRANSACTION_NOT_FOUND: 404,

  // State conflict
  ALREADY_APPROVED: 409,
  NOT_APPROVED: 409,
  ALREADY_EXECUTED: 409,
  ALREADY_DECLINED: 409,
  INSUFFICIENT_APPROVALS: 409,
  PENDING_TRANSACTIONS_EXIST: 409,

  // Validation
  EMPTY_OWNER_SET: 400,
  INVALID_THRESHOLD: 400,
  ZERO_ADDRESS_OWNER: 400,
  DUPLICATE_OWNER: 400,
  INVALID_ADDRESS: 400,
  INVALID_VALUE: 400,
  INVALID_PAYLOAD: 400,
  ZERO_DEPOSIT_VALUE: 400,
  INVALID_SELF_CALL: 400,
  INVALID_SNAPSHOT: 400,
  OVERFLOW: 400,

  // Downstream
  EXECUTION_FAILED: 422,
};

const EVENT_STORE_STATUS: Record<EventStoreErrorCode, ErrorStatus> = {
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,
};

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the error handler registered as Hono's onError.
 *
 * @param onUnexpected - Called with every error that becomes a 500
 */
export function createErrorHandler(
  onUnexpected?: (err: Error) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof WalletError) {
      const status = WALLET_STATUS[err.code];
      return c.json(createErrorEnvelope(err.code, err.message, err.details), status);
    }

    if (err instanceof EventStoreError) {
      const status = EVENT_STORE_STATUS[err.code];
      const details = err.streamId !== undefined ? { streamId: err.streamId } : undefined;
      return c.json(createErrorEnvelope(err.code, err.message, details), status);
    }

    onUnexpected?.(err);
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
