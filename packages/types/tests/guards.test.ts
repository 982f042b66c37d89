/**
 * Runtime type guard tests for @quorum-vault/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isTransactionStatus,
  isTransactionId,
  isEventMetadata,
  isDomainEvent,
  isWalletEventType,
} from "../src/guards.js";
import { isAddress, canonicalAddress, ZERO_ADDRESS } from "../src/address.js";

// =============================================================================
// Address guards
// =============================================================================

describe("isAddress", () => {
  it("accepts lower-case and mixed-case addresses", () => {
    expect(isAddress("0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed")).toBe(true);
    expect(isAddress("0x5AAeb6053F3E94C9b9A09f33669435E7Ef1BeAed")).toBe(true);
  });

  it("accepts the zero address", () => {
    expect(isAddress(ZERO_ADDRESS)).toBe(true);
  });

  it("rejects missing prefix", () => {
    expect(isAddress("5aaeb6053f3e94c9b9a09f33669435e7ef1beaed")).toBe(false);
  });

  it("rejects wrong length", () => {
    expect(isAddress("0x5aaeb6053f3e94c9b9a09f33669435e7ef1bea")).toBe(false);
  });

  it("rejects non-hex characters", () => {
    expect(isAddress("0xzaaeb6053f3e94c9b9a09f33669435e7ef1beaed")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("canonicalAddress", () => {
  it("lower-cases a valid address", () => {
    expect(canonicalAddress("0x5AAeb6053F3E94C9b9A09f33669435E7Ef1BeAed")).toBe(
      "0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed",
    );
  });

  it("returns undefined for a malformed address", () => {
    expect(canonicalAddress("alice")).toBeUndefined();
  });
});

// =============================================================================
// Transaction guards
// =============================================================================

describe("isTransactionStatus", () => {
  it("accepts all lifecycle states", () => {
    for (const s of ["pending", "executed", "declined"]) {
      expect(isTransactionStatus(s)).toBe(true);
    }
  });

  it("rejects unknown states", () => {
    expect(isTransactionStatus("approved")).toBe(false);
    expect(isTransactionStatus(undefined)).toBe(false);
  });
});

describe("isTransactionId", () => {
  it("accepts zero and positive integers", () => {
    expect(isTransactionId(0)).toBe(true);
    expect(isTransactionId(17)).toBe(true);
  });

  it("rejects negatives, fractions and unsafe integers", () => {
    expect(isTransactionId(-1)).toBe(false);
    expect(isTransactionId(1.5)).toBe(false);
    expect(isTransactionId(2 ** 53)).toBe(false);
    expect(isTransactionId("1")).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const VALID_METADATA = {
  eventId: "evt-1",
  timestamp: "2024-01-01T00:00:00.000Z",
  actor: "0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed",
  correlationId: "tx:0",
  source: "wallet",
};

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(VALID_METADATA)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...VALID_METADATA, source: "vault" })).toBe(false);
  });

  it("rejects missing correlationId", () => {
    const { correlationId: _omit, ...rest } = VALID_METADATA;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "wallet.transaction.approved",
        metadata: VALID_METADATA,
        payload: { transactionId: 0 },
      }),
    ).toBe(true);
  });

  it("rejects null payload", () => {
    expect(
      isDomainEvent({ type: "x", metadata: VALID_METADATA, payload: null }),
    ).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isDomainEvent("event")).toBe(false);
  });
});

describe("isWalletEventType", () => {
  it("accepts known notification types", () => {
    expect(isWalletEventType("wallet.owners.updated")).toBe(true);
    expect(isWalletEventType("wallet.funds.deposited")).toBe(true);
  });

  it("rejects unknown types", () => {
    expect(isWalletEventType("wallet.transaction.rejected")).toBe(false);
  });
});
