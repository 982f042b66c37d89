/**
 * Tests for privileged self-calls: owner replacement, declines and
 * self-deposits, all run through the quorum.
 */

import { describe, it, expect } from "vitest";
import { WALLET_EVENTS } from "@quorum-vault/types";
import { utf8Decode, utf8Encode } from "../src/bytes.js";
import { encodeSelfCall } from "../src/self-call.js";
import type { SelfCall } from "../src/self-call.js";
import { QuorumWallet } from "../src/wallet.js";
import {
  DEST,
  OUTSIDER,
  OWNER_A,
  OWNER_B,
  OWNER_C,
  WALLET,
  catchExecutionFailure,
  catchWalletError,
  eventTypes,
  setup,
} from "./helpers.js";

/** Propose a self-call and gather approvals from A and B. */
function approvedSelfCall(
  wallet: QuorumWallet,
  call: SelfCall | Uint8Array,
  value = 0n,
): number {
  const payload = call instanceof Uint8Array ? call : encodeSelfCall(call);
  const id = wallet.proposeAndApprove(OWNER_A, { destination: WALLET, value, payload });
  wallet.approve(OWNER_B, id);
  return id;
}

describe("update_owners", () => {
  it("replaces owners and threshold once executed", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, {
      kind: "update_owners",
      owners: [OWNER_B, OUTSIDER],
      threshold: 1,
    });

    wallet.execute(OWNER_A, id);

    expect(wallet.owners()).toEqual([OWNER_B, OUTSIDER]);
    expect(wallet.threshold()).toBe(1);
    expect(wallet.isOwner(OWNER_A)).toBe(false);
    expect(wallet.status(id)).toBe("executed");
  });

  it("emits the update after the execution notification", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, {
      kind: "update_owners",
      owners: [OWNER_C],
      threshold: 1,
    });
    wallet.execute(OWNER_A, id);

    expect(eventTypes(wallet).slice(-2)).toEqual([
      WALLET_EVENTS.TRANSACTION_EXECUTED,
      WALLET_EVENTS.OWNERS_UPDATED,
    ]);
    const last = wallet.events().at(-1)?.event;
    expect(last?.payload).toEqual({ owners: [OWNER_C], threshold: 1 });
    expect(last?.metadata).toMatchObject({
      actor: WALLET,
      correlationId: "registry",
      source: "registry",
    });
  });

  it("does not count its own transaction as pending", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, {
      kind: "update_owners",
      owners: [OWNER_A, OWNER_B],
      threshold: 2,
    });
    expect(wallet.pendingCount()).toBe(1);
    expect(wallet.execute(OWNER_B, id).status).toBe("executed");
  });

  it("fails while another transaction is pending", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, {
      kind: "update_owners",
      owners: [OWNER_C],
      threshold: 1,
    });
    wallet.propose(OWNER_C, { destination: DEST, value: 1n });

    const err = catchExecutionFailure(() => wallet.execute(OWNER_A, id));
    expect(err.cause).toMatchObject({ code: "PENDING_TRANSACTIONS_EXIST" });
    expect(utf8Decode(err.returnData)).toBe(
      '{"code":"PENDING_TRANSACTIONS_EXIST","message":"Cannot change owners while 1 transaction(s) are pending"}',
    );
    expect(wallet.status(id)).toBe("pending");
    expect(wallet.owners()).toEqual([OWNER_A, OWNER_B, OWNER_C]);
  });

  it("fails on an empty owner set and stays pending", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, { kind: "update_owners", owners: [], threshold: 1 });

    const err = catchExecutionFailure(() => wallet.execute(OWNER_C, id));
    expect(err.cause).toMatchObject({ code: "EMPTY_OWNER_SET" });
    expect(utf8Decode(err.returnData)).toBe(
      '{"code":"EMPTY_OWNER_SET","message":"Owner set must not be empty"}',
    );
    expect(wallet.status(id)).toBe("pending");
    expect(wallet.approvalCount(id)).toBe(2);
    expect(wallet.owners()).toEqual([OWNER_A, OWNER_B, OWNER_C]);
    expect(wallet.threshold()).toBe(2);
    expect(eventTypes(wallet)).toEqual([
      WALLET_EVENTS.TRANSACTION_SUBMITTED,
      WALLET_EVENTS.TRANSACTION_APPROVED,
      WALLET_EVENTS.TRANSACTION_APPROVED,
    ]);
  });

  it("fails on an invalid threshold without changing owners", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, {
      kind: "update_owners",
      owners: [OWNER_C],
      threshold: 2,
    });

    const err = catchExecutionFailure(() => wallet.execute(OWNER_A, id));
    expect(err.cause).toMatchObject({ code: "INVALID_THRESHOLD" });
    expect(wallet.threshold()).toBe(2);
    expect(eventTypes(wallet)).not.toContain(WALLET_EVENTS.OWNERS_UPDATED);
  });
});

describe("decline", () => {
  it("declines a pending transaction", () => {
    const { wallet, executor } = setup();
    const target = wallet.proposeAndApprove(OWNER_C, { destination: DEST, value: 10n });
    const id = approvedSelfCall(wallet, { kind: "decline", transactionId: target });

    wallet.execute(OWNER_B, id);

    expect(wallet.status(target)).toBe("declined");
    expect(wallet.get(target).executionDate).toBe(0);
    expect(wallet.pendingCount()).toBe(0);
    expect(executor.balance).toBe(1_000n);
    expect(wallet.events().at(-1)?.event).toMatchObject({
      type: WALLET_EVENTS.TRANSACTION_DECLINED,
      payload: { transactionId: target },
      metadata: { actor: WALLET, correlationId: `tx:${target}` },
    });
  });

  it("makes the declined transaction terminal", () => {
    const { wallet } = setup();
    const target = wallet.propose(OWNER_C, { destination: DEST, value: 10n });
    wallet.execute(OWNER_A, approvedSelfCall(wallet, { kind: "decline", transactionId: target }));

    expect(catchWalletError(() => wallet.approve(OWNER_A, target)).code).toBe("ALREADY_DECLINED");
    expect(catchWalletError(() => wallet.revoke(OWNER_A, target)).code).toBe("ALREADY_DECLINED");
    expect(catchWalletError(() => wallet.execute(OWNER_A, target)).code).toBe("ALREADY_DECLINED");
  });

  it("fails for an unknown transaction", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, { kind: "decline", transactionId: 42 });

    const err = catchExecutionFailure(() => wallet.execute(OWNER_A, id));
    expect(err.cause).toMatchObject({ code: "TRANSACTION_NOT_FOUND" });
    expect(wallet.status(id)).toBe("pending");
  });

  it("cannot decline its own transaction", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, { kind: "decline", transactionId: 0 });

    const err = catchExecutionFailure(() => wallet.execute(OWNER_A, id));
    expect(err.cause).toMatchObject({ code: "ALREADY_EXECUTED" });
    expect(wallet.status(id)).toBe("pending");
  });

  it("can be called directly by the wallet identity", () => {
    const { wallet } = setup();
    const target = wallet.propose(OWNER_A, { destination: DEST, value: 1n });
    wallet.decline(WALLET, target);
    expect(wallet.status(target)).toBe("declined");
  });
});

describe("other self-call payloads", () => {
  it("treats an empty payload as a deposit to itself", () => {
    const { wallet, executor } = setup();
    const id = approvedSelfCall(wallet, new Uint8Array(0), 5n);
    wallet.execute(OWNER_A, id);

    expect(wallet.events().at(-1)?.event).toMatchObject({
      type: WALLET_EVENTS.FUNDS_DEPOSITED,
      payload: { from: WALLET, value: "5" },
    });
    expect(executor.transfers()).toEqual([]);
  });

  it.each([
    { call: { kind: "update_owners", owners: [OWNER_C], threshold: 1 } satisfies SelfCall },
    { call: { kind: "decline", transactionId: 0 } satisfies SelfCall },
  ])("rejects value attached to $call.kind", ({ call }) => {
    const { wallet, executor } = setup();
    const id = approvedSelfCall(wallet, call, 500n);

    const err = catchExecutionFailure(() => wallet.execute(OWNER_A, id));
    expect(err.cause).toMatchObject({
      code: "INVALID_SELF_CALL",
      details: { kind: call.kind, value: "500" },
    });
    expect(wallet.status(id)).toBe("pending");
    expect(wallet.owners()).toEqual([OWNER_A, OWNER_B, OWNER_C]);
    expect(executor.balance).toBe(1_000n);
  });

  it("fails on an unknown payload", () => {
    const { wallet } = setup();
    const id = approvedSelfCall(wallet, utf8Encode('{"kind":"selfdestruct"}'));

    const err = catchExecutionFailure(() => wallet.execute(OWNER_A, id));
    expect(err.cause).toMatchObject({ code: "INVALID_SELF_CALL" });
    expect(err.message).toBe(
      "Execution of transaction 0 failed: Self-call payload does not match a known operation",
    );
  });
});
