/**
 * Tests for ApprovalWallet: M-of-N approval automaton.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { InMemoryEventStore } from "@multicustody/event-store";
import { ValidationError } from "@multicustody/types";
import { ApprovalWallet } from "../src/approval-wallet.js";
import { InMemoryTokenLedger } from "../src/token-ledger.js";
import { ApprovalError } from "../src/types.js";
import type { ApprovalErrorCode, ApprovalEvent, ApprovalLogger } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const WALLET = "rWallet";
const A = "rCustodianA";
const B = "rCustodianB";
const C = "rCustodianC";
const OUTSIDER = "rOutsider";
const RECIPIENT = "rRecipient";
const T0 = 1_700_000_000;

let now: number;
let token: InMemoryTokenLedger;

function makeWallet(
  owners: readonly string[] = [A, B, C],
  threshold = 2,
  extra: { expirationPeriodSeconds?: number; eventStore?: InMemoryEventStore; logger?: ApprovalLogger } = {},
): ApprovalWallet {
  return new ApprovalWallet({
    address: WALLET,
    token,
    owners,
    threshold,
    clock: () => now,
    ...extra,
  });
}

function codeOf(fn: () => unknown): ApprovalErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ApprovalError) return err.code;
    throw err;
  }
  return undefined;
}

function eventTypes(wallet: ApprovalWallet): string[] {
  return wallet.getEvents().map((e) => e.type);
}

beforeEach(() => {
  now = T0;
  token = new InMemoryTokenLedger({ balances: { [WALLET]: 1_000n } });
});

// =============================================================================
// Construction
// =============================================================================

describe("construction", () => {
  it("exposes the roster and threshold", () => {
    const wallet = makeWallet();

    expect(wallet.getOwners()).toEqual([A, B, C]);
    expect(wallet.getOwnerCount()).toBe(3);
    expect(wallet.isOwner(B)).toBe(true);
    expect(wallet.isOwner(OUTSIDER)).toBe(false);
    expect(wallet.threshold).toBe(2);
    expect(wallet.expirationPeriodSeconds).toBe(86_400);
    expect(wallet.getTransactionCount()).toBe(0);
    expect(wallet.getBalance()).toBe(1_000n);
  });

  it("rejects a threshold of zero or above the roster size", () => {
    expect(() => makeWallet([A, B], 0)).toThrow(ValidationError);
    expect(() => makeWallet([A, B], 3)).toThrow(ValidationError);
  });

  it("rejects an empty roster and duplicate custodians", () => {
    expect(() => makeWallet([], 1)).toThrow(ValidationError);
    expect(() => makeWallet([A, A], 1)).toThrow(/Duplicate custodian/);
  });

  it("rejects a non-positive expiration period", () => {
    expect(codeOf(() => makeWallet([A], 1, { expirationPeriodSeconds: 0 }))).toBe("INVALID_CONFIG");
  });
});

// =============================================================================
// Worked examples
// =============================================================================

describe("worked examples", () => {
  it("A,B,C with threshold 2: B's approval executes, C is too late", () => {
    const wallet = makeWallet([A, B, C], 2);

    const id = wallet.submit(A, RECIPIENT, 100n);
    expect(id).toBe(0);
    expect(wallet.getTransaction(0)).toMatchObject({
      approvalCount: 1,
      executed: false,
      state: "open",
    });

    wallet.approve(B, 0);
    expect(wallet.getTransaction(0)).toMatchObject({
      approvalCount: 2,
      executed: true,
      state: "completed",
    });
    expect(token.balanceOf(RECIPIENT)).toBe(100n);
    expect(wallet.getBalance()).toBe(900n);

    expect(codeOf(() => wallet.approve(C, 0))).toBe("ALREADY_TERMINAL");
  });

  it("A,B with threshold 1: submission executes immediately", () => {
    const wallet = makeWallet([A, B], 1);

    const id = wallet.submit(A, RECIPIENT, 50n);

    expect(wallet.getTransaction(id)).toMatchObject({
      approvalCount: 1,
      executed: true,
      state: "completed",
    });
    expect(token.balanceOf(RECIPIENT)).toBe(50n);
    expect(token.transfers).toHaveLength(1);
    expect(eventTypes(wallet)).toEqual(["submission", "approval", "execution"]);
  });
});

// =============================================================================
// submit
// =============================================================================

describe("submit", () => {
  it("records the submitter's approval and both notifications", () => {
    const wallet = makeWallet();

    wallet.submit(A, RECIPIENT, 100n);

    expect(wallet.isApproved(0, A)).toBe(true);
    expect(wallet.isApproved(0, B)).toBe(false);
    expect(wallet.getEvents()).toEqual([
      { type: "submission", proposalId: 0, actor: A, timestamp: T0, to: RECIPIENT, amount: 100n },
      { type: "approval", proposalId: 0, actor: A, timestamp: T0 },
    ]);
  });

  it("assigns sequential ids", () => {
    const wallet = makeWallet();
    expect(wallet.submit(A, RECIPIENT, 1n)).toBe(0);
    expect(wallet.submit(B, RECIPIENT, 2n)).toBe(1);
    expect(wallet.getTransactionCount()).toBe(2);
  });

  it("rejects callers outside the roster", () => {
    expect(codeOf(() => makeWallet().submit(OUTSIDER, RECIPIENT, 1n))).toBe("NOT_AUTHORIZED");
  });

  it("rejects the zero address", () => {
    const wallet = makeWallet();
    expect(codeOf(() => wallet.submit(A, "", 1n))).toBe("ZERO_ADDRESS");
    expect(codeOf(() => wallet.submit(A, "0x0000000000000000000000000000000000000000", 1n))).toBe(
      "ZERO_ADDRESS",
    );
  });

  it("rejects a zero amount", () => {
    expect(codeOf(() => makeWallet().submit(A, RECIPIENT, 0n))).toBe("ZERO_AMOUNT");
  });

  it("leaves no trace when rejected", () => {
    const wallet = makeWallet();
    codeOf(() => wallet.submit(A, RECIPIENT, 0n));

    expect(wallet.getTransactionCount()).toBe(0);
    expect(wallet.getEvents()).toEqual([]);
  });
});

// =============================================================================
// approve
// =============================================================================

describe("approve", () => {
  it("rejects a second approval from the same custodian", () => {
    const wallet = makeWallet([A, B, C], 3);
    wallet.submit(A, RECIPIENT, 100n);

    expect(codeOf(() => wallet.approve(A, 0))).toBe("ALREADY_APPROVED");
  });

  it("rejects unknown ids and outsiders", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);

    expect(codeOf(() => wallet.approve(B, 7))).toBe("NOT_FOUND");
    expect(codeOf(() => wallet.approve(B, -1))).toBe("NOT_FOUND");
    expect(codeOf(() => wallet.approve(OUTSIDER, 0))).toBe("NOT_AUTHORIZED");
  });

  it("checks authorization before existence", () => {
    expect(codeOf(() => makeWallet().approve(OUTSIDER, 99))).toBe("NOT_AUTHORIZED");
  });

  it("returns the updated proposal", () => {
    const wallet = makeWallet([A, B, C], 3);
    wallet.submit(A, RECIPIENT, 100n);

    expect(wallet.approve(B, 0).approvalCount).toBe(2);
  });

  it("is allowed on an expired proposal that is still open", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);
    now = T0 + 86_401;

    expect(wallet.isExpired(0)).toBe(true);
    expect(wallet.approve(B, 0).state).toBe("completed");
  });
});

// =============================================================================
// revoke
// =============================================================================

describe("revoke", () => {
  it("decrements the count without cancelling", () => {
    const wallet = makeWallet([A, B, C], 3);
    wallet.submit(A, RECIPIENT, 100n);
    wallet.approve(B, 0);

    const proposal = wallet.revoke(B, 0);

    expect(proposal.approvalCount).toBe(1);
    expect(proposal.state).toBe("open");
    expect(wallet.isApproved(0, B)).toBe(false);
  });

  it("cancels the proposal when the last approval is revoked", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);

    const proposal = wallet.revoke(A, 0);

    expect(proposal).toMatchObject({ approvalCount: 0, state: "cancelled", executed: true });
    expect(eventTypes(wallet)).toEqual(["submission", "approval", "revocation", "cancellation"]);
    expect(wallet.getEvents().at(-1)).toEqual({
      type: "cancellation",
      proposalId: 0,
      actor: A,
      timestamp: T0,
      reason: "revoked",
    });
    expect(token.balanceOf(RECIPIENT)).toBe(0n);
  });

  it("rejects approve after cancellation", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);
    wallet.revoke(A, 0);

    expect(codeOf(() => wallet.approve(B, 0))).toBe("ALREADY_TERMINAL");
  });

  it("rejects a custodian without an active approval", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);

    expect(codeOf(() => wallet.revoke(B, 0))).toBe("NOT_APPROVED");
  });

  it("allows approving again after a revocation", () => {
    const wallet = makeWallet([A, B, C], 3);
    wallet.submit(A, RECIPIENT, 100n);
    wallet.approve(B, 0);
    wallet.revoke(B, 0);

    expect(wallet.approve(B, 0).approvalCount).toBe(2);
  });
});

// =============================================================================
// Expiry
// =============================================================================

describe("cancelExpired", () => {
  it("rejects a proposal still inside its window", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);
    now = T0 + 86_400;

    expect(wallet.isExpired(0)).toBe(false);
    expect(codeOf(() => wallet.cancelExpired(B, 0))).toBe("NOT_EXPIRED");
  });

  it("marks an expired proposal terminal", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);
    now = T0 + 86_401;

    const proposal = wallet.cancelExpired(C, 0);

    expect(proposal.state).toBe("expired");
    expect(proposal.executed).toBe(true);
    expect(wallet.isExpired(0)).toBe(false);
    expect(wallet.getEvents().at(-1)).toEqual({
      type: "cancellation",
      proposalId: 0,
      actor: C,
      timestamp: T0 + 86_401,
      reason: "expired",
    });
    expect(codeOf(() => wallet.approve(B, 0))).toBe("ALREADY_TERMINAL");
  });

  it("honours a custom window", () => {
    const wallet = makeWallet([A, B], 2, { expirationPeriodSeconds: 60 });
    wallet.submit(A, RECIPIENT, 100n);
    now = T0 + 61;

    expect(wallet.cancelExpired(B, 0).state).toBe("expired");
  });

  it("rejects terminal, unknown and outsider calls", () => {
    const wallet = makeWallet([A, B], 1);
    wallet.submit(A, RECIPIENT, 100n);
    now = T0 + 100_000;

    expect(codeOf(() => wallet.cancelExpired(A, 0))).toBe("ALREADY_TERMINAL");
    expect(codeOf(() => wallet.cancelExpired(A, 5))).toBe("NOT_FOUND");
    expect(codeOf(() => wallet.cancelExpired(OUTSIDER, 0))).toBe("NOT_AUTHORIZED");
  });
});

// =============================================================================
// Execution
// =============================================================================

describe("execution", () => {
  it("trusts the balance, not the legacy false return", () => {
    token.falseNegativeTransfers = true;
    const wallet = makeWallet([A, B], 1);

    wallet.submit(A, RECIPIENT, 100n);

    expect(wallet.getTransaction(0).state).toBe("completed");
    expect(token.balanceOf(RECIPIENT)).toBe(100n);
  });

  it("fails when the recipient balance does not move", () => {
    token.dropTransfers = true;
    const wallet = makeWallet([A, B], 1);

    expect(codeOf(() => wallet.submit(A, RECIPIENT, 100n))).toBe("TRANSFER_FAILED");
    expect(wallet.getTransactionCount()).toBe(0);
  });

  it("exempts self-transfers from the balance check", () => {
    token.dropTransfers = true;
    const wallet = makeWallet([A, B], 1);

    wallet.submit(A, WALLET, 100n);

    expect(wallet.getTransaction(0).state).toBe("completed");
    expect(wallet.getBalance()).toBe(1_000n);
  });

  it("wraps a throwing token as TRANSFER_FAILED with the cause", () => {
    token.failTransfers = true;
    const wallet = makeWallet([A, B], 1);

    try {
      wallet.submit(A, RECIPIENT, 100n);
      expect.unreachable("submit should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ApprovalError);
      if (err instanceof ApprovalError) {
        expect(err.code).toBe("TRANSFER_FAILED");
        expect(err.kind).toBe("resource");
        expect(err.cause).toBeInstanceOf(Error);
      }
    }
  });

  it("rolls back the approving custodian when the balance is short", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 5_000n);

    expect(codeOf(() => wallet.approve(B, 0))).toBe("INSUFFICIENT_BALANCE");
    expect(wallet.isApproved(0, B)).toBe(false);
    expect(wallet.getTransaction(0)).toMatchObject({ approvalCount: 1, state: "open" });
    expect(eventTypes(wallet)).toEqual(["submission", "approval"]);

    token.mint(WALLET, 5_000n);
    expect(wallet.approve(B, 0).state).toBe("completed");
    expect(token.balanceOf(RECIPIENT)).toBe(5_000n);
  });

  it("rolls back a whole submission when threshold 1 execution fails", () => {
    const wallet = makeWallet([A, B], 1);

    expect(codeOf(() => wallet.submit(A, RECIPIENT, 5_000n))).toBe("INSUFFICIENT_BALANCE");
    expect(wallet.getTransactionCount()).toBe(0);
    expect(wallet.getEvents()).toEqual([]);
    expect(wallet.submit(A, RECIPIENT, 10n)).toBe(0);
  });

  it("rejects every mutation on an executed proposal", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);
    wallet.approve(B, 0);

    expect(codeOf(() => wallet.approve(C, 0))).toBe("ALREADY_TERMINAL");
    expect(codeOf(() => wallet.revoke(A, 0))).toBe("ALREADY_TERMINAL");
    now = T0 + 100_000;
    expect(codeOf(() => wallet.cancelExpired(A, 0))).toBe("ALREADY_TERMINAL");
    expect(token.balanceOf(RECIPIENT)).toBe(100n);
  });
});

// =============================================================================
// Reentrancy
// =============================================================================

describe("reentrancy", () => {
  it("a token callback sees the executing proposal already terminal", () => {
    const states: string[] = [];
    const observed: (ApprovalErrorCode | undefined)[] = [];
    const wallet = makeWallet([A, B, C], 2);
    token.onTransfer = () => {
      states.push(wallet.getTransaction(0).state);
      observed.push(codeOf(() => wallet.approve(C, 0)));
      observed.push(codeOf(() => wallet.revoke(A, 0)));
    };

    wallet.submit(A, RECIPIENT, 100n);
    wallet.approve(B, 0);

    expect(states).toEqual(["completed"]);
    expect(observed).toEqual(["ALREADY_TERMINAL", "ALREADY_TERMINAL"]);
    expect(token.balanceOf(RECIPIENT)).toBe(100n);
    expect(token.transfers).toHaveLength(1);
  });

  it("a throwing callback undoes the transfer and the approval", () => {
    const wallet = makeWallet();
    wallet.submit(A, RECIPIENT, 100n);
    token.onTransfer = () => {
      throw new Error("recipient hook refused");
    };

    expect(codeOf(() => wallet.approve(B, 0))).toBe("TRANSFER_FAILED");
    expect(token.balanceOf(RECIPIENT)).toBe(0n);
    expect(wallet.getBalance()).toBe(1_000n);
    expect(wallet.getTransaction(0)).toMatchObject({ approvalCount: 1, state: "open" });
  });
});

// =============================================================================
// Notifications
// =============================================================================

describe("notifications", () => {
  it("publishes committed events to subscribers in order", () => {
    const wallet = makeWallet();
    const seen: ApprovalEvent[] = [];
    wallet.subscribe((e) => seen.push(e));

    wallet.submit(A, RECIPIENT, 100n);
    wallet.approve(B, 0);

    expect(seen.map((e) => e.type)).toEqual(["submission", "approval", "approval", "execution"]);
  });

  it("publishes nothing for a failed call", () => {
    const wallet = makeWallet();
    const handler = vi.fn();
    wallet.submit(A, RECIPIENT, 5_000n);
    wallet.subscribe(handler);

    codeOf(() => wallet.approve(B, 0));

    expect(handler).not.toHaveBeenCalled();
  });

  it("stops after unsubscribe", () => {
    const wallet = makeWallet();
    const handler = vi.fn();
    wallet.subscribe(handler).unsubscribe();

    wallet.submit(A, RECIPIENT, 100n);

    expect(handler).not.toHaveBeenCalled();
  });

  it("isolates a throwing subscriber from the caller and the other subscribers", () => {
    const logger = { error: vi.fn() };
    const wallet = makeWallet([A, B, C], 2, { logger });
    const seen: string[] = [];
    wallet.subscribe(() => {
      throw new Error("subscriber down");
    });
    wallet.subscribe((e) => seen.push(e.type));

    expect(wallet.submit(A, RECIPIENT, 100n)).toBe(0);

    expect(seen).toEqual(["submission", "approval"]);
    expect(wallet.getTransaction(0)).toMatchObject({ approvalCount: 1, state: "open" });
    expect(logger.error).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ proposalId: 0, type: "submission" }),
      "Approval subscriber failed",
    );
  });

  it("appends committed events to the event store", () => {
    const eventStore = new InMemoryEventStore();
    const wallet = makeWallet([A, B, C], 2, { eventStore });

    wallet.submit(A, RECIPIENT, 100n);
    wallet.approve(B, 0);

    const stored = eventStore.read(`approval-wallet:${WALLET}`);
    expect(stored.map((e) => e.event.type)).toEqual([
      "approval.submission",
      "approval.approval",
      "approval.approval",
      "approval.execution",
    ]);
    expect(stored[0]?.event.payload).toEqual({ proposalId: 0, to: RECIPIENT, amount: "100" });
    expect(stored[3]?.event.metadata).toEqual({
      eventId: `${WALLET}:3`,
      timestamp: new Date(T0 * 1000).toISOString(),
      actor: B,
      correlationId: `${WALLET}:proposal:0`,
      source: "approval",
    });
  });

  it("rolls back when the event store rejects the batch", () => {
    const eventStore = new InMemoryEventStore();
    const wallet = makeWallet([A, B], 2, { eventStore });
    vi.spyOn(eventStore, "append").mockImplementationOnce(() => {
      throw new Error("disk full");
    });

    expect(() => wallet.submit(A, RECIPIENT, 100n)).toThrow("disk full");
    expect(wallet.getTransactionCount()).toBe(0);
    expect(wallet.getEvents()).toEqual([]);
  });
});
