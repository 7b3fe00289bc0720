/**
 * Approval Wallet: M-of-N approval automaton over a token ledger.
 *
 * One instance models one deployed wallet contract. Every mutating call
 * names its caller explicitly.
 *
 * Rules:
 * - Only roster custodians may mutate; queries are open to everyone
 * - A custodian holds at most one active approval per proposal
 * - The approval that reaches the threshold executes the proposal
 * - Revoking the last approval cancels the proposal
 * - An open proposal past its window can be cancelled by any custodian
 * - Terminal proposals never change again
 *
 * Atomicity:
 * Each mutating call is a unit of work. State changes are journaled and
 * undone if the call throws, including a failure during auto-execution.
 * Notifications are buffered and published only when the outermost unit of
 * work commits. A token ledger that calls back into the wallet during
 * `transfer` joins the running unit of work and sees the executing proposal
 * already terminal.
 */

import type { EventStore, Subscription } from "@multicustody/event-store";
import type { TransactionProposal } from "@multicustody/types";
import {
  assertNonZeroAddress,
  expiryOf,
  isPastDeadline,
  isZeroAddress,
  validateRoster,
} from "@multicustody/types";
import { toDomainEvent } from "./events.js";
import type {
  ApprovalEvent,
  ApprovalEventHandler,
  ApprovalLogger,
  ApprovalWalletOptions,
  Clock,
  TokenLedger,
} from "./types.js";
import { ApprovalError } from "./types.js";

export const DEFAULT_EXPIRATION_PERIOD_SECONDS = 86_400;

const systemClock: Clock = () => Math.floor(Date.now() / 1000);

const silentLogger: ApprovalLogger = { error: () => undefined };

export class ApprovalWallet {
  readonly address: string;
  private readonly token: TokenLedger;
  private readonly owners: readonly string[];
  private readonly ownerSet: ReadonlySet<string>;
  private readonly quorum: number;
  private readonly period: number;
  private readonly clock: Clock;
  private readonly eventStore: EventStore | undefined;
  private readonly streamId: string;
  private readonly logger: ApprovalLogger;

  private readonly proposals: TransactionProposal[] = [];
  private readonly approvals = new Map<number, Set<string>>();
  private readonly history: ApprovalEvent[] = [];
  private readonly handlers = new Set<ApprovalEventHandler>();

  private depth = 0;
  private journal: (() => void)[] = [];
  private buffered: ApprovalEvent[] = [];

  constructor(options: ApprovalWalletOptions) {
    assertNonZeroAddress(options.address, "wallet address");
    const roster = validateRoster(options.owners, options.threshold);

    const period = options.expirationPeriodSeconds ?? DEFAULT_EXPIRATION_PERIOD_SECONDS;
    if (!Number.isInteger(period) || period <= 0) {
      throw new ApprovalError(
        "INVALID_CONFIG",
        `Expiration period must be a positive number of seconds, got ${String(period)}`,
      );
    }

    this.address = options.address;
    this.token = options.token;
    this.owners = roster.signers.map((s) => s.address);
    this.ownerSet = new Set(this.owners);
    this.quorum = roster.threshold;
    this.period = period;
    this.clock = options.clock ?? systemClock;
    this.eventStore = options.eventStore;
    this.streamId = options.streamId ?? `approval-wallet:${options.address}`;
    this.logger = options.logger ?? silentLogger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Propose a transfer. The caller's approval is recorded with it, so a
   * threshold of 1 executes the transfer before this returns.
   *
   * @returns the new proposal id
   */
  submit(caller: string, to: string, amount: bigint): number {
    return this.atomic(() => {
      this.requireOwner(caller);
      if (isZeroAddress(to)) {
        throw new ApprovalError("ZERO_ADDRESS", "Recipient must not be the zero address");
      }
      if (amount <= 0n) {
        throw new ApprovalError("ZERO_AMOUNT", "Amount must be greater than zero");
      }

      const id = this.proposals.length;
      const now = this.clock();

      this.putProposal({
        id,
        to,
        amount,
        approvalCount: 1,
        createdAt: now,
        state: "open",
        executed: false,
      });
      this.setApproval(id, caller, true);
      this.emit({ type: "submission", proposalId: id, actor: caller, timestamp: now, to, amount });
      this.emit({ type: "approval", proposalId: id, actor: caller, timestamp: now });

      if (this.quorum <= 1) {
        this.execute(id, caller);
      }
      return id;
    });
  }

  approve(caller: string, id: number): TransactionProposal {
    return this.atomic(() => {
      this.requireOwner(caller);
      const proposal = this.openProposal(id);
      if (this.hasApproval(id, caller)) {
        throw new ApprovalError("ALREADY_APPROVED", `${caller} has already approved proposal ${String(id)}`);
      }

      const approvalCount = proposal.approvalCount + 1;
      this.putProposal({ ...proposal, approvalCount });
      this.setApproval(id, caller, true);
      this.emit({ type: "approval", proposalId: id, actor: caller, timestamp: this.clock() });

      if (approvalCount >= this.quorum) {
        this.execute(id, caller);
      }
      return this.proposalAt(id);
    });
  }

  revoke(caller: string, id: number): TransactionProposal {
    return this.atomic(() => {
      this.requireOwner(caller);
      const proposal = this.openProposal(id);
      if (!this.hasApproval(id, caller)) {
        throw new ApprovalError("NOT_APPROVED", `${caller} has not approved proposal ${String(id)}`);
      }

      const now = this.clock();
      const approvalCount = proposal.approvalCount - 1;
      this.putProposal({ ...proposal, approvalCount });
      this.setApproval(id, caller, false);
      this.emit({ type: "revocation", proposalId: id, actor: caller, timestamp: now });

      if (approvalCount === 0) {
        this.putProposal({ ...proposal, approvalCount, state: "cancelled", executed: true });
        this.emit({ type: "cancellation", proposalId: id, actor: caller, timestamp: now, reason: "revoked" });
      }
      return this.proposalAt(id);
    });
  }

  cancelExpired(caller: string, id: number): TransactionProposal {
    return this.atomic(() => {
      this.requireOwner(caller);
      const proposal = this.openProposal(id);
      const now = this.clock();
      if (!isPastDeadline(expiryOf(proposal.createdAt, this.period), now)) {
        throw new ApprovalError("NOT_EXPIRED", `Proposal ${String(id)} has not expired`);
      }

      this.putProposal({ ...proposal, state: "expired", executed: true });
      this.emit({ type: "cancellation", proposalId: id, actor: caller, timestamp: now, reason: "expired" });
      return this.proposalAt(id);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getOwners(): readonly string[] {
    return [...this.owners];
  }

  getOwnerCount(): number {
    return this.owners.length;
  }

  isOwner(address: string): boolean {
    return this.ownerSet.has(address);
  }

  get threshold(): number {
    return this.quorum;
  }

  get expirationPeriodSeconds(): number {
    return this.period;
  }

  getTransaction(id: number): TransactionProposal {
    return this.proposalAt(id);
  }

  getTransactionCount(): number {
    return this.proposals.length;
  }

  isApproved(id: number, owner: string): boolean {
    this.proposalAt(id);
    return this.hasApproval(id, owner);
  }

  /** True while the proposal is open and its window has passed. */
  isExpired(id: number): boolean {
    const proposal = this.proposalAt(id);
    return (
      proposal.state === "open" &&
      isPastDeadline(expiryOf(proposal.createdAt, this.period), this.clock())
    );
  }

  getBalance(): bigint {
    return this.token.balanceOf(this.address);
  }

  /** Committed notifications, oldest first. */
  getEvents(): readonly ApprovalEvent[] {
    return [...this.history];
  }

  /** Receive each notification after its unit of work commits. */
  subscribe(handler: ApprovalEventHandler): Subscription {
    this.handlers.add(handler);
    return {
      unsubscribe: () => {
        this.handlers.delete(handler);
      },
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  private execute(id: number, actor: string): void {
    const proposal = this.proposalAt(id);

    const balance = this.token.balanceOf(this.address);
    if (balance < proposal.amount) {
      throw new ApprovalError(
        "INSUFFICIENT_BALANCE",
        `Wallet holds ${balance.toString()}, proposal ${String(id)} needs ${proposal.amount.toString()}`,
      );
    }

    // Terminal before the external call.
    this.putProposal({ ...proposal, state: "completed", executed: true });

    const selfTransfer = proposal.to === this.address;
    const before = this.token.balanceOf(proposal.to);
    try {
      this.token.transfer(this.address, proposal.to, proposal.amount);
    } catch (err) {
      throw new ApprovalError(
        "TRANSFER_FAILED",
        `Transfer for proposal ${String(id)} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!selfTransfer) {
      const received = this.token.balanceOf(proposal.to) - before;
      if (received < proposal.amount) {
        throw new ApprovalError(
          "TRANSFER_FAILED",
          `Recipient of proposal ${String(id)} received ${received.toString()} of ${proposal.amount.toString()}`,
        );
      }
    }

    this.emit({
      type: "execution",
      proposalId: id,
      actor,
      timestamp: this.clock(),
      to: proposal.to,
      amount: proposal.amount,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Unit of work
  // ───────────────────────────────────────────────────────────────────────

  private atomic<T>(work: () => T): T {
    const journalMark = this.journal.length;
    const bufferMark = this.buffered.length;

    this.depth += 1;
    let result: T;
    try {
      result = work();
    } catch (err) {
      this.rollbackTo(journalMark, bufferMark);
      this.depth -= 1;
      throw err;
    }
    this.depth -= 1;

    if (this.depth === 0) {
      this.commit();
    }
    return result;
  }

  private commit(): void {
    const events = this.buffered;

    if (events.length > 0 && this.eventStore !== undefined) {
      const base = this.history.length;
      try {
        this.eventStore.append(
          this.streamId,
          events.map((event, i) => toDomainEvent(event, this.address, base + i)),
        );
      } catch (err) {
        this.rollbackTo(0, 0);
        throw err;
      }
    }

    this.journal = [];
    this.buffered = [];
    this.history.push(...events);

    // State is final here: subscriber failures are reported, never rethrown.
    for (const event of events) {
      for (const handler of this.handlers) {
        try {
          handler(event);
        } catch (err) {
          this.logger.error(
            { err, proposalId: event.proposalId, type: event.type },
            "Approval subscriber failed",
          );
        }
      }
    }
  }

  private rollbackTo(journalMark: number, bufferMark: number): void {
    while (this.journal.length > journalMark) {
      this.journal.pop()?.();
    }
    this.buffered.length = bufferMark;
  }

  private putProposal(next: TransactionProposal): void {
    const previous = this.proposals[next.id];
    if (previous === undefined) {
      this.proposals.push(next);
      this.journal.push(() => {
        this.proposals.pop();
      });
    } else {
      this.proposals[next.id] = next;
      this.journal.push(() => {
        this.proposals[next.id] = previous;
      });
    }
  }

  private setApproval(id: number, owner: string, approved: boolean): void {
    let owners = this.approvals.get(id);
    if (owners === undefined) {
      owners = new Set();
      this.approvals.set(id, owners);
    }
    const set = owners;

    if (approved) {
      set.add(owner);
      this.journal.push(() => {
        set.delete(owner);
      });
    } else {
      set.delete(owner);
      this.journal.push(() => {
        set.add(owner);
      });
    }
  }

  private emit(event: ApprovalEvent): void {
    this.buffered.push(event);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireOwner(caller: string): void {
    if (!this.ownerSet.has(caller)) {
      throw new ApprovalError("NOT_AUTHORIZED", `${caller} is not a custodian of this wallet`);
    }
  }

  private proposalAt(id: number): TransactionProposal {
    const proposal = Number.isInteger(id) ? this.proposals[id] : undefined;
    if (proposal === undefined) {
      throw new ApprovalError("NOT_FOUND", `Proposal ${String(id)} not found`);
    }
    return proposal;
  }

  private openProposal(id: number): TransactionProposal {
    const proposal = this.proposalAt(id);
    if (proposal.state !== "open") {
      throw new ApprovalError(
        "ALREADY_TERMINAL",
        `Proposal ${String(id)} is ${proposal.state} and can no longer change`,
      );
    }
    return proposal;
  }

  private hasApproval(id: number, owner: string): boolean {
    return this.approvals.get(id)?.has(owner) ?? false;
  }
}
