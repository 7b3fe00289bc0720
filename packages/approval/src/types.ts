/**
 * @multicustody/approval domain types.
 *
 * A contract-style wallet shared by a fixed custodian roster:
 * - Custodians submit transfer proposals
 * - Each custodian approves a proposal at most once
 * - The proposal executes on the approval that reaches the threshold
 * - Proposals expire after a fixed window and can then be cancelled
 */

import type { ErrorKind } from "@multicustody/types";
import type { EventStore } from "@multicustody/event-store";

// =============================================================================
// Token ledger
// =============================================================================

/**
 * The fungible token the wallet holds.
 *
 * Legacy stablecoins report transfer success inconsistently, so the boolean
 * returned by `transfer` is advisory. The wallet trusts only the absence of
 * an exception and the recipient's balance.
 */
export interface TokenLedger {
  balanceOf(address: string): bigint;
  transfer(from: string, to: string, amount: bigint): boolean;
}

// =============================================================================
// Notifications
// =============================================================================

interface ApprovalEventBase {
  readonly proposalId: number;
  /** Custodian whose call produced the event */
  readonly actor: string;
  /** Unix seconds */
  readonly timestamp: number;
}

export interface SubmissionEvent extends ApprovalEventBase {
  readonly type: "submission";
  readonly to: string;
  readonly amount: bigint;
}

export interface ApprovalGrantedEvent extends ApprovalEventBase {
  readonly type: "approval";
}

export interface RevocationEvent extends ApprovalEventBase {
  readonly type: "revocation";
}

export interface ExecutionEvent extends ApprovalEventBase {
  readonly type: "execution";
  readonly to: string;
  readonly amount: bigint;
}

export type CancellationReason = "revoked" | "expired";

export interface CancellationEvent extends ApprovalEventBase {
  readonly type: "cancellation";
  readonly reason: CancellationReason;
}

export type ApprovalEvent =
  | SubmissionEvent
  | ApprovalGrantedEvent
  | RevocationEvent
  | ExecutionEvent
  | CancellationEvent;

export type ApprovalEventType = ApprovalEvent["type"];

export type ApprovalEventHandler = (event: ApprovalEvent) => void;

// =============================================================================
// Configuration
// =============================================================================

/** Current time in unix seconds. */
export type Clock = () => number;

/**
 * Object-first error sink. pino satisfies it.
 */
export interface ApprovalLogger {
  error(obj: object, msg?: string): void;
}

export interface ApprovalWalletOptions {
  /** The wallet's own account on the token ledger */
  readonly address: string;
  readonly token: TokenLedger;
  readonly owners: readonly string[];
  readonly threshold: number;
  /** Default: 86400 (one day) */
  readonly expirationPeriodSeconds?: number;
  readonly clock?: Clock;
  /** Durable copy of every committed notification */
  readonly eventStore?: EventStore;
  /** Stream to append to. Default: `approval-wallet:<address>` */
  readonly streamId?: string;
  /** Receives subscriber failures. Default: discards them */
  readonly logger?: ApprovalLogger;
}

// =============================================================================
// Errors
// =============================================================================

export type ApprovalErrorCode =
  | "NOT_AUTHORIZED"
  | "ZERO_ADDRESS"
  | "ZERO_AMOUNT"
  | "INVALID_CONFIG"
  | "NOT_FOUND"
  | "ALREADY_TERMINAL"
  | "ALREADY_APPROVED"
  | "NOT_APPROVED"
  | "NOT_EXPIRED"
  | "INSUFFICIENT_BALANCE"
  | "TRANSFER_FAILED";

const KIND_BY_CODE: Record<ApprovalErrorCode, ErrorKind> = {
  NOT_AUTHORIZED: "authorization",
  ZERO_ADDRESS: "validation",
  ZERO_AMOUNT: "validation",
  INVALID_CONFIG: "validation",
  NOT_FOUND: "not_found",
  ALREADY_TERMINAL: "invalid_state",
  ALREADY_APPROVED: "invalid_state",
  NOT_APPROVED: "invalid_state",
  NOT_EXPIRED: "invalid_state",
  INSUFFICIENT_BALANCE: "resource",
  TRANSFER_FAILED: "resource",
};

export class ApprovalError extends Error {
  public readonly code: ApprovalErrorCode;
  public readonly kind: ErrorKind;

  constructor(code: ApprovalErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ApprovalError";
    this.code = code;
    this.kind = KIND_BY_CODE[code];
  }
}
