/**
 * @multicustody/approval: Contract-style M-of-N approval automaton.
 *
 * Provides:
 * - ApprovalWallet: proposals, approvals, revocations, expiry, auto-execution
 * - TokenLedger: the capability the wallet spends from
 * - InMemoryTokenLedger: reference ledger with legacy-token switches
 *
 * @packageDocumentation
 */

export type {
  TokenLedger,
  SubmissionEvent,
  ApprovalGrantedEvent,
  RevocationEvent,
  ExecutionEvent,
  CancellationEvent,
  CancellationReason,
  ApprovalEvent,
  ApprovalEventType,
  ApprovalEventHandler,
  Clock,
  ApprovalLogger,
  ApprovalWalletOptions,
  ApprovalErrorCode,
} from "./types.js";
export { ApprovalError } from "./types.js";

export { ApprovalWallet, DEFAULT_EXPIRATION_PERIOD_SECONDS } from "./approval-wallet.js";

export { InMemoryTokenLedger, TokenLedgerError } from "./token-ledger.js";
export type { InMemoryTokenLedgerOptions, TransferHook } from "./token-ledger.js";

export { APPROVAL_EVENT_TYPES, toDomainEvent } from "./events.js";
