/**
 * @multicustody/types: Shared domain types for the custody stack.
 *
 * Used by every package:
 * - Roster, proposal and pending-transaction records
 * - Event architecture
 * - Validation and deadline helpers shared by both authorization paths
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Custody types
export type {
  SignerEntry,
  CustodianRoster,
  AssetRef,
  ProposalState,
  TransactionProposal,
  PendingStatus,
  PendingTransaction,
  ErrorKind,
} from "./custody.js";

// Event types
export type {
  EventSource,
  EventMetadata,
  DomainEvent,
} from "./event.js";

// Validation
export type { ValidationErrorCode } from "./validation.js";
export {
  ValidationError,
  XRPL_ACCOUNT_ZERO,
  isZeroAddress,
  assertNonZeroAddress,
  assertPositiveAmount,
  parseUnits,
  formatUnits,
  validateRoster,
} from "./validation.js";

// Deadlines
export { expiryOf, isPastDeadline } from "./expiry.js";

// Runtime type guards
export { isRecord, isDomainEvent } from "./guards.js";
