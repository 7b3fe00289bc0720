/**
 * Custody Types
 *
 * The vocabulary shared by both authorization paths: the contract-style
 * approval automaton and the off-chain signature coordinator.
 *
 * Rules:
 * - Records are immutable values; state changes produce new records
 * - Amounts are integers in the asset's smallest unit
 * - Timestamps are ISO 8601 strings unless a field says otherwise
 */

// =============================================================================
// Roster
// =============================================================================

/**
 * One custodian in a roster.
 *
 * The approval automaton counts every custodian once; native multisig
 * ledgers attach a weight to each entry.
 */
export interface SignerEntry {
  readonly address: string;
  readonly weight: number;
}

/**
 * Ordered, de-duplicated custodian set plus the quorum it must reach.
 */
export interface CustodianRoster {
  readonly signers: readonly SignerEntry[];
  readonly threshold: number;
}

// =============================================================================
// Assets
// =============================================================================

/**
 * The transferred asset.
 *
 * A native asset has no issuer. An issued asset (stablecoin) names the
 * account that issued it.
 */
export interface AssetRef {
  /** Currency code ("XRP" for the native asset, "USD", a 40-hex code, ...) */
  readonly code: string;

  /** Issuing account; absent for the native asset */
  readonly issuer?: string;
}

// =============================================================================
// Approval automaton
// =============================================================================

/**
 * Lifecycle of a proposal. Everything except `open` is terminal.
 */
export type ProposalState = "open" | "completed" | "cancelled" | "expired";

/**
 * A transfer proposal as held by the approval automaton.
 */
export interface TransactionProposal {
  /** Sequential id, starting at 0 */
  readonly id: number;

  /** Recipient */
  readonly to: string;

  /** Smallest-unit amount, always > 0 */
  readonly amount: bigint;

  /** Number of active approvals */
  readonly approvalCount: number;

  /** Unix seconds */
  readonly createdAt: number;

  readonly state: ProposalState;

  /** True once the proposal left `open`, for whatever reason */
  readonly executed: boolean;
}

// =============================================================================
// Signature coordinator
// =============================================================================

/**
 * Lifecycle of a pending transaction.
 *
 * pending → ready → broadcast | failed
 * pending | ready → expired
 */
export type PendingStatus = "pending" | "ready" | "broadcast" | "failed" | "expired";

/**
 * A native multisig transfer being assembled by custodians.
 */
export interface PendingTransaction {
  /** Local record id */
  readonly id: string;

  /** Network transaction id of the unsigned payload */
  readonly txId: string;

  /** Hex-encoded, unsigned or partially multi-signed payload */
  readonly payload: string;

  /** Multisig account the funds leave */
  readonly source: string;

  readonly destination: string;

  /** Smallest-unit amount as a decimal string */
  readonly amount: string;

  readonly asset: AssetRef;

  /** Quorum captured at creation */
  readonly threshold: number;

  /** Roster captured at creation */
  readonly signerList: readonly SignerEntry[];

  /** Distinct verified signers, re-derived from `payload` */
  readonly signers: readonly string[];

  readonly createdAt: string;

  /** Deadline carried by the payload itself */
  readonly expiresAt: string;

  readonly status: PendingStatus;

  readonly description?: string;

  /** Reason the network (or the transport) rejected the last broadcast */
  readonly errorMessage?: string;

  /** Hash assigned by the network on broadcast */
  readonly networkTxId?: string;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Coarse error taxonomy shared by every package. Each package error carries
 * one of these next to its specific code.
 */
export type ErrorKind =
  | "authorization"
  | "not_found"
  | "invalid_state"
  | "validation"
  | "resource"
  | "transport";
