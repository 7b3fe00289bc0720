/**
 * @multicustody/coordinator: Core types.
 *
 * The coordinator owns the local set of pending transactions for one
 * custodian. Everything it touches outside that set is injected:
 * - LedgerGateway: the network (roster query, payload building, submission)
 * - PayloadCodec: offline inspection, signer recovery and merging
 * - PayloadSigner: the local custodian's key
 * - PendingStore: durable persistence of records
 */

import type {
  AssetRef,
  CustodianRoster,
  ErrorKind,
  PendingStatus,
  PendingTransaction,
  SignerEntry,
} from "@multicustody/types";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Parameters for building one unsigned transfer.
 */
export interface TransferRequest {
  /** Multisig account the funds leave */
  readonly source: string;
  readonly destination: string;
  /** Smallest-unit amount as a decimal string */
  readonly amount: string;
  readonly asset: AssetRef;
  /** Deadline embedded in the payload (ISO 8601) */
  readonly expiresAt: string;
  /** Number of entries on the signer list (affects multisig fees) */
  readonly signerCount: number;
}

/**
 * What the ledger says about a record's sequence slot.
 * - open: the slot is still free
 * - settled: this record's transaction was applied in it
 * - superseded: a different transaction took it; this one can never apply
 */
export type Settlement =
  | { readonly state: "open" }
  | { readonly state: "settled" }
  | { readonly state: "superseded"; readonly reason: string };

/**
 * Balances of an account, in smallest units.
 */
export interface AccountBalances {
  /** Native balance (drops for XRP) */
  readonly native: string;
  /** Balance of the requested issued asset, when one was asked for */
  readonly token?: string;
}

export type SubmitResult =
  | { readonly accepted: true; readonly networkTxId: string }
  | { readonly accepted: false; readonly reason: string };

/**
 * Network-facing operations. Every method may reject with a transport error.
 */
export interface LedgerGateway {
  /** Current roster and quorum of a multisig account */
  getSignerList(account: string): Promise<CustodianRoster>;

  /** Build an unsigned payload for a transfer */
  buildTransfer(request: TransferRequest): Promise<string>;

  /** Submit a fully signed payload */
  submit(payload: string): Promise<SubmitResult>;

  /** Whether the record's transaction, or another one, used its sequence slot */
  settlementOf(record: PendingTransaction): Promise<Settlement>;

  /** Native balance, plus the issued asset's balance when `asset` has an issuer */
  getAccountInfo(account: string, asset?: AssetRef): Promise<AccountBalances>;
}

/**
 * What a payload says about itself.
 */
export interface PayloadInfo {
  /** Id of the unsigned transaction; stable while signatures are added */
  readonly txId: string;
  readonly source: string;
  readonly destination: string;
  readonly amount: string;
  readonly asset: AssetRef;
  readonly expiresAt: string;
}

/**
 * Offline payload operations. Implementations never touch the network.
 */
export interface PayloadCodec {
  /** @throws on a malformed payload */
  inspect(payload: string): PayloadInfo;

  /** Addresses whose signatures verify over the payload, de-duplicated */
  recoverSigners(payload: string): readonly string[];

  /**
   * Union of the signatures of several encodings of the same transaction.
   * Signatures that do not verify or whose signer is not in
   * `allowedSigners` are dropped; each signer appears once.
   *
   * @throws when the payloads are not the same transaction
   */
  merge(payloads: readonly string[], allowedSigners: readonly string[]): string;

  isValidAddress(address: string): boolean;
}

/**
 * The local custodian's signing key.
 */
export interface PayloadSigner {
  readonly address: string;

  /** Returns an encoding of the payload carrying only this signer's signature */
  sign(payload: string): Promise<string>;
}

/**
 * Durable key-value store of pending transactions, keyed by record id.
 * A rejected `put` or `delete` must leave the store unchanged.
 */
export interface PendingStore {
  get(id: string): Promise<PendingTransaction | undefined>;
  put(record: PendingTransaction): Promise<void>;
  /** @returns whether a record was removed */
  delete(id: string): Promise<boolean>;
  list(): Promise<readonly PendingTransaction[]>;
}

/**
 * Object-first structured logger. pino satisfies it.
 */
export interface CoordinatorLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

// =============================================================================
// Coordinator
// =============================================================================

export interface CoordinatorOptions {
  /** Multisig account this coordinator spends from */
  readonly account: string;
  readonly gateway: LedgerGateway;
  readonly codec: PayloadCodec;
  readonly signer: PayloadSigner;
  readonly store: PendingStore;
  readonly logger?: CoordinatorLogger;
  readonly clock?: () => Date;
  readonly idGenerator?: () => string;
  /** How long a new payload stays valid. Default: one hour */
  readonly expiryWindowMs?: number;
}

export interface CreateRequest {
  readonly destination: string;
  /** Smallest units */
  readonly amount: string | bigint;
  readonly asset: AssetRef;
  readonly description?: string;
}

export interface ReconcileReport {
  /** Records removed because their transaction settled */
  readonly settled: readonly string[];
  /** Records flipped to `expired` because their deadline passed */
  readonly expired: readonly string[];
  /** Records flipped to `expired` because another transaction took their slot */
  readonly superseded: readonly string[];
  readonly errors: readonly { readonly id: string; readonly message: string }[];
}

/**
 * The multisig account as the local custodian sees it.
 */
export interface AccountOverview {
  readonly account: string;
  readonly balances: AccountBalances;
  readonly asset?: AssetRef;
  readonly signerList: readonly SignerEntry[];
  readonly threshold: number;
  /** Address of the local custodian key */
  readonly signer: string;
  /** Whether the local key is on the signer list */
  readonly isSigner: boolean;
}

export type { PendingStatus, PendingTransaction };

// =============================================================================
// Errors
// =============================================================================

export type CoordinatorErrorCode =
  | "NOT_FOUND"
  | "ALREADY_SIGNED"
  | "NOT_AUTHORIZED"
  | "INVALID_STATE"
  | "INVALID_IMPORT"
  | "QUORUM_NOT_MET"
  | "EXPIRED"
  | "BROADCAST_REJECTED"
  | "INVALID_ADDRESS"
  | "ZERO_ADDRESS"
  | "ZERO_AMOUNT"
  | "INVALID_AMOUNT";

const KIND_BY_CODE: Record<CoordinatorErrorCode, ErrorKind> = {
  NOT_FOUND: "not_found",
  ALREADY_SIGNED: "invalid_state",
  NOT_AUTHORIZED: "authorization",
  INVALID_STATE: "invalid_state",
  INVALID_IMPORT: "validation",
  QUORUM_NOT_MET: "invalid_state",
  EXPIRED: "invalid_state",
  BROADCAST_REJECTED: "transport",
  INVALID_ADDRESS: "validation",
  ZERO_ADDRESS: "validation",
  ZERO_AMOUNT: "validation",
  INVALID_AMOUNT: "validation",
};

export class CoordinatorError extends Error {
  public readonly code: CoordinatorErrorCode;
  public readonly kind: ErrorKind;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: CoordinatorErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "CoordinatorError";
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    this.details = details;
  }
}
