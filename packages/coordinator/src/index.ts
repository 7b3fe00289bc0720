/**
 * @multicustody/coordinator: Off-chain signature coordinator.
 *
 * Collects custodian signatures on native multisig payments:
 * - SignatureCoordinator: pending transaction lifecycle
 * - PendingStore implementations (in-memory, JSON file)
 * - XRPL adapter: payload codec, wallet signer, ledger gateway
 * - Export format for exchanging partial signature sets
 */

// Types
export type {
  TransferRequest,
  SubmitResult,
  Settlement,
  AccountBalances,
  AccountOverview,
  LedgerGateway,
  PayloadInfo,
  PayloadCodec,
  PayloadSigner,
  PendingStore,
  CoordinatorLogger,
  CoordinatorOptions,
  CreateRequest,
  ReconcileReport,
  CoordinatorErrorCode,
} from "./types.js";
export { CoordinatorError } from "./types.js";

// Coordinator
export { SignatureCoordinator, DEFAULT_EXPIRY_WINDOW_MS } from "./coordinator.js";
export { signerWeight, hasQuorum, collectingStatus, isClosed } from "./status.js";
export { SerialQueue } from "./serial-queue.js";
export { silentLogger } from "./logger.js";

// Export format
export type { ParseResult } from "./schema.js";
export {
  EXPORT_FORMAT,
  pendingStatusSchema,
  pendingTransactionSchema,
  serializeRecord,
  parseRecord,
} from "./schema.js";

// Stores
export { InMemoryPendingStore } from "./stores/in-memory-store.js";
export { FilePendingStore, PendingStoreError, STORE_FORMAT } from "./stores/file-store.js";

// Retry
export type { RetryPolicy, RetryOptions } from "./retry.js";
export {
  DEFAULT_RETRY_POLICY,
  RetryExhaustedError,
  withRetry,
  backoffDelay,
  isTransientXrplError,
} from "./retry.js";

// XRPL
export type { XrplCodecOptions } from "./xrpl/codec.js";
export {
  createXrplPayloadCodec,
  xrplPayloadCodec,
  transactionId,
  verifySigner,
  NATIVE_CODE,
  DEFAULT_TOKEN_DECIMALS,
} from "./xrpl/codec.js";
export type { DecodedPayment } from "./xrpl/payment.js";
export { decodePayment, encodePayment, PayloadFormatError } from "./xrpl/payment.js";
export { EXPIRY_MEMO_TYPE, encodeExpiryMemo, readExpiryMemo } from "./xrpl/memo.js";
export { XrplWalletSigner } from "./xrpl/signer.js";
export type { XrplGatewayConfig } from "./xrpl/gateway.js";
export { XrplGateway } from "./xrpl/gateway.js";
