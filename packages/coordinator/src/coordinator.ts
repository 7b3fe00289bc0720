/**
 * SignatureCoordinator: assembles native multisig transfers across custodians.
 *
 * One instance serves one custodian and one multisig account. It builds an
 * unsigned payment per request, signs it with the local key and collects
 * partial signature sets that other custodians export. Once the summed
 * signer weight reaches the captured quorum the payment can be broadcast.
 *
 * Rules:
 * - `signers` is always re-derived from `payload`, never taken on trust
 * - Merging partial sets yields their union; merging twice changes nothing
 * - A payload past its deadline is never broadcast
 * - Every mutation runs on a serial queue and commits with one store.put
 * - Reconciliation isolates failures per record and never throws
 * - Only records spending from this coordinator's account are accepted
 */

import { randomUUID } from "node:crypto";
import {
  ValidationError,
  assertPositiveAmount,
  isPastDeadline,
  isZeroAddress,
  validateRoster,
} from "@multicustody/types";
import type { AssetRef, PendingStatus, PendingTransaction } from "@multicustody/types";
import { silentLogger } from "./logger.js";
import { parseRecord, serializeRecord } from "./schema.js";
import { SerialQueue } from "./serial-queue.js";
import { collectingStatus, hasQuorum, isClosed } from "./status.js";
import type {
  AccountOverview,
  CoordinatorLogger,
  CoordinatorOptions,
  CreateRequest,
  LedgerGateway,
  PayloadCodec,
  PayloadInfo,
  PayloadSigner,
  PendingStore,
  ReconcileReport,
  Settlement,
  SubmitResult,
} from "./types.js";
import { CoordinatorError } from "./types.js";

export const DEFAULT_EXPIRY_WINDOW_MS = 60 * 60 * 1000;

export class SignatureCoordinator {
  readonly account: string;
  private readonly gateway: LedgerGateway;
  private readonly codec: PayloadCodec;
  private readonly signer: PayloadSigner;
  private readonly store: PendingStore;
  private readonly logger: CoordinatorLogger;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly expiryWindowMs: number;
  private readonly queue = new SerialQueue();

  constructor(options: CoordinatorOptions) {
    this.account = options.account;
    this.gateway = options.gateway;
    this.codec = options.codec;
    this.signer = options.signer;
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.expiryWindowMs = options.expiryWindowMs ?? DEFAULT_EXPIRY_WINDOW_MS;
  }

  /** Address of the local custodian key */
  get signerAddress(): string {
    return this.signer.address;
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Build, sign and persist a new transfer from the multisig account.
   *
   * @throws CoordinatorError ZERO_ADDRESS | INVALID_ADDRESS | ZERO_AMOUNT |
   *   INVALID_AMOUNT | NOT_AUTHORIZED
   */
  create(request: CreateRequest): Promise<PendingTransaction> {
    return this.queue.run(async () => {
      this.assertAddress(request.destination, "destination");
      if (request.asset.issuer !== undefined) {
        this.assertAddress(request.asset.issuer, "issuer");
      }
      const amount = parseAmount(request.amount);

      const roster = await this.gateway.getSignerList(this.account);
      if (!roster.signers.some((entry) => entry.address === this.signer.address)) {
        throw new CoordinatorError(
          "NOT_AUTHORIZED",
          `${this.signer.address} is not on the signer list of ${this.account}`,
        );
      }

      const now = this.clock();
      const asset: AssetRef =
        request.asset.issuer === undefined
          ? { code: request.asset.code }
          : { code: request.asset.code, issuer: request.asset.issuer };
      const unsigned = await this.gateway.buildTransfer({
        source: this.account,
        destination: request.destination,
        amount: amount.toString(),
        asset,
        expiresAt: new Date(now.getTime() + this.expiryWindowMs).toISOString(),
        signerCount: roster.signers.length,
      });
      const allowed = roster.signers.map((entry) => entry.address);
      const signed = await this.signer.sign(unsigned);
      const payload = this.codec.merge([unsigned, signed], allowed);
      const info = this.codec.inspect(payload);

      const record = this.withPayload(
        {
          id: this.idGenerator(),
          txId: info.txId,
          payload,
          source: info.source,
          destination: info.destination,
          amount: info.amount,
          asset: info.asset,
          threshold: roster.threshold,
          signerList: roster.signers,
          signers: [],
          createdAt: now.toISOString(),
          expiresAt: info.expiresAt,
          status: "pending",
          ...(request.description !== undefined ? { description: request.description } : {}),
        },
        payload,
      );

      await this.store.put(record);
      this.logger.info(
        { id: record.id, txId: record.txId, status: record.status },
        "Pending transaction created",
      );
      return record;
    });
  }

  /**
   * Add the local custodian's signature.
   *
   * @throws CoordinatorError NOT_FOUND | INVALID_STATE | EXPIRED |
   *   ALREADY_SIGNED | NOT_AUTHORIZED
   */
  sign(id: string): Promise<PendingTransaction> {
    return this.queue.run(async () => {
      const record = await this.require(id);
      this.assertOpen(record);
      this.assertInTime(record);

      const address = this.signer.address;
      if (record.signers.includes(address)) {
        throw new CoordinatorError("ALREADY_SIGNED", `${address} already signed ${id}`, { id });
      }
      if (!record.signerList.some((entry) => entry.address === address)) {
        throw new CoordinatorError(
          "NOT_AUTHORIZED",
          `${address} is not on the signer list of ${id}`,
          { id },
        );
      }

      const signed = await this.signer.sign(record.payload);
      const payload = this.codec.merge([record.payload, signed], rosterOf(record));
      const next = this.withPayload(record, payload);

      await this.store.put(next);
      this.logger.info(
        { id, txId: next.txId, signers: next.signers.length, status: next.status },
        "Pending transaction signed",
      );
      return next;
    });
  }

  /**
   * Merge a record exported by another custodian.
   *
   * An unknown transaction is inserted; a known one gains the union of both
   * signature sets. Importing the same blob twice is a no-op.
   *
   * @throws CoordinatorError INVALID_IMPORT | INVALID_STATE
   */
  importAndMerge(blob: string): Promise<PendingTransaction> {
    return this.queue.run(async () => {
      const parsed = parseRecord(blob);
      if (!parsed.ok) {
        throw new CoordinatorError("INVALID_IMPORT", `Malformed export: ${parsed.reason}`);
      }
      const imported = parsed.record;
      const info = this.inspectImport(imported);
      if (info.source !== this.account) {
        throw new CoordinatorError(
          "INVALID_IMPORT",
          `Record spends from ${info.source}, not ${this.account}`,
          { source: info.source },
        );
      }

      try {
        validateRoster(imported.signerList, imported.threshold);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new CoordinatorError("INVALID_IMPORT", `Invalid signer list: ${message}`, undefined, {
          cause: err,
        });
      }

      const existing = (await this.store.list()).find((r) => r.txId === info.txId);

      let next: PendingTransaction;
      if (existing === undefined) {
        const { errorMessage: _error, networkTxId: _network, ...rest } = imported;
        const id = (await this.store.get(imported.id)) === undefined ? imported.id : this.idGenerator();
        const payload = this.mergeImport([imported.payload], rosterOf(imported));
        next = this.withPayload({ ...rest, id, txId: info.txId, status: "pending" }, payload);
      } else {
        this.assertOpen(existing);
        const payload = this.mergeImport([existing.payload, imported.payload], rosterOf(existing));
        next = this.withPayload(existing, payload);
      }

      await this.store.put(next);
      this.logger.info(
        {
          id: next.id,
          txId: next.txId,
          signers: next.signers.length,
          status: next.status,
          inserted: existing === undefined,
        },
        "Pending transaction imported",
      );
      return next;
    });
  }

  /**
   * Submit a record that has reached quorum.
   *
   * A rejection (or a transport failure) marks the record `failed`, stores
   * the reason and rethrows; a later call may retry.
   *
   * @throws CoordinatorError NOT_FOUND | INVALID_STATE | EXPIRED |
   *   QUORUM_NOT_MET | BROADCAST_REJECTED
   */
  broadcast(id: string): Promise<PendingTransaction> {
    return this.queue.run(async () => {
      const record = await this.require(id);
      this.assertOpen(record);
      this.assertInTime(record);

      if (!hasQuorum(record)) {
        throw new CoordinatorError(
          "QUORUM_NOT_MET",
          `${id} has ${String(record.signers.length)} signer(s); quorum is ${String(record.threshold)}`,
          { id, signers: record.signers, threshold: record.threshold },
        );
      }

      let result: SubmitResult;
      try {
        result = await this.gateway.submit(record.payload);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        await this.markFailed(record, reason);
        throw new CoordinatorError("BROADCAST_REJECTED", `Broadcast of ${id} failed: ${reason}`, { id }, {
          cause: err,
        });
      }

      if (!result.accepted) {
        await this.markFailed(record, result.reason);
        throw new CoordinatorError(
          "BROADCAST_REJECTED",
          `Network rejected ${id}: ${result.reason}`,
          { id, reason: result.reason },
        );
      }

      const { errorMessage: _error, ...rest } = record;
      const next: PendingTransaction = {
        ...rest,
        status: "broadcast",
        networkTxId: result.networkTxId,
      };
      await this.store.put(next);
      this.logger.info({ id, txId: next.txId, networkTxId: result.networkTxId }, "Pending transaction broadcast");
      return next;
    });
  }

  /**
   * @returns whether a record was removed
   */
  delete(id: string): Promise<boolean> {
    return this.queue.run(async () => {
      const removed = await this.store.delete(id);
      if (removed) {
        this.logger.info({ id }, "Pending transaction deleted");
      }
      return removed;
    });
  }

  /**
   * Drop records whose transaction settled on the ledger and expire those
   * that can no longer apply: past their deadline, or with their sequence
   * slot taken by another transaction. Only `pending` and `ready` records
   * are examined.
   *
   * A failed settlement query is reported and the deadline check still runs.
   */
  reconcile(): Promise<ReconcileReport> {
    return this.queue.run(async () => {
      const settled: string[] = [];
      const expired: string[] = [];
      const superseded: string[] = [];
      const errors: { id: string; message: string }[] = [];

      const fail = (record: PendingTransaction, err: unknown): void => {
        const message = err instanceof Error ? err.message : String(err);
        errors.push({ id: record.id, message });
        this.logger.warn({ id: record.id, err: message }, "Reconciliation failed for record");
      };

      for (const record of await this.store.list()) {
        if (record.status !== "pending" && record.status !== "ready") continue;

        let settlement: Settlement = { state: "open" };
        try {
          settlement = await this.gateway.settlementOf(record);
        } catch (err) {
          fail(record, err);
        }

        try {
          if (settlement.state === "settled") {
            await this.store.delete(record.id);
            settled.push(record.id);
          } else if (settlement.state === "superseded") {
            await this.store.put({ ...record, status: "expired", errorMessage: settlement.reason });
            superseded.push(record.id);
            this.logger.warn({ id: record.id, reason: settlement.reason }, "Pending transaction superseded");
          } else if (this.isPast(record)) {
            await this.store.put({ ...record, status: "expired" });
            expired.push(record.id);
          }
        } catch (err) {
          fail(record, err);
        }
      }

      if (settled.length + expired.length + superseded.length + errors.length > 0) {
        this.logger.info(
          {
            settled: settled.length,
            expired: expired.length,
            superseded: superseded.length,
            errors: errors.length,
          },
          "Reconciliation finished",
        );
      }
      return { settled, expired, superseded, errors };
    });
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Balances and signer list of the multisig account, and whether the
   * local key may sign for it.
   *
   * @throws CoordinatorError ZERO_ADDRESS | INVALID_ADDRESS for a bad issuer
   */
  async accountInfo(asset?: AssetRef): Promise<AccountOverview> {
    if (asset?.issuer !== undefined) {
      this.assertAddress(asset.issuer, "issuer");
    }
    const [balances, roster] = await Promise.all([
      this.gateway.getAccountInfo(this.account, asset),
      this.gateway.getSignerList(this.account),
    ]);
    const signer = this.signer.address;
    return {
      account: this.account,
      balances,
      ...(asset !== undefined ? { asset } : {}),
      signerList: roster.signers,
      threshold: roster.threshold,
      signer,
      isSigner: roster.signers.some((entry) => entry.address === signer),
    };
  }

  async get(id: string): Promise<PendingTransaction | undefined> {
    return this.store.get(id);
  }

  async list(status?: PendingStatus): Promise<readonly PendingTransaction[]> {
    const records = await this.store.list();
    const filtered = status === undefined ? [...records] : records.filter((r) => r.status === status);
    return filtered.sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
  }

  /** Whether the local custodian's signature is on the record */
  async hasSigned(id: string): Promise<boolean> {
    const record = await this.require(id);
    return record.signers.includes(this.signer.address);
  }

  /**
   * Canonical JSON of a record, for handing to another custodian.
   *
   * @throws CoordinatorError NOT_FOUND
   */
  async export(id: string): Promise<string> {
    return serializeRecord(await this.require(id));
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  private async require(id: string): Promise<PendingTransaction> {
    const record = await this.store.get(id);
    if (record === undefined) {
      throw new CoordinatorError("NOT_FOUND", `Pending transaction not found: ${id}`, { id });
    }
    return record;
  }

  private withPayload(record: PendingTransaction, payload: string): PendingTransaction {
    const roster = new Set(rosterOf(record));
    const signers = this.codec.recoverSigners(payload).filter((address) => roster.has(address));
    const withSigners = { ...record, payload, signers };
    return {
      ...withSigners,
      // A failed broadcast stays failed until the next attempt.
      status: record.status === "failed" ? "failed" : collectingStatus(withSigners),
    };
  }

  private async markFailed(record: PendingTransaction, reason: string): Promise<void> {
    await this.store.put({ ...record, status: "failed", errorMessage: reason });
    this.logger.error({ id: record.id, txId: record.txId, reason }, "Broadcast failed");
  }

  private inspectImport(imported: PendingTransaction): PayloadInfo {
    let info: PayloadInfo;
    try {
      info = this.codec.inspect(imported.payload);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CoordinatorError("INVALID_IMPORT", `Unreadable payload: ${message}`, undefined, {
        cause: err,
      });
    }

    const mismatched = [
      info.txId.toUpperCase() !== imported.txId.toUpperCase() ? "txId" : undefined,
      info.source !== imported.source ? "source" : undefined,
      info.destination !== imported.destination ? "destination" : undefined,
      info.amount !== imported.amount ? "amount" : undefined,
      info.asset.code !== imported.asset.code || info.asset.issuer !== imported.asset.issuer
        ? "asset"
        : undefined,
      Date.parse(info.expiresAt) !== Date.parse(imported.expiresAt) ? "expiresAt" : undefined,
    ].filter((field): field is string => field !== undefined);

    if (mismatched.length > 0) {
      throw new CoordinatorError(
        "INVALID_IMPORT",
        `Payload does not match its record: ${mismatched.join(", ")}`,
        { fields: mismatched },
      );
    }
    return info;
  }

  private mergeImport(payloads: readonly string[], allowed: readonly string[]): string {
    try {
      return this.codec.merge(payloads, allowed);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CoordinatorError("INVALID_IMPORT", `Cannot merge payload: ${message}`, undefined, {
        cause: err,
      });
    }
  }

  private assertAddress(address: string, field: string): void {
    if (isZeroAddress(address)) {
      throw new CoordinatorError("ZERO_ADDRESS", `${field} must not be the zero address`, { field });
    }
    if (!this.codec.isValidAddress(address)) {
      throw new CoordinatorError("INVALID_ADDRESS", `${field} is not a valid address: ${address}`, {
        field,
      });
    }
  }

  private assertOpen(record: PendingTransaction): void {
    if (isClosed(record.status)) {
      throw new CoordinatorError(
        "INVALID_STATE",
        `Pending transaction ${record.id} is ${record.status}`,
        { id: record.id, status: record.status },
      );
    }
  }

  private assertInTime(record: PendingTransaction): void {
    if (this.isPast(record)) {
      throw new CoordinatorError(
        "EXPIRED",
        `Pending transaction ${record.id} expired at ${record.expiresAt}`,
        { id: record.id, expiresAt: record.expiresAt },
      );
    }
  }

  private isPast(record: PendingTransaction): boolean {
    return isPastDeadline(Date.parse(record.expiresAt), this.clock().getTime());
  }
}

// =============================================================================
// Helpers
// =============================================================================

function rosterOf(record: Pick<PendingTransaction, "signerList">): string[] {
  return record.signerList.map((entry) => entry.address);
}

function parseAmount(amount: string | bigint): bigint {
  try {
    return assertPositiveAmount(amount);
  } catch (err) {
    if (err instanceof ValidationError) {
      const code = err.code === "ZERO_AMOUNT" ? "ZERO_AMOUNT" : "INVALID_AMOUNT";
      throw new CoordinatorError(code, err.message, undefined, { cause: err });
    }
    throw err;
  }
}
