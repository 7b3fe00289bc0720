/**
 * XRPL ledger gateway.
 *
 * Connects to a rippled node over WebSocket and provides the network side
 * of the coordinator for one multisig account.
 *
 * Design:
 * - The roster is the account's SignerList (entries with weights, quorum)
 * - Payments are autofilled for the number of signers, which scales the fee
 * - LastLedgerSequence is set from the payload deadline so the network
 *   drops the payment once it has expired
 * - Submission retries transient failures with withRetry()
 * - Settlement: once the account's sequence has moved past the payment's,
 *   the validated transaction that used that sequence is compared with
 *   the record by unsigned transaction id
 */

import { Client, decode, hashes } from "xrpl";
import type { Payment } from "xrpl";
import { formatUnits, parseUnits, validateRoster } from "@multicustody/types";
import type { AssetRef, CustodianRoster, PendingTransaction } from "@multicustody/types";
import type {
  AccountBalances,
  LedgerGateway,
  Settlement,
  SubmitResult,
  TransferRequest,
} from "../types.js";
import { DEFAULT_RETRY_POLICY, isTransientXrplError, withRetry } from "../retry.js";
import type { RetryPolicy } from "../retry.js";
import { DEFAULT_TOKEN_DECIMALS, transactionId } from "./codec.js";
import { encodeExpiryMemo } from "./memo.js";
import { PayloadFormatError, decodePayment, encodePayment } from "./payment.js";

// =============================================================================
// Types
// =============================================================================

export interface XrplGatewayConfig {
  /** WebSocket endpoint, e.g. wss://s.altnet.rippletest.net:51233 */
  readonly url: string;

  /** Decimal places of issued-currency amounts. Default: 6 */
  readonly decimals?: number;

  /** Fixed fee per payment in drops; autofilled when absent */
  readonly feeDrops?: string;

  /** Default: 30000 */
  readonly timeoutMs?: number;

  /** Average ledger close time used to turn a deadline into a ledger index. Default: 4000 */
  readonly ledgerCloseMs?: number;

  readonly retry?: RetryPolicy;

  readonly clock?: () => Date;
}

const ACCEPTED_RESULTS = new Set(["tesSUCCESS", "terQUEUED"]);

/** account_tx pages searched for the transaction that used a sequence */
const HISTORY_PAGES = 10;
const HISTORY_PAGE_SIZE = 200;

// =============================================================================
// XrplGateway
// =============================================================================

export class XrplGateway implements LedgerGateway {
  private client: Client | null = null;
  private readonly config: XrplGatewayConfig;
  private readonly decimals: number;
  private readonly ledgerCloseMs: number;
  private readonly clock: () => Date;

  constructor(config: XrplGatewayConfig) {
    this.config = config;
    this.decimals = config.decimals ?? DEFAULT_TOKEN_DECIMALS;
    this.ledgerCloseMs = config.ledgerCloseMs ?? 4_000;
    this.clock = config.clock ?? (() => new Date());
  }

  async connect(): Promise<void> {
    this.client = new Client(this.config.url, {
      timeout: this.config.timeoutMs ?? 30_000,
    });
    await this.client.connect();
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.disconnect();
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.client?.isConnected() === true;
  }

  async getSignerList(account: string): Promise<CustodianRoster> {
    const client = this.requireClient();
    const response = await client.request({
      command: "account_objects",
      account,
      type: "signer_list",
      ledger_index: "validated",
    });

    for (const entry of response.result.account_objects) {
      if (entry.LedgerEntryType !== "SignerList") continue;
      return validateRoster(
        entry.SignerEntries.map(({ SignerEntry }) => ({
          address: SignerEntry.Account,
          weight: SignerEntry.SignerWeight,
        })),
        entry.SignerQuorum,
      );
    }

    throw new Error(`Account ${account} has no signer list`);
  }

  async buildTransfer(request: TransferRequest): Promise<string> {
    const client = this.requireClient();

    const amount = BigInt(request.amount);
    const ledgerIndex = await client.getLedgerIndex();
    const windowMs = Date.parse(request.expiresAt) - this.clock().getTime();
    const ledgers = Math.max(1, Math.ceil(windowMs / this.ledgerCloseMs));

    const tx: Payment = {
      TransactionType: "Payment",
      Account: request.source,
      Destination: request.destination,
      Amount:
        request.asset.issuer === undefined
          ? amount.toString()
          : {
              currency: request.asset.code,
              issuer: request.asset.issuer,
              value: formatUnits(amount, this.decimals),
            },
      Memos: [encodeExpiryMemo(request.expiresAt)],
      LastLedgerSequence: ledgerIndex + ledgers,
      ...(this.config.feeDrops !== undefined ? { Fee: this.config.feeDrops } : {}),
    };

    const prepared = await client.autofill(tx, request.signerCount);
    return encodePayment(prepared, []);
  }

  async submit(payload: string): Promise<SubmitResult> {
    const client = this.requireClient();

    return withRetry(
      async () => {
        const response = await client.submit(payload);
        const { engine_result: code, engine_result_message: message } = response.result;

        if (ACCEPTED_RESULTS.has(code)) {
          return { accepted: true, networkTxId: hashes.hashSignedTx(payload) } as const;
        }
        if (code.startsWith("tel") || code.startsWith("ter")) {
          // Local or retryable engine results; resubmitting may succeed.
          throw new Error(`${code}: ${message}`);
        }
        return { accepted: false, reason: `${code}: ${message}` } as const;
      },
      {
        policy: this.config.retry ?? DEFAULT_RETRY_POLICY,
        shouldRetry: isTransientXrplError,
      },
    );
  }

  async settlementOf(record: PendingTransaction): Promise<Settlement> {
    const client = this.requireClient();
    const { tx } = decodePayment(record.payload);
    const sequence = tx.Sequence;
    if (sequence === undefined) {
      throw new Error(`Payload of ${record.id} has no sequence`);
    }

    const response = await client.request({
      command: "account_info",
      account: record.source,
      ledger_index: "validated",
    });
    if (response.result.account_data.Sequence <= sequence) {
      return { state: "open" };
    }

    const blob = await this.findBySequence(client, record.source, sequence);
    if (blob === undefined) {
      throw new Error(`No validated transaction of ${record.source} found with sequence ${String(sequence)}`);
    }
    if (unsignedIdOf(blob) === record.txId.toUpperCase()) {
      return { state: "settled" };
    }
    return {
      state: "superseded",
      reason: `Sequence ${String(sequence)} was used by ${hashes.hashSignedTx(blob)}`,
    };
  }

  async getAccountInfo(account: string, asset?: AssetRef): Promise<AccountBalances> {
    const client = this.requireClient();
    const info = await client.request({
      command: "account_info",
      account,
      ledger_index: "validated",
    });
    const native = info.result.account_data.Balance;

    const issuer = asset?.issuer;
    if (asset === undefined || issuer === undefined) {
      return { native };
    }

    const lines = await client.request({
      command: "account_lines",
      account,
      peer: issuer,
      ledger_index: "validated",
    });
    const line = lines.result.lines.find((l) => l.currency === asset.code && l.account === issuer);
    return {
      native,
      token: line === undefined ? "0" : balanceUnits(line.balance, this.decimals).toString(),
    };
  }

  // ===========================================================================
  // Private
  // ===========================================================================

  /**
   * Newest-first walk of the account's validated history for the blob of
   * its own transaction with `sequence`.
   */
  private async findBySequence(client: Client, account: string, sequence: number): Promise<string | undefined> {
    let marker: unknown;
    for (let page = 0; page < HISTORY_PAGES; page++) {
      const response = await client.request({
        command: "account_tx",
        account,
        ledger_index_min: -1,
        ledger_index_max: -1,
        binary: true,
        forward: false,
        limit: HISTORY_PAGE_SIZE,
        ...(marker !== undefined ? { marker } : {}),
      });

      for (const entry of response.result.transactions) {
        const blob = entry.tx_blob;
        if (blob === undefined) continue;
        const fields = decode(blob);
        const used = fields.Sequence;
        // Incoming payments and ticketed transactions carry no usable sequence.
        if (fields.Account !== account || typeof used !== "number" || used === 0) continue;
        if (used === sequence) return blob;
        if (used < sequence) return undefined;
      }

      marker = response.result.marker;
      if (marker === undefined) return undefined;
    }
    return undefined;
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error("XrplGateway: not connected. Call connect() first.");
    }
    return this.client;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Unsigned transaction id of a ledger blob, or undefined when the blob is
 * not a payment of the shape this package builds.
 */
function unsignedIdOf(blob: string): string | undefined {
  try {
    return transactionId(decodePayment(blob).tx);
  } catch (err) {
    if (err instanceof PayloadFormatError) return undefined;
    throw err;
  }
}

/**
 * Trust-line balance in smallest units; digits beyond `decimals` are dropped.
 */
function balanceUnits(value: string, decimals: number): bigint {
  const [whole = "0", fraction = ""] = value.split(".");
  const kept = fraction.slice(0, decimals);
  return parseUnits(kept === "" ? whole : `${whole}.${kept}`, decimals);
}
