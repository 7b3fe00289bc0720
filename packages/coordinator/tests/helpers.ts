/**
 * Shared fixtures: offline XRPL wallets and an in-process ledger gateway.
 */

import { Wallet } from "xrpl";
import type { Payment } from "xrpl";
import { formatUnits } from "@multicustody/types";
import type { AssetRef, CustodianRoster, PendingTransaction } from "@multicustody/types";
import { SignatureCoordinator } from "../src/coordinator.js";
import { InMemoryPendingStore } from "../src/stores/in-memory-store.js";
import type {
  AccountBalances,
  LedgerGateway,
  Settlement,
  SubmitResult,
  TransferRequest,
} from "../src/types.js";
import { xrplPayloadCodec } from "../src/xrpl/codec.js";
import { encodeExpiryMemo } from "../src/xrpl/memo.js";
import { decodePayment, encodePayment } from "../src/xrpl/payment.js";
import { XrplWalletSigner } from "../src/xrpl/signer.js";

export const START = new Date("2026-01-01T00:00:00.000Z");

export interface Custodians {
  readonly a: Wallet;
  readonly b: Wallet;
  readonly c: Wallet;
  readonly outsider: Wallet;
  readonly account: string;
  readonly recipient: string;
}

export function makeCustodians(): Custodians {
  return {
    a: Wallet.generate(),
    b: Wallet.generate(),
    c: Wallet.generate(),
    outsider: Wallet.generate(),
    account: Wallet.generate().classicAddress,
    recipient: Wallet.generate().classicAddress,
  };
}

export function makeRoster(custodians: Custodians, threshold = 2): CustodianRoster {
  return {
    signers: [custodians.a, custodians.b, custodians.c].map((w) => ({
      address: w.classicAddress,
      weight: 1,
    })),
    threshold,
  };
}

/**
 * Ledger gateway that builds real XRPL payments without a network.
 *
 * Accepted submissions occupy their sequence slot, the way the ledger
 * consumes an account sequence.
 */
export class FakeGateway implements LedgerGateway {
  roster: CustodianRoster;
  nextSequence = 10;
  /** 0 hands out the same sequence again, as autofill does before a broadcast */
  sequenceStep = 1;
  submitted: string[] = [];
  submitResults: (SubmitResult | Error)[] = [];
  /** Transactions settled by someone else's broadcast */
  settledTxIds = new Set<string>();
  brokenSettlement = new Set<string>();
  /** Sequence → unsigned id of the transaction that used it */
  appliedSequences = new Map<number, string>();
  nativeBalance = "75000000";
  tokenBalances = new Map<string, string>();

  constructor(roster: CustodianRoster) {
    this.roster = roster;
  }

  async getSignerList(): Promise<CustodianRoster> {
    return this.roster;
  }

  async buildTransfer(request: TransferRequest): Promise<string> {
    const amount = BigInt(request.amount);
    const tx: Payment = {
      TransactionType: "Payment",
      Account: request.source,
      Destination: request.destination,
      Amount:
        request.asset.issuer === undefined
          ? amount.toString()
          : { currency: request.asset.code, issuer: request.asset.issuer, value: formatUnits(amount, 6) },
      Fee: "40",
      Sequence: this.takeSequence(),
      LastLedgerSequence: 5_000,
      Flags: 0,
      Memos: [encodeExpiryMemo(request.expiresAt)],
      SigningPubKey: "",
    };
    return encodePayment(tx, []);
  }

  async submit(payload: string): Promise<SubmitResult> {
    this.submitted.push(payload);
    const next = this.submitResults.shift() ?? { accepted: true, networkTxId: "NETWORK-HASH" };
    if (next instanceof Error) {
      throw next;
    }
    const sequence = decodePayment(payload).tx.Sequence;
    if (next.accepted && sequence !== undefined) {
      this.appliedSequences.set(sequence, xrplPayloadCodec.inspect(payload).txId);
    }
    return next;
  }

  async settlementOf(record: PendingTransaction): Promise<Settlement> {
    if (this.brokenSettlement.has(record.txId)) {
      throw new Error("ledger unavailable");
    }
    if (this.settledTxIds.has(record.txId)) {
      return { state: "settled" };
    }
    const sequence = decodePayment(record.payload).tx.Sequence;
    const applied = sequence === undefined ? undefined : this.appliedSequences.get(sequence);
    if (applied === undefined) {
      return { state: "open" };
    }
    return applied === record.txId
      ? { state: "settled" }
      : { state: "superseded", reason: `Sequence ${String(sequence)} was used by ${applied}` };
  }

  async getAccountInfo(_account: string, asset?: AssetRef): Promise<AccountBalances> {
    if (asset?.issuer === undefined) {
      return { native: this.nativeBalance };
    }
    return {
      native: this.nativeBalance,
      token: this.tokenBalances.get(`${asset.code}:${asset.issuer}`) ?? "0",
    };
  }

  private takeSequence(): number {
    const sequence = this.nextSequence;
    this.nextSequence += this.sequenceStep;
    return sequence;
  }
}

export interface CoordinatorFixture {
  readonly coordinator: SignatureCoordinator;
  readonly store: InMemoryPendingStore;
}

export function makeCoordinator(
  wallet: Wallet,
  account: string,
  gateway: LedgerGateway,
  clock: () => Date,
  prefix = "id",
): CoordinatorFixture {
  const store = new InMemoryPendingStore();
  let counter = 0;
  const coordinator = new SignatureCoordinator({
    account,
    gateway,
    codec: xrplPayloadCodec,
    signer: new XrplWalletSigner(wallet),
    store,
    clock,
    idGenerator: () => `${prefix}-${String(++counter)}`,
  });
  return { coordinator, store };
}

export function sorted(values: readonly string[]): string[] {
  return [...values].sort();
}
