/**
 * XRPL payload codec.
 *
 * Payloads are hex-encoded binary Payments from a multisig account. Each
 * custodian's signature lives in `Signers[]` and covers the payment with
 * `Signers` stripped and `SigningPubKey` empty, so adding signatures never
 * changes the transaction id computed here.
 *
 * Rules:
 * - A signature counts only if it verifies over the multisigning encoding
 *   for its account and the signing key derives that account
 * - Each account counts once, whatever the number of entries it has
 * - Amounts are drops for XRP; issued-currency values are scaled by
 *   `decimals` into smallest units
 */

import { createHash } from "node:crypto";
import { encodeForMultiSigning, encodeForSigning, isValidClassicAddress, multisign } from "xrpl";
import type { Payment, Signer } from "xrpl";
import { deriveAddress, verify } from "ripple-keypairs";
import { parseUnits } from "@multicustody/types";
import type { PayloadCodec, PayloadInfo } from "../types.js";
import { readExpiryMemo } from "./memo.js";
import { decodePayment, encodePayment, PayloadFormatError } from "./payment.js";

export const NATIVE_CODE = "XRP";

export const DEFAULT_TOKEN_DECIMALS = 6;

export interface XrplCodecOptions {
  /** Decimal places of issued-currency amounts. Default: 6 */
  readonly decimals?: number;
}

/**
 * Transaction id of a payment: SHA-512Half over its single-signing
 * encoding, with signatures removed.
 */
export function transactionId(tx: Payment): string {
  const bytes = Buffer.from(encodeForSigning({ ...tx, SigningPubKey: "" }), "hex");
  return createHash("sha512").update(bytes).digest("hex").slice(0, 64).toUpperCase();
}

/**
 * Whether `signer` is a valid signature over `tx` by its named account.
 */
export function verifySigner(tx: Payment, signer: Signer): boolean {
  const { Account, SigningPubKey, TxnSignature } = signer.Signer;
  try {
    if (deriveAddress(SigningPubKey) !== Account) return false;
    const message = encodeForMultiSigning({ ...tx, SigningPubKey: "" }, Account);
    return verify(message, TxnSignature, SigningPubKey);
  } catch {
    // Unparseable keys or signatures never verify.
    return false;
  }
}

export function createXrplPayloadCodec(options: XrplCodecOptions = {}): PayloadCodec {
  const decimals = options.decimals ?? DEFAULT_TOKEN_DECIMALS;

  function verifiedSigners(tx: Payment, signers: readonly Signer[]): Signer[] {
    const seen = new Set<string>();
    const result: Signer[] = [];
    for (const signer of signers) {
      const account = signer.Signer.Account;
      if (seen.has(account) || !verifySigner(tx, signer)) continue;
      seen.add(account);
      result.push(signer);
    }
    return result;
  }

  return {
    inspect(payload: string): PayloadInfo {
      const { tx } = decodePayment(payload);
      const expiresAt = readExpiryMemo(tx.Memos);
      if (expiresAt === undefined) {
        throw new PayloadFormatError("Payload carries no expiry memo");
      }

      const amount = tx.Amount;
      if (typeof amount === "string") {
        return {
          txId: transactionId(tx),
          source: tx.Account,
          destination: tx.Destination,
          amount,
          asset: { code: NATIVE_CODE },
          expiresAt,
        };
      }
      if (!("currency" in amount)) {
        throw new PayloadFormatError("Unsupported payment amount");
      }

      let scaled: bigint;
      try {
        scaled = parseUnits(amount.value, decimals);
      } catch (err) {
        throw new PayloadFormatError(
          `Payment value ${amount.value} does not fit ${String(decimals)} decimals`,
          { cause: err },
        );
      }
      return {
        txId: transactionId(tx),
        source: tx.Account,
        destination: tx.Destination,
        amount: scaled.toString(),
        asset: { code: amount.currency, issuer: amount.issuer },
        expiresAt,
      };
    },

    recoverSigners(payload: string): readonly string[] {
      const { tx, signers } = decodePayment(payload);
      return verifiedSigners(tx, signers).map((s) => s.Signer.Account);
    },

    merge(payloads: readonly string[], allowedSigners: readonly string[]): string {
      const [first, ...rest] = payloads.map(decodePayment);
      if (first === undefined) {
        throw new PayloadFormatError("Nothing to merge");
      }

      const txId = transactionId(first.tx);
      for (const other of rest) {
        if (transactionId(other.tx) !== txId) {
          throw new PayloadFormatError("Payloads are not the same transaction");
        }
      }

      const allowed = new Set(allowedSigners);
      const signers = verifiedSigners(
        first.tx,
        [first, ...rest].flatMap((p) => p.signers),
      ).filter((s) => allowed.has(s.Signer.Account));

      if (signers.length === 0) {
        return encodePayment(first.tx, []);
      }
      return multisign(signers.map((s) => encodePayment(first.tx, [s])));
    },

    isValidAddress(address: string): boolean {
      return isValidClassicAddress(address);
    },
  };
}

export const xrplPayloadCodec: PayloadCodec = createXrplPayloadCodec();
