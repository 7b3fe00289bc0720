/**
 * Typed view of a binary-encoded XRPL Payment.
 *
 * The binary codec decodes into an untyped JSON object. Payloads travel
 * between custodians, so every field is checked and copied into a typed
 * Payment instead of being trusted. Fields outside the set the gateway
 * builds are rejected: any field the view dropped would change the signed
 * bytes.
 */

import { decode, encode } from "xrpl";
import type { Amount, Memo, Payment, Signer } from "xrpl";
import { isRecord } from "@multicustody/types";

export class PayloadFormatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PayloadFormatError";
  }
}

export interface DecodedPayment {
  /** The payment with `Signers` removed */
  readonly tx: Payment;
  /** Signatures attached to the payload, in encoded order */
  readonly signers: readonly Signer[];
}

const KNOWN_FIELDS = new Set([
  "TransactionType",
  "Account",
  "Destination",
  "Amount",
  "Fee",
  "Sequence",
  "LastLedgerSequence",
  "Flags",
  "Memos",
  "SigningPubKey",
  "NetworkID",
  "DestinationTag",
  "SourceTag",
  "Signers",
]);

// =============================================================================
// Decoding
// =============================================================================

export function decodePayment(payload: string): DecodedPayment {
  if (!/^([0-9A-F]{2})+$/i.test(payload)) {
    throw new PayloadFormatError("Payload is not hex");
  }

  let json: Record<string, unknown>;
  try {
    json = decode(payload);
  } catch (err) {
    throw new PayloadFormatError(
      `Payload does not decode: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  for (const key of Object.keys(json)) {
    if (!KNOWN_FIELDS.has(key)) {
      throw new PayloadFormatError(`Unsupported payment field: ${key}`);
    }
  }

  if (json.TransactionType !== "Payment") {
    throw new PayloadFormatError(`Expected a Payment, got ${String(json.TransactionType)}`);
  }

  const lastLedgerSequence = optionalNumber(json, "LastLedgerSequence");
  const flags = optionalNumber(json, "Flags");
  const networkId = optionalNumber(json, "NetworkID");
  const destinationTag = optionalNumber(json, "DestinationTag");
  const sourceTag = optionalNumber(json, "SourceTag");

  const tx: Payment = {
    TransactionType: "Payment",
    Account: requireString(json, "Account"),
    Destination: requireString(json, "Destination"),
    Amount: readAmount(json.Amount),
    Fee: requireString(json, "Fee"),
    Sequence: requireNumber(json, "Sequence"),
    SigningPubKey: typeof json.SigningPubKey === "string" ? json.SigningPubKey : "",
    ...(lastLedgerSequence !== undefined ? { LastLedgerSequence: lastLedgerSequence } : {}),
    ...(flags !== undefined ? { Flags: flags } : {}),
    ...(networkId !== undefined ? { NetworkID: networkId } : {}),
    ...(destinationTag !== undefined ? { DestinationTag: destinationTag } : {}),
    ...(sourceTag !== undefined ? { SourceTag: sourceTag } : {}),
    ...(json.Memos !== undefined ? { Memos: readMemos(json.Memos) } : {}),
  };

  return {
    tx,
    signers: json.Signers !== undefined ? readSigners(json.Signers) : [],
  };
}

/**
 * Encode a payment with the given signatures, or unsigned when empty.
 */
export function encodePayment(tx: Payment, signers: readonly Signer[]): string {
  if (signers.length === 0) {
    return encode({ ...tx, SigningPubKey: "" });
  }
  return encode({ ...tx, SigningPubKey: "", Signers: [...signers] });
}

// =============================================================================
// Field readers
// =============================================================================

function requireString(json: Record<string, unknown>, field: string): string {
  const value = json[field];
  if (typeof value !== "string" || value.length === 0) {
    throw new PayloadFormatError(`Payment field ${field} is missing`);
  }
  return value;
}

function requireNumber(json: Record<string, unknown>, field: string): number {
  const value = json[field];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new PayloadFormatError(`Payment field ${field} is missing`);
  }
  return value;
}

function optionalNumber(json: Record<string, unknown>, field: string): number | undefined {
  return json[field] === undefined ? undefined : requireNumber(json, field);
}

function readAmount(value: unknown): Amount {
  if (typeof value === "string") {
    return value;
  }
  if (
    isRecord(value) &&
    typeof value.currency === "string" &&
    typeof value.issuer === "string" &&
    typeof value.value === "string"
  ) {
    return { currency: value.currency, issuer: value.issuer, value: value.value };
  }
  throw new PayloadFormatError("Payment Amount must be drops or an issued currency amount");
}

function readMemos(value: unknown): Memo[] {
  if (!Array.isArray(value)) {
    throw new PayloadFormatError("Payment Memos must be an array");
  }
  return value.map((entry: unknown) => {
    const memo = isRecord(entry) ? entry.Memo : undefined;
    if (!isRecord(memo)) {
      throw new PayloadFormatError("Malformed memo");
    }
    return {
      Memo: {
        ...(typeof memo.MemoType === "string" ? { MemoType: memo.MemoType } : {}),
        ...(typeof memo.MemoData === "string" ? { MemoData: memo.MemoData } : {}),
        ...(typeof memo.MemoFormat === "string" ? { MemoFormat: memo.MemoFormat } : {}),
      },
    };
  });
}

function readSigners(value: unknown): Signer[] {
  if (!Array.isArray(value)) {
    throw new PayloadFormatError("Payment Signers must be an array");
  }
  return value.map((entry: unknown) => {
    const signer = isRecord(entry) ? entry.Signer : undefined;
    if (
      !isRecord(signer) ||
      typeof signer.Account !== "string" ||
      typeof signer.SigningPubKey !== "string" ||
      typeof signer.TxnSignature !== "string"
    ) {
      throw new PayloadFormatError("Malformed signer entry");
    }
    return {
      Signer: {
        Account: signer.Account,
        SigningPubKey: signer.SigningPubKey,
        TxnSignature: signer.TxnSignature,
      },
    };
  });
}
