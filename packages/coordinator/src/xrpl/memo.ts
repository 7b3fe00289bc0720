/**
 * XRPL expiry memo.
 *
 * Payments carry no native wall-clock deadline, so the payload records its
 * own as a memo. The network-side cut-off is the payment's
 * LastLedgerSequence; the memo is what custodians compare against.
 *
 * - MemoType: hex of "multicustody/expires"
 * - MemoData: hex of the ISO 8601 deadline
 */

import type { Memo } from "xrpl";

export const EXPIRY_MEMO_TYPE = "multicustody/expires";

export function encodeExpiryMemo(expiresAt: string): Memo {
  return {
    Memo: {
      MemoType: toHex(EXPIRY_MEMO_TYPE),
      MemoData: toHex(expiresAt),
    },
  };
}

/**
 * The deadline carried by a payment's memos, if any.
 */
export function readExpiryMemo(memos: readonly Memo[] | undefined): string | undefined {
  for (const { Memo: memo } of memos ?? []) {
    if (memo.MemoType === undefined || memo.MemoData === undefined) continue;
    if (fromHex(memo.MemoType) === EXPIRY_MEMO_TYPE) {
      return fromHex(memo.MemoData);
    }
  }
  return undefined;
}

/**
 * Convert a UTF-8 string to uppercase hex encoding (XRPL convention).
 */
export function toHex(str: string): string {
  return Buffer.from(str, "utf8").toString("hex").toUpperCase();
}

export function fromHex(hex: string): string {
  return Buffer.from(hex, "hex").toString("utf8");
}
