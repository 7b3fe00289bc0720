/**
 * Quorum arithmetic over captured rosters.
 */

import type { PendingStatus, PendingTransaction, SignerEntry } from "@multicustody/types";

/**
 * Summed weight of the distinct signers that appear on the roster.
 */
export function signerWeight(signers: readonly string[], signerList: readonly SignerEntry[]): number {
  const weights = new Map(signerList.map((entry) => [entry.address, entry.weight]));
  let total = 0;
  for (const address of new Set(signers)) {
    total += weights.get(address) ?? 0;
  }
  return total;
}

export function hasQuorum(
  record: Pick<PendingTransaction, "signers" | "signerList" | "threshold">,
): boolean {
  return signerWeight(record.signers, record.signerList) >= record.threshold;
}

/**
 * Status of a record that is still collecting signatures.
 */
export function collectingStatus(
  record: Pick<PendingTransaction, "signers" | "signerList" | "threshold">,
): Extract<PendingStatus, "pending" | "ready"> {
  return hasQuorum(record) ? "ready" : "pending";
}

/** `broadcast` and `expired` accept no further changes. */
export function isClosed(status: PendingStatus): boolean {
  return status === "broadcast" || status === "expired";
}
