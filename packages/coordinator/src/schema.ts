/**
 * Wire and storage schema for pending transactions.
 *
 * Export format (serialized with RFC 8785 canonical JSON):
 * { "format": "multicustody/pending/v1", "record": { ...PendingTransaction } }
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { PendingTransaction } from "@multicustody/types";

export const EXPORT_FORMAT = "multicustody/pending/v1";

export const signerEntrySchema = z.object({
  address: z.string().min(1),
  weight: z.number().int().positive(),
});

export const assetSchema = z.object({
  code: z.string().min(1),
  issuer: z.string().min(1).optional(),
});

export const pendingStatusSchema = z.enum(["pending", "ready", "broadcast", "failed", "expired"]);

export const pendingTransactionSchema = z.object({
  id: z.string().min(1),
  txId: z.string().regex(/^[0-9A-F]{64}$/i, "txId must be 32 bytes of hex"),
  payload: z.string().regex(/^([0-9A-F]{2})+$/i, "payload must be hex"),
  source: z.string().min(1),
  destination: z.string().min(1),
  amount: z.string().regex(/^[1-9]\d*$/, "amount must be a positive integer string"),
  asset: assetSchema,
  threshold: z.number().int().positive(),
  signerList: z.array(signerEntrySchema).min(1),
  signers: z.array(z.string().min(1)),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
  status: pendingStatusSchema,
  description: z.string().optional(),
  errorMessage: z.string().optional(),
  networkTxId: z.string().optional(),
});

export const exportEnvelopeSchema = z.object({
  format: z.literal(EXPORT_FORMAT),
  record: pendingTransactionSchema,
});

export function serializeRecord(record: PendingTransaction): string {
  return canonicalize({ format: EXPORT_FORMAT, record });
}

export type ParseResult =
  | { readonly ok: true; readonly record: PendingTransaction }
  | { readonly ok: false; readonly reason: string };

export function parseRecord(blob: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(blob);
  } catch (err) {
    return { ok: false, reason: `not JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = exportEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return { ok: false, reason: `${where}${issue?.message ?? "invalid export"}` };
  }
  return { ok: true, record: parsed.data.record };
}
