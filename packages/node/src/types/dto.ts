/**
 * Request DTOs with Zod validation schemas.
 */

import { z } from "zod";
import { pendingStatusSchema } from "@multicustody/coordinator";

export const CreatePendingSchema = z.object({
  destination: z.string().min(1),
  /** Smallest units, as a base-10 string */
  amount: z.string().min(1).max(40),
  asset: z
    .object({
      code: z.string().min(1).max(40),
      issuer: z.string().min(1).optional(),
    })
    .default({ code: "XRP" }),
  description: z.string().max(1024).optional(),
});

export type CreatePendingDto = z.infer<typeof CreatePendingSchema>;

export const ImportPendingSchema = z.object({
  blob: z.string().min(1),
});

export type ImportPendingDto = z.infer<typeof ImportPendingSchema>;

export const ListPendingQuerySchema = z.object({
  status: pendingStatusSchema.optional(),
});

export type ListPendingQuery = z.infer<typeof ListPendingQuerySchema>;

export const AccountQuerySchema = z
  .object({
    currency: z.string().min(1).max(40).optional(),
    issuer: z.string().min(1).optional(),
  })
  .refine((q) => (q.currency === undefined) === (q.issuer === undefined), {
    message: "currency and issuer go together",
    path: ["issuer"],
  });

export type AccountQuery = z.infer<typeof AccountQuerySchema>;
