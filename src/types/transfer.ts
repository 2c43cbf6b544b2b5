/**
 * Stock movements between stores.
 */

import { z } from "zod";
import { idSchema, storedRecordSchema, type CreateInput, type UpdateInput } from "./common.js";

export const TRANSFER_STATUSES = ["pending", "approved", "rejected", "completed"] as const;

export type TransferStatus = (typeof TRANSFER_STATUSES)[number];

/** Reason recorded on transfers produced by store deletion */
export const CASCADE_DELETE_REASON = "cascade-delete";

export const transferSchema = storedRecordSchema.extend({
  from_store_id: idSchema,
  to_store_id: idSchema,
  medicine_id: idSchema,
  quantity: z.number().int().positive(),
  reason: z.string().default("inter-department"),
  status: z.enum(TRANSFER_STATUSES).default("pending"),
  notes: z.string().default(""),
  approved_at: z.string().optional(),
});

export type Transfer = z.infer<typeof transferSchema>;

/** Transfer requests always start out pending */
export type CreateTransferInput = Omit<
  CreateInput<typeof transferSchema>,
  "status" | "approved_at"
>;

/** Status only changes through approve() and reject() */
export type UpdateTransferInput = Omit<UpdateInput<Transfer>, "status" | "approved_at">;
