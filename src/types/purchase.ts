/**
 * Purchase orders. Delivery is the only event that adds stock to a store.
 */

import { z } from "zod";
import {
  MAIN_ID,
  idSchema,
  lineItemSchema,
  storedRecordSchema,
  type CreateInput,
  type UpdateInput,
} from "./common.js";

export const PURCHASE_STATUSES = ["pending", "delivered", "cancelled"] as const;

export type PurchaseStatus = (typeof PURCHASE_STATUSES)[number];

export const purchaseSchema = storedRecordSchema.extend({
  supplier_id: idSchema,

  /** Store that receives the goods on delivery */
  store_id: idSchema.default(MAIN_ID),

  medicines: z.array(lineItemSchema).min(1),
  total_amount: z.number().nonnegative().default(0),
  status: z.enum(PURCHASE_STATUSES).default("pending"),
  purchase_date: z.string().optional(),
  invoice_number: z.string().default(""),
  notes: z.string().default(""),
  delivered_at: z.string().optional(),
});

export type Purchase = z.infer<typeof purchaseSchema>;

/** New purchases always start out pending */
export type CreatePurchaseInput = Omit<
  CreateInput<typeof purchaseSchema>,
  "status" | "delivered_at"
>;

/** Status only changes through deliver() and cancel() */
export type UpdatePurchaseInput = Omit<UpdateInput<Purchase>, "status" | "delivered_at">;
