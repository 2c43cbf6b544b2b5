/**
 * Medicine catalogue entries.
 */

import { z } from "zod";
import { idSchema, storedRecordSchema, type CreateInput, type UpdateInput } from "./common.js";

export const medicineSchema = storedRecordSchema.extend({
  name: z.string().trim().min(1),
  supplier_id: idSchema,

  /** e.g. "Tablet 500mg" */
  form_dosage: z.string().default(""),
  category: z.string().default(""),

  /** Stock at or below this level is reported as low */
  low_stock_limit: z.number().int().nonnegative().default(10),

  batch_number: z.string().optional(),
  expiry_date: z.string().optional(),
  photos: z.array(z.string()).default([]),
  notes: z.string().default(""),
});

export type Medicine = z.infer<typeof medicineSchema>;

export type CreateMedicineInput = CreateInput<typeof medicineSchema>;

export type UpdateMedicineInput = UpdateInput<Medicine>;
