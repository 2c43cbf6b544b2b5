/**
 * Shared record shapes.
 *
 * Every persisted entity is a flat JSON object keyed by a zero-padded
 * sequential string id. Field names are snake_case because the JSON files
 * are read by other tools.
 */

import { z } from "zod";

/** Id of the protected main department and main store */
export const MAIN_ID = "01";

export const idSchema = z.string().min(1);

/** Fields the repository layer owns */
export const storedRecordSchema = z.object({
  id: idSchema,
  created_at: z.string(),
  updated_at: z.string().optional(),
});

export type StoredRecord = z.infer<typeof storedRecordSchema>;

export type StoredRecordKey = keyof StoredRecord;

/**
 * A medicine line on a purchase or consumption record.
 */
export const lineItemSchema = z.object({
  medicine_id: idSchema,
  quantity: z.number().int().positive(),
  batch_number: z.string().optional(),
  expiry_date: z.string().optional(),
});

export type LineItem = z.infer<typeof lineItemSchema>;

/** medicine_id -> quantity on hand */
export const inventorySchema = z.record(z.number().int().nonnegative());

export type Inventory = z.infer<typeof inventorySchema>;

/**
 * Input accepted by `create()`: the schema's input shape minus the
 * repository-owned fields, so defaulted fields stay optional.
 */
export type CreateInput<S extends z.ZodTypeAny> = Omit<z.input<S>, StoredRecordKey>;

/**
 * Patch accepted by `update()`.
 */
export type UpdateInput<T extends StoredRecord> = Partial<Omit<T, StoredRecordKey>>;
