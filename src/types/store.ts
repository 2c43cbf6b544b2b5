/**
 * Department stores and their stock.
 */

import { z } from "zod";
import {
  idSchema,
  inventorySchema,
  storedRecordSchema,
  type CreateInput,
  type UpdateInput,
} from "./common.js";

export const storeSchema = storedRecordSchema.extend({
  name: z.string().trim().min(1),

  /** Owning department (one store per department) */
  department_id: idSchema,

  location: z.string().default(""),
  description: z.string().default(""),
  inventory: inventorySchema.default({}),
});

export type Store = z.infer<typeof storeSchema>;

export type CreateStoreInput = CreateInput<typeof storeSchema>;

export type UpdateStoreInput = UpdateInput<Store>;

/** Stock classification relative to a medicine's low-stock limit */
export type StockLevel = "low" | "medium" | "good" | "unknown";
