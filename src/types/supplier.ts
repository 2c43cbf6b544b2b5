import { z } from "zod";
import { storedRecordSchema, type CreateInput, type UpdateInput } from "./common.js";

export const supplierSchema = storedRecordSchema.extend({
  name: z.string().trim().min(1),
  contact_person: z.string().default(""),
  email: z.string().default(""),
  telephone: z.string().default(""),
  address: z.string().default(""),
  notes: z.string().default(""),
});

export type Supplier = z.infer<typeof supplierSchema>;

export type CreateSupplierInput = CreateInput<typeof supplierSchema>;

export type UpdateSupplierInput = UpdateInput<Supplier>;
