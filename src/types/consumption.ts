/**
 * Medicines dispensed to a patient from a department's store.
 */

import { z } from "zod";
import {
  idSchema,
  lineItemSchema,
  storedRecordSchema,
  type CreateInput,
  type UpdateInput,
} from "./common.js";

export const consumptionSchema = storedRecordSchema.extend({
  patient_id: idSchema,

  /** Prescribing doctor */
  doctor_id: idSchema.optional(),

  department_id: idSchema,
  medicines: z.array(lineItemSchema).min(1),
  consumption_date: z.string().optional(),
  notes: z.string().default(""),
});

export type Consumption = z.infer<typeof consumptionSchema>;

export type CreateConsumptionInput = CreateInput<typeof consumptionSchema>;

/** Stock-affecting fields are fixed once dispensed */
export type UpdateConsumptionInput = Omit<
  UpdateInput<Consumption>,
  "medicines" | "department_id"
>;
