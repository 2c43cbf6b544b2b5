/**
 * Patients who receive dispensed medicines.
 */

import { z } from "zod";
import { storedRecordSchema, type CreateInput, type UpdateInput } from "./common.js";

export const patientSchema = storedRecordSchema.extend({
  name: z.string().trim().min(1),
  age: z.number().int().nonnegative(),
  gender: z.string().default(""),
  diagnosis: z.string().default(""),

  /** Admitting department, if any */
  department_id: z.string().optional(),

  notes: z.string().default(""),
});

export type Patient = z.infer<typeof patientSchema>;

export type CreatePatientInput = CreateInput<typeof patientSchema>;

export type UpdatePatientInput = UpdateInput<Patient>;
