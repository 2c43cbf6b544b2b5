/**
 * Hospital departments. Each owns exactly one store.
 */

import { z } from "zod";
import { storedRecordSchema, type CreateInput, type UpdateInput } from "./common.js";

export const departmentSchema = storedRecordSchema.extend({
  name: z.string().trim().min(1),
  description: z.string().default(""),
  responsible_person: z.string().default(""),
  telephone: z.string().default(""),
  notes: z.string().default(""),
});

export type Department = z.infer<typeof departmentSchema>;

export type CreateDepartmentInput = CreateInput<typeof departmentSchema>;

export type UpdateDepartmentInput = UpdateInput<Department>;
