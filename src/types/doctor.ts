import { z } from "zod";
import { storedRecordSchema, type CreateInput, type UpdateInput } from "./common.js";

export const doctorSchema = storedRecordSchema.extend({
  name: z.string().trim().min(1),
  gender: z.string().default(""),
  nationality: z.string().default(""),
  department_id: z.string().optional(),
  specialist: z.string().default(""),
  position: z.string().default(""),
  type: z.string().default(""),
  mobile_no: z.string().default(""),
  email: z.string().default(""),
  notes: z.string().default(""),
});

export type Doctor = z.infer<typeof doctorSchema>;

export type CreateDoctorInput = CreateInput<typeof doctorSchema>;

export type UpdateDoctorInput = UpdateInput<Doctor>;
