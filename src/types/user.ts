/**
 * User accounts.
 */

import { z } from "zod";
import { storedRecordSchema, type CreateInput, type UpdateInput } from "./common.js";

export const USER_ROLES = ["admin", "department_user"] as const;

export type UserRole = (typeof USER_ROLES)[number];

export const userSchema = storedRecordSchema.extend({
  username: z.string().min(1),

  /** scrypt hash, never plain text once stored */
  password: z.string().min(1),

  role: z.enum(USER_ROLES).default("department_user"),
  name: z.string().default(""),
  email: z.string().default(""),

  /** Owning department; admins usually have none */
  department_id: z.string().nullable().default(null),

  failed_login_attempts: z.number().int().nonnegative().default(0),
  account_locked: z.boolean().default(false),
  password_changed_at: z.string().optional(),
  must_change_password: z.boolean().default(false),
});

export type User = z.infer<typeof userSchema>;

/** Plain-text password in; the repository hashes it */
export type CreateUserInput = CreateInput<typeof userSchema>;

export type UpdateUserInput = UpdateInput<User>;
