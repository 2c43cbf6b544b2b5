/**
 * Append-only audit trail.
 */

import { z } from "zod";
import { idSchema } from "./common.js";

export const activityEntrySchema = z.object({
  id: idSchema,
  timestamp: z.string(),
  user_id: z.string(),
  username: z.string(),
  role: z.string(),

  /** CREATE, UPDATE, DELETE, TRANSFER, ... */
  action: z.string().min(1),

  /** department, store, user, ... */
  entity_type: z.string().min(1),
  entity_id: z.string().nullable(),
  details: z.record(z.unknown()).default({}),
});

export type ActivityEntry = z.infer<typeof activityEntrySchema>;

/** Who performed an action */
export interface Actor {
  user_id: string;
  username: string;
  role: string;
}

export const SYSTEM_ACTOR: Actor = {
  user_id: "system",
  username: "system",
  role: "system",
};

export interface ActivityInput {
  action: string;
  entity_type: string;
  entity_id?: string | null;
  details?: Record<string, unknown>;
}
