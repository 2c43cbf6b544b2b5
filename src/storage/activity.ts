/**
 * Activity Log Storage
 *
 * Append-only audit trail kept in the `history` collection. Entries are
 * never updated or removed by the data layer.
 */

import {
  SYSTEM_ACTOR,
  activityEntrySchema,
  type ActivityEntry,
  type ActivityInput,
  type Actor,
} from "../types/activity.js";
import { nextId, type CollectionStore } from "./base.js";
import { QueryBuilder } from "./repository.js";

export interface HistoryFilter {
  /** Maximum entries returned (default 100) */
  limit?: number;
  userId?: string;
  entityType?: string;
}

export interface UserActivitySummary {
  totalActions: number;
  lastLogin: string | null;
  mostCommonAction: string | null;
  entitiesModified: number;
  actionBreakdown: Record<string, number>;
}

export interface ActivityLog {
  /** Append one entry */
  log(input: ActivityInput, actor?: Actor): ActivityEntry;

  /**
   * Append entries to an in-memory copy of the log without writing it.
   * Returns the full new collection.
   */
  stage(
    existing: readonly ActivityEntry[],
    inputs: readonly ActivityInput[],
    actor?: Actor
  ): ActivityEntry[];

  getAll(): ActivityEntry[];

  query(): QueryBuilder<ActivityEntry>;

  /** Newest first */
  history(filter?: HistoryFilter): ActivityEntry[];

  userActivitySummary(userId: string): UserActivitySummary;
}

export function createActivityLog(store: CollectionStore): ActivityLog {
  const load = () => store.load("history", activityEntrySchema);

  const buildEntry = (
    id: string,
    input: ActivityInput,
    actor: Actor,
    timestamp: string
  ): ActivityEntry =>
    activityEntrySchema.parse({
      id,
      timestamp,
      user_id: actor.user_id,
      username: actor.username,
      role: actor.role,
      action: input.action,
      entity_type: input.entity_type,
      entity_id: input.entity_id ?? null,
      details: input.details ?? {},
    });

  const stage = (
    existing: readonly ActivityEntry[],
    inputs: readonly ActivityInput[],
    actor: Actor = SYSTEM_ACTOR
  ): ActivityEntry[] => {
    const entries = [...existing];
    const timestamp = new Date().toISOString();
    for (const input of inputs) {
      entries.push(buildEntry(nextId(entries), input, actor, timestamp));
    }
    return entries;
  };

  return {
    log(input: ActivityInput, actor: Actor = SYSTEM_ACTOR): ActivityEntry {
      const entries = load();
      const entry = buildEntry(nextId(entries), input, actor, new Date().toISOString());
      store.save("history", [...entries, entry]);
      return entry;
    },

    stage,

    getAll(): ActivityEntry[] {
      return load();
    },

    query(): QueryBuilder<ActivityEntry> {
      return new QueryBuilder(load);
    },

    history(filter: HistoryFilter = {}): ActivityEntry[] {
      // Reversed first so entries sharing a timestamp still come out newest first
      let query = new QueryBuilder(() => load().reverse());
      if (filter.userId) query = query.where("user_id", filter.userId);
      if (filter.entityType) query = query.where("entity_type", filter.entityType);
      return query
        .orderBy("timestamp", true)
        .limit(filter.limit ?? 100)
        .toArray();
    },

    userActivitySummary(userId: string): UserActivitySummary {
      const entries = load().filter((entry) => entry.user_id === userId);

      const actionBreakdown: Record<string, number> = {};
      const entities = new Set<string>();
      let lastLogin: string | null = null;

      for (const entry of entries) {
        actionBreakdown[entry.action] = (actionBreakdown[entry.action] ?? 0) + 1;
        if (entry.entity_id) {
          entities.add(`${entry.entity_type}:${entry.entity_id}`);
        }
        if (entry.action === "LOGIN" && (lastLogin === null || entry.timestamp > lastLogin)) {
          lastLogin = entry.timestamp;
        }
      }

      let mostCommonAction: string | null = null;
      let highest = 0;
      for (const [action, count] of Object.entries(actionBreakdown)) {
        if (count > highest) {
          mostCommonAction = action;
          highest = count;
        }
      }

      return {
        totalActions: entries.length,
        lastLogin,
        mostCommonAction,
        entitiesModified: entities.size,
        actionBreakdown,
      };
    },
  };
}
