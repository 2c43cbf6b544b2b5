/**
 * Storage Layer
 *
 * Collection stores (JSON files or SQLite), the generic repository and
 * the per-entity repositories built on it.
 *
 * Set STORAGE_BACKEND=sqlite to keep every collection in one SQLite file.
 */

// Re-export base utilities
export {
  COLLECTIONS,
  createJsonStore,
  nextId,
  parseCollection,
  assertUniqueIds,
  type CollectionName,
  type CollectionStore,
  type RecordSchema,
} from "./base.js";

export { createSqliteStore } from "./sqlite.js";

export {
  QueryBuilder,
  createRepository,
  type Repository,
  type RepositoryOptions,
} from "./repository.js";

export { createTables, type Tables } from "./tables.js";

export * from "./errors.js";

// Re-export entity repositories
export * from "./activity.js";
export * from "./users.js";
export * from "./medicines.js";
export * from "./suppliers.js";
export * from "./people.js";
export * from "./departments.js";
export * from "./stores.js";
export * from "./purchases.js";
export * from "./consumption.js";
export * from "./transfers.js";
