/**
 * Pharmacy data layer.
 *
 * Open a database with openDatabase(), then work through its repositories
 * and the cascade orchestrator.
 */

export { openDatabase, createDatabase } from "./database.js";
export type { PharmacyDatabase, OpenDatabaseOptions } from "./database.js";

export { loadConfig, getStorageBackend } from "./config.js";
export type { PharmacyConfig, StorageBackend } from "./config.js";

export { CascadeOrchestrator } from "./services/cascade.js";
export type { CascadeResult, CascadeState } from "./services/cascade.js";

export { ensureMainEntities, initDatabase } from "./services/guard.js";
export type { EnsureMainResult, InitOptions, InitResult } from "./services/guard.js";

export * from "./storage/index.js";
export * from "./types/index.js";
