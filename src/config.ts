/**
 * Runtime configuration from environment variables.
 */

import * as path from "node:path";

/**
 * Storage backend type.
 */
export type StorageBackend = "json" | "sqlite";

export interface PharmacyConfig {
  /** Which CollectionStore to open */
  backend: StorageBackend;

  /** Directory holding `<collection>.json` files */
  dataDir: string;

  /** SQLite database file (sqlite backend only) */
  sqliteFile: string;
}

/**
 * Get the current storage backend from environment.
 */
export function getStorageBackend(env: NodeJS.ProcessEnv = process.env): StorageBackend {
  const backend = env.STORAGE_BACKEND?.toLowerCase();
  if (backend === "sqlite") return "sqlite";
  return "json";
}

function resolveSqliteFile(file: string | undefined, dataDir: string): string {
  if (!file) return path.join(dataDir, "pharmacy.db");
  return file === ":memory:" ? file : path.resolve(file);
}

/**
 * Resolve configuration. Explicit overrides win over the environment;
 * relative paths are taken from the working directory.
 */
export function loadConfig(
  overrides: Partial<PharmacyConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): PharmacyConfig {
  const dataDir = path.resolve(
    overrides.dataDir ?? env.PHARMACY_DATA_DIR ?? path.join(process.cwd(), "data")
  );
  const sqliteFile = overrides.sqliteFile ?? env.PHARMACY_DB_FILE;
  return {
    backend: overrides.backend ?? getStorageBackend(env),
    dataDir,
    sqliteFile: resolveSqliteFile(sqliteFile, dataDir),
  };
}
