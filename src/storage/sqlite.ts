/**
 * SQLite Storage Backend
 *
 * Same whole-collection contract as the JSON files, kept in one
 * better-sqlite3 database. Each save replaces a collection inside a
 * transaction, and batch() wraps several saves in one outer transaction.
 */

import Database from "better-sqlite3";
import * as fs from "node:fs";
import * as path from "node:path";
import {
  assertUniqueIds,
  parseCollection,
  type CollectionName,
  type CollectionStore,
  type RecordSchema,
} from "./base.js";
import { StorageError } from "./errors.js";

/**
 * Initialize database schema.
 */
function initializeSchema(database: Database.Database): void {
  database.exec(`
    -- One row per record; position keeps insertion order
    CREATE TABLE IF NOT EXISTS records (
      collection TEXT NOT NULL,
      position INTEGER NOT NULL,
      id TEXT NOT NULL,
      data TEXT NOT NULL,
      PRIMARY KEY (collection, position)
    );

    CREATE UNIQUE INDEX IF NOT EXISTS idx_records_collection_id ON records(collection, id);

    -- Collections that have been saved at least once
    CREATE TABLE IF NOT EXISTS collections (
      name TEXT PRIMARY KEY,
      updated_at TEXT NOT NULL
    );
  `);
}

/**
 * Open (or create) a SQLite-backed collection store.
 *
 * @param filename - Database file, or ":memory:"
 */
export function createSqliteStore(filename: string): CollectionStore {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  initializeSchema(db);

  const selectRows = db.prepare<[string], { data: string }>(
    "SELECT data FROM records WHERE collection = ? ORDER BY position"
  );
  const deleteRows = db.prepare("DELETE FROM records WHERE collection = ?");
  const insertRow = db.prepare(
    "INSERT INTO records (collection, position, id, data) VALUES (?, ?, ?, ?)"
  );
  const touchCollection = db.prepare(`
    INSERT INTO collections (name, updated_at) VALUES (?, ?)
    ON CONFLICT(name) DO UPDATE SET updated_at = excluded.updated_at
  `);
  const selectCollection = db.prepare<[string]>("SELECT 1 FROM collections WHERE name = ? LIMIT 1");

  const replaceCollection = db.transaction(
    (collection: CollectionName, records: readonly { id: string }[]) => {
      deleteRows.run(collection);
      records.forEach((record, position) => {
        insertRow.run(collection, position, record.id, JSON.stringify(record));
      });
      touchCollection.run(collection, new Date().toISOString());
    }
  );

  return {
    kind: "sqlite",

    load<T>(collection: CollectionName, schema: RecordSchema<T>): T[] {
      let rows: { data: string }[];
      try {
        rows = selectRows.all(collection);
      } catch (err) {
        throw new StorageError(collection, "query failed", { cause: err });
      }

      const raw: unknown[] = [];
      for (const row of rows) {
        try {
          raw.push(JSON.parse(row.data));
        } catch (err) {
          throw new StorageError(collection, "row is not valid JSON", { cause: err });
        }
      }
      return parseCollection(collection, raw, schema);
    },

    save(collection: CollectionName, records: readonly { id: string }[]): void {
      assertUniqueIds(collection, records);
      try {
        replaceCollection(collection, records);
      } catch (err) {
        throw new StorageError(collection, "write failed", { cause: err });
      }
    },

    exists(collection: CollectionName): boolean {
      return selectCollection.get(collection) !== undefined;
    },

    batch<R>(fn: () => R): R {
      return db.transaction(fn)();
    },

    close(): void {
      db.close();
    },
  };
}
