/**
 * Storage Base
 *
 * Storage primitives shared by every backend: collection names, the
 * CollectionStore contract, id generation, and the JSON file store.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import type { z } from "zod";
import { DuplicateError, StorageError } from "./errors.js";

/**
 * Persisted collections, one file (or table partition) each.
 * The activity log lives in `history`.
 */
export const COLLECTIONS = [
  "users",
  "medicines",
  "patients",
  "doctors",
  "suppliers",
  "departments",
  "stores",
  "purchases",
  "consumption",
  "transfers",
  "history",
] as const;

export type CollectionName = (typeof COLLECTIONS)[number];

/** Schema that validates one stored record of type T */
export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Whole-collection read/write operations.
 */
export interface CollectionStore {
  /** Backend identifier */
  readonly kind: "json" | "sqlite";

  /** Load a collection in stored order; an absent collection is empty */
  load<T>(collection: CollectionName, schema: RecordSchema<T>): T[];

  /** Replace a collection with the given records, atomically */
  save(collection: CollectionName, records: readonly { id: string }[]): void;

  /** Whether the collection has ever been saved */
  exists(collection: CollectionName): boolean;

  /**
   * Run several saves as one unit. Atomic on SQLite; on the JSON backend
   * the saves simply run in order.
   */
  batch<R>(fn: () => R): R;

  /** Release any handle held by the backend */
  close(): void;
}

const NUMERIC_ID = /^\d+$/;
const MIN_ID_WIDTH = 2;

/**
 * Next sequential id: max numeric id + 1, zero-padded to the widest
 * numeric id (at least two digits). Non-numeric ids are skipped.
 */
export function nextId(records: readonly { id: string }[]): string {
  let max = 0n;
  let width = MIN_ID_WIDTH;

  for (const { id } of records) {
    if (!NUMERIC_ID.test(id)) continue;
    const value = BigInt(id);
    if (value > max) max = value;
    width = Math.max(width, id.length);
  }

  return (max + 1n).toString().padStart(width, "0");
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Put back the fields a schema does not declare, so fields written by
 * other tools survive a load-modify-save.
 */
export function withUnknownFields<T>(raw: unknown, parsed: T): T {
  if (!isPlainObject(raw) || !isPlainObject(parsed)) return parsed;
  return { ...raw, ...parsed };
}

/**
 * Validate raw parsed JSON as a collection of T. Undeclared fields are kept.
 */
export function parseCollection<T>(
  collection: CollectionName,
  raw: unknown,
  schema: RecordSchema<T>
): T[] {
  if (!Array.isArray(raw)) {
    throw new StorageError(collection, "expected an array of records");
  }

  return raw.map((item, index) => {
    const result = schema.safeParse(item);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(record)"}: ${issue.message}`)
        .join("; ");
      throw new StorageError(collection, `malformed record at index ${index}: ${issues}`);
    }
    return withUnknownFields(item, result.data);
  });
}

/**
 * Reject a collection that repeats an id.
 */
export function assertUniqueIds(
  collection: CollectionName,
  records: readonly { id: string }[]
): void {
  const seen = new Set<string>();
  for (const { id } of records) {
    if (seen.has(id)) {
      throw new DuplicateError(collection, "id", id);
    }
    seen.add(id);
  }
}

/**
 * Create a store that keeps each collection in `<dataDir>/<name>.json`.
 */
export function createJsonStore(dataDir: string): CollectionStore {
  fs.mkdirSync(dataDir, { recursive: true });

  const getFilePath = (collection: CollectionName) =>
    path.join(dataDir, `${collection}.json`);

  return {
    kind: "json",

    load<T>(collection: CollectionName, schema: RecordSchema<T>): T[] {
      let json: string;
      try {
        json = fs.readFileSync(getFilePath(collection), "utf-8");
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === "ENOENT") {
          return [];
        }
        throw new StorageError(collection, "read failed", { cause: err });
      }

      let raw: unknown;
      try {
        raw = JSON.parse(json);
      } catch (err) {
        throw new StorageError(collection, "file is not valid JSON", { cause: err });
      }

      return parseCollection(collection, raw, schema);
    },

    save(collection: CollectionName, records: readonly { id: string }[]): void {
      assertUniqueIds(collection, records);

      const filePath = getFilePath(collection);
      // Same directory as the target so the rename never crosses devices
      const tmpPath = `${filePath}.${randomUUID()}.tmp`;
      const json = JSON.stringify(records, null, 2);

      try {
        fs.writeFileSync(tmpPath, json, "utf-8");
        fs.renameSync(tmpPath, filePath);
      } catch (err) {
        fs.rmSync(tmpPath, { force: true });
        throw new StorageError(collection, "write failed", { cause: err });
      }
    },

    exists(collection: CollectionName): boolean {
      return fs.existsSync(getFilePath(collection));
    },

    batch<R>(fn: () => R): R {
      return fn();
    },

    close(): void {},
  };
}
