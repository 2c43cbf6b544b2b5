/**
 * Generic repository over one collection.
 *
 * Every operation is a full load, in-memory change, full save. Entity
 * repositories wrap this to add foreign-key checks and business rules.
 */

import type { StoredRecord, UpdateInput } from "../types/common.js";
import {
  nextId,
  withUnknownFields,
  type CollectionName,
  type CollectionStore,
  type RecordSchema,
} from "./base.js";
import { NotFoundError, ValidationError } from "./errors.js";

/**
 * Fluent filter over a record source.
 *
 * Builders are immutable: each call returns a new builder. Iterating
 * re-reads the source, so a builder can be iterated any number of times
 * and always reflects the current collection.
 */
export class QueryBuilder<T extends object> implements Iterable<T> {
  private readonly source: () => readonly T[];
  private readonly filters: ReadonlyArray<(record: T) => boolean>;
  private readonly ordering: { field: keyof T; descending: boolean } | null;
  private readonly max: number | null;

  constructor(
    source: () => readonly T[],
    filters: ReadonlyArray<(record: T) => boolean> = [],
    ordering: { field: keyof T; descending: boolean } | null = null,
    max: number | null = null
  ) {
    this.source = source;
    this.filters = filters;
    this.ordering = ordering;
    this.max = max;
  }

  /** Keep records whose field equals value */
  where<K extends keyof T>(field: K, value: T[K]): QueryBuilder<T> {
    return this.filter((record) => record[field] === value);
  }

  /** Keep records whose field is one of values */
  whereIn<K extends keyof T>(field: K, values: readonly T[K][]): QueryBuilder<T> {
    const allowed = new Set<T[K]>(values);
    return this.filter((record) => allowed.has(record[field]));
  }

  /** Keep records whose field contains text, ignoring case */
  whereContains(field: keyof T, text: string): QueryBuilder<T> {
    const needle = text.toLowerCase();
    return this.filter((record) =>
      String(record[field] ?? "").toLowerCase().includes(needle)
    );
  }

  /** Keep records matching an arbitrary predicate */
  filter(predicate: (record: T) => boolean): QueryBuilder<T> {
    return new QueryBuilder(
      this.source,
      [...this.filters, predicate],
      this.ordering,
      this.max
    );
  }

  orderBy(field: keyof T, descending = false): QueryBuilder<T> {
    return new QueryBuilder(this.source, this.filters, { field, descending }, this.max);
  }

  limit(count: number): QueryBuilder<T> {
    return new QueryBuilder(this.source, this.filters, this.ordering, Math.max(0, count));
  }

  *[Symbol.iterator](): Iterator<T> {
    const rows = this.ordering ? this.sorted(this.ordering) : this.source();

    let yielded = 0;
    for (const record of rows) {
      if (this.max !== null && yielded >= this.max) return;
      if (!this.matches(record)) continue;
      yield record;
      yielded++;
    }
  }

  toArray(): T[] {
    return [...this];
  }

  first(): T | null {
    for (const record of this.limit(1)) {
      return record;
    }
    return null;
  }

  count(): number {
    let total = 0;
    for (const _record of this) total++;
    return total;
  }

  private sorted(ordering: { field: keyof T; descending: boolean }): T[] {
    const { field, descending } = ordering;
    return [...this.source()].sort(
      (a, b) => compareValues(a[field], b[field]) * (descending ? -1 : 1)
    );
  }

  private matches(record: T): boolean {
    return this.filters.every((predicate) => predicate(record));
  }
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a ?? "");
  const right = String(b ?? "");
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Generic repository operations.
 */
export interface Repository<T extends StoredRecord, C extends object> {
  /** Collection this repository persists to */
  readonly collection: CollectionName;

  /** Get all entities, in stored order */
  getAll(): T[];

  /** Get an entity by ID; throws NotFoundError */
  getById(id: string): T;

  /** Get an entity by ID, or null */
  findById(id: string): T | null;

  /** Check if an entity exists */
  exists(id: string): boolean;

  /** Count all entities */
  count(): number;

  /** Find entities matching a predicate */
  find(predicate: (entity: T) => boolean): T[];

  /** Start a query over the collection */
  query(): QueryBuilder<T>;

  /** Insert a new entity with the next sequential id */
  create(input: C): T;

  /** Merge a patch into an existing entity */
  update(id: string, patch: UpdateInput<T>): T;

  /** Remove an entity and return it */
  delete(id: string): T;

  /** Build a validated record without writing it */
  stageCreate(input: C, existing: readonly T[], id?: string): T;

  /** Build a validated updated record without writing it */
  stageUpdate(existing: T, patch: UpdateInput<T>): T;

  /** Overwrite the whole collection */
  replaceAll(records: readonly T[]): void;
}

export interface RepositoryOptions<T> {
  collection: CollectionName;

  /** Human-readable entity name used in error messages */
  entity: string;

  schema: RecordSchema<T>;
}

/**
 * Reject a patch that sets fields only a workflow method may change.
 * The update types already omit them; this holds for untyped callers too.
 */
export function rejectWorkflowFields(
  entity: string,
  id: string,
  patch: object,
  fields: readonly string[]
): void {
  const touched = Object.entries(patch)
    .filter(([key, value]) => value !== undefined && fields.includes(key))
    .map(([key]) => key);
  if (touched.length > 0) {
    throw new ValidationError(`${entity} '${id}' cannot change ${touched.join(", ")} directly`);
  }
}

/**
 * Create a repository for a specific entity type and collection.
 */
export function createRepository<T extends StoredRecord, C extends object>(
  store: CollectionStore,
  options: RepositoryOptions<T>
): Repository<T, C> {
  const { collection, entity, schema } = options;

  const load = () => store.load(collection, schema);

  const validate = (candidate: unknown): T => {
    const result = schema.safeParse(candidate);
    if (!result.success) {
      throw new ValidationError(
        `Invalid ${entity}`,
        result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      );
    }
    return withUnknownFields(candidate, result.data);
  };

  const stageCreate = (input: C, existing: readonly T[], id = nextId(existing)): T =>
    validate({ ...input, id, created_at: new Date().toISOString() });

  const stageUpdate = (existing: T, patch: UpdateInput<T>): T =>
    validate({
      ...existing,
      ...patch,
      id: existing.id,
      created_at: existing.created_at,
      updated_at: new Date().toISOString(),
    });

  const findById = (id: string): T | null =>
    load().find((record) => record.id === id) ?? null;

  return {
    collection,

    getAll(): T[] {
      return load();
    },

    getById(id: string): T {
      const record = findById(id);
      if (!record) throw new NotFoundError(entity, id);
      return record;
    },

    findById,

    exists(id: string): boolean {
      return findById(id) !== null;
    },

    count(): number {
      return load().length;
    },

    find(predicate: (entity: T) => boolean): T[] {
      return load().filter(predicate);
    },

    query(): QueryBuilder<T> {
      return new QueryBuilder(load);
    },

    create(input: C): T {
      const records = load();
      const record = stageCreate(input, records);
      store.save(collection, [...records, record]);
      return record;
    },

    update(id: string, patch: UpdateInput<T>): T {
      const records = load();
      const index = records.findIndex((record) => record.id === id);
      const existing = records[index];
      if (!existing) throw new NotFoundError(entity, id);

      const updated = stageUpdate(existing, patch);
      records[index] = updated;
      store.save(collection, records);
      return updated;
    },

    delete(id: string): T {
      const records = load();
      const existing = records.find((record) => record.id === id);
      if (!existing) throw new NotFoundError(entity, id);

      store.save(
        collection,
        records.filter((record) => record.id !== id)
      );
      return existing;
    },

    stageCreate,
    stageUpdate,

    replaceAll(records: readonly T[]): void {
      store.save(collection, records);
    },
  };
}
