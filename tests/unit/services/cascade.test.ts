import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createDatabase, type PharmacyDatabase } from "../../../src/database.js";
import type { CollectionStore } from "../../../src/storage/base.js";
import { createSqliteStore } from "../../../src/storage/sqlite.js";
import {
  CascadeError,
  NotFoundError,
  ProtectedEntityError,
  StorageError,
} from "../../../src/storage/errors.js";
import type { Actor } from "../../../src/types/activity.js";
import {
  memoryDatabase,
  quietConsole,
  seedHospital,
  tempJsonDatabase,
  type Hospital,
  type TempJsonDatabase,
} from "../helpers.js";

const adminActor: Actor = { user_id: "01", username: "admin", role: "admin" };

/** Counts and inventories the cascade is expected to touch */
function snapshot(db: PharmacyDatabase) {
  return {
    stores: db.stores.getAll(),
    departments: db.departments.getAll(),
    users: db.users.getAll(),
    transfers: db.transfers.getAll(),
    history: db.activity.getAll(),
  };
}

const backends: Array<[string, () => { db: PharmacyDatabase; cleanup(): void }]> = [
  [
    "sqlite",
    () => {
      const db = memoryDatabase();
      return { db, cleanup: () => db.close() };
    },
  ],
  ["json", () => tempJsonDatabase("pharmacy-cascade-")],
];

describe.each(backends)("Cascade orchestrator (%s)", (_name, open) => {
  let db: PharmacyDatabase;
  let cleanup: () => void;
  let hospital: Hospital;

  beforeEach(() => {
    quietConsole();
    ({ db, cleanup } = open());
    hospital = seedHospital(db);
  });

  afterEach(() => {
    cleanup();
  });

  it("starts from four stores, four departments and three users", () => {
    expect(db.stores.count()).toBe(4);
    expect(db.departments.count()).toBe(4);
    expect(db.users.count()).toBe(3);
    expect(db.stores.getById(hospital.icu.storeId).inventory).toEqual({ "02": 13 });
    expect(db.stores.getById("01").inventory).toEqual({ "02": 194 });
  });

  it("moves stock to the main store and removes store, department and users", () => {
    const result = db.orchestrator.deleteStoreCascading(hospital.icu.storeId, adminActor);

    expect(db.stores.count()).toBe(3);
    expect(db.departments.count()).toBe(3);
    expect(db.users.count()).toBe(2);
    expect(db.stores.exists(hospital.icu.storeId)).toBe(false);
    expect(db.departments.exists(hospital.icu.departmentId)).toBe(false);
    expect(db.users.exists(hospital.icu.userId)).toBe(false);
    expect(db.users.exists(hospital.surgery.userId)).toBe(true);
    expect(db.stores.getById("01").inventory).toEqual({ "02": 207 });

    const transfers = db.transfers.getAll();
    expect(transfers).toHaveLength(1);
    expect(transfers[0]).toMatchObject({
      from_store_id: hospital.icu.storeId,
      to_store_id: "01",
      medicine_id: "02",
      quantity: 13,
      reason: "cascade-delete",
      status: "completed",
    });

    expect(result).toMatchObject({
      storeId: hospital.icu.storeId,
      departmentId: hospital.icu.departmentId,
      movedInventory: { "02": 13 },
      removedUserIds: [hospital.icu.userId],
      removedDepartmentId: hospital.icu.departmentId,
    });
    expect(result.transfers).toEqual(transfers);
    expect(result.states).toEqual([
      "Requested",
      "ValidateProtection",
      "ComputeInventorySnapshot",
      "StageTransfers",
      "StageUserRemoval",
      "StageStoreRemoval",
      "StageDepartmentRemoval",
      "Commit",
      "Completed",
    ]);
    expect(db.orchestrator.state).toBe("Completed");
  });

  it("logs one activity entry per step", () => {
    const before = db.activity.getAll().length;
    db.orchestrator.deleteStoreCascading(hospital.icu.storeId, adminActor);

    const entries = db.activity.getAll().slice(before);
    expect(entries.map((e) => [e.action, e.entity_type, e.entity_id, e.username])).toEqual([
      ["TRANSFER", "store", hospital.icu.storeId, "admin"],
      ["DELETE", "user", null, "admin"],
      ["DELETE", "store", hospital.icu.storeId, "admin"],
      ["DELETE", "department", hospital.icu.departmentId, "admin"],
    ]);
    expect(entries[1]?.details).toEqual({
      department_id: hospital.icu.departmentId,
      user_ids: [hospital.icu.userId],
    });
  });

  it("skips zero quantities and leaves the main store alone when nothing moves", () => {
    db.stores.update(hospital.surgery.storeId, { inventory: { "01": 0 } });

    const result = db.orchestrator.deleteStoreCascading(hospital.surgery.storeId);

    expect(result.transfers).toEqual([]);
    expect(result.movedInventory).toEqual({});
    expect(db.transfers.count()).toBe(0);
    expect(db.stores.getById("01").inventory).toEqual({ "02": 194 });
    expect(db.stores.count()).toBe(3);
  });

  it("refuses the main store and writes nothing", () => {
    const before = snapshot(db);

    expect(() => db.orchestrator.deleteStoreCascading("01")).toThrow(
      new ProtectedEntityError("Store", "01")
    );
    expect(snapshot(db)).toEqual(before);
    expect(db.orchestrator.state).toBe("Requested");
  });

  it("refuses a store owned by the main department", () => {
    db.stores.replaceAll(
      db.stores
        .getAll()
        .map((s) => (s.id === hospital.radiology.storeId ? { ...s, department_id: "01" } : s))
    );
    const before = snapshot(db);

    expect(() => db.orchestrator.deleteStoreCascading(hospital.radiology.storeId)).toThrow(
      new ProtectedEntityError("Department", "01")
    );
    expect(snapshot(db)).toEqual(before);
  });

  it("fails with NotFoundError for an unknown store", () => {
    expect(() => db.orchestrator.deleteStoreCascading("09")).toThrow(
      new NotFoundError("Store", "09")
    );
  });

  it("aborts when the main store is missing", () => {
    db.stores.replaceAll(db.stores.getAll().filter((s) => s.id !== "01"));
    const before = snapshot(db);

    expect(() => db.orchestrator.deleteStoreCascading(hospital.icu.storeId)).toThrow(
      CascadeError
    );
    expect(snapshot(db)).toEqual(before);
  });

  it("aborts rather than remove every admin", () => {
    db.users.update("01", { department_id: hospital.icu.departmentId });
    const before = snapshot(db);

    expect(() => db.orchestrator.deleteStoreCascading(hospital.icu.storeId)).toThrow(
      `Deleting store ${hospital.icu.storeId} would remove every admin user`
    );
    expect(snapshot(db)).toEqual(before);
  });

  it("still cascades after the department was deleted on its own", () => {
    db.orchestrator.deleteDepartmentOnly(hospital.icu.departmentId);
    const before = db.activity.getAll().length;

    const result = db.orchestrator.deleteStoreCascading(hospital.icu.storeId);

    expect(result.removedDepartmentId).toBeNull();
    expect(db.users.exists(hospital.icu.userId)).toBe(false);
    expect(db.stores.getById("01").inventory).toEqual({ "02": 207 });
    expect(db.activity.getAll().slice(before).map((e) => e.entity_type)).toEqual([
      "store",
      "user",
      "store",
    ]);
  });

  describe("deleteDepartmentOnly", () => {
    it("leaves the store, its inventory and users unchanged", () => {
      const storeBefore = db.stores.getById(hospital.icu.storeId);

      const removed = db.orchestrator.deleteDepartmentOnly(hospital.icu.departmentId, adminActor);

      expect(removed.name).toBe("ICU");
      expect(db.departments.exists(hospital.icu.departmentId)).toBe(false);
      expect(db.stores.getById(hospital.icu.storeId)).toEqual(storeBefore);
      expect(db.users.exists(hospital.icu.userId)).toBe(true);
      expect(db.transfers.count()).toBe(0);
      expect(db.activity.history({ limit: 1 })[0]).toMatchObject({
        action: "DELETE",
        entity_type: "department",
        entity_id: hospital.icu.departmentId,
        username: "admin",
        details: { name: "ICU", cascade: false },
      });
    });

    it("protects the main department and rejects unknown ids", () => {
      expect(() => db.orchestrator.deleteDepartmentOnly("01")).toThrow(ProtectedEntityError);
      expect(() => db.orchestrator.deleteDepartmentOnly("09")).toThrow(NotFoundError);
    });
  });
});

describe("Cascade commit on SQLite", () => {
  let inner: CollectionStore;
  let failDepartments: boolean;

  beforeEach(() => {
    quietConsole();
    inner = createSqliteStore(":memory:");
    failDepartments = false;
  });

  afterEach(() => {
    inner.close();
  });

  it("rolls back every collection when a write fails", () => {
    const store: CollectionStore = {
      ...inner,
      save(collection, records) {
        if (failDepartments && collection === "departments") {
          throw new StorageError(collection, "write failed");
        }
        inner.save(collection, records);
      },
    };
    const db = createDatabase(store);
    const hospital = seedHospital(db);
    const before = snapshot(db);

    failDepartments = true;
    expect(() => db.orchestrator.deleteStoreCascading(hospital.icu.storeId)).toThrow(
      "departments: write failed"
    );

    expect(snapshot(db)).toEqual(before);
    expect(db.orchestrator.state).toBe("Requested");
    expect(db.orchestrator.states.slice(-2)).toEqual(["Commit", "Abort"]);
  });
});

describe("Cascade commit on JSON files", () => {
  let temp: TempJsonDatabase;

  beforeEach(() => {
    quietConsole();
    temp = tempJsonDatabase("pharmacy-partial-");
  });

  afterEach(() => {
    temp.cleanup();
  });

  it("keeps the collections written before a failed save", () => {
    const inner = temp.db.store;
    let failDepartments = false;
    const store: CollectionStore = {
      ...inner,
      save(collection, records) {
        if (failDepartments && collection === "departments") {
          throw new StorageError(collection, "write failed");
        }
        inner.save(collection, records);
      },
    };
    const db = createDatabase(store);
    const hospital = seedHospital(db);
    const before = snapshot(db);

    failDepartments = true;
    expect(() => db.orchestrator.deleteStoreCascading(hospital.icu.storeId)).toThrow(
      "departments: write failed"
    );

    expect(db.transfers.count()).toBe(1);
    expect(db.users.exists(hospital.icu.userId)).toBe(false);
    expect(db.stores.exists(hospital.icu.storeId)).toBe(false);
    expect(db.departments.getAll()).toEqual(before.departments);
    expect(db.activity.getAll()).toEqual(before.history);
    expect(db.orchestrator.state).toBe("Requested");
  });
});
