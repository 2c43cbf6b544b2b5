import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { PharmacyDatabase } from "../../../src/database.js";
import { initDatabase } from "../../../src/services/guard.js";
import { verifyPassword } from "../../../src/storage/users.js";
import {
  DuplicateError,
  ForeignKeyError,
  ProtectedEntityError,
  ValidationError,
} from "../../../src/storage/errors.js";
import { memoryDatabase, quietConsole } from "../helpers.js";

describe("Departments", () => {
  let db: PharmacyDatabase;

  beforeEach(() => {
    quietConsole();
    db = memoryDatabase();
    initDatabase(db);
  });

  afterEach(() => {
    db.close();
  });

  it("rejects a name already used, ignoring case and padding", () => {
    db.departments.create({ name: "ICU" });
    expect(() => db.departments.create({ name: " icu " })).toThrow(
      new DuplicateError("Department", "name", "icu")
    );
    expect(() => db.departments.create({ name: "main pharmacy" })).toThrow(DuplicateError);
  });

  it("allows renaming a department to its own name", () => {
    const icu = db.departments.create({ name: "ICU" });
    expect(db.departments.update(icu.id, { name: "icu" }).name).toBe("icu");

    db.departments.create({ name: "Surgery" });
    expect(() => db.departments.update(icu.id, { name: "SURGERY" })).toThrow(DuplicateError);
  });

  it("protects the main department", () => {
    expect(() => db.departments.delete("01")).toThrow(
      new ProtectedEntityError("Department", "01")
    );
    expect(db.departments.exists("01")).toBe(true);
  });

  it("deletes only the department record", () => {
    const { department, store, user } = db.departments.createWithStoreAndUser({ name: "ICU" });
    db.stores.update(store.id, { inventory: { "02": 13 } });

    db.departments.delete(department.id);

    expect(db.departments.exists(department.id)).toBe(false);
    expect(db.stores.getById(store.id).inventory).toEqual({ "02": 13 });
    expect(db.users.exists(user.id)).toBe(true);
  });

  it("finds a department by name", () => {
    db.departments.create({ name: "Radiology" });
    expect(db.departments.getByName("RADIOLOGY")?.id).toBe("02");
    expect(db.departments.getByName("Oncology")).toBeNull();
  });

  it("creates a department with its store and user", () => {
    const setup = db.departments.createWithStoreAndUser({
      name: "Intensive Care",
      responsible_person: "Dr. Grey",
    });

    expect(setup.department).toMatchObject({ id: "02", name: "Intensive Care" });
    expect(setup.store).toMatchObject({
      id: "02",
      name: "Intensive Care Store",
      department_id: "02",
      inventory: {},
    });
    expect(setup.username).toBe("intensive_care_user");
    expect(setup.user).toMatchObject({
      username: "intensive_care_user",
      role: "department_user",
      department_id: "02",
    });
    expect(verifyPassword(setup.password, db.users.getById(setup.user.id).password)).toBe(true);
    expect(db.stores.storeByDepartment("02")?.id).toBe("02");
  });

  it("reuses the store left behind when a department id comes back", () => {
    const icu = db.departments.createWithStoreAndUser({ name: "ICU" });
    db.stores.update(icu.store.id, { inventory: { "02": 13 } });
    db.departments.delete(icu.department.id);

    const oncology = db.departments.createWithStoreAndUser({ name: "Oncology" });

    expect(oncology.department.id).toBe(icu.department.id);
    expect(oncology.store.id).toBe(icu.store.id);
    expect(oncology.store.inventory).toEqual({ "02": 13 });
    expect(db.stores.find((s) => s.department_id === oncology.department.id)).toHaveLength(1);
    expect(db.stores.count()).toBe(2);
    expect(db.users.getById(oncology.user.id).department_id).toBe(oncology.department.id);
  });

  it("writes nothing when the name is taken", () => {
    db.departments.create({ name: "ICU" });
    expect(() => db.departments.createWithStoreAndUser({ name: "ICU" })).toThrow(DuplicateError);
    expect(db.stores.count()).toBe(1);
    expect(db.users.count()).toBe(0);
  });
});

describe("Stores", () => {
  let db: PharmacyDatabase;

  beforeEach(() => {
    quietConsole();
    db = memoryDatabase();
    initDatabase(db);
  });

  afterEach(() => {
    db.close();
  });

  it("requires an existing department without a store", () => {
    expect(() => db.stores.create({ name: "Ghost Store", department_id: "09" })).toThrow(
      ForeignKeyError
    );
    expect(() => db.stores.create({ name: "Second Main", department_id: "01" })).toThrow(
      new ValidationError("Department '01' already has store '01'")
    );
  });

  it("refuses to move a store onto a department that has one", () => {
    const icu = db.departments.createWithStoreAndUser({ name: "ICU" });
    expect(() => db.stores.update(icu.store.id, { department_id: "01" })).toThrow(ValidationError);
    expect(db.stores.update(icu.store.id, { location: "Floor 2" }).location).toBe("Floor 2");
  });

  it("protects the main store and stores holding stock", () => {
    expect(() => db.stores.delete("01")).toThrow(new ProtectedEntityError("Store", "01"));

    const department = db.departments.create({ name: "Radiology" });
    const store = db.stores.create({
      name: "Radiology Store",
      department_id: department.id,
      inventory: { "01": 4 },
    });
    expect(() => db.stores.delete(store.id)).toThrow(ValidationError);

    db.stores.update(store.id, { inventory: { "01": 0 } });
    expect(db.stores.delete(store.id).id).toBe(store.id);
  });

  it("returns the main store", () => {
    expect(db.stores.mainStore()?.name).toBe("Main Pharmacy Store");
  });

  describe("stock queries", () => {
    let paracetamol: string;
    let amoxicillin: string;
    let icuDepartment: string;

    beforeEach(() => {
      const supplier = db.suppliers.create({ name: "Acme Pharma" });
      paracetamol = db.medicines.create({
        name: "Paracetamol",
        supplier_id: supplier.id,
        low_stock_limit: 20,
      }).id;
      amoxicillin = db.medicines.create({
        name: "Amoxicillin",
        supplier_id: supplier.id,
        low_stock_limit: 10,
      }).id;
      const icu = db.departments.createWithStoreAndUser({ name: "ICU" });
      icuDepartment = icu.department.id;

      db.stores.update("01", { inventory: { [paracetamol]: 25, [amoxicillin]: 40 } });
      db.stores.update(icu.store.id, { inventory: { [paracetamol]: 5 } });
    });

    it("reports stock per department or in total", () => {
      expect(db.stores.medicineStock(paracetamol)).toBe(30);
      expect(db.stores.medicineStock(paracetamol, icuDepartment)).toBe(5);
      expect(db.stores.medicineStock(amoxicillin, icuDepartment)).toBe(0);
      expect(db.stores.medicineStock(paracetamol, "99")).toBe(0);
    });

    it("classifies stock against the low-stock limit", () => {
      // limit 20: low <= 20 < medium <= 30 < good
      expect(db.stores.stockStatus(paracetamol)).toBe("medium");
      expect(db.stores.stockStatus(paracetamol, icuDepartment)).toBe("low");
      expect(db.stores.stockStatus(amoxicillin)).toBe("good");
      expect(db.stores.stockStatus("99")).toBe("unknown");
    });

    it("lists medicines at or below their limit", () => {
      const low = db.stores.lowStockMedicines(icuDepartment);
      expect(
        low.map((entry) => [entry.medicine.name, entry.currentStock, entry.lowStockLimit])
      ).toEqual([
        ["Paracetamol", 5, 20],
        ["Amoxicillin", 0, 10],
      ]);
      expect(db.stores.lowStockMedicines()).toEqual([]);
    });

    it("lists medicines with stock available", () => {
      expect(
        db.stores.availableMedicines(icuDepartment).map((m) => [m.name, m.available_stock])
      ).toEqual([["Paracetamol", 5]]);
      expect(db.stores.availableMedicines().map((m) => [m.name, m.available_stock])).toEqual([
        ["Paracetamol", 30],
        ["Amoxicillin", 40],
      ]);
    });
  });
});
