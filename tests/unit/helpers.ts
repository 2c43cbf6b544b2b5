/**
 * Shared fixtures for storage and service tests.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import { createDatabase, type PharmacyDatabase } from "../../src/database.js";
import { createJsonStore } from "../../src/storage/base.js";
import { createSqliteStore } from "../../src/storage/sqlite.js";
import { initDatabase } from "../../src/services/guard.js";

export const ADMIN = { username: "admin", password: "Admin#Pass1" };

/** Placeholder password that passes the strength rules */
export const VALID_PASSWORD = "Test#Pass99";

export function memoryDatabase(): PharmacyDatabase {
  return createDatabase(createSqliteStore(":memory:"));
}

export interface TempJsonDatabase {
  db: PharmacyDatabase;
  dataDir: string;
  cleanup(): void;
}

export function tempJsonDatabase(prefix = "pharmacy-"): TempJsonDatabase {
  const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const db = createDatabase(createJsonStore(dataDir));
  return {
    db,
    dataDir,
    cleanup: () => {
      db.close();
      fs.rmSync(dataDir, { recursive: true, force: true });
    },
  };
}

/** Silence the tagged console output of the data layer */
export function quietConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}

export interface Hospital {
  supplierId: string;
  paracetamolId: string;
  amoxicillinId: string;
  icu: { departmentId: string; storeId: string; userId: string };
  surgery: { departmentId: string; storeId: string; userId: string };
  radiology: { departmentId: string; storeId: string };
}

/**
 * Four departments with one store each and three users:
 *
 *   01 Main Pharmacy  store 01  inventory {"02": 194}
 *   02 ICU            store 02  inventory {"02": 13}   user icu_user
 *   03 Surgery        store 03  inventory {}           user surgery_user
 *   04 Radiology      store 04  inventory {}
 *
 * plus the admin user, supplier 01 and medicines 01 (Paracetamol) and
 * 02 (Amoxicillin).
 */
export function seedHospital(db: PharmacyDatabase): Hospital {
  initDatabase(db, { admin: ADMIN });

  const supplier = db.suppliers.create({ name: "Acme Pharma" });
  const paracetamol = db.medicines.create({
    name: "Paracetamol",
    supplier_id: supplier.id,
    low_stock_limit: 20,
  });
  const amoxicillin = db.medicines.create({
    name: "Amoxicillin",
    supplier_id: supplier.id,
    low_stock_limit: 50,
  });

  const icu = db.departments.createWithStoreAndUser({ name: "ICU" });
  const surgery = db.departments.createWithStoreAndUser({ name: "Surgery" });
  const radiology = db.departments.create({ name: "Radiology" });
  const radiologyStore = db.stores.create({
    name: "Radiology Store",
    department_id: radiology.id,
  });

  db.stores.update(icu.store.id, { inventory: { [amoxicillin.id]: 13 } });
  db.stores.update("01", { inventory: { [amoxicillin.id]: 194 } });

  return {
    supplierId: supplier.id,
    paracetamolId: paracetamol.id,
    amoxicillinId: amoxicillin.id,
    icu: { departmentId: icu.department.id, storeId: icu.store.id, userId: icu.user.id },
    surgery: {
      departmentId: surgery.department.id,
      storeId: surgery.store.id,
      userId: surgery.user.id,
    },
    radiology: { departmentId: radiology.id, storeId: radiologyStore.id },
  };
}
