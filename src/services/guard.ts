/**
 * Startup checks for the protected main department and main store.
 *
 * Run once per process start via initDatabase(); both functions are
 * idempotent.
 */

import type { PharmacyDatabase } from "../database.js";
import { COLLECTIONS, type CollectionName } from "../storage/base.js";
import { MAIN_ID } from "../types/common.js";

const MAIN_DEPARTMENT = {
  name: "Main Pharmacy",
  description: "Main hospital pharmacy department",
  notes: "Main hospital pharmacy department - System Protected",
};

const MAIN_STORE = {
  name: "Main Pharmacy Store",
  department_id: MAIN_ID,
  location: "Main Building, Ground Floor",
  description: "Main pharmacy store - System Protected",
  inventory: {},
};

export interface EnsureMainResult {
  departmentCreated: boolean;
  storeCreated: boolean;
}

/**
 * Recreate department "01" and store "01" if either is missing.
 */
export function ensureMainEntities(db: PharmacyDatabase): EnsureMainResult {
  const result: EnsureMainResult = { departmentCreated: false, storeCreated: false };

  if (!db.departments.exists(MAIN_ID)) {
    const departments = db.departments.getAll();
    const department = db.departments.stageCreate(MAIN_DEPARTMENT, departments, MAIN_ID);
    db.departments.replaceAll([...departments, department]);
    result.departmentCreated = true;

    console.log("[Guard] Main department recreated");
    db.activity.log({
      action: "RECREATE",
      entity_type: "department",
      entity_id: MAIN_ID,
      details: { name: department.name },
    });
  }

  if (!db.stores.exists(MAIN_ID)) {
    const stores = db.stores.getAll();
    const store = db.stores.stageCreate(MAIN_STORE, stores, MAIN_ID);
    db.stores.replaceAll([...stores, store]);
    result.storeCreated = true;

    console.log("[Guard] Main store recreated");
    db.activity.log({
      action: "RECREATE",
      entity_type: "store",
      entity_id: MAIN_ID,
      details: { name: store.name },
    });
  }

  return result;
}

export interface InitOptions {
  /** Seed an admin account when the users collection has none */
  admin?: { username: string; password: string; name?: string; email?: string };
}

export interface InitResult extends EnsureMainResult {
  /** Collections written empty because they did not exist yet */
  createdCollections: CollectionName[];
  adminCreated: boolean;
}

/**
 * Create every missing collection, optionally seed an admin, then ensure
 * the main entities exist.
 */
export function initDatabase(db: PharmacyDatabase, options: InitOptions = {}): InitResult {
  const createdCollections: CollectionName[] = [];
  for (const collection of COLLECTIONS) {
    if (!db.store.exists(collection)) {
      db.store.save(collection, []);
      createdCollections.push(collection);
    }
  }
  if (createdCollections.length > 0) {
    console.log(`[Guard] Created collections: ${createdCollections.join(", ")}`);
  }

  let adminCreated = false;
  if (options.admin && !db.users.query().where("role", "admin").first()) {
    const admin = db.users.create({
      ...options.admin,
      name: options.admin.name ?? "Administrator",
      role: "admin",
      department_id: null,
    });
    adminCreated = true;
    console.log(`[Guard] Admin user '${admin.username}' created`);
  }

  return { createdCollections, adminCreated, ...ensureMainEntities(db) };
}
