/**
 * Database handle
 *
 * Bundles every repository over one CollectionStore. There is no
 * module-level instance: callers open a database and pass it around.
 */

import { loadConfig, type PharmacyConfig } from "./config.js";
import { createJsonStore, type CollectionStore } from "./storage/base.js";
import { createSqliteStore } from "./storage/sqlite.js";
import { createTables } from "./storage/tables.js";
import { createActivityLog, type ActivityLog } from "./storage/activity.js";
import { createUsersRepository, type UsersRepository } from "./storage/users.js";
import { createMedicinesRepository, type MedicinesRepository } from "./storage/medicines.js";
import { createSuppliersRepository, type SuppliersRepository } from "./storage/suppliers.js";
import {
  createDoctorsRepository,
  createPatientsRepository,
  type DoctorsRepository,
  type PatientsRepository,
} from "./storage/people.js";
import {
  createDepartmentsRepository,
  type DepartmentsRepository,
} from "./storage/departments.js";
import { createStoresRepository, type StoresRepository } from "./storage/stores.js";
import { createPurchasesRepository, type PurchasesRepository } from "./storage/purchases.js";
import {
  createConsumptionRepository,
  type ConsumptionRepository,
} from "./storage/consumption.js";
import { createTransfersRepository, type TransfersRepository } from "./storage/transfers.js";
import { CascadeOrchestrator } from "./services/cascade.js";
import { initDatabase, type InitOptions } from "./services/guard.js";

export interface PharmacyDatabase {
  readonly store: CollectionStore;
  readonly users: UsersRepository;
  readonly medicines: MedicinesRepository;
  readonly suppliers: SuppliersRepository;
  readonly doctors: DoctorsRepository;
  readonly patients: PatientsRepository;
  readonly departments: DepartmentsRepository;
  readonly stores: StoresRepository;
  readonly purchases: PurchasesRepository;
  readonly consumption: ConsumptionRepository;
  readonly transfers: TransfersRepository;
  readonly activity: ActivityLog;
  readonly orchestrator: CascadeOrchestrator;

  close(): void;
}

/**
 * Build the repositories over an existing store.
 */
export function createDatabase(store: CollectionStore): PharmacyDatabase {
  const tables = createTables(store);
  const users = createUsersRepository(tables);
  const activity = createActivityLog(store);

  return {
    store,
    users,
    medicines: createMedicinesRepository(tables),
    suppliers: createSuppliersRepository(tables),
    doctors: createDoctorsRepository(tables),
    patients: createPatientsRepository(tables),
    departments: createDepartmentsRepository(store, tables, users),
    stores: createStoresRepository(tables),
    purchases: createPurchasesRepository(store, tables),
    consumption: createConsumptionRepository(store, tables),
    transfers: createTransfersRepository(store, tables),
    activity,
    orchestrator: new CascadeOrchestrator(store, tables, activity),
    close: () => store.close(),
  };
}

export interface OpenDatabaseOptions extends Partial<PharmacyConfig> {
  /** Run initDatabase() after opening (default true) */
  initialize?: boolean;

  /** Passed to initDatabase() */
  init?: InitOptions;
}

/**
 * Open the configured backend. Options override values read from the
 * environment.
 */
export function openDatabase(options: OpenDatabaseOptions = {}): PharmacyDatabase {
  const { initialize = true, init, ...overrides } = options;
  const config = loadConfig(overrides);

  const store =
    config.backend === "sqlite"
      ? createSqliteStore(config.sqliteFile)
      : createJsonStore(config.dataDir);

  const db = createDatabase(store);
  if (initialize) {
    initDatabase(db, init);
  }
  return db;
}
