/**
 * Raw per-collection repositories.
 *
 * Entity repositories receive this bundle so that foreign-key checks can
 * read any collection without the entity repositories depending on each
 * other.
 */

import type { CreateInput } from "../types/common.js";
import { userSchema, type User } from "../types/user.js";
import { medicineSchema, type Medicine } from "../types/medicine.js";
import { supplierSchema, type Supplier } from "../types/supplier.js";
import { doctorSchema, type Doctor } from "../types/doctor.js";
import { patientSchema, type Patient } from "../types/patient.js";
import { departmentSchema, type Department } from "../types/department.js";
import { storeSchema, type Store } from "../types/store.js";
import { purchaseSchema, type Purchase } from "../types/purchase.js";
import { consumptionSchema, type Consumption } from "../types/consumption.js";
import { transferSchema, type Transfer } from "../types/transfer.js";
import type { CollectionStore } from "./base.js";
import { createRepository, type Repository } from "./repository.js";

export interface Tables {
  users: Repository<User, CreateInput<typeof userSchema>>;
  medicines: Repository<Medicine, CreateInput<typeof medicineSchema>>;
  suppliers: Repository<Supplier, CreateInput<typeof supplierSchema>>;
  doctors: Repository<Doctor, CreateInput<typeof doctorSchema>>;
  patients: Repository<Patient, CreateInput<typeof patientSchema>>;
  departments: Repository<Department, CreateInput<typeof departmentSchema>>;
  stores: Repository<Store, CreateInput<typeof storeSchema>>;
  purchases: Repository<Purchase, CreateInput<typeof purchaseSchema>>;
  consumption: Repository<Consumption, CreateInput<typeof consumptionSchema>>;
  transfers: Repository<Transfer, CreateInput<typeof transferSchema>>;
}

export function createTables(store: CollectionStore): Tables {
  return {
    users: createRepository(store, { collection: "users", entity: "User", schema: userSchema }),
    medicines: createRepository(store, {
      collection: "medicines",
      entity: "Medicine",
      schema: medicineSchema,
    }),
    suppliers: createRepository(store, {
      collection: "suppliers",
      entity: "Supplier",
      schema: supplierSchema,
    }),
    doctors: createRepository(store, {
      collection: "doctors",
      entity: "Doctor",
      schema: doctorSchema,
    }),
    patients: createRepository(store, {
      collection: "patients",
      entity: "Patient",
      schema: patientSchema,
    }),
    departments: createRepository(store, {
      collection: "departments",
      entity: "Department",
      schema: departmentSchema,
    }),
    stores: createRepository(store, { collection: "stores", entity: "Store", schema: storeSchema }),
    purchases: createRepository(store, {
      collection: "purchases",
      entity: "Purchase",
      schema: purchaseSchema,
    }),
    consumption: createRepository(store, {
      collection: "consumption",
      entity: "Consumption",
      schema: consumptionSchema,
    }),
    transfers: createRepository(store, {
      collection: "transfers",
      entity: "Transfer",
      schema: transferSchema,
    }),
  };
}
