/**
 * Store Storage
 *
 * One store per department. Inventory is a map of medicine id to quantity
 * on hand; every stock movement goes through adjustStock().
 */

import { MAIN_ID, type Inventory } from "../types/common.js";
import type { Medicine } from "../types/medicine.js";
import type { Store, CreateStoreInput, UpdateStoreInput, StockLevel } from "../types/store.js";
import {
  ForeignKeyError,
  ProtectedEntityError,
  ValidationError,
} from "./errors.js";
import type { Repository } from "./repository.js";
import type { Tables } from "./tables.js";

/**
 * Return a new inventory with `delta` applied to one medicine.
 * A result below zero is a ValidationError.
 */
export function adjustStock(inventory: Inventory, medicineId: string, delta: number): Inventory {
  const current = inventory[medicineId] ?? 0;
  const next = current + delta;
  if (next < 0) {
    throw new ValidationError(
      `Insufficient stock for medicine '${medicineId}': requested ${-delta}, available ${current}`
    );
  }
  return { ...inventory, [medicineId]: next };
}

/**
 * Classify a quantity against a low-stock limit.
 * low: <= limit, medium: <= 1.5 x limit, good: above.
 */
export function classifyStock(quantity: number, lowStockLimit: number): StockLevel {
  if (quantity <= lowStockLimit) return "low";
  if (quantity <= lowStockLimit * 1.5) return "medium";
  return "good";
}

export interface LowStockEntry {
  medicine: Medicine;
  currentStock: number;
  lowStockLimit: number;
}

export interface AvailableMedicine extends Medicine {
  available_stock: number;
}

export interface StoresRepository extends Repository<Store, CreateStoreInput> {
  storeByDepartment(departmentId: string): Store | null;
  mainStore(): Store | null;

  /**
   * Quantity of a medicine in one department's store, or summed across
   * every store when no department is given.
   */
  medicineStock(medicineId: string, departmentId?: string): number;

  lowStockMedicines(departmentId?: string): LowStockEntry[];
  stockStatus(medicineId: string, departmentId?: string): StockLevel;
  availableMedicines(departmentId?: string): AvailableMedicine[];
}

export function createStoresRepository(tables: Tables): StoresRepository {
  const base = tables.stores;

  const stockIn = (stores: readonly Store[], medicineId: string, departmentId?: string) => {
    if (departmentId !== undefined) {
      const store = stores.find((s) => s.department_id === departmentId);
      return store?.inventory[medicineId] ?? 0;
    }
    return stores.reduce((total, s) => total + (s.inventory[medicineId] ?? 0), 0);
  };

  const checkDepartment = (departmentId: string, stores: readonly Store[], selfId?: string) => {
    if (!tables.departments.exists(departmentId)) {
      throw new ForeignKeyError("department_id", departmentId);
    }
    const owner = stores.find((s) => s.department_id === departmentId && s.id !== selfId);
    if (owner) {
      throw new ValidationError(
        `Department '${departmentId}' already has store '${owner.id}'`
      );
    }
  };

  return {
    ...base,

    create(input: CreateStoreInput): Store {
      const stores = base.getAll();
      checkDepartment(input.department_id, stores);
      const store = base.stageCreate(input, stores);
      base.replaceAll([...stores, store]);
      return store;
    },

    update(id: string, patch: UpdateStoreInput): Store {
      const stores = base.getAll();
      const existing = base.getById(id);
      if (patch.department_id !== undefined && patch.department_id !== existing.department_id) {
        checkDepartment(patch.department_id, stores, id);
      }
      const updated = base.stageUpdate(existing, patch);
      base.replaceAll(stores.map((s) => (s.id === id ? updated : s)));
      return updated;
    },

    /**
     * Remove an empty store record. A store still holding stock must go
     * through the cascade so its inventory reaches the main store.
     */
    delete(id: string): Store {
      if (id === MAIN_ID) {
        throw new ProtectedEntityError("Store", id);
      }
      const store = base.getById(id);
      if (Object.values(store.inventory).some((qty) => qty > 0)) {
        throw new ValidationError(
          `Store '${id}' still holds stock; use the cascading delete to move it to the main store`
        );
      }
      base.replaceAll(base.getAll().filter((s) => s.id !== id));
      return store;
    },

    storeByDepartment(departmentId: string): Store | null {
      return base.query().where("department_id", departmentId).first();
    },

    mainStore(): Store | null {
      return base.findById(MAIN_ID);
    },

    medicineStock(medicineId: string, departmentId?: string): number {
      return stockIn(base.getAll(), medicineId, departmentId);
    },

    lowStockMedicines(departmentId?: string): LowStockEntry[] {
      const stores = base.getAll();
      return tables.medicines
        .getAll()
        .map((medicine) => ({
          medicine,
          currentStock: stockIn(stores, medicine.id, departmentId),
          lowStockLimit: medicine.low_stock_limit,
        }))
        .filter((entry) => entry.currentStock <= entry.lowStockLimit);
    },

    stockStatus(medicineId: string, departmentId?: string): StockLevel {
      const medicine = tables.medicines.findById(medicineId);
      if (!medicine) return "unknown";
      return classifyStock(
        stockIn(base.getAll(), medicineId, departmentId),
        medicine.low_stock_limit
      );
    },

    availableMedicines(departmentId?: string): AvailableMedicine[] {
      const stores = base.getAll();
      const available: AvailableMedicine[] = [];
      for (const medicine of tables.medicines.getAll()) {
        const stock = stockIn(stores, medicine.id, departmentId);
        if (stock > 0) {
          available.push({ ...medicine, available_stock: stock });
        }
      }
      return available;
    },
  };
}
