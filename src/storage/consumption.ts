/**
 * Consumption Storage
 *
 * Dispensing medicines to a patient takes stock out of the department's
 * store. Every line is checked before any write, so a shortfall leaves
 * the store exactly as it was.
 */

import type { LineItem } from "../types/common.js";
import type {
  Consumption,
  CreateConsumptionInput,
  UpdateConsumptionInput,
} from "../types/consumption.js";
import type { Store } from "../types/store.js";
import type { CollectionStore } from "./base.js";
import { ForeignKeyError, ValidationError } from "./errors.js";
import { rejectWorkflowFields, type Repository } from "./repository.js";
import type { Tables } from "./tables.js";
import { adjustStock } from "./stores.js";

export interface StockShortfall {
  medicine_id: string;
  medicine_name: string;
  requested: number;
  available: number;
}

export interface StockValidation {
  valid: boolean;
  shortfalls: StockShortfall[];
}

export interface ConsumptionRepository
  extends Repository<Consumption, CreateConsumptionInput> {
  /** Medicines and department are fixed once dispensed */
  update(id: string, patch: UpdateConsumptionInput): Consumption;

  /** Check requested quantities against the department's store */
  validateStock(items: readonly LineItem[], departmentId: string): StockValidation;

  consumptionByPatient(patientId: string): Consumption[];
  consumptionByDepartment(departmentId: string): Consumption[];
}

/** Sum quantities per medicine, keeping first-seen order */
function totalsByMedicine(items: readonly LineItem[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const item of items) {
    totals.set(item.medicine_id, (totals.get(item.medicine_id) ?? 0) + item.quantity);
  }
  return totals;
}

function formatShortfall(shortfall: StockShortfall): string {
  return `${shortfall.medicine_name}: requested ${shortfall.requested}, available ${shortfall.available}`;
}

export function createConsumptionRepository(
  store: CollectionStore,
  tables: Tables
): ConsumptionRepository {
  const base = tables.consumption;

  const findShortfalls = (items: readonly LineItem[], target: Store | null) => {
    const shortfalls: StockShortfall[] = [];
    for (const [medicineId, requested] of totalsByMedicine(items)) {
      const available = target?.inventory[medicineId] ?? 0;
      if (requested > available) {
        shortfalls.push({
          medicine_id: medicineId,
          medicine_name: tables.medicines.findById(medicineId)?.name ?? `Medicine ${medicineId}`,
          requested,
          available,
        });
      }
    }
    return shortfalls;
  };

  const checkPeople = (fields: { patient_id?: string; doctor_id?: string }) => {
    if (fields.patient_id !== undefined && !tables.patients.exists(fields.patient_id)) {
      throw new ForeignKeyError("patient_id", fields.patient_id);
    }
    if (fields.doctor_id !== undefined && !tables.doctors.exists(fields.doctor_id)) {
      throw new ForeignKeyError("doctor_id", fields.doctor_id);
    }
  };

  return {
    ...base,

    create(input: CreateConsumptionInput): Consumption {
      checkPeople(input);
      if (!tables.departments.exists(input.department_id)) {
        throw new ForeignKeyError("department_id", input.department_id);
      }
      for (const item of input.medicines) {
        if (!tables.medicines.exists(item.medicine_id)) {
          throw new ForeignKeyError("medicine_id", item.medicine_id);
        }
      }

      const stores = tables.stores.getAll();
      const target = stores.find((s) => s.department_id === input.department_id);
      if (!target) {
        throw new ValidationError(`No store found for department '${input.department_id}'`);
      }

      const shortfalls = findShortfalls(input.medicines, target);
      if (shortfalls.length > 0) {
        throw new ValidationError("Insufficient stock", shortfalls.map(formatShortfall));
      }

      const records = base.getAll();
      const record = base.stageCreate(input, records);

      let inventory = target.inventory;
      for (const [medicineId, quantity] of totalsByMedicine(input.medicines)) {
        inventory = adjustStock(inventory, medicineId, -quantity);
      }
      const updatedStores = stores.map((s) =>
        s.id === target.id ? tables.stores.stageUpdate(s, { inventory }) : s
      );

      store.batch(() => {
        tables.stores.replaceAll(updatedStores);
        base.replaceAll([...records, record]);
      });
      return record;
    },

    update(id: string, patch: UpdateConsumptionInput): Consumption {
      rejectWorkflowFields("Consumption", id, patch, ["medicines", "department_id"]);
      checkPeople(patch);
      return base.update(id, patch);
    },

    validateStock(items: readonly LineItem[], departmentId: string): StockValidation {
      const target = tables.stores.query().where("department_id", departmentId).first();
      const shortfalls = findShortfalls(items, target);
      return { valid: shortfalls.length === 0, shortfalls };
    },

    consumptionByPatient(patientId: string): Consumption[] {
      return base.query().where("patient_id", patientId).toArray();
    },

    consumptionByDepartment(departmentId: string): Consumption[] {
      return base.query().where("department_id", departmentId).toArray();
    },
  };
}
