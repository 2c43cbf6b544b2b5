/**
 * Medicine Storage
 *
 * Catalogue of medicines. Stock levels live on the stores, not here.
 */

import type {
  Medicine,
  CreateMedicineInput,
  UpdateMedicineInput,
} from "../types/medicine.js";
import { ForeignKeyError } from "./errors.js";
import type { Repository } from "./repository.js";
import type { Tables } from "./tables.js";

export interface MedicinesRepository extends Repository<Medicine, CreateMedicineInput> {
  medicinesBySupplier(supplierId: string): Medicine[];

  /** Case-insensitive substring match on name */
  searchByName(text: string): Medicine[];
}

export function createMedicinesRepository(tables: Tables): MedicinesRepository {
  const base = tables.medicines;

  const checkSupplier = (supplierId: string | undefined) => {
    if (supplierId !== undefined && !tables.suppliers.exists(supplierId)) {
      throw new ForeignKeyError("supplier_id", supplierId);
    }
  };

  return {
    ...base,

    create(input: CreateMedicineInput): Medicine {
      checkSupplier(input.supplier_id);
      return base.create(input);
    },

    update(id: string, patch: UpdateMedicineInput): Medicine {
      checkSupplier(patch.supplier_id);
      return base.update(id, patch);
    },

    medicinesBySupplier(supplierId: string): Medicine[] {
      return base.query().where("supplier_id", supplierId).toArray();
    },

    searchByName(text: string): Medicine[] {
      return base.query().whereContains("name", text).orderBy("name").toArray();
    },
  };
}
