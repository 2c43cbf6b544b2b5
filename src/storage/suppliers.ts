/**
 * Supplier Storage
 */

import type { Supplier, CreateSupplierInput } from "../types/supplier.js";
import { ForeignKeyError } from "./errors.js";
import type { Repository } from "./repository.js";
import type { Tables } from "./tables.js";

export type SuppliersRepository = Repository<Supplier, CreateSupplierInput>;

export function createSuppliersRepository(tables: Tables): SuppliersRepository {
  const base = tables.suppliers;

  return {
    ...base,

    /**
     * Delete a supplier. Fails while a medicine or purchase still
     * references it.
     */
    delete(id: string): Supplier {
      const supplier = base.getById(id);

      const medicine = tables.medicines.query().where("supplier_id", id).first();
      if (medicine) {
        throw new ForeignKeyError(
          "supplier_id",
          id,
          `Supplier '${id}' is still referenced by medicine '${medicine.id}'`
        );
      }
      const purchase = tables.purchases.query().where("supplier_id", id).first();
      if (purchase) {
        throw new ForeignKeyError(
          "supplier_id",
          id,
          `Supplier '${id}' is still referenced by purchase '${purchase.id}'`
        );
      }

      base.replaceAll(base.getAll().filter((s) => s.id !== supplier.id));
      return supplier;
    },
  };
}
