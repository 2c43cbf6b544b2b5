/**
 * Purchase Storage
 *
 * Purchases start out pending. deliver() is the only path that adds stock
 * from a supplier; cancel() closes a purchase without touching stock.
 */

import type { LineItem, UpdateInput } from "../types/common.js";
import type {
  Purchase,
  CreatePurchaseInput,
  UpdatePurchaseInput,
} from "../types/purchase.js";
import type { CollectionStore } from "./base.js";
import { ForeignKeyError, ValidationError } from "./errors.js";
import { rejectWorkflowFields, type Repository } from "./repository.js";
import type { Tables } from "./tables.js";
import { adjustStock } from "./stores.js";

export interface PurchasesRepository extends Repository<Purchase, CreatePurchaseInput> {
  update(id: string, patch: UpdatePurchaseInput): Purchase;

  /** Mark a pending purchase delivered and add its items to the target store */
  deliver(id: string): Purchase;

  /** Mark a pending purchase cancelled */
  cancel(id: string): Purchase;

  purchasesBySupplier(supplierId: string): Purchase[];
}

export function createPurchasesRepository(
  store: CollectionStore,
  tables: Tables
): PurchasesRepository {
  const base = tables.purchases;

  const checkReferences = (fields: {
    supplier_id?: string;
    store_id?: string;
    medicines?: readonly LineItem[];
  }) => {
    if (fields.supplier_id !== undefined && !tables.suppliers.exists(fields.supplier_id)) {
      throw new ForeignKeyError("supplier_id", fields.supplier_id);
    }
    if (fields.store_id !== undefined && !tables.stores.exists(fields.store_id)) {
      throw new ForeignKeyError("store_id", fields.store_id);
    }
    for (const item of fields.medicines ?? []) {
      if (!tables.medicines.exists(item.medicine_id)) {
        throw new ForeignKeyError("medicine_id", item.medicine_id);
      }
    }
  };

  const requirePending = (purchase: Purchase, action: string) => {
    if (purchase.status !== "pending") {
      throw new ValidationError(
        `Cannot ${action} purchase '${purchase.id}': status is ${purchase.status}`
      );
    }
  };

  const transition = (id: string, action: string, patch: UpdateInput<Purchase>) => {
    const purchases = base.getAll();
    const existing = base.getById(id);
    requirePending(existing, action);
    const updated = base.stageUpdate(existing, patch);
    return { purchases: purchases.map((p) => (p.id === id ? updated : p)), updated };
  };

  return {
    ...base,

    create(input: CreatePurchaseInput): Purchase {
      checkReferences(input);
      return base.create({ ...input, status: "pending" });
    },

    update(id: string, patch: UpdatePurchaseInput): Purchase {
      rejectWorkflowFields("Purchase", id, patch, ["status", "delivered_at"]);
      const existing = base.getById(id);
      if (existing.status !== "pending" && patch.medicines !== undefined) {
        throw new ValidationError(`Purchase '${id}' is ${existing.status}; its items are fixed`);
      }
      checkReferences(patch);
      return base.update(id, patch);
    },

    deliver(id: string): Purchase {
      const now = new Date().toISOString();
      const { purchases, updated } = transition(id, "deliver", {
        status: "delivered",
        delivered_at: now,
      });

      const target = tables.stores.findById(updated.store_id);
      if (!target) {
        throw new ForeignKeyError("store_id", updated.store_id);
      }
      let inventory = target.inventory;
      for (const item of updated.medicines) {
        inventory = adjustStock(inventory, item.medicine_id, item.quantity);
      }
      const stores = tables.stores
        .getAll()
        .map((s) => (s.id === target.id ? tables.stores.stageUpdate(s, { inventory }) : s));

      store.batch(() => {
        base.replaceAll(purchases);
        tables.stores.replaceAll(stores);
      });
      return updated;
    },

    cancel(id: string): Purchase {
      const { purchases, updated } = transition(id, "cancel", { status: "cancelled" });
      base.replaceAll(purchases);
      return updated;
    },

    purchasesBySupplier(supplierId: string): Purchase[] {
      return base.query().where("supplier_id", supplierId).toArray();
    },
  };
}
