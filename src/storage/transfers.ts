/**
 * Transfer Storage
 *
 * Requests to move stock between stores. Stock only moves on approve();
 * a pending request reserves nothing.
 */

import type {
  Transfer,
  CreateTransferInput,
  TransferStatus,
  UpdateTransferInput,
} from "../types/transfer.js";
import type { CollectionStore } from "./base.js";
import { ForeignKeyError, ValidationError } from "./errors.js";
import { rejectWorkflowFields, type Repository } from "./repository.js";
import type { Tables } from "./tables.js";
import { adjustStock } from "./stores.js";

export interface TransfersRepository extends Repository<Transfer, CreateTransferInput> {
  /** Create a pending transfer request */
  request(input: CreateTransferInput): Transfer;

  /** Edit a pending request; status is not editable here */
  update(id: string, patch: UpdateTransferInput): Transfer;

  /** Move the stock and mark the transfer approved */
  approve(id: string): Transfer;

  reject(id: string): Transfer;

  /** Transfers leaving or entering a store */
  transfersForStore(storeId: string): Transfer[];
}

export function createTransfersRepository(
  store: CollectionStore,
  tables: Tables
): TransfersRepository {
  const base = tables.transfers;

  const checkRoute = (fields: Pick<Transfer, "from_store_id" | "to_store_id" | "medicine_id">) => {
    if (fields.from_store_id === fields.to_store_id) {
      throw new ValidationError("Source and destination stores must differ");
    }
    for (const field of ["from_store_id", "to_store_id"] as const) {
      if (!tables.stores.exists(fields[field])) {
        throw new ForeignKeyError(field, fields[field]);
      }
    }
    if (!tables.medicines.exists(fields.medicine_id)) {
      throw new ForeignKeyError("medicine_id", fields.medicine_id);
    }
  };

  const request = (input: CreateTransferInput): Transfer => {
    checkRoute(input);
    return base.create({ ...input, status: "pending" });
  };

  const stageStatus = (id: string, status: TransferStatus) => {
    const transfer = base.getById(id);
    if (transfer.status !== "pending") {
      throw new ValidationError(
        `Transfer '${id}' is ${transfer.status}; only pending transfers can change status`
      );
    }
    const updated = base.stageUpdate(
      transfer,
      status === "approved" ? { status, approved_at: new Date().toISOString() } : { status }
    );
    const transfers = base.getAll().map((t) => (t.id === id ? updated : t));
    return { transfer, updated, transfers };
  };

  return {
    ...base,

    create: request,
    request,

    update(id: string, patch: UpdateTransferInput): Transfer {
      rejectWorkflowFields("Transfer", id, patch, ["status", "approved_at"]);
      const existing = base.getById(id);
      if (existing.status !== "pending") {
        throw new ValidationError(
          `Transfer '${id}' is ${existing.status}; only pending transfers can be edited`
        );
      }
      checkRoute({
        from_store_id: patch.from_store_id ?? existing.from_store_id,
        to_store_id: patch.to_store_id ?? existing.to_store_id,
        medicine_id: patch.medicine_id ?? existing.medicine_id,
      });
      return base.update(id, patch);
    },

    approve(id: string): Transfer {
      const { transfer, updated, transfers } = stageStatus(id, "approved");

      const stores = tables.stores.getAll();
      const source = stores.find((s) => s.id === transfer.from_store_id);
      const destination = stores.find((s) => s.id === transfer.to_store_id);
      if (!source) throw new ForeignKeyError("from_store_id", transfer.from_store_id);
      if (!destination) throw new ForeignKeyError("to_store_id", transfer.to_store_id);

      const fromInventory = adjustStock(source.inventory, transfer.medicine_id, -transfer.quantity);
      const toInventory = adjustStock(
        destination.inventory,
        transfer.medicine_id,
        transfer.quantity
      );
      const updatedStores = stores.map((s) => {
        if (s.id === source.id) return tables.stores.stageUpdate(s, { inventory: fromInventory });
        if (s.id === destination.id) return tables.stores.stageUpdate(s, { inventory: toInventory });
        return s;
      });

      store.batch(() => {
        tables.stores.replaceAll(updatedStores);
        base.replaceAll(transfers);
      });
      return updated;
    },

    reject(id: string): Transfer {
      const { updated, transfers } = stageStatus(id, "rejected");
      base.replaceAll(transfers);
      return updated;
    },

    transfersForStore(storeId: string): Transfer[] {
      return base
        .query()
        .filter((t) => t.from_store_id === storeId || t.to_store_id === storeId)
        .toArray();
    },
  };
}
