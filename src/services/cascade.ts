/**
 * Cascade Orchestrator
 *
 * Deleting a store takes its department and users with it and moves its
 * stock to the main store. Every mutation is staged in memory first; the
 * commit phase then writes the affected collections in a fixed order:
 *
 *   transfers → users → stores → departments → history
 *
 * Nothing is written if any staging step fails. On the SQLite backend the
 * commit runs in one transaction. On the JSON backend a failure or crash
 * mid-commit keeps the collections already written, in the order above,
 * leaves the later ones unchanged and records no history entry.
 */

import { MAIN_ID, type Inventory } from "../types/common.js";
import type { Department } from "../types/department.js";
import type { Store } from "../types/store.js";
import { CASCADE_DELETE_REASON, type Transfer } from "../types/transfer.js";
import type { User } from "../types/user.js";
import { SYSTEM_ACTOR, type ActivityInput, type Actor } from "../types/activity.js";
import type { ActivityLog } from "../storage/activity.js";
import type { CollectionStore } from "../storage/base.js";
import { CascadeError, ProtectedEntityError } from "../storage/errors.js";
import { adjustStock } from "../storage/stores.js";
import type { Tables } from "../storage/tables.js";

export type CascadeState =
  | "Requested"
  | "ValidateProtection"
  | "ComputeInventorySnapshot"
  | "StageTransfers"
  | "StageUserRemoval"
  | "StageStoreRemoval"
  | "StageDepartmentRemoval"
  | "Commit"
  | "Completed"
  | "Abort";

export interface CascadeResult {
  storeId: string;
  departmentId: string;

  /** States visited, in order */
  states: CascadeState[];

  /** Stock that was moved to the main store */
  movedInventory: Inventory;
  transfers: Transfer[];
  removedUserIds: string[];

  /** null when the department was already gone */
  removedDepartmentId: string | null;
}

/** Everything a cascade will write, computed before the first save */
interface StagedCascade {
  store: Store;
  department: Department | null;
  movedInventory: Inventory;
  newTransfers: Transfer[];
  transfers: Transfer[];
  removedUsers: User[];
  users: User[];
  stores: Store[];
  departments: Department[];
}

export class CascadeOrchestrator {
  private readonly store: CollectionStore;
  private readonly tables: Tables;
  private readonly activity: ActivityLog;
  private current: CascadeState = "Requested";
  private trace: CascadeState[] = [];

  constructor(store: CollectionStore, tables: Tables, activity: ActivityLog) {
    this.store = store;
    this.tables = tables;
    this.activity = activity;
  }

  /** State of the last (or running) cascade */
  get state(): CascadeState {
    return this.current;
  }

  /** States the last cascade went through, including a final Abort */
  get states(): CascadeState[] {
    return [...this.trace];
  }

  /**
   * Delete a store, its department and the department's users, moving all
   * positive stock to the main store as completed transfers.
   */
  deleteStoreCascading(storeId: string, actor: Actor = SYSTEM_ACTOR): CascadeResult {
    this.trace = [];
    this.enter("Requested");

    let staged: StagedCascade;
    try {
      staged = this.stage(storeId);
    } catch (err) {
      this.enter("Abort");
      this.current = "Requested";
      console.warn(`[Cascade] Aborted delete of store ${storeId}:`, err);
      throw err;
    }

    this.enter("Commit");
    const history = this.activity.stage(
      this.activity.getAll(),
      this.auditEntries(staged),
      actor
    );

    try {
      this.store.batch(() => {
        this.tables.transfers.replaceAll(staged.transfers);
        this.tables.users.replaceAll(staged.users);
        this.tables.stores.replaceAll(staged.stores);
        if (staged.department) {
          this.tables.departments.replaceAll(staged.departments);
        }
        this.store.save("history", history);
      });
    } catch (err) {
      this.enter("Abort");
      this.current = "Requested";
      console.error(`[Cascade] Commit failed for store ${storeId}:`, err);
      throw err;
    }

    this.enter("Completed");
    console.log(
      `[Cascade] Deleted store ${storeId}: ${staged.newTransfers.length} transfers, ` +
        `${staged.removedUsers.length} users removed`
    );

    return {
      storeId,
      departmentId: staged.store.department_id,
      states: [...this.trace],
      movedInventory: staged.movedInventory,
      transfers: staged.newTransfers,
      removedUserIds: staged.removedUsers.map((u) => u.id),
      removedDepartmentId: staged.department?.id ?? null,
    };
  }

  /**
   * Remove only the department record. Its store, inventory and users are
   * left untouched.
   */
  deleteDepartmentOnly(departmentId: string, actor: Actor = SYSTEM_ACTOR): Department {
    if (departmentId === MAIN_ID) {
      throw new ProtectedEntityError("Department", departmentId);
    }
    const department = this.tables.departments.getById(departmentId);
    const departments = this.tables.departments
      .getAll()
      .filter((d) => d.id !== departmentId);
    const history = this.activity.stage(
      this.activity.getAll(),
      [
        {
          action: "DELETE",
          entity_type: "department",
          entity_id: departmentId,
          details: { name: department.name, cascade: false },
        },
      ],
      actor
    );

    this.store.batch(() => {
      this.tables.departments.replaceAll(departments);
      this.store.save("history", history);
    });
    return department;
  }

  private enter(state: CascadeState): void {
    this.current = state;
    this.trace.push(state);
  }

  private stage(storeId: string): StagedCascade {
    this.enter("ValidateProtection");
    if (storeId === MAIN_ID) {
      throw new ProtectedEntityError("Store", storeId);
    }
    const store = this.tables.stores.getById(storeId);
    if (store.department_id === MAIN_ID) {
      throw new ProtectedEntityError("Department", MAIN_ID);
    }

    this.enter("ComputeInventorySnapshot");
    const movedInventory: Inventory = {};
    for (const [medicineId, quantity] of Object.entries(store.inventory)) {
      if (quantity > 0) movedInventory[medicineId] = quantity;
    }

    this.enter("StageTransfers");
    const allStores = this.tables.stores.getAll();
    const mainStore = allStores.find((s) => s.id === MAIN_ID);
    if (!mainStore) {
      throw new CascadeError(`Main store '${MAIN_ID}' is missing; cannot move stock`);
    }
    const transfers = this.tables.transfers.getAll();
    const newTransfers: Transfer[] = [];
    let mainInventory = mainStore.inventory;
    for (const [medicineId, quantity] of Object.entries(movedInventory)) {
      const transfer = this.tables.transfers.stageCreate(
        {
          from_store_id: storeId,
          to_store_id: MAIN_ID,
          medicine_id: medicineId,
          quantity,
          reason: CASCADE_DELETE_REASON,
          status: "completed",
          notes: `Automatic transfer from deleted store ${store.name}`,
        },
        transfers
      );
      transfers.push(transfer);
      newTransfers.push(transfer);
      mainInventory = adjustStock(mainInventory, medicineId, quantity);
    }

    this.enter("StageUserRemoval");
    const departmentId = store.department_id;
    const allUsers = this.tables.users.getAll();
    const removedUsers = allUsers.filter((u) => u.department_id === departmentId);
    const users = allUsers.filter((u) => u.department_id !== departmentId);
    if (
      removedUsers.some((u) => u.role === "admin") &&
      !users.some((u) => u.role === "admin")
    ) {
      throw new CascadeError(`Deleting store ${storeId} would remove every admin user`);
    }

    this.enter("StageStoreRemoval");
    const stores = allStores
      .filter((s) => s.id !== storeId)
      .map((s) =>
        s.id === MAIN_ID && newTransfers.length > 0
          ? this.tables.stores.stageUpdate(s, { inventory: mainInventory })
          : s
      );

    this.enter("StageDepartmentRemoval");
    const allDepartments = this.tables.departments.getAll();
    const department = allDepartments.find((d) => d.id === departmentId) ?? null;
    if (!department) {
      console.warn(`[Cascade] Department ${departmentId} already removed; skipping`);
    }
    const departments = allDepartments.filter((d) => d.id !== departmentId);

    return {
      store,
      department,
      movedInventory,
      newTransfers,
      transfers,
      removedUsers,
      users,
      stores,
      departments,
    };
  }

  private auditEntries(staged: StagedCascade): ActivityInput[] {
    const { store, department } = staged;
    const entries: ActivityInput[] = [
      {
        action: "TRANSFER",
        entity_type: "store",
        entity_id: store.id,
        details: {
          to_store_id: MAIN_ID,
          reason: CASCADE_DELETE_REASON,
          transfer_ids: staged.newTransfers.map((t) => t.id),
          inventory: staged.movedInventory,
        },
      },
      {
        action: "DELETE",
        entity_type: "user",
        entity_id: null,
        details: {
          department_id: store.department_id,
          user_ids: staged.removedUsers.map((u) => u.id),
        },
      },
      {
        action: "DELETE",
        entity_type: "store",
        entity_id: store.id,
        details: { name: store.name, department_id: store.department_id },
      },
    ];
    if (department) {
      entries.push({
        action: "DELETE",
        entity_type: "department",
        entity_id: department.id,
        details: { name: department.name, cascade: true },
      });
    }
    return entries;
  }
}
