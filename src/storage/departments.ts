/**
 * Department Storage
 *
 * Deleting a department removes only the department record. Its store,
 * inventory and users stay in place so the department can be recreated
 * without losing stock; the store cascade lives in services/cascade.ts.
 */

import { MAIN_ID } from "../types/common.js";
import type {
  Department,
  CreateDepartmentInput,
  UpdateDepartmentInput,
} from "../types/department.js";
import type { Store } from "../types/store.js";
import type { User } from "../types/user.js";
import type { CollectionStore } from "./base.js";
import { DuplicateError, ProtectedEntityError } from "./errors.js";
import type { Repository } from "./repository.js";
import type { Tables } from "./tables.js";
import { generateSecurePassword, generateUsername, type UsersRepository } from "./users.js";

export interface DepartmentSetup {
  department: Department;
  store: Store;
  user: User;

  /** Plain-text credentials, only ever returned here */
  username: string;
  password: string;
}

export interface DepartmentsRepository
  extends Repository<Department, CreateDepartmentInput> {
  getByName(name: string): Department | null;

  /**
   * Create a department together with its store ("<name> Store") and a
   * department user. All three are validated before anything is written.
   * An existing store already pointing at the new id is reused.
   */
  createWithStoreAndUser(input: CreateDepartmentInput): DepartmentSetup;
}

const sameName = (a: string, b: string) => a.trim().toLowerCase() === b.trim().toLowerCase();

export function createDepartmentsRepository(
  store: CollectionStore,
  tables: Tables,
  users: UsersRepository
): DepartmentsRepository {
  const base = tables.departments;

  const checkName = (name: string, departments: readonly Department[], selfId?: string) => {
    if (departments.some((d) => d.id !== selfId && sameName(d.name, name))) {
      throw new DuplicateError("Department", "name", name.trim());
    }
  };

  return {
    ...base,

    create(input: CreateDepartmentInput): Department {
      const departments = base.getAll();
      checkName(input.name, departments);
      const department = base.stageCreate(input, departments);
      base.replaceAll([...departments, department]);
      return department;
    },

    update(id: string, patch: UpdateDepartmentInput): Department {
      const departments = base.getAll();
      const existing = base.getById(id);
      if (patch.name !== undefined) {
        checkName(patch.name, departments, id);
      }
      const updated = base.stageUpdate(existing, patch);
      base.replaceAll(departments.map((d) => (d.id === id ? updated : d)));
      return updated;
    },

    delete(id: string): Department {
      if (id === MAIN_ID) {
        throw new ProtectedEntityError("Department", id);
      }
      const department = base.getById(id);
      base.replaceAll(base.getAll().filter((d) => d.id !== id));
      return department;
    },

    getByName(name: string): Department | null {
      return base.getAll().find((d) => sameName(d.name, name)) ?? null;
    },

    createWithStoreAndUser(input: CreateDepartmentInput): DepartmentSetup {
      const departments = base.getAll();
      const stores = tables.stores.getAll();
      const existingUsers = users.getAll();

      checkName(input.name, departments);
      const department = base.stageCreate(input, departments);

      // A store left behind by a department-only delete keeps its
      // department id; a department recreated under that id adopts it.
      const orphan = stores.find((s) => s.department_id === department.id);
      const newStore =
        orphan ??
        tables.stores.stageCreate(
          {
            name: `${department.name} Store`,
            department_id: department.id,
            description: `Main store for ${department.name} department`,
          },
          stores
        );

      const username = generateUsername(
        department.name,
        existingUsers.map((u) => u.username)
      );
      const password = generateSecurePassword();

      // Department is not saved yet, so the user skips the FK lookup and
      // is linked afterwards.
      const staged = users.stageUser(
        {
          username,
          password,
          role: "department_user",
          name: `${department.name} User`,
        },
        existingUsers
      );
      const user: User = { ...staged, department_id: department.id };

      store.batch(() => {
        base.replaceAll([...departments, department]);
        if (!orphan) tables.stores.replaceAll([...stores, newStore]);
        users.replaceAll([...existingUsers, user]);
      });

      return { department, store: newStore, user, username, password };
    },
  };
}
