/**
 * Pharmacy Type Definitions
 *
 * Zod schemas and inferred record types for every persisted collection.
 */

export {
  MAIN_ID,
  idSchema,
  storedRecordSchema,
  lineItemSchema,
  inventorySchema,
} from "./common.js";
export type {
  StoredRecord,
  StoredRecordKey,
  LineItem,
  Inventory,
  CreateInput,
  UpdateInput,
} from "./common.js";

export { USER_ROLES, userSchema } from "./user.js";
export type { User, UserRole, CreateUserInput, UpdateUserInput } from "./user.js";

export { medicineSchema } from "./medicine.js";
export type { Medicine, CreateMedicineInput, UpdateMedicineInput } from "./medicine.js";

export { supplierSchema } from "./supplier.js";
export type { Supplier, CreateSupplierInput, UpdateSupplierInput } from "./supplier.js";

export { doctorSchema } from "./doctor.js";
export type { Doctor, CreateDoctorInput, UpdateDoctorInput } from "./doctor.js";

export { patientSchema } from "./patient.js";
export type { Patient, CreatePatientInput, UpdatePatientInput } from "./patient.js";

export { departmentSchema } from "./department.js";
export type {
  Department,
  CreateDepartmentInput,
  UpdateDepartmentInput,
} from "./department.js";

export { storeSchema } from "./store.js";
export type { Store, CreateStoreInput, UpdateStoreInput, StockLevel } from "./store.js";

export { PURCHASE_STATUSES, purchaseSchema } from "./purchase.js";
export type {
  Purchase,
  PurchaseStatus,
  CreatePurchaseInput,
  UpdatePurchaseInput,
} from "./purchase.js";

export { consumptionSchema } from "./consumption.js";
export type {
  Consumption,
  CreateConsumptionInput,
  UpdateConsumptionInput,
} from "./consumption.js";

export { TRANSFER_STATUSES, CASCADE_DELETE_REASON, transferSchema } from "./transfer.js";
export type { Transfer, TransferStatus, CreateTransferInput, UpdateTransferInput } from "./transfer.js";

export { SYSTEM_ACTOR, activityEntrySchema } from "./activity.js";
export type { ActivityEntry, Actor, ActivityInput } from "./activity.js";
