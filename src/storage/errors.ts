/**
 * Error taxonomy for the data layer.
 *
 * Callers translate these into HTTP statuses or flash messages; the core
 * only throws them.
 */

export type PharmacyErrorCode =
  | "NOT_FOUND"
  | "DUPLICATE"
  | "FOREIGN_KEY"
  | "PROTECTED_ENTITY"
  | "VALIDATION"
  | "STORAGE"
  | "CASCADE";

/**
 * Base class for every error raised by the data layer.
 */
export class PharmacyError extends Error {
  readonly code: PharmacyErrorCode;

  constructor(code: PharmacyErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The requested id does not exist in the collection */
export class NotFoundError extends PharmacyError {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super("NOT_FOUND", `${entity} '${id}' not found`);
    this.entity = entity;
    this.id = id;
  }
}

/** A uniqueness rule would be broken */
export class DuplicateError extends PharmacyError {
  readonly field: string;
  readonly value: string;

  constructor(entity: string, field: string, value: string) {
    super("DUPLICATE", `${entity} with ${field} '${value}' already exists`);
    this.field = field;
    this.value = value;
  }
}

/** A referenced record is missing, or a delete would orphan references */
export class ForeignKeyError extends PharmacyError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string, message?: string) {
    super("FOREIGN_KEY", message ?? `${field} '${value}' does not reference an existing record`);
    this.field = field;
    this.value = value;
  }
}

/** Attempt to delete the main department or main store */
export class ProtectedEntityError extends PharmacyError {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super("PROTECTED_ENTITY", `${entity} '${id}' is protected and cannot be deleted`);
    this.entity = entity;
    this.id = id;
  }
}

/** Malformed input or a business rule violation */
export class ValidationError extends PharmacyError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("VALIDATION", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

/** I/O or parse failure at the storage boundary */
export class StorageError extends PharmacyError {
  readonly collection: string;

  constructor(collection: string, message: string, options?: ErrorOptions) {
    super("STORAGE", `${collection}: ${message}`, options);
    this.collection = collection;
  }
}

/** A cascade could not be staged; nothing was written */
export class CascadeError extends PharmacyError {
  constructor(message: string, options?: ErrorOptions) {
    super("CASCADE", message, options);
  }
}
