/**
 * User Storage
 *
 * Accounts for administrators and department staff. Passwords are stored
 * as scrypt hashes; verifyPassword() checks a login attempt against one.
 */

import { randomBytes, randomInt, scryptSync, timingSafeEqual } from "node:crypto";
import type { CreateUserInput, UpdateUserInput, User } from "../types/user.js";
import { DuplicateError, ForeignKeyError, ValidationError } from "./errors.js";
import type { Repository } from "./repository.js";
import type { Tables } from "./tables.js";

const SALT_LENGTH = 16;
const KEY_LENGTH = 64;
const SCRYPT_PARAMS = { N: 16384, r: 8, p: 1 };

const USERNAME_PATTERN = /^[A-Za-z0-9_-]+$/;
const SPECIAL_CHARACTERS = "!@#$%^&*()_+-=[]{}|;:,.<>?";

/**
 * Hash a plain-text password.
 * Format: `scrypt:N:r:p:salt:hash` (salt and hash base64url encoded).
 */
export function hashPassword(password: string): string {
  const salt = randomBytes(SALT_LENGTH);
  const hash = scryptSync(password, salt, KEY_LENGTH, SCRYPT_PARAMS);
  const { N, r, p } = SCRYPT_PARAMS;
  return `scrypt:${N}:${r}:${p}:${salt.toString("base64url")}:${hash.toString("base64url")}`;
}

/**
 * Verify a password against a stored hash.
 */
export function verifyPassword(password: string, storedHash: string): boolean {
  const [scheme, n, r, p, salt, hash] = storedHash.split(":");
  if (scheme !== "scrypt" || !n || !r || !p || !salt || !hash) return false;

  const expected = Buffer.from(hash, "base64url");
  const actual = scryptSync(password, Buffer.from(salt, "base64url"), expected.length, {
    N: Number.parseInt(n, 10),
    r: Number.parseInt(r, 10),
    p: Number.parseInt(p, 10),
  });
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

export interface PasswordStrength {
  valid: boolean;
  score: number;
  feedback: string[];
}

/**
 * Score a password. Each of length, upper, lower, digit and special is
 * required and worth 20; length >= 12 and character diversity add 10 each.
 */
export function passwordStrength(password: string): PasswordStrength {
  const rules: Array<[boolean, string]> = [
    [password.length >= 8, "Password must be at least 8 characters long"],
    [/[A-Z]/.test(password), "Password must contain at least one uppercase letter"],
    [/[a-z]/.test(password), "Password must contain at least one lowercase letter"],
    [/\d/.test(password), "Password must contain at least one digit"],
    [
      [...password].some((c) => SPECIAL_CHARACTERS.includes(c)),
      "Password must contain at least one special character",
    ],
  ];

  const feedback = rules.filter(([met]) => !met).map(([, message]) => message);
  let score = (rules.length - feedback.length) * 20;
  if (password.length >= 12) score += 10;
  if (new Set(password).size >= password.length * 0.7) score += 10;

  return { valid: feedback.length === 0, score, feedback };
}

/**
 * Derive a unique username from a department name, e.g. "icu_user",
 * then "icu_user1", "icu_user2", ...
 */
export function generateUsername(departmentName: string, taken: Iterable<string>): string {
  const existing = new Set(taken);
  const base = departmentName
    .toLowerCase()
    .replace(/[ -]/g, "_")
    .replace(/[^a-z0-9_]/g, "")
    .slice(0, 15);

  let username = `${base}_user`;
  for (let counter = 1; existing.has(username); counter++) {
    username = `${base}_user${counter}`;
  }
  return username;
}

/**
 * Random password with at least one lowercase, uppercase, digit and
 * special character.
 */
export function generateSecurePassword(length = 12): string {
  const lowercase = "abcdefghijklmnopqrstuvwxyz";
  const uppercase = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
  const digits = "0123456789";
  const special = "!@#$%^&*";
  const all = lowercase + uppercase + digits + special;

  const pick = (chars: string) => chars.charAt(randomInt(chars.length));
  const chars = [pick(lowercase), pick(uppercase), pick(digits), pick(special)];
  while (chars.length < Math.max(length, 4)) {
    chars.push(pick(all));
  }

  // Fisher-Yates
  for (let i = chars.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    const current = chars[i];
    const swap = chars[j];
    if (current === undefined || swap === undefined) continue;
    chars[i] = swap;
    chars[j] = current;
  }
  return chars.join("");
}

function validateUsername(username: string): void {
  if (username.length < 3) {
    throw new ValidationError("Username must be at least 3 characters long");
  }
  if (!USERNAME_PATTERN.test(username)) {
    throw new ValidationError(
      "Username can only contain letters, numbers, hyphens, and underscores"
    );
  }
}

function validatePassword(password: string): void {
  const strength = passwordStrength(password);
  if (!strength.valid) {
    throw new ValidationError("Password validation failed", strength.feedback);
  }
}

/** Credentials handed back once when a department user is generated */
export interface GeneratedCredentials {
  user: User;
  username: string;
  password: string;
}

export interface UsersRepository extends Repository<User, CreateUserInput> {
  getByUsername(username: string): User | null;
  usersByDepartment(departmentId: string): User[];

  /** Build a validated, hashed user record without writing it */
  stageUser(input: CreateUserInput, existing: readonly User[]): User;

  /** Create a department_user with a generated username and password */
  createDepartmentUser(departmentId: string, departmentName: string): GeneratedCredentials;
}

export function createUsersRepository(tables: Tables): UsersRepository {
  const base = tables.users;

  const checkDepartment = (departmentId: string | null | undefined) => {
    if (departmentId && !tables.departments.exists(departmentId)) {
      throw new ForeignKeyError("department_id", departmentId);
    }
  };

  const stageUser = (input: CreateUserInput, existing: readonly User[]): User => {
    validateUsername(input.username);
    if (existing.some((u) => u.username === input.username)) {
      throw new DuplicateError("User", "username", input.username);
    }
    validatePassword(input.password);
    checkDepartment(input.department_id);

    const now = new Date().toISOString();
    return base.stageCreate(
      {
        ...input,
        password: hashPassword(input.password),
        name: input.name || input.username,
        email: input.email || `${input.username}@hospital.local`,
        password_changed_at: input.password_changed_at ?? now,
      },
      existing
    );
  };

  const usersByDepartment = (departmentId: string): User[] =>
    base.query().where("department_id", departmentId).toArray();

  return {
    ...base,

    create(input: CreateUserInput): User {
      const users = base.getAll();
      const user = stageUser(input, users);
      base.replaceAll([...users, user]);
      return user;
    },

    update(id: string, patch: UpdateUserInput): User {
      const users = base.getAll();
      const existing = base.getById(id);
      const changes: UpdateUserInput = { ...patch };

      if (patch.username !== undefined) {
        validateUsername(patch.username);
        if (users.some((u) => u.id !== id && u.username === patch.username)) {
          throw new DuplicateError("User", "username", patch.username);
        }
      }
      if (patch.password !== undefined) {
        validatePassword(patch.password);
        changes.password = hashPassword(patch.password);
        changes.password_changed_at = new Date().toISOString();
        changes.must_change_password = false;
      }
      checkDepartment(patch.department_id);
      if (
        existing.role === "admin" &&
        patch.role !== undefined &&
        patch.role !== "admin" &&
        users.filter((u) => u.role === "admin").length <= 1
      ) {
        throw new ValidationError("Cannot demote the last admin user");
      }

      const updated = base.stageUpdate(existing, changes);
      base.replaceAll(users.map((u) => (u.id === id ? updated : u)));
      return updated;
    },

    delete(id: string): User {
      const users = base.getAll();
      const user = base.getById(id);
      if (user.role === "admin" && users.filter((u) => u.role === "admin").length <= 1) {
        throw new ValidationError("Cannot delete the last admin user");
      }
      base.replaceAll(users.filter((u) => u.id !== id));
      return user;
    },

    getByUsername(username: string): User | null {
      return base.query().where("username", username).first();
    },

    usersByDepartment,

    stageUser,

    createDepartmentUser(departmentId: string, departmentName: string): GeneratedCredentials {
      const users = base.getAll();
      const username = generateUsername(
        departmentName,
        users.map((u) => u.username)
      );
      const password = generateSecurePassword();
      const user = stageUser(
        {
          username,
          password,
          role: "department_user",
          name: `${departmentName} User`,
          department_id: departmentId,
        },
        users
      );
      base.replaceAll([...users, user]);
      return { user, username, password };
    },
  };
}
