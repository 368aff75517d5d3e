/**
 * UserRepository - persistence for API accounts
 */

import { sql, type Kysely } from "kysely";

import { toIsoTimestamp } from "../../db/values.js";

import type { Database, UserRole, UserRow } from "../../db/types.js";

export const USER_ROLES = ["user", "admin"] as const satisfies readonly UserRole[];

/** Public view of an account; never carries the password hash */
export interface User {
  id: number;
  email: string;
  role: UserRole;
  createdAt: string;
  updatedAt: string;
}

export interface UserCredentials extends User {
  passwordHash: string;
}

export interface NewUser {
  email: string;
  passwordHash: string;
  role?: UserRole;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    role: row.role,
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at),
  };
}

export class UserRepository {
  constructor(private readonly db: Kysely<Database>) {}

  async findById(id: number): Promise<User | undefined> {
    const row = await this.db
      .selectFrom("users")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
    return row !== undefined ? toUser(row) : undefined;
  }

  async findByEmail(email: string): Promise<UserCredentials | undefined> {
    const row = await this.db
      .selectFrom("users")
      .selectAll()
      .where("email", "=", normalizeEmail(email))
      .executeTakeFirst();
    return row !== undefined
      ? { ...toUser(row), passwordHash: row.password_hash }
      : undefined;
  }

  async create(user: NewUser): Promise<User> {
    const row = await this.db
      .insertInto("users")
      .values({
        email: normalizeEmail(user.email),
        password_hash: user.passwordHash,
        role: user.role ?? "user",
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toUser(row);
  }

  async updateRole(id: number, role: UserRole): Promise<User | undefined> {
    const row = await this.db
      .updateTable("users")
      .set({ role, updated_at: sql<string>`CURRENT_TIMESTAMP` })
      .where("id", "=", id)
      .returningAll()
      .executeTakeFirst();
    return row !== undefined ? toUser(row) : undefined;
  }
}
