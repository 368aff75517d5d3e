import type { ColumnType, Generated, Selectable, Updateable } from "kysely";

// ============================================================================
// Column helpers
// ============================================================================

/**
 * Timestamps are filled by the database default and read back as strings
 * (pg is configured to hand back ISO strings, SQLite stores text).
 */
export type Timestamp = ColumnType<string, string | undefined, string>;

// ============================================================================
// Enum-like string unions
// ============================================================================

export type SyncRunStatus = "pending" | "running" | "succeeded" | "failed";

export type SyncTrigger = "manual" | "schedule";

export type UserRole = "user" | "admin";

export type SyncErrorKind =
  | "record"
  | "provider"
  | "timeout"
  | "cancelled"
  | "store";

// ============================================================================
// Tables
// ============================================================================

/**
 * products - local catalog; rows with external_id set are owned by the
 * reconciliation job, rows without it were created through the API.
 */
export interface ProductsTable {
  id: Generated<number>;
  external_id: string | null;
  name: string;
  description: string | null;
  price: number;
  category: string | null;
  height: number | null;
  length: number | null;
  depth: number | null;
  source: string | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

/**
 * sync_state - one row per job holding its last completed run
 */
export interface SyncStateTable {
  job: string;
  run_id: string;
  trigger: SyncTrigger;
  provider: string;
  status: SyncRunStatus;
  started_at: string;
  finished_at: string | null;
  records_fetched: number;
  records_created: number;
  records_updated: number;
  records_failed: number;
  records_skipped: number;
  pages_fetched: number;
  errors: string;
  saved_at: Timestamp;
}

/**
 * users - API accounts; email is stored lowercased
 */
export interface UsersTable {
  id: Generated<number>;
  email: string;
  password_hash: string;
  role: ColumnType<UserRole, UserRole | undefined, UserRole>;
  created_at: Timestamp;
  updated_at: Timestamp;
}

export interface Database {
  products: ProductsTable;
  sync_state: SyncStateTable;
  users: UsersTable;
}

// ============================================================================
// Row helpers
// ============================================================================

export type ProductRow = Selectable<ProductsTable>;
export type ProductRowUpdate = Updateable<ProductsTable>;

export type SyncStateRow = Selectable<SyncStateTable>;

export type UserRow = Selectable<UsersTable>;
