/**
 * Schema definition shared by the PostgreSQL and SQLite backends.
 */

import { sql, type Kysely } from "kysely";

import type { DatabaseKind } from "./connection.js";
import type { Database } from "./types.js";

export const TABLES = ["products", "sync_state", "users"] as const;

export async function createSchema(
  db: Kysely<Database>,
  kind: DatabaseKind
): Promise<void> {
  await db.schema
    .createTable("products")
    .ifNotExists()
    .addColumn("id", kind === "postgres" ? "serial" : "integer", (col) =>
      kind === "postgres"
        ? col.primaryKey()
        : col.primaryKey().autoIncrement()
    )
    .addColumn("external_id", "text", (col) => col.unique())
    .addColumn("name", "text", (col) => col.notNull())
    .addColumn("description", "text")
    .addColumn("price", "numeric(10, 2)", (col) =>
      col.notNull().check(sql`price >= 0`)
    )
    .addColumn("category", "text")
    .addColumn("height", "numeric(10, 2)")
    .addColumn("length", "numeric(10, 2)")
    .addColumn("depth", "numeric(10, 2)")
    .addColumn("source", "text")
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`)
    )
    .addColumn("updated_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`)
    )
    .execute();

  await db.schema
    .createIndex("products_name_idx")
    .ifNotExists()
    .on("products")
    .column("name")
    .execute();

  await db.schema
    .createIndex("products_category_idx")
    .ifNotExists()
    .on("products")
    .column("category")
    .execute();

  await db.schema
    .createTable("sync_state")
    .ifNotExists()
    .addColumn("job", "text", (col) => col.primaryKey())
    .addColumn("run_id", "text", (col) => col.notNull())
    .addColumn("trigger", "text", (col) => col.notNull())
    .addColumn("provider", "text", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("started_at", "text", (col) => col.notNull())
    .addColumn("finished_at", "text")
    .addColumn("records_fetched", "integer", (col) => col.notNull())
    .addColumn("records_created", "integer", (col) => col.notNull())
    .addColumn("records_updated", "integer", (col) => col.notNull())
    .addColumn("records_failed", "integer", (col) => col.notNull())
    .addColumn("records_skipped", "integer", (col) => col.notNull())
    .addColumn("pages_fetched", "integer", (col) => col.notNull())
    .addColumn("errors", "text", (col) => col.notNull().defaultTo("[]"))
    .addColumn("saved_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`)
    )
    .execute();

  await db.schema
    .createTable("users")
    .ifNotExists()
    .addColumn("id", kind === "postgres" ? "serial" : "integer", (col) =>
      kind === "postgres"
        ? col.primaryKey()
        : col.primaryKey().autoIncrement()
    )
    .addColumn("email", "text", (col) => col.notNull().unique())
    .addColumn("password_hash", "text", (col) => col.notNull())
    .addColumn("role", "text", (col) =>
      col
        .notNull()
        .defaultTo("user")
        .check(sql`role in ('user', 'admin')`)
    )
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`)
    )
    .addColumn("updated_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`)
    )
    .execute();
}

export async function dropSchema(db: Kysely<Database>): Promise<void> {
  for (const table of [...TABLES].reverse()) {
    await db.schema.dropTable(table).ifExists().execute();
  }
}
