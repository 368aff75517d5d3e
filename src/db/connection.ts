import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, PostgresDialect, SqliteDialect, sql } from "kysely";
import pg from "pg";

import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// NUMERIC comes back as a string by default; prices and dimensions fit a double
types.setTypeParser(types.builtins.NUMERIC, (val: string) =>
  Number.parseFloat(val)
);
// Timestamps are exposed as ISO strings, same as the SQLite backend
types.setTypeParser(types.builtins.TIMESTAMPTZ, (val: string) =>
  new Date(val).toISOString()
);
types.setTypeParser(types.builtins.TIMESTAMP, (val: string) =>
  new Date(`${val.replace(" ", "T")}Z`).toISOString()
);

// ============================================================================
// Configuration
// ============================================================================

export type DatabaseKind = "postgres" | "sqlite";

export interface DatabaseHandle {
  db: Kysely<Database>;
  kind: DatabaseKind;
  url: string;
}

const SQLITE_PREFIX = "sqlite:";

export function resolveDatabaseKind(url: string): DatabaseKind {
  return url === ":memory:" || url.startsWith(SQLITE_PREFIX)
    ? "sqlite"
    : "postgres";
}

function createPostgresDialect(url: string): PostgresDialect {
  const poolConfig: pg.PoolConfig = {
    connectionString: url,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5000,
  };

  return new PostgresDialect({ pool: new Pool(poolConfig) });
}

function createSqliteDialect(url: string): SqliteDialect {
  const path = url.startsWith(SQLITE_PREFIX)
    ? url.slice(SQLITE_PREFIX.length)
    : url;

  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  return new SqliteDialect({ database: new SQLite(path) });
}

/**
 * Open a Kysely instance for a connection URL.
 *
 * `postgres://` / `postgresql://` URLs use a pg pool; `sqlite:<path>` and
 * `:memory:` use better-sqlite3.
 */
export function createDatabase(url: string): DatabaseHandle {
  const kind = resolveDatabaseKind(url);
  const dialect =
    kind === "sqlite" ? createSqliteDialect(url) : createPostgresDialect(url);

  dbLogger.debug({ kind, url: maskDatabaseUrl(url) }, "Opening database");

  return {
    db: new Kysely<Database>({ dialect }),
    kind,
    url,
  };
}

// ============================================================================
// Shared instance
// ============================================================================

let shared: DatabaseHandle | undefined;

/**
 * Process-wide database handle, opened on first use
 */
export function getDatabase(url: string): DatabaseHandle {
  shared ??= createDatabase(url);
  return shared;
}

/**
 * Check if the database connection is healthy
 */
export async function checkConnection(db: Kysely<Database>): Promise<boolean> {
  try {
    await sql`SELECT 1`.execute(db);
    return true;
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return false;
  }
}

/**
 * Gracefully close the shared database connection
 */
export async function closeConnection(): Promise<void> {
  if (shared === undefined) {
    return;
  }

  const handle = shared;
  shared = undefined;

  try {
    await handle.db.destroy();
    dbLogger.info("Database connection closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing database connection");
    throw error;
  }
}

/**
 * Connection URL for display, with the password masked
 */
export function maskDatabaseUrl(url: string): string {
  if (resolveDatabaseKind(url) === "sqlite") {
    return url;
  }

  try {
    const parsed = new URL(url);
    if (parsed.password !== "") {
      parsed.password = "****";
    }
    return parsed.toString();
  } catch {
    return "<invalid database url>";
  }
}
