import { sql } from "kysely";

import { loadConfig } from "../config.js";
import { logger } from "../logger.js";
import { closeConnection, getDatabase, type DatabaseHandle } from "./connection.js";
import { createSchema, dropSchema, TABLES } from "./schema.js";

// ============================================================================
// Migration Functions
// ============================================================================

/**
 * Create (or with `fresh`, recreate) the catalog schema
 */
export async function runMigration(
  handle: DatabaseHandle,
  options?: { fresh?: boolean }
): Promise<void> {
  if (options?.fresh === true) {
    logger.info("Dropping existing tables (--fresh mode)...");
    await dropSchema(handle.db);
  }

  logger.info({ kind: handle.kind }, "Running schema migration...");
  await createSchema(handle.db, handle.kind);
  logger.info("Schema migration completed successfully");
}

export interface TableStat {
  table_name: string;
  row_count: number;
}

/**
 * Row counts for every catalog table; throws if the schema is missing
 */
export async function getTableStats(
  handle: DatabaseHandle
): Promise<TableStat[]> {
  const stats: TableStat[] = [];

  for (const table of TABLES) {
    const row = await handle.db
      .selectFrom(table)
      .select(sql<number | string>`COUNT(*)`.as("count"))
      .executeTakeFirst();
    stats.push({ table_name: table, row_count: Number(row?.count ?? 0) });
  }

  return stats;
}

// ============================================================================
// CLI Entry Point (only runs when executed directly, not when imported)
// ============================================================================

async function main(): Promise<void> {
  const fresh = process.argv.slice(2).includes("--fresh");
  const config = loadConfig();

  if (fresh) {
    console.log("Running migration with --fresh flag (will drop all tables)");
  }

  try {
    const handle = getDatabase(config.databaseUrl);
    await runMigration(handle, { fresh });
    console.log("Migration completed successfully!");

    const stats = await getTableStats(handle);
    console.log("\nTable statistics:");
    for (const row of stats) {
      console.log(`  ${row.table_name}: ${String(row.row_count)} rows`);
    }
  } catch (error) {
    console.error("Migration failed:", error);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

const isMainModule = process.argv[1]?.includes("migrate") === true;
if (isMainModule) {
  void main();
}
