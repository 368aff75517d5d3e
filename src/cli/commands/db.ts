import ora from "ora";

import { loadConfig } from "../../config.js";
import {
  checkConnection,
  closeConnection,
  getDatabase,
  maskDatabaseUrl,
} from "../../db/connection.js";
import { getTableStats, runMigration } from "../../db/migrate.js";
import { describeError } from "../../utils/errors.js";
import { displayTableStats } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const db = program.command("db").description("Database management commands");

  // db migrate
  db.command("migrate")
    .description("Create the catalog tables if they do not exist")
    .option("--fresh", "Drop all tables first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora("Running migration...").start();

      try {
        const handle = getDatabase(loadConfig().databaseUrl);
        if (options.fresh === true) {
          spinner.text = "Dropping existing schema...";
        }

        await runMigration(handle, { fresh: options.fresh });
        spinner.succeed("Migration completed successfully");

        console.log("\nTables:");
        displayTableStats(await getTableStats(handle));
      } catch (error) {
        spinner.fail(`Migration failed: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // db status
  db.command("status")
    .description("Check database connection and show statistics")
    .action(async () => {
      const spinner = ora("Checking database connection...").start();

      try {
        const config = loadConfig();
        const handle = getDatabase(config.databaseUrl);
        const connected = await checkConnection(handle.db);

        if (!connected) {
          spinner.fail("Database connection failed");
          console.log(`\nDatabase URL: ${maskDatabaseUrl(config.databaseUrl)}`);
          process.exitCode = 1;
          return;
        }

        spinner.succeed("Database connected");
        console.log(`\nDatabase URL: ${maskDatabaseUrl(config.databaseUrl)}`);

        try {
          const stats = await getTableStats(handle);
          console.log("\nTable statistics:");
          displayTableStats(stats);
        } catch {
          console.log("\nSchema: Not initialized (run 'db migrate')");
        }
      } catch (error) {
        spinner.fail(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
