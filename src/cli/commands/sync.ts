import ora from "ora";

import { loadConfig } from "../../config.js";
import { createAppContext } from "../../context.js";
import { closeConnection, getDatabase } from "../../db/connection.js";
import { runMigration } from "../../db/migrate.js";
import { DatabaseSyncRunStore } from "../../services/sync/run-store.js";
import { describeError } from "../../utils/errors.js";
import { displaySyncErrors, displaySyncRun } from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Reconcile the catalog with the configured product provider");

  // sync run
  sync
    .command("run")
    .description("Run one sync in the foreground and print its report")
    .action(async () => {
      const spinner = ora("Starting sync...").start();

      try {
        const config = loadConfig();
        const database = getDatabase(config.databaseUrl);
        await runMigration(database);

        const context = createAppContext(config, database);
        const { runId } = context.orchestrator.trigger("manual");

        const interrupt = (): void => {
          spinner.text = "Cancelling...";
          context.orchestrator.cancel("interrupted", runId);
        };
        process.once("SIGINT", interrupt);

        const progress = setInterval(() => {
          const current = context.status.getStatus().current;
          if (current !== null) {
            spinner.text = `Syncing from ${current.provider}: ${String(current.pagesFetched)} pages, ${String(current.recordsFetched)} records`;
          }
        }, 250);

        try {
          await context.orchestrator.whenIdle();
        } finally {
          clearInterval(progress);
          process.off("SIGINT", interrupt);
        }

        const run = context.status.lastCompleted();
        if (run === null || run.runId !== runId) {
          spinner.fail("Sync finished without a result");
          process.exitCode = 1;
          return;
        }

        if (run.status === "succeeded") {
          spinner.succeed(
            `Synced ${String(run.recordsFetched)} records (${String(run.recordsCreated)} created, ${String(run.recordsUpdated)} updated, ${String(run.recordsFailed)} failed)`
          );
        } else {
          spinner.fail("Sync failed");
          process.exitCode = 1;
        }

        displaySyncRun(run);
        displaySyncErrors(run);
      } catch (error) {
        spinner.fail(`Failed: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // sync status
  sync
    .command("status")
    .description("Show the last completed sync run")
    .option("--errors", "Also list the run's errors")
    .action(async (options: { errors?: boolean }) => {
      try {
        const database = getDatabase(loadConfig().databaseUrl);
        const run = await new DatabaseSyncRunStore(database.db).loadLastCompleted();

        if (run === null) {
          console.log("No sync run has completed yet");
          return;
        }

        displaySyncRun(run);
        if (options.errors === true) {
          displaySyncErrors(run);
        } else if (run.errors.length > 0) {
          console.log(`\n${String(run.errors.length)} errors (use --errors to list them)`);
        }
      } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
