/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStat } from "../../db/migrate.js";
import type { User } from "../../services/users/repository.js";
import type { SyncRun, SyncRunStatus } from "../../services/sync/types.js";

function colorStatus(status: SyncRunStatus): string {
  switch (status) {
    case "succeeded":
      return chalk.green(status);
    case "failed":
      return chalk.red(status);
    case "pending":
    case "running":
      return chalk.yellow(status);
  }
}

function formatDuration(run: SyncRun): string {
  if (run.finishedAt === null) {
    return "-";
  }
  const ms = Date.parse(run.finishedAt) - Date.parse(run.startedAt);
  return ms < 1000 ? `${String(ms)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Display a sync run's summary and counts
 */
export function displaySyncRun(run: SyncRun): void {
  console.log(chalk.bold(`\nSync run ${run.runId}\n`));
  console.log(`  Status:    ${colorStatus(run.status)}`);
  console.log(`  Provider:  ${run.provider}`);
  console.log(`  Trigger:   ${run.trigger}`);
  console.log(`  Started:   ${run.startedAt}`);
  console.log(`  Finished:  ${run.finishedAt ?? "-"}`);
  console.log(`  Duration:  ${formatDuration(run)}`);
  console.log();

  const table = new CliTable3({
    head: [
      chalk.cyan("Pages"),
      chalk.cyan("Fetched"),
      chalk.cyan("Created"),
      chalk.cyan("Updated"),
      chalk.cyan("Failed"),
      chalk.cyan("Skipped"),
    ],
  });
  table.push([
    String(run.pagesFetched),
    String(run.recordsFetched),
    chalk.green(String(run.recordsCreated)),
    String(run.recordsUpdated),
    run.recordsFailed > 0 ? chalk.red(String(run.recordsFailed)) : "0",
    String(run.recordsSkipped),
  ]);
  console.log(table.toString());
}

/**
 * Display the error list of a run, if it has one
 */
export function displaySyncErrors(run: SyncRun, limit = 20): void {
  if (run.errors.length === 0) {
    return;
  }

  const table = new CliTable3({
    head: [chalk.cyan("Kind"), chalk.cyan("External ID"), chalk.cyan("Reason")],
    colWidths: [10, 16, 70],
    wordWrap: true,
  });

  for (const error of run.errors.slice(0, limit)) {
    table.push([error.kind, error.externalId ?? "-", error.reason]);
  }

  console.log(chalk.bold("\nErrors:\n"));
  console.log(table.toString());

  if (run.errors.length > limit) {
    console.log(chalk.dim(`... and ${String(run.errors.length - limit)} more`));
  }
}

/**
 * Display per-table row counts
 */
export function displayTableStats(stats: readonly TableStat[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows")],
  });
  for (const row of stats) {
    table.push([row.table_name, String(row.row_count)]);
  }
  console.log(table.toString());
}

export function displayUser(user: User): void {
  const table = new CliTable3({
    head: [chalk.cyan("ID"), chalk.cyan("Email"), chalk.cyan("Role"), chalk.cyan("Created")],
  });
  table.push([
    String(user.id),
    user.email,
    user.role === "admin" ? chalk.magenta(user.role) : user.role,
    user.createdAt,
  ]);
  console.log(table.toString());
}
