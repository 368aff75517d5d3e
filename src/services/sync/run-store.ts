/**
 * Persistence of the last completed sync run (single slot per job)
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { sql, type Kysely } from "kysely";

import { syncLogger } from "../../logger.js";
import { freezeRun, SyncRunErrorSchema, type SyncRun, type SyncRunError } from "./types.js";

import type { Database, SyncStateRow } from "../../db/types.js";

const SyncRunErrorsSchema = Type.Array(SyncRunErrorSchema);

export interface SyncRunStore {
  loadLastCompleted(): Promise<SyncRun | null>;
  saveLastCompleted(run: SyncRun): Promise<void>;
}

function parseErrors(row: SyncStateRow): SyncRunError[] {
  let decoded: unknown;
  try {
    decoded = JSON.parse(row.errors);
  } catch {
    decoded = undefined;
  }

  if (!Value.Check(SyncRunErrorsSchema, decoded)) {
    syncLogger.warn(
      { job: row.job, runId: row.run_id },
      "Ignoring unreadable errors of persisted sync run"
    );
    return [];
  }
  return decoded;
}

export class DatabaseSyncRunStore implements SyncRunStore {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly job = "products"
  ) {}

  async loadLastCompleted(): Promise<SyncRun | null> {
    const row = await this.db
      .selectFrom("sync_state")
      .selectAll()
      .where("job", "=", this.job)
      .executeTakeFirst();

    if (row === undefined) {
      return null;
    }

    return freezeRun({
      runId: row.run_id,
      trigger: row.trigger,
      provider: row.provider,
      status: row.status,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      recordsFetched: row.records_fetched,
      recordsCreated: row.records_created,
      recordsUpdated: row.records_updated,
      recordsFailed: row.records_failed,
      recordsSkipped: row.records_skipped,
      pagesFetched: row.pages_fetched,
      errors: parseErrors(row),
    });
  }

  async saveLastCompleted(run: SyncRun): Promise<void> {
    const values = {
      run_id: run.runId,
      trigger: run.trigger,
      provider: run.provider,
      status: run.status,
      started_at: run.startedAt,
      finished_at: run.finishedAt,
      records_fetched: run.recordsFetched,
      records_created: run.recordsCreated,
      records_updated: run.recordsUpdated,
      records_failed: run.recordsFailed,
      records_skipped: run.recordsSkipped,
      pages_fetched: run.pagesFetched,
      errors: JSON.stringify(run.errors),
    };

    await this.db
      .insertInto("sync_state")
      .values({ job: this.job, ...values })
      .onConflict((oc) =>
        oc.column("job").doUpdateSet({
          ...values,
          saved_at: sql<string>`CURRENT_TIMESTAMP`,
        })
      )
      .execute();
  }
}
