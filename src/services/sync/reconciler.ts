/**
 * Reconciler - create-or-update of external records keyed by external_id
 *
 * One reconcile() call is one batch and one transaction. Every record
 * runs inside its own savepoint, so a failed write is rolled back on its
 * own and the rest of the batch still commits.
 */

import { sql, type Kysely, type Transaction } from "kysely";

import { syncLogger } from "../../logger.js";
import { describeError } from "../../utils/errors.js";
import {
  ProductRepository,
  type Product,
  type ProductPatch,
} from "../products/repository.js";
import { RecordWriteError, StoreError } from "./errors.js";

import type { Database } from "../../db/types.js";
import type { ExternalRecord } from "../../providers/types.js";

// ============================================================================
// Types
// ============================================================================

export interface RecordFailure {
  externalId: string;
  reason: string;
}

export interface ReconcileReport {
  fetched: number;
  created: number;
  updated: number;
  failed: number;
  errors: RecordFailure[];
}

export interface ReconcileOptions {
  /** checked between records; an abort rolls back the whole batch */
  signal?: AbortSignal;
}

type RecordOutcome = "created" | "updated";

const SAVEPOINT = sql.raw("reconcile_record");

// ============================================================================
// Helpers
// ============================================================================

export function emptyReport(): ReconcileReport {
  return { fetched: 0, created: 0, updated: 0, failed: 0, errors: [] };
}

/**
 * Fields of the stored product that differ from the incoming record
 */
export function diffProduct(
  existing: Product,
  record: ExternalRecord
): ProductPatch {
  const patch: ProductPatch = {};
  if (existing.name !== record.name) patch.name = record.name;
  if (existing.description !== record.description) {
    patch.description = record.description;
  }
  if (existing.price !== record.price) patch.price = record.price;
  if (existing.category !== record.category) patch.category = record.category;
  if (existing.height !== record.height) patch.height = record.height;
  if (existing.length !== record.length) patch.length = record.length;
  if (existing.depth !== record.depth) patch.depth = record.depth;
  if (existing.source !== record.source) patch.source = record.source;
  return patch;
}

// ============================================================================
// Reconciler
// ============================================================================

export class Reconciler {
  constructor(private readonly db: Kysely<Database>) {}

  /**
   * Upsert a batch in provider order.
   *
   * Identical records are still counted as updated; only changed fields
   * are written. A failure to open or commit the batch transaction throws
   * StoreError.
   */
  async reconcile(
    records: readonly ExternalRecord[],
    options: ReconcileOptions = {}
  ): Promise<ReconcileReport> {
    const report = emptyReport();
    if (records.length === 0) {
      return report;
    }

    try {
      await this.db.transaction().execute(async (trx) => {
        const products = new ProductRepository(trx);

        for (const record of records) {
          options.signal?.throwIfAborted();

          report.fetched++;
          try {
            const outcome = await this.applyRecord(trx, products, record);
            report[outcome]++;
          } catch (error) {
            const failure = new RecordWriteError(
              record.externalId,
              describeError(error),
              { cause: error }
            );
            syncLogger.warn(
              { externalId: failure.externalId, reason: failure.message },
              "Failed to write external record"
            );
            report.failed++;
            report.errors.push({
              externalId: failure.externalId,
              reason: failure.message,
            });
          }
        }
      });
    } catch (error) {
      // Aborts surface as-is; the orchestrator owns their meaning
      if (options.signal?.aborted === true) {
        throw error;
      }
      throw new StoreError(
        `batch transaction failed: ${describeError(error)}`,
        { cause: error }
      );
    }

    syncLogger.debug(
      {
        fetched: report.fetched,
        created: report.created,
        updated: report.updated,
        failed: report.failed,
      },
      "Reconciled batch"
    );

    return report;
  }

  private async applyRecord(
    trx: Transaction<Database>,
    products: ProductRepository,
    record: ExternalRecord
  ): Promise<RecordOutcome> {
    await sql`SAVEPOINT ${SAVEPOINT}`.execute(trx);

    try {
      const outcome = await this.upsert(products, record);
      await sql`RELEASE SAVEPOINT ${SAVEPOINT}`.execute(trx);
      return outcome;
    } catch (error) {
      await sql`ROLLBACK TO SAVEPOINT ${SAVEPOINT}`.execute(trx);
      await sql`RELEASE SAVEPOINT ${SAVEPOINT}`.execute(trx);
      throw error;
    }
  }

  private async upsert(
    products: ProductRepository,
    record: ExternalRecord
  ): Promise<RecordOutcome> {
    const existing = await products.findByExternalId(record.externalId);

    if (existing === undefined) {
      await products.create({
        externalId: record.externalId,
        name: record.name,
        description: record.description,
        price: record.price,
        category: record.category,
        height: record.height,
        length: record.length,
        depth: record.depth,
        source: record.source,
      });
      return "created";
    }

    const patch = diffProduct(existing, record);
    if (Object.keys(patch).length > 0) {
      await products.update(existing.id, patch);
    }
    return "updated";
  }
}
