/**
 * SyncOrchestrator - runs the reconciliation job, at most one run at a time
 *
 * trigger() is the only way in, for the scheduler and on-demand requests
 * alike. It answers synchronously: either the new run id or
 * AlreadyRunningError carrying the id of the run in flight. The run itself
 * proceeds in the background:
 *
 *   pending → running → succeeded | failed
 *
 * cancel() aborts the run in flight; it ends failed with a cancelled error.
 *
 * Status is published as an immutable snapshot that is replaced on every
 * change, so readers never see a half-written run.
 */

import { randomUUID } from "node:crypto";

import { syncLogger } from "../../logger.js";
import { iterateProviderPages, type CursorPage } from "../../providers/pages.js";
import { describeError } from "../../utils/errors.js";
import {
  AlreadyRunningError,
  ProviderError,
  StoreError,
  SyncCancelledError,
  SyncTimeoutError,
} from "./errors.js";
import {
  freezeRun,
  type SyncRun,
  type SyncRunError,
  type SyncStatusSnapshot,
  type SyncTrigger,
} from "./types.js";

import type { ProductProvider } from "../../providers/types.js";
import type { ReconcileReport, Reconciler } from "./reconciler.js";
import type { SyncRunStore } from "./run-store.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncOrchestratorOptions {
  provider: ProductProvider;
  reconciler: Pick<Reconciler, "reconcile">;
  /** persists the last completed run; optional for one-off runs */
  store?: SyncRunStore;
  runTimeoutMs: number;
  /** cap on record-level errors kept per run */
  maxErrors: number;
  now?: () => Date;
  generateId?: () => string;
}

export interface TriggerResult {
  runId: string;
}

// ============================================================================
// Run transitions
// ============================================================================

export function applyPage(
  run: SyncRun,
  page: CursorPage,
  report: ReconcileReport,
  maxErrors: number
): SyncRun {
  const recordErrors: SyncRunError[] = report.errors.map((failure) => ({
    externalId: failure.externalId,
    reason: failure.reason,
    kind: "record",
  }));
  const room = Math.max(0, maxErrors - run.errors.length);

  return freezeRun({
    ...run,
    recordsFetched: run.recordsFetched + report.fetched,
    recordsCreated: run.recordsCreated + report.created,
    recordsUpdated: run.recordsUpdated + report.updated,
    recordsFailed: run.recordsFailed + report.failed,
    recordsSkipped: run.recordsSkipped + page.skipped.length,
    pagesFetched: run.pagesFetched + 1,
    errors: [...run.errors, ...recordErrors.slice(0, room)],
  });
}

export function describeRunFailure(error: unknown): SyncRunError {
  if (error instanceof SyncTimeoutError) {
    return { externalId: null, reason: error.message, kind: "timeout" };
  }
  if (error instanceof SyncCancelledError) {
    return { externalId: null, reason: error.message, kind: "cancelled" };
  }
  if (error instanceof ProviderError) {
    return {
      externalId: null,
      reason: `${error.provider} page at cursor ${String(error.cursor)}: ${error.message}`,
      kind: "provider",
    };
  }
  if (error instanceof StoreError) {
    return { externalId: null, reason: error.message, kind: "store" };
  }
  return { externalId: null, reason: describeError(error), kind: "store" };
}

// ============================================================================
// SyncOrchestrator
// ============================================================================

export class SyncOrchestrator {
  private snapshot: SyncStatusSnapshot = Object.freeze({
    current: null,
    lastCompleted: null,
  });

  private inFlight: Promise<void> | null = null;

  /** aborts the run in flight */
  private controller: AbortController | null = null;

  private readonly now: () => Date;

  private readonly generateId: () => string;

  constructor(private readonly options: SyncOrchestratorOptions) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get providerName(): string {
    return this.options.provider.name;
  }

  /**
   * Current and last completed run; never waits on a run in flight
   */
  getSnapshot(): SyncStatusSnapshot {
    return this.snapshot;
  }

  /**
   * Start a run unless one is already running.
   *
   * The running check and the switch to running happen in one synchronous
   * step, which is the mutual-exclusion gate for the whole process.
   */
  trigger(trigger: SyncTrigger = "manual"): TriggerResult {
    const active = this.snapshot.current;
    if (active !== null) {
      throw new AlreadyRunningError(active.runId);
    }

    const pending: SyncRun = freezeRun({
      runId: this.generateId(),
      trigger,
      provider: this.options.provider.name,
      status: "pending",
      startedAt: this.now().toISOString(),
      finishedAt: null,
      recordsFetched: 0,
      recordsCreated: 0,
      recordsUpdated: 0,
      recordsFailed: 0,
      recordsSkipped: 0,
      pagesFetched: 0,
      errors: [],
    });
    const running = freezeRun({ ...pending, status: "running" });
    this.publish({ current: running });

    syncLogger.info(
      { runId: running.runId, trigger, provider: running.provider },
      "Sync run started"
    );

    // a new run may start while this one is still persisting its result
    const flight = this.execute(running).finally(() => {
      if (this.inFlight === flight) {
        this.inFlight = null;
      }
    });
    this.inFlight = flight;

    return { runId: running.runId };
  }

  /**
   * Abort the run in flight. With a runId, only that run is cancelled.
   * Returns the id of the cancelled run, or null when nothing matched.
   */
  cancel(reason: string, runId?: string): string | null {
    const active = this.snapshot.current;
    if (
      active === null ||
      this.controller === null ||
      (runId !== undefined && active.runId !== runId)
    ) {
      return null;
    }

    syncLogger.info({ runId: active.runId, reason }, "Cancelling sync run");
    this.controller.abort(new SyncCancelledError(reason));
    return active.runId;
  }

  /**
   * Resolves once no run is in flight
   */
  async whenIdle(): Promise<void> {
    await this.inFlight;
  }

  /**
   * Load the persisted last completed run, if nothing newer is known
   */
  async restore(): Promise<SyncRun | null> {
    if (this.options.store === undefined) {
      return null;
    }

    const last = await this.options.store.loadLastCompleted();
    if (last !== null && this.snapshot.lastCompleted === null) {
      this.publish({ lastCompleted: last });
      syncLogger.info(
        { runId: last.runId, status: last.status },
        "Restored last sync run"
      );
    }
    return last;
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  private publish(change: Partial<SyncStatusSnapshot>): void {
    this.snapshot = Object.freeze({ ...this.snapshot, ...change });
  }

  private isCurrent(runId: string): boolean {
    return this.snapshot.current?.runId === runId;
  }

  private async execute(initial: SyncRun): Promise<void> {
    const { runTimeoutMs } = this.options;
    const controller = new AbortController();
    this.controller = controller;
    const timer = setTimeout(() => {
      controller.abort(new SyncTimeoutError(runTimeoutMs));
    }, runTimeoutMs);

    // Latest published progress; kept when the run fails part way
    let progress = initial;
    const work = this.processPages(initial, controller.signal, (next) => {
      progress = next;
    });
    // Work abandoned on timeout or cancel may settle later; it stops at the next
    // record or page boundary
    void work.catch((error: unknown) => {
      if (controller.signal.aborted) {
        syncLogger.debug(
          { runId: initial.runId, error: describeError(error) },
          "Abandoned sync work settled"
        );
      }
    });

    let final: SyncRun;
    try {
      await Promise.race([work, rejectOnAbort(controller.signal)]);
      final = freezeRun({
        ...progress,
        status: "succeeded",
        finishedAt: this.now().toISOString(),
      });
    } catch (error) {
      const cause: unknown = controller.signal.aborted
        ? controller.signal.reason
        : error;
      final = freezeRun({
        ...progress,
        status: "failed",
        finishedAt: this.now().toISOString(),
        errors: [...progress.errors, describeRunFailure(cause)],
      });
    } finally {
      clearTimeout(timer);
      this.controller = null;
    }

    await this.complete(final);
  }

  private async processPages(
    run: SyncRun,
    signal: AbortSignal,
    onProgress: (run: SyncRun) => void
  ): Promise<void> {
    let progress = run;

    for await (const page of iterateProviderPages(this.options.provider, {
      signal,
    })) {
      const report = await this.options.reconciler.reconcile(page.records, {
        signal,
      });

      if (signal.aborted || !this.isCurrent(run.runId)) {
        return;
      }

      progress = applyPage(progress, page, report, this.options.maxErrors);
      onProgress(progress);
      this.publish({ current: progress });

      syncLogger.debug(
        {
          runId: run.runId,
          cursor: page.cursor,
          fetched: progress.recordsFetched,
          failed: progress.recordsFailed,
        },
        "Sync page reconciled"
      );
    }
  }

  private async complete(run: SyncRun): Promise<void> {
    this.publish({ current: null, lastCompleted: run });

    const summary = {
      runId: run.runId,
      status: run.status,
      fetched: run.recordsFetched,
      created: run.recordsCreated,
      updated: run.recordsUpdated,
      failed: run.recordsFailed,
      skipped: run.recordsSkipped,
      pages: run.pagesFetched,
    };
    if (run.status === "succeeded") {
      syncLogger.info(summary, "Sync run succeeded");
    } else {
      syncLogger.error(
        { ...summary, error: run.errors[run.errors.length - 1]?.reason },
        "Sync run failed"
      );
    }

    if (this.options.store === undefined) {
      return;
    }

    try {
      await this.options.store.saveLastCompleted(run);
    } catch (error) {
      syncLogger.error(
        { runId: run.runId, error: describeError(error) },
        "Failed to persist sync run"
      );
    }
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener(
      "abort",
      () => {
        reject(signal.reason);
      },
      { once: true }
    );
  });
}
