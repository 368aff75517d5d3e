import { Type, type Static } from "@sinclair/typebox";

import type {
  SyncErrorKind,
  SyncRunStatus,
  SyncTrigger,
} from "../../db/types.js";

export type { SyncErrorKind, SyncRunStatus, SyncTrigger };

export const SyncRunErrorSchema = Type.Object({
  externalId: Type.Union([Type.String(), Type.Null()]),
  reason: Type.String(),
  kind: Type.Union([
    Type.Literal("record"),
    Type.Literal("provider"),
    Type.Literal("timeout"),
    Type.Literal("cancelled"),
    Type.Literal("store"),
  ]),
});

export type SyncRunError = Static<typeof SyncRunErrorSchema>;

/**
 * One execution of the reconciliation job.
 *
 * Snapshots handed out by the orchestrator are frozen; progress is
 * published by replacing the whole object.
 */
export interface SyncRun {
  readonly runId: string;
  readonly trigger: SyncTrigger;
  readonly provider: string;
  readonly status: SyncRunStatus;
  readonly startedAt: string;
  readonly finishedAt: string | null;
  readonly recordsFetched: number;
  readonly recordsCreated: number;
  readonly recordsUpdated: number;
  readonly recordsFailed: number;
  /** malformed provider items dropped before reconciliation */
  readonly recordsSkipped: number;
  readonly pagesFetched: number;
  readonly errors: readonly SyncRunError[];
}

export interface SyncStatusSnapshot {
  readonly current: SyncRun | null;
  readonly lastCompleted: SyncRun | null;
}

export function freezeRun(run: SyncRun): SyncRun {
  return Object.freeze({ ...run, errors: Object.freeze([...run.errors]) });
}
