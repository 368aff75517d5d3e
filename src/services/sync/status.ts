import type { SyncRun, SyncStatusSnapshot } from "./types.js";

export interface SnapshotSource {
  getSnapshot(): SyncStatusSnapshot;
}

/**
 * Read side of the sync job. Returns the orchestrator's current snapshot
 * object as-is; snapshots are frozen and swapped whole, so a reader never
 * observes a partially updated run.
 */
export class SyncStatusReporter {
  constructor(private readonly source: SnapshotSource) {}

  getStatus(): SyncStatusSnapshot {
    return this.source.getSnapshot();
  }

  isRunning(): boolean {
    return this.source.getSnapshot().current !== null;
  }

  lastCompleted(): SyncRun | null {
    return this.source.getSnapshot().lastCompleted;
  }
}
