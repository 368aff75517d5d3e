import { syncLogger } from "../../logger.js";
import { describeError } from "../../utils/errors.js";
import { AlreadyRunningError } from "./errors.js";

import type { SyncOrchestrator } from "./orchestrator.js";

export interface SyncSchedulerOptions {
  /** 0 disables the timer */
  intervalMinutes: number;
  runOnStart: boolean;
}

/**
 * Fixed-interval timer that goes through the same trigger gate as
 * on-demand requests. A tick that finds a run in flight is skipped.
 */
export class SyncScheduler {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly orchestrator: Pick<SyncOrchestrator, "trigger">,
    private readonly options: SyncSchedulerOptions
  ) {}

  get isActive(): boolean {
    return this.timer !== null;
  }

  start(): boolean {
    if (this.timer !== null) {
      return true;
    }

    if (this.options.intervalMinutes <= 0) {
      syncLogger.info("Scheduled sync disabled (interval is 0)");
      return false;
    }

    const intervalMs = Math.round(this.options.intervalMinutes * 60_000);
    this.timer = setInterval(() => {
      this.tick();
    }, intervalMs);
    this.timer.unref();

    syncLogger.info(
      { intervalMinutes: this.options.intervalMinutes },
      "Scheduled sync enabled"
    );

    if (this.options.runOnStart) {
      this.tick();
    }
    return true;
  }

  stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One scheduled trigger attempt; returns the new run id, if any
   */
  tick(): string | null {
    try {
      const { runId } = this.orchestrator.trigger("schedule");
      return runId;
    } catch (error) {
      if (error instanceof AlreadyRunningError) {
        syncLogger.info(
          { runId: error.runId },
          "Skipping scheduled sync, a run is already in progress"
        );
      } else {
        syncLogger.error(
          { error: describeError(error) },
          "Scheduled sync trigger failed"
        );
      }
      return null;
    }
  }
}
