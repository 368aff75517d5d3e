import { serverLogger } from "../logger.js";
import { describeError } from "../utils/errors.js";

import type { SyncOrchestrator } from "../services/sync/orchestrator.js";
import type { SyncScheduler } from "../services/sync/scheduler.js";

export interface ShutdownTargets {
  app: { close(): Promise<unknown> };
  scheduler: Pick<SyncScheduler, "stop">;
  orchestrator: Pick<SyncOrchestrator, "cancel" | "whenIdle">;
  closeDatabase: () => Promise<void>;
}

/**
 * Graceful stop, at most once: no new scheduled runs, the run in flight
 * is cancelled, HTTP stops accepting, then the database closes once the
 * cancelled run has recorded its result.
 */
export function createShutdown(
  targets: ShutdownTargets
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    serverLogger.info({ signal }, "Shutting down");

    targets.scheduler.stop();
    targets.orchestrator.cancel(`server shutting down (${signal})`);
    try {
      await targets.app.close();
      await targets.orchestrator.whenIdle();
      await targets.closeDatabase();
    } catch (error) {
      serverLogger.error({ error: describeError(error) }, "Error during shutdown");
      process.exitCode = 1;
    }
  };
}
