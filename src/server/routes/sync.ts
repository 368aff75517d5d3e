/**
 * Sync API Routes
 *
 * Triggering answers immediately; the run proceeds in the background and
 * is observed through /sync/status.
 */

import { Type, type Static } from "@sinclair/typebox";

import { AVAILABLE_PROVIDERS } from "../../providers/index.js";
import { AlreadyRunningError } from "../../services/sync/errors.js";
import { ConflictError, NotFoundError } from "../plugins/error-handler.js";
import { SyncRunSchema } from "../schemas/common.js";

import type { SyncOrchestrator } from "../../services/sync/orchestrator.js";
import type { SyncStatusReporter } from "../../services/sync/status.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const RunIdResponseSchema = Type.Object({
  data: Type.Object({
    runId: Type.String(),
  }),
});

const RunIdParamSchema = Type.Object({
  runId: Type.String({ minLength: 1 }),
});

type RunIdParam = Static<typeof RunIdParamSchema>;

const SyncStatusResponseSchema = Type.Object({
  data: Type.Object({
    current: Type.Union([SyncRunSchema, Type.Null()]),
    lastCompleted: Type.Union([SyncRunSchema, Type.Null()]),
  }),
});

const SyncProvidersResponseSchema = Type.Object({
  data: Type.Object({
    active: Type.String(),
    available: Type.Array(
      Type.Object({
        name: Type.String(),
        description: Type.String(),
      })
    ),
  }),
});

// ============================================================================
// Route Registration
// ============================================================================

export interface SyncRouteDeps {
  orchestrator: Pick<SyncOrchestrator, "trigger" | "cancel" | "providerName">;
  status: SyncStatusReporter;
}

export function registerSyncRoutes(
  app: FastifyInstance,
  deps: SyncRouteDeps
): void {
  const adminOnly = app.requireRole("admin");

  // POST /sync/trigger - Start a run unless one is in flight
  app.post(
    "/sync/trigger",
    {
      preHandler: adminOnly,
      schema: {
        summary: "Trigger a sync run",
        description:
          "Starts reconciliation from the configured provider and returns the new run id. " +
          "Answers 409 with the id of the in-flight run when one is already running.",
        tags: ["Sync"],
        response: {
          202: RunIdResponseSchema,
        },
      },
    },
    async (request, reply) => {
      try {
        const { runId } = deps.orchestrator.trigger("manual");
        request.log.info({ runId, user: request.user?.id }, "Sync triggered");
        return await reply.status(202).send({ data: { runId } });
      } catch (error) {
        if (error instanceof AlreadyRunningError) {
          throw new ConflictError("SYNC_ALREADY_RUNNING", error.message, {
            runId: error.runId,
          });
        }
        throw error;
      }
    }
  );

  // DELETE /sync/cancel/:runId - Abort the run in flight
  app.delete<{ Params: RunIdParam }>(
    "/sync/cancel/:runId",
    {
      preHandler: adminOnly,
      schema: {
        summary: "Cancel a sync run",
        description:
          "Aborts the given run if it is the one in progress. The run ends failed with a " +
          "cancelled error; counts reached so far are kept.",
        tags: ["Sync"],
        params: RunIdParamSchema,
        response: {
          202: RunIdResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { runId } = request.params;
      const user = request.user?.email ?? "unknown";
      const cancelled = deps.orchestrator.cancel(`cancelled by ${user}`, runId);
      if (cancelled === null) {
        throw new NotFoundError(`No sync run ${runId} is in progress`);
      }
      request.log.info({ runId, user }, "Sync cancelled");
      return reply.status(202).send({ data: { runId: cancelled } });
    }
  );

  // GET /sync/status - Current and last completed run
  app.get(
    "/sync/status",
    {
      preHandler: adminOnly,
      schema: {
        summary: "Get sync status",
        description:
          "Returns the run in progress, if any, and the last completed run with its counts and errors",
        tags: ["Sync"],
        response: {
          200: SyncStatusResponseSchema,
        },
      },
    },
    () => {
      const { current, lastCompleted } = deps.status.getStatus();
      return { data: { current, lastCompleted } };
    }
  );

  // GET /sync/providers - Configured provider and supported variants
  app.get(
    "/sync/providers",
    {
      preHandler: adminOnly,
      schema: {
        summary: "List providers",
        description:
          "Returns the provider this instance syncs from and the provider variants it supports",
        tags: ["Sync"],
        response: {
          200: SyncProvidersResponseSchema,
        },
      },
    },
    () => ({
      data: {
        active: deps.orchestrator.providerName,
        available: AVAILABLE_PROVIDERS.map((provider) => ({
          name: provider.name,
          description: provider.description,
        })),
      },
    })
  );
}
