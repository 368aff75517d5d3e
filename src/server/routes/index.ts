/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { checkConnection } from "../../db/connection.js";
import { DatabaseError } from "../plugins/error-handler.js";
import { registerAuthRoutes, type AuthRouteDeps } from "./auth.js";
import { registerProductRoutes, type ProductRouteDeps } from "./products.js";
import { registerSyncRoutes, type SyncRouteDeps } from "./sync.js";

import type { Database } from "../../db/types.js";
import type { FastifyInstance } from "fastify";
import type { Kysely } from "kysely";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Literal("ok"),
    syncRunning: Type.Boolean(),
  },
  {
    examples: [{ status: "ok", syncRunning: false }],
  }
);

export interface ApiRouteDeps
  extends AuthRouteDeps,
    ProductRouteDeps,
    SyncRouteDeps {
  db: Kysely<Database>;
}

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ApiRouteDeps
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description:
          "Returns ok when the database answers; 503 otherwise",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      if (!(await checkConnection(deps.db))) {
        throw new DatabaseError("Database is unavailable");
      }
      return { status: "ok" as const, syncRunning: deps.status.isRunning() };
    }
  );

  // API v1 routes
  await app.register(
    (api, _opts, done) => {
      registerAuthRoutes(api, deps);
      registerProductRoutes(api, deps);
      registerSyncRoutes(api, deps);
      done();
    },
    { prefix: "/api/v1" }
  );
}
