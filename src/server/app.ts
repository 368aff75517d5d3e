import cors from "@fastify/cors";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { auth } from "./plugins/auth.js";
import { errorHandler } from "./plugins/error-handler.js";
import { openapi } from "./plugins/openapi.js";
import { registerApiRoutes } from "./routes/index.js";

import type { AppContext } from "../context.js";

export interface BuildServerOptions {
  logger?: FastifyServerOptions["logger"];
  /** token clock, for tests */
  now?: () => Date;
}

/**
 * Assemble the Fastify instance without listening
 */
export async function buildServer(
  context: Pick<
    AppContext,
    "config" | "database" | "products" | "users" | "accounts" | "orchestrator" | "status"
  >,
  options: BuildServerOptions = {}
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? false,
  });

  // Register plugins
  await app.register(cors, {
    origin: context.config.server.corsOrigins,
  });

  // Register OpenAPI (must be before routes)
  await app.register(openapi);

  await app.register(errorHandler);
  await app.register(auth, {
    secret: context.config.auth.jwtSecret,
    tokenTtlSeconds: context.config.auth.tokenTtlMinutes * 60,
    users: context.users,
    now: options.now,
  });

  await registerApiRoutes(app, {
    db: context.database.db,
    products: context.products,
    users: context.users,
    accounts: context.accounts,
    orchestrator: context.orchestrator,
    status: context.status,
  });

  // OpenAPI spec endpoint
  app.get("/openapi.json", { schema: { hide: true } }, () => app.swagger());

  return app;
}
