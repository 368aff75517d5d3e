import { loadConfig } from "../config.js";
import { createAppContext } from "../context.js";
import { checkConnection, closeConnection, getDatabase, maskDatabaseUrl } from "../db/connection.js";
import { runMigration } from "../db/migrate.js";
import { fastifyLoggerConfig, serverLogger } from "../logger.js";
import { buildServer } from "./app.js";
import { createShutdown } from "./shutdown.js";

const config = loadConfig();
const database = getDatabase(config.databaseUrl);

if (!(await checkConnection(database.db))) {
  serverLogger.fatal(
    { databaseUrl: maskDatabaseUrl(config.databaseUrl) },
    "Database is unreachable"
  );
  process.exit(1);
}

// Idempotent; keeps a fresh SQLite file or database usable without a
// separate migrate step
await runMigration(database);

const context = createAppContext(config, database);
await context.orchestrator.restore();

if (config.auth.jwtSecret === null) {
  serverLogger.warn("JWT_SECRET is not set, every authenticated route answers 401");
}

const app = await buildServer(context, { logger: fastifyLoggerConfig });

const shutdown = createShutdown({
  app,
  scheduler: context.scheduler,
  orchestrator: context.orchestrator,
  closeDatabase: closeConnection,
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}

// Start server
try {
  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { host: config.server.host, port: config.server.port, provider: context.orchestrator.providerName },
    "Server started"
  );
  context.scheduler.start();
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}
