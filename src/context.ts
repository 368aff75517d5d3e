/**
 * Wiring of the long-lived services shared by the server and the CLI
 */

import { createProvider } from "./providers/index.js";
import { ProductRepository } from "./services/products/repository.js";
import {
  DatabaseSyncRunStore,
  Reconciler,
  SyncOrchestrator,
  SyncScheduler,
  SyncStatusReporter,
} from "./services/sync/index.js";
import { AccountService } from "./services/users/accounts.js";
import { UserRepository } from "./services/users/repository.js";

import type { AppConfig } from "./config.js";
import type { DatabaseHandle } from "./db/connection.js";
import type { FetchFn } from "./providers/http.js";
import type { ProductProvider } from "./providers/types.js";

export interface AppContext {
  config: AppConfig;
  database: DatabaseHandle;
  products: ProductRepository;
  users: UserRepository;
  accounts: AccountService;
  orchestrator: SyncOrchestrator;
  status: SyncStatusReporter;
  scheduler: SyncScheduler;
}

export interface AppContextOptions {
  /** replaces the configured provider */
  provider?: ProductProvider;
  fetch?: FetchFn;
}

export function createAppContext(
  config: AppConfig,
  database: DatabaseHandle,
  options: AppContextOptions = {}
): AppContext {
  const provider =
    options.provider ?? createProvider(config.provider, { fetch: options.fetch });

  const orchestrator = new SyncOrchestrator({
    provider,
    reconciler: new Reconciler(database.db),
    store: new DatabaseSyncRunStore(database.db),
    runTimeoutMs: config.sync.runTimeoutMs,
    maxErrors: config.sync.maxErrors,
  });

  const users = new UserRepository(database.db);

  return {
    config,
    database,
    products: new ProductRepository(database.db),
    users,
    accounts: new AccountService(users, {
      passwordRounds: config.auth.passwordRounds,
    }),
    orchestrator,
    status: new SyncStatusReporter(orchestrator),
    scheduler: new SyncScheduler(orchestrator, {
      intervalMinutes: config.sync.intervalMinutes,
      runOnStart: config.sync.runOnStart,
    }),
  };
}
