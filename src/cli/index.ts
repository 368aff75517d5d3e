#!/usr/bin/env node

/**
 * Catalog sync CLI
 *
 * Database setup, foreground sync runs, accounts and access tokens.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerTokenCommand } from "./commands/token.js";
import { registerUserCommand } from "./commands/user.js";

const program = new Command();

program
  .name("catalog-sync")
  .description("Product catalog sync - database, sync runs, accounts and API tokens")
  .version("0.1.0");

registerDbCommand(program);
registerSyncCommand(program);
registerUserCommand(program);
registerTokenCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
