import { InvalidArgumentError, type Command } from "commander";

import { loadConfig } from "../../config.js";
import { closeConnection, getDatabase } from "../../db/connection.js";
import { AccountService } from "../../services/users/accounts.js";
import { USER_ROLES, UserRepository } from "../../services/users/repository.js";
import { describeError } from "../../utils/errors.js";
import { displayUser } from "../utils/display.js";

import type { UserRole } from "../../db/types.js";

function parseRole(value: string): UserRole {
  const role = USER_ROLES.find((candidate) => candidate === value);
  if (role === undefined) {
    throw new InvalidArgumentError(`Expected one of: ${USER_ROLES.join(", ")}`);
  }
  return role;
}

// ============================================================================
// Account Commands
// ============================================================================

export function registerUserCommand(program: Command): void {
  const user = program.command("user").description("Manage API accounts");

  // user create
  user
    .command("create")
    .description("Create an account; the way to set up the first admin")
    .requiredOption("--email <email>", "Login email")
    .requiredOption("--password <password>", "At least 6 characters")
    .option("--role <role>", "user or admin", parseRole, "user" satisfies UserRole)
    .action(async (options: { email: string; password: string; role: UserRole }) => {
      try {
        if (options.password.length < 6) {
          throw new InvalidArgumentError("Password must be at least 6 characters");
        }

        const config = loadConfig();
        const users = new UserRepository(getDatabase(config.databaseUrl).db);
        const accounts = new AccountService(users, {
          passwordRounds: config.auth.passwordRounds,
        });

        displayUser(await accounts.register(options));
      } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  // user role
  user
    .command("role")
    .description("Change an account's role")
    .requiredOption("--email <email>", "Account to change")
    .requiredOption("--role <role>", "user or admin", parseRole)
    .action(async (options: { email: string; role: UserRole }) => {
      try {
        const users = new UserRepository(getDatabase(loadConfig().databaseUrl).db);
        const existing = await users.findByEmail(options.email);
        const updated =
          existing !== undefined
            ? await users.updateRole(existing.id, options.role)
            : undefined;

        if (updated === undefined) {
          console.error(`No account for ${options.email}`);
          process.exitCode = 1;
          return;
        }
        displayUser(updated);
      } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
