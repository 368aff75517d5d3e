import { InvalidArgumentError, type Command } from "commander";

import { signAccessToken } from "../../auth/token.js";
import { loadConfig } from "../../config.js";
import { closeConnection, getDatabase } from "../../db/connection.js";
import { UserRepository } from "../../services/users/repository.js";
import { describeError } from "../../utils/errors.js";

function parseMinutes(value: string): number {
  const minutes = Number.parseInt(value, 10);
  if (Number.isNaN(minutes) || minutes < 1) {
    throw new InvalidArgumentError("Expected a positive number of minutes");
  }
  return minutes;
}

export function registerTokenCommand(program: Command): void {
  program
    .command("token")
    .description("Mint an API access token for an existing account")
    .requiredOption("--email <email>", "Account to issue the token for")
    .option("--ttl <minutes>", "Lifetime in minutes (default: JWT_TTL_MINUTES)", parseMinutes)
    .action(async (options: { email: string; ttl?: number }) => {
      try {
        const config = loadConfig();
        const secret = config.auth.jwtSecret;
        if (secret === null) {
          console.error("JWT_SECRET is not set");
          process.exitCode = 1;
          return;
        }

        const users = new UserRepository(getDatabase(config.databaseUrl).db);
        const user = await users.findByEmail(options.email);
        if (user === undefined) {
          console.error(`No account for ${options.email}`);
          process.exitCode = 1;
          return;
        }

        const ttlMinutes = options.ttl ?? config.auth.tokenTtlMinutes;
        console.log(
          await signAccessToken(String(user.id), secret, {
            ttlSeconds: ttlMinutes * 60,
          })
        );
      } catch (error) {
        console.error(`Error: ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
