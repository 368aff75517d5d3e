/**
 * Bearer-token auth gate
 *
 * Decorates every request with `user` (null until a guard accepts a
 * token) and the instance with `requireRole(role?)`, a preHandler factory,
 * and `issueAccessToken(user)` for the login route. The account behind a
 * token is loaded on every guarded request. Without a role any valid token
 * passes; admins pass every role check.
 */

import fp from "fastify-plugin";

import {
  TokenError,
  signAccessToken,
  verifyAccessToken,
} from "../../auth/token.js";
import { ForbiddenError, UnauthorizedError } from "./error-handler.js";

import type { UserRole } from "../../db/types.js";
import type { User, UserRepository } from "../../services/users/repository.js";
import type { FastifyInstance, FastifyRequest } from "fastify";

export interface AuthUser {
  id: number;
  email: string;
  role: UserRole;
}

export interface IssuedToken {
  accessToken: string;
  tokenType: "bearer";
  expiresIn: number;
}

export interface AuthPluginOptions {
  /** null rejects every token; the API then only serves /health */
  secret: string | null;
  tokenTtlSeconds: number;
  users: Pick<UserRepository, "findById">;
  now?: () => Date;
}

export type AuthGuard = (request: FastifyRequest) => Promise<void>;

declare module "fastify" {
  interface FastifyRequest {
    user: AuthUser | null;
  }

  interface FastifyInstance {
    requireRole(role?: UserRole): AuthGuard;
    issueAccessToken(user: Pick<User, "id">): Promise<IssuedToken>;
  }
}

const BEARER = /^Bearer\s+(\S+)$/i;
const USER_ID = /^[1-9]\d*$/;

export function readBearerToken(header: string | undefined): string | null {
  if (header === undefined) {
    return null;
  }
  return BEARER.exec(header.trim())?.[1] ?? null;
}

async function readSubject(token: string, secret: string, now: Date): Promise<number> {
  try {
    const claims = await verifyAccessToken(token, secret, now);
    if (!USER_ID.test(claims.sub)) {
      throw new UnauthorizedError("Invalid token: unknown user");
    }
    return Number.parseInt(claims.sub, 10);
  } catch (error) {
    if (error instanceof TokenError) {
      throw new UnauthorizedError(`Invalid token: ${error.message}`);
    }
    throw error;
  }
}

function authPlugin(
  fastify: FastifyInstance,
  options: AuthPluginOptions,
  done: () => void
): void {
  const now = options.now ?? (() => new Date());

  fastify.decorateRequest("user", null);

  fastify.decorate("requireRole", (role?: UserRole): AuthGuard => {
    return async (request) => {
      const token = readBearerToken(request.headers.authorization);
      if (token === null) {
        throw new UnauthorizedError("Missing bearer token");
      }
      if (options.secret === null) {
        throw new UnauthorizedError("Token authentication is not configured");
      }

      const userId = await readSubject(token, options.secret, now());
      const account = await options.users.findById(userId);
      if (account === undefined) {
        throw new UnauthorizedError("Invalid token: unknown user");
      }

      const user: AuthUser = { id: account.id, email: account.email, role: account.role };
      request.user = user;

      if (role !== undefined && user.role !== role && user.role !== "admin") {
        throw new ForbiddenError(`Requires role ${role}`);
      }
    };
  });

  fastify.decorate("issueAccessToken", async (user: Pick<User, "id">): Promise<IssuedToken> => {
    if (options.secret === null) {
      throw new UnauthorizedError("Token authentication is not configured");
    }

    const accessToken = await signAccessToken(String(user.id), options.secret, {
      ttlSeconds: options.tokenTtlSeconds,
      now: now(),
    });
    return { accessToken, tokenType: "bearer", expiresIn: options.tokenTtlSeconds };
  });

  done();
}

export const auth = fp(authPlugin, { name: "auth" });
