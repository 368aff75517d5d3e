/**
 * Account Routes - /api/v1/auth
 *
 * Registration and login are public. Self-registered accounts always get
 * the user role; admins promote accounts through the role route or the
 * CLI.
 */

import { Type, type Static } from "@sinclair/typebox";

import { EmailTakenError } from "../../services/users/accounts.js";
import {
  ConflictError,
  NotFoundError,
  UnauthorizedError,
} from "../plugins/error-handler.js";
import {
  IdParamSchema,
  UserSchema,
  createResponseSchema,
  type IdParam,
} from "../schemas/common.js";

import type { AccountService } from "../../services/users/accounts.js";
import type { UserRepository } from "../../services/users/repository.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const CredentialsBodySchema = Type.Object(
  {
    email: Type.String({ format: "email", maxLength: 254 }),
    password: Type.String({ minLength: 6, maxLength: 72 }),
  },
  { additionalProperties: false }
);

type CredentialsBody = Static<typeof CredentialsBodySchema>;

const RoleBodySchema = Type.Object(
  {
    role: Type.Union([Type.Literal("user"), Type.Literal("admin")]),
  },
  { additionalProperties: false }
);

type RoleBody = Static<typeof RoleBodySchema>;

const TokenResponseSchema = createResponseSchema(
  Type.Object({
    accessToken: Type.String(),
    tokenType: Type.Literal("bearer"),
    expiresIn: Type.Integer({ description: "Lifetime in seconds" }),
  })
);

const UserResponseSchema = createResponseSchema(UserSchema);

// ============================================================================
// Route Registration
// ============================================================================

export interface AuthRouteDeps {
  users: Pick<UserRepository, "findById" | "updateRole">;
  accounts: Pick<AccountService, "register" | "authenticate">;
}

export function registerAuthRoutes(
  app: FastifyInstance,
  deps: AuthRouteDeps
): void {
  // POST /auth/register - Create an account with the user role
  app.post<{ Body: CredentialsBody }>(
    "/auth/register",
    {
      schema: {
        summary: "Register",
        tags: ["Auth"],
        security: [],
        body: CredentialsBodySchema,
        response: {
          201: UserResponseSchema,
        },
      },
    },
    async (request, reply) => {
      try {
        const user = await deps.accounts.register(request.body);
        request.log.info({ userId: user.id }, "Account registered");
        return await reply.status(201).send({ data: user });
      } catch (error) {
        if (error instanceof EmailTakenError) {
          throw new ConflictError("EMAIL_TAKEN", "Email already registered");
        }
        throw error;
      }
    }
  );

  // POST /auth/login - Exchange credentials for an access token
  app.post<{ Body: CredentialsBody }>(
    "/auth/login",
    {
      schema: {
        summary: "Log in",
        tags: ["Auth"],
        security: [],
        body: CredentialsBodySchema,
        response: {
          200: TokenResponseSchema,
        },
      },
    },
    async (request) => {
      const user = await deps.accounts.authenticate(
        request.body.email,
        request.body.password
      );
      if (user === null) {
        throw new UnauthorizedError("Incorrect email or password");
      }
      return { data: await app.issueAccessToken(user) };
    }
  );

  // GET /auth/me - The account behind the token
  app.get(
    "/auth/me",
    {
      preHandler: app.requireRole(),
      schema: {
        summary: "Current account",
        tags: ["Auth"],
        response: {
          200: UserResponseSchema,
        },
      },
    },
    async (request) => {
      const user =
        request.user !== null ? await deps.users.findById(request.user.id) : undefined;
      if (user === undefined) {
        throw new NotFoundError("Account not found");
      }
      return { data: user };
    }
  );

  // PUT /auth/users/:id/role - Change an account's role (admin)
  app.put<{ Params: IdParam; Body: RoleBody }>(
    "/auth/users/:id/role",
    {
      preHandler: app.requireRole("admin"),
      schema: {
        summary: "Change role",
        tags: ["Auth"],
        params: IdParamSchema,
        body: RoleBodySchema,
        response: {
          200: UserResponseSchema,
        },
      },
    },
    async (request) => {
      const user = await deps.users.updateRole(request.params.id, request.body.role);
      if (user === undefined) {
        throw new NotFoundError(`User ${String(request.params.id)} not found`);
      }
      request.log.info(
        { userId: user.id, role: user.role, by: request.user?.id },
        "Role changed"
      );
      return { data: user };
    }
  );
}
