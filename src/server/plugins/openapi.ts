/**
 * OpenAPI Plugin - Generates OpenAPI 3.0 specification
 */

import swagger from "@fastify/swagger";
import fp from "fastify-plugin";

import type { FastifyInstance } from "fastify";

function openapiPlugin(
  fastify: FastifyInstance,
  _opts: Record<string, unknown>,
  done: () => void
): void {
  void fastify.register(swagger, {
    openapi: {
      openapi: "3.0.3",
      info: {
        title: "Catalog Sync API",
        description:
          "Product catalog API. Products are created by hand or reconciled from an external " +
          "product-listing provider by a scheduled or on-demand sync job. " +
          "Log in through /api/v1/auth/login and send the token as a bearer credential.",
        version: "1.0.0",
      },
      servers: [
        {
          url: "http://localhost:3000",
          description: "Local development server",
        },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            bearerFormat: "JWT",
          },
        },
      },
      security: [{ bearerAuth: [] }],
      tags: [
        {
          name: "Auth",
          description: "Register, log in and manage account roles",
        },
        {
          name: "Products",
          description: "Browse, search and maintain catalog products",
        },
        {
          name: "Sync",
          description:
            "Trigger reconciliation runs and inspect the current and last completed run (admin only)",
        },
        {
          name: "Health",
          description: "Liveness and database reachability",
        },
      ],
    },
  });

  done();
}

export const openapi = fp(openapiPlugin, { name: "openapi" });
