import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { encodeCursor } from "../../../../src/utils/pagination.js";
import { ScriptedProvider } from "../../../helpers/providers.js";
import { createTestServer, type TestServer } from "../../../helpers/server.js";

import type { Product } from "../../../../src/services/products/repository.js";

interface ListBody {
  data: Product[];
  meta: {
    pagination: { cursor: string | null; hasMore: boolean; limit: number; total: number };
  };
}

describe("server/routes/products", () => {
  let server: TestServer;

  beforeEach(async () => {
    server = await createTestServer(new ScriptedProvider([]));
    const { products } = server.context;
    await products.create({ name: "Oak Desk", price: 250, category: "furniture" });
    await products.create({
      name: "Desk Lamp",
      price: 40,
      category: "lighting",
      description: "Warm white LED",
    });
    await products.create({ name: "Bookshelf", price: 120, category: "furniture" });
  });

  afterEach(async () => {
    await server.close();
  });

  describe("GET /api/v1/products", () => {
    it("should require authentication", async () => {
      const response = await server.app.inject({ method: "GET", url: "/api/v1/products" });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({
        error: "UNAUTHORIZED",
        message: "Missing bearer token",
      });
    });

    it("should page through products by cursor", async () => {
      const first = await server.app.inject({
        method: "GET",
        url: "/api/v1/products?limit=2",
        headers: server.headers.user,
      });

      expect(first.statusCode).toBe(200);
      const firstBody = first.json<ListBody>();
      expect(firstBody.data.map((product) => product.name)).toEqual([
        "Oak Desk",
        "Desk Lamp",
      ]);
      expect(firstBody.meta.pagination).toEqual({
        cursor: encodeCursor({ id: 2 }),
        hasMore: true,
        limit: 2,
        total: 3,
      });

      const second = await server.app.inject({
        method: "GET",
        url: `/api/v1/products?limit=2&cursor=${encodeCursor({ id: 2 })}`,
        headers: server.headers.user,
      });

      const secondBody = second.json<ListBody>();
      expect(secondBody.data.map((product) => product.name)).toEqual(["Bookshelf"]);
      expect(secondBody.meta.pagination.hasMore).toBe(false);
      expect(secondBody.meta.pagination.cursor).toBeNull();
    });

    it("should match search against name and description", async () => {
      const byName = await server.app.inject({
        method: "GET",
        url: "/api/v1/products?search=desk",
        headers: server.headers.user,
      });
      const byDescription = await server.app.inject({
        method: "GET",
        url: "/api/v1/products?search=led",
        headers: server.headers.user,
      });

      expect(byName.json<ListBody>().data.map((product) => product.name)).toEqual([
        "Oak Desk",
        "Desk Lamp",
      ]);
      expect(
        byDescription.json<ListBody>().data.map((product) => product.name)
      ).toEqual(["Desk Lamp"]);
    });

    it("should filter by category and price range", async () => {
      const response = await server.app.inject({
        method: "GET",
        url: "/api/v1/products?category=furniture&minPrice=100&maxPrice=200",
        headers: server.headers.user,
      });

      const body = response.json<ListBody>();
      expect(body.data.map((product) => product.name)).toEqual(["Bookshelf"]);
      expect(body.meta.pagination.total).toBe(1);
    });

    it("should reject an inverted price range", async () => {
      const response = await server.app.inject({
        method: "GET",
        url: "/api/v1/products?minPrice=200&maxPrice=100",
        headers: server.headers.user,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        message: "minPrice must not exceed maxPrice",
      });
    });

    it("should reject a cursor it did not issue", async () => {
      const response = await server.app.inject({
        method: "GET",
        url: "/api/v1/products?cursor=not-a-cursor",
        headers: server.headers.user,
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        message: "Invalid cursor",
      });
    });
  });

  describe("GET /api/v1/products/:id", () => {
    it("should return one product", async () => {
      const response = await server.app.inject({
        method: "GET",
        url: "/api/v1/products/2",
        headers: server.headers.user,
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        data: {
          id: 2,
          externalId: null,
          name: "Desk Lamp",
          description: "Warm white LED",
          price: 40,
          category: "lighting",
          source: null,
        },
      });
    });

    it("should answer 404 for an unknown id", async () => {
      const response = await server.app.inject({
        method: "GET",
        url: "/api/v1/products/999",
        headers: server.headers.user,
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Product 999 not found",
      });
    });
  });

  describe("POST /api/v1/products", () => {
    it("should create a product as admin", async () => {
      const response = await server.app.inject({
        method: "POST",
        url: "/api/v1/products",
        headers: server.headers.admin,
        payload: { name: "Stool", price: 35, height: 45 },
      });

      expect(response.statusCode).toBe(201);
      expect(response.json()).toMatchObject({
        data: {
          id: 4,
          name: "Stool",
          price: 35,
          height: 45,
          length: null,
          externalId: null,
        },
      });
    });

    it("should refuse writes from a non-admin user", async () => {
      const response = await server.app.inject({
        method: "POST",
        url: "/api/v1/products",
        headers: server.headers.user,
        payload: { name: "Stool", price: 35 },
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toMatchObject({
        error: "FORBIDDEN",
        message: "Requires role admin",
      });
    });

    it("should reject a negative price", async () => {
      const response = await server.app.inject({
        method: "POST",
        url: "/api/v1/products",
        headers: server.headers.admin,
        payload: { name: "Stool", price: -1 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: "VALIDATION_ERROR" });
    });
  });

  describe("PATCH /api/v1/products/:id", () => {
    it("should change only the given fields", async () => {
      const response = await server.app.inject({
        method: "PATCH",
        url: "/api/v1/products/1",
        headers: server.headers.admin,
        payload: { price: 199.5 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        data: { id: 1, name: "Oak Desk", price: 199.5, category: "furniture" },
      });
    });

    it("should reject an empty patch", async () => {
      const response = await server.app.inject({
        method: "PATCH",
        url: "/api/v1/products/1",
        headers: server.headers.admin,
        payload: {},
      });

      expect(response.statusCode).toBe(400);
    });

    it("should answer 404 for an unknown id", async () => {
      const response = await server.app.inject({
        method: "PATCH",
        url: "/api/v1/products/999",
        headers: server.headers.admin,
        payload: { price: 1 },
      });

      expect(response.statusCode).toBe(404);
    });
  });

  describe("DELETE /api/v1/products/:id", () => {
    it("should delete and then report the product gone", async () => {
      const deleted = await server.app.inject({
        method: "DELETE",
        url: "/api/v1/products/3",
        headers: server.headers.admin,
      });
      const again = await server.app.inject({
        method: "DELETE",
        url: "/api/v1/products/3",
        headers: server.headers.admin,
      });

      expect(deleted.statusCode).toBe(204);
      expect(again.statusCode).toBe(404);
      expect(await server.context.products.findById(3)).toBeUndefined();
    });
  });
});
