/**
 * Product Routes - /api/v1/products
 *
 * Reads are open to any authenticated user, writes need the admin role.
 * Products created here have no external id; the sync job only ever
 * touches rows it created itself (matched by external id).
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  createPaginationMeta,
  decodeCursor,
  parseLimit,
} from "../../utils/pagination.js";
import { NotFoundError, ValidationError } from "../plugins/error-handler.js";
import {
  IdParamSchema,
  PaginationQuerySchema,
  ProductSchema,
  createListResponseSchema,
  createResponseSchema,
  type IdParam,
} from "../schemas/common.js";

import type { ProductRepository } from "../../services/products/repository.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const ListProductsQuerySchema = Type.Intersect([
  PaginationQuerySchema,
  Type.Object({
    search: Type.Optional(
      Type.String({ description: "Case-insensitive match on name or description" })
    ),
    category: Type.Optional(Type.String()),
    minPrice: Type.Optional(Type.Number({ minimum: 0 })),
    maxPrice: Type.Optional(Type.Number({ minimum: 0 })),
  }),
]);

type ListProductsQuery = Static<typeof ListProductsQuerySchema>;

const Dimension = Type.Union([Type.Number({ minimum: 0 }), Type.Null()]);
const OptionalText = Type.Union([Type.String(), Type.Null()]);

const CreateProductBodySchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    price: Type.Number({ minimum: 0 }),
    description: Type.Optional(OptionalText),
    category: Type.Optional(OptionalText),
    height: Type.Optional(Dimension),
    length: Type.Optional(Dimension),
    depth: Type.Optional(Dimension),
  },
  { additionalProperties: false }
);

type CreateProductBody = Static<typeof CreateProductBodySchema>;

const UpdateProductBodySchema = Type.Partial(CreateProductBodySchema, {
  additionalProperties: false,
  minProperties: 1,
});

type UpdateProductBody = Static<typeof UpdateProductBodySchema>;

const ProductResponseSchema = createResponseSchema(ProductSchema);
const ProductListResponseSchema = createListResponseSchema(ProductSchema);

// ============================================================================
// Route Registration
// ============================================================================

export interface ProductRouteDeps {
  products: ProductRepository;
}

export function registerProductRoutes(
  app: FastifyInstance,
  deps: ProductRouteDeps
): void {
  const anyUser = app.requireRole();
  const adminOnly = app.requireRole("admin");

  // GET /products - List with search, filters and cursor pagination
  app.get<{ Querystring: ListProductsQuery }>(
    "/products",
    {
      preHandler: anyUser,
      schema: {
        summary: "List products",
        description:
          "Lists products ordered by id. Filter by text, category and price range; " +
          "follow meta.pagination.cursor for the next page.",
        tags: ["Products"],
        querystring: ListProductsQuerySchema,
        response: {
          200: ProductListResponseSchema,
        },
      },
    },
    async (request) => {
      const { search, category, minPrice, maxPrice, cursor } = request.query;
      const limit = parseLimit(request.query.limit);

      if (
        minPrice !== undefined &&
        maxPrice !== undefined &&
        minPrice > maxPrice
      ) {
        throw new ValidationError("minPrice must not exceed maxPrice", {
          minPrice,
          maxPrice,
        });
      }

      let afterId: number | undefined;
      if (cursor !== undefined) {
        const payload = decodeCursor(cursor);
        if (payload === null) {
          throw new ValidationError("Invalid cursor");
        }
        afterId = payload.id;
      }

      const page = await deps.products.list({
        search,
        category,
        minPrice,
        maxPrice,
        afterId,
        limit,
      });

      return {
        data: page.items,
        meta: {
          pagination: createPaginationMeta(
            page.items,
            limit,
            page.hasMore,
            page.total
          ),
        },
      };
    }
  );

  // GET /products/:id
  app.get<{ Params: IdParam }>(
    "/products/:id",
    {
      preHandler: anyUser,
      schema: {
        summary: "Get product",
        tags: ["Products"],
        params: IdParamSchema,
        response: {
          200: ProductResponseSchema,
        },
      },
    },
    async (request) => {
      const product = await deps.products.findById(request.params.id);
      if (product === undefined) {
        throw new NotFoundError(`Product ${String(request.params.id)} not found`);
      }
      return { data: product };
    }
  );

  // POST /products - Manual product, not linked to any provider
  app.post<{ Body: CreateProductBody }>(
    "/products",
    {
      preHandler: adminOnly,
      schema: {
        summary: "Create product",
        tags: ["Products"],
        body: CreateProductBodySchema,
        response: {
          201: ProductResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const product = await deps.products.create(request.body);
      return reply.status(201).send({ data: product });
    }
  );

  // PATCH /products/:id
  app.patch<{ Params: IdParam; Body: UpdateProductBody }>(
    "/products/:id",
    {
      preHandler: adminOnly,
      schema: {
        summary: "Update product",
        description: "Partial update; only the fields present are changed",
        tags: ["Products"],
        params: IdParamSchema,
        body: UpdateProductBodySchema,
        response: {
          200: ProductResponseSchema,
        },
      },
    },
    async (request) => {
      const product = await deps.products.update(
        request.params.id,
        request.body
      );
      if (product === undefined) {
        throw new NotFoundError(`Product ${String(request.params.id)} not found`);
      }
      return { data: product };
    }
  );

  // DELETE /products/:id
  app.delete<{ Params: IdParam }>(
    "/products/:id",
    {
      preHandler: adminOnly,
      schema: {
        summary: "Delete product",
        tags: ["Products"],
        params: IdParamSchema,
      },
    },
    async (request, reply) => {
      const deleted = await deps.products.delete(request.params.id);
      if (!deleted) {
        throw new NotFoundError(`Product ${String(request.params.id)} not found`);
      }
      return reply.status(204).send();
    }
  );
}
