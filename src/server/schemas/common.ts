/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

import { SyncRunErrorSchema } from "../../services/sync/types.js";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100, default: 50 })),
  cursor: Type.Optional(Type.String()),
});

export type PaginationQuery = Static<typeof PaginationQuerySchema>;

export const PaginationMetaSchema = Type.Object({
  cursor: Type.Union([Type.String(), Type.Null()]),
  hasMore: Type.Boolean(),
  limit: Type.Number(),
  total: Type.Optional(Type.Number()),
});

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorType = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Object({
      pagination: PaginationMetaSchema,
    }),
  });
}

// ============================================================================
// Domain Schemas
// ============================================================================

const Nullable = <T extends TSchema>(schema: T) =>
  Type.Union([schema, Type.Null()]);

export const ProductSchema = Type.Object({
  id: Type.Integer(),
  externalId: Nullable(Type.String()),
  name: Type.String(),
  description: Nullable(Type.String()),
  price: Type.Number(),
  category: Nullable(Type.String()),
  height: Nullable(Type.Number()),
  length: Nullable(Type.Number()),
  depth: Nullable(Type.Number()),
  source: Nullable(Type.String()),
  createdAt: Type.String({ format: "date-time" }),
  updatedAt: Type.String({ format: "date-time" }),
});

export const UserSchema = Type.Object({
  id: Type.Integer(),
  email: Type.String(),
  role: Type.Union([Type.Literal("user"), Type.Literal("admin")]),
  createdAt: Type.String({ format: "date-time" }),
  updatedAt: Type.String({ format: "date-time" }),
});

export const SyncRunSchema = Type.Object({
  runId: Type.String(),
  trigger: Type.Union([Type.Literal("manual"), Type.Literal("schedule")]),
  provider: Type.String(),
  status: Type.Union([
    Type.Literal("pending"),
    Type.Literal("running"),
    Type.Literal("succeeded"),
    Type.Literal("failed"),
  ]),
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: Nullable(Type.String({ format: "date-time" })),
  recordsFetched: Type.Integer(),
  recordsCreated: Type.Integer(),
  recordsUpdated: Type.Integer(),
  recordsFailed: Type.Integer(),
  recordsSkipped: Type.Integer(),
  pagesFetched: Type.Integer(),
  errors: Type.Array(SyncRunErrorSchema),
});

// ============================================================================
// ID Parameter Schemas
// ============================================================================

export const IdParamSchema = Type.Object({
  id: Type.Integer({ minimum: 1 }),
});

export type IdParam = Static<typeof IdParamSchema>;
