/**
 * ProductRepository - persistence for catalog products
 *
 * Works on a Kysely instance or a transaction, so the reconciler can run
 * it inside its batch transaction.
 */

import { sql, type Kysely, type SqlBool } from "kysely";

import { toIsoTimestamp } from "../../db/values.js";

import type { Database, ProductRow, ProductRowUpdate } from "../../db/types.js";

// ============================================================================
// Types
// ============================================================================

export interface Product {
  id: number;
  externalId: string | null;
  name: string;
  description: string | null;
  price: number;
  category: string | null;
  height: number | null;
  length: number | null;
  depth: number | null;
  source: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Fields a caller may set on a product */
export interface ProductFields {
  name: string;
  description: string | null;
  price: number;
  category: string | null;
  height: number | null;
  length: number | null;
  depth: number | null;
}

export interface NewProduct extends Partial<ProductFields> {
  name: string;
  price: number;
  externalId?: string | null;
  source?: string | null;
}

export type ProductPatch = Partial<ProductFields> & {
  source?: string | null;
};

export interface ProductFilters {
  search?: string;
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  /** return products with id greater than this */
  afterId?: number;
  limit: number;
}

export interface ProductPage {
  items: Product[];
  hasMore: boolean;
  total: number;
}

// ============================================================================
// Mapping
// ============================================================================

export function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    externalId: row.external_id,
    name: row.name,
    description: row.description,
    price: row.price,
    category: row.category,
    height: row.height,
    length: row.length,
    depth: row.depth,
    source: row.source,
    createdAt: toIsoTimestamp(row.created_at),
    updatedAt: toIsoTimestamp(row.updated_at),
  };
}

function toRowUpdate(patch: ProductPatch): ProductRowUpdate {
  const update: ProductRowUpdate = {};
  if (patch.name !== undefined) update.name = patch.name;
  if (patch.description !== undefined) update.description = patch.description;
  if (patch.price !== undefined) update.price = patch.price;
  if (patch.category !== undefined) update.category = patch.category;
  if (patch.height !== undefined) update.height = patch.height;
  if (patch.length !== undefined) update.length = patch.length;
  if (patch.depth !== undefined) update.depth = patch.depth;
  if (patch.source !== undefined) update.source = patch.source;
  return update;
}

/** Search text is matched literally; `%` and `_` are not wildcards */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

// ============================================================================
// ProductRepository
// ============================================================================

export class ProductRepository {
  constructor(private readonly db: Kysely<Database>) {}

  async findById(id: number): Promise<Product | undefined> {
    const row = await this.db
      .selectFrom("products")
      .selectAll()
      .where("id", "=", id)
      .executeTakeFirst();
    return row !== undefined ? toProduct(row) : undefined;
  }

  async findByExternalId(externalId: string): Promise<Product | undefined> {
    const row = await this.db
      .selectFrom("products")
      .selectAll()
      .where("external_id", "=", externalId)
      .executeTakeFirst();
    return row !== undefined ? toProduct(row) : undefined;
  }

  async list(filters: ProductFilters): Promise<ProductPage> {
    let query = this.db.selectFrom("products");

    if (filters.search !== undefined && filters.search !== "") {
      const pattern = `%${escapeLikePattern(filters.search.toLowerCase())}%`;
      query = query.where((eb) =>
        eb.or([
          sql<SqlBool>`${eb.fn<string>("lower", ["name"])} like ${pattern} escape '\\'`,
          sql<SqlBool>`${eb.fn<string>("lower", ["description"])} like ${pattern} escape '\\'`,
        ])
      );
    }
    if (filters.category !== undefined) {
      query = query.where("category", "=", filters.category);
    }
    if (filters.minPrice !== undefined) {
      query = query.where("price", ">=", filters.minPrice);
    }
    if (filters.maxPrice !== undefined) {
      query = query.where("price", "<=", filters.maxPrice);
    }

    const countRow = await query
      .select(sql<number | string>`COUNT(*)`.as("count"))
      .executeTakeFirst();

    let pageQuery = query.selectAll().orderBy("id", "asc");
    if (filters.afterId !== undefined) {
      pageQuery = pageQuery.where("id", ">", filters.afterId);
    }

    // Fetch one extra to determine hasMore
    const rows = await pageQuery.limit(filters.limit + 1).execute();

    return {
      items: rows.slice(0, filters.limit).map(toProduct),
      hasMore: rows.length > filters.limit,
      total: Number(countRow?.count ?? 0),
    };
  }

  async create(product: NewProduct): Promise<Product> {
    const row = await this.db
      .insertInto("products")
      .values({
        external_id: product.externalId ?? null,
        name: product.name,
        description: product.description ?? null,
        price: product.price,
        category: product.category ?? null,
        height: product.height ?? null,
        length: product.length ?? null,
        depth: product.depth ?? null,
        source: product.source ?? null,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toProduct(row);
  }

  /**
   * Apply a partial update; resolves undefined when the product is gone
   */
  async update(id: number, patch: ProductPatch): Promise<Product | undefined> {
    const row = await this.db
      .updateTable("products")
      .set({
        ...toRowUpdate(patch),
        updated_at: sql<string>`CURRENT_TIMESTAMP`,
      })
      .where("id", "=", id)
      .returningAll()
      .executeTakeFirst();
    return row !== undefined ? toProduct(row) : undefined;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db
      .deleteFrom("products")
      .where("id", "=", id)
      .executeTakeFirst();
    return result.numDeletedRows > 0n;
  }
}
