/**
 * DummyJSON-style product listings: `?limit=&skip=` paging with a
 * `{ products, total, skip, limit }` envelope.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { HttpJsonProvider, type ListingSlice } from "./http.js";

import type { FieldMap } from "./mapping.js";

const DummyJsonEnvelopeSchema = Type.Object({
  products: Type.Array(Type.Unknown()),
  total: Type.Number({ minimum: 0 }),
  skip: Type.Number(),
  limit: Type.Number(),
});

export const DUMMYJSON_FIELDS: FieldMap = {
  externalId: "id",
  name: "title",
  price: "price",
  description: "description",
  category: "category",
  height: "dimensions.height",
  length: "dimensions.width",
  depth: "dimensions.depth",
};

export class DummyJsonProvider extends HttpJsonProvider {
  readonly name = "dummyjson";

  protected readonly fields = DUMMYJSON_FIELDS;

  protected buildUrl(cursor: number): URL {
    const url = new URL(this.options.baseUrl);
    url.searchParams.set("limit", String(this.options.pageSize));
    url.searchParams.set("skip", String(cursor));
    return url;
  }

  protected extractListing(body: unknown): ListingSlice {
    if (!Value.Check(DummyJsonEnvelopeSchema, body)) {
      const first = Value.Errors(DummyJsonEnvelopeSchema, body).First();
      throw new Error(
        `unexpected response envelope${first !== undefined ? ` at ${first.path || "/"}: ${first.message}` : ""}`
      );
    }
    return { items: body.products, total: body.total };
  }
}
