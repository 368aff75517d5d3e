/**
 * Field mapping for generic JSON product listings.
 *
 * Paths are dotted (`data.items`, `pricing.amount`); an empty `itemsPath`
 * means the response body itself is the item array.
 */

import { Type, type Static } from "@sinclair/typebox";

export const FieldMapSchema = Type.Object({
  externalId: Type.String({ minLength: 1 }),
  name: Type.String({ minLength: 1 }),
  price: Type.String({ minLength: 1 }),
  description: Type.Optional(Type.String({ minLength: 1 })),
  category: Type.Optional(Type.String({ minLength: 1 })),
  height: Type.Optional(Type.String({ minLength: 1 })),
  length: Type.Optional(Type.String({ minLength: 1 })),
  depth: Type.Optional(Type.String({ minLength: 1 })),
});

export type FieldMap = Static<typeof FieldMapSchema>;

export const ProviderMappingSchema = Type.Object({
  itemsPath: Type.String({ default: "" }),
  totalPath: Type.Optional(Type.String({ minLength: 1 })),
  offsetParam: Type.String({ minLength: 1, default: "offset" }),
  limitParam: Type.String({ minLength: 1, default: "limit" }),
  // provider price units per one catalog unit, e.g. 100 for cents
  priceScale: Type.Number({ exclusiveMinimum: 0, default: 1 }),
  fields: FieldMapSchema,
});

export type ProviderMapping = Static<typeof ProviderMappingSchema>;

/**
 * Read a dotted path out of a decoded JSON value
 */
export function getPath(value: unknown, path: string): unknown {
  if (path === "") {
    return value;
  }

  let current: unknown = value;
  for (const segment of path.split(".")) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}
