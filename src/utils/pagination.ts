/**
 * Cursor-based pagination utilities
 *
 * Listings are ordered by id, so a cursor only has to carry the last id
 * seen. Cursors are opaque base64url JSON.
 */

export interface CursorPayload {
  id: number;
}

export interface PaginationMeta {
  cursor: string | null;
  hasMore: boolean;
  limit: number;
  total?: number;
}

/**
 * Encode cursor payload to base64url string
 */
export function encodeCursor(payload: CursorPayload): string {
  return Buffer.from(JSON.stringify(payload)).toString("base64url");
}

/**
 * Decode a cursor; null when it is not one we issued
 */
export function decodeCursor(cursor: string): CursorPayload | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return null;
  }

  if (typeof decoded !== "object" || decoded === null) {
    return null;
  }

  const id: unknown = Reflect.get(decoded, "id");
  if (typeof id !== "number" || !Number.isInteger(id) || id < 0) {
    return null;
  }

  return { id };
}

/**
 * Create pagination meta from results
 */
export function createPaginationMeta(
  items: readonly { id: number }[],
  limit: number,
  hasMore: boolean,
  total?: number
): PaginationMeta {
  const lastItem = items[items.length - 1];
  const cursor =
    hasMore && lastItem !== undefined ? encodeCursor({ id: lastItem.id }) : null;

  return {
    cursor,
    hasMore,
    limit,
    total,
  };
}

/**
 * Parse limit from query parameter with bounds
 */
export function parseLimit(
  value: string | number | undefined,
  defaultLimit = 50,
  maxLimit = 100
): number {
  if (value === undefined) {
    return defaultLimit;
  }

  const parsed = typeof value === "string" ? Number.parseInt(value, 10) : value;

  if (Number.isNaN(parsed) || parsed < 1) {
    return defaultLimit;
  }

  return Math.min(parsed, maxLimit);
}
