/**
 * Unit tests for pagination utilities
 */

import { describe, it, expect } from "vitest";

import {
  encodeCursor,
  decodeCursor,
  parseLimit,
  createPaginationMeta,
} from "../../../src/utils/pagination.js";

describe("Pagination Utils", () => {
  describe("encodeCursor / decodeCursor", () => {
    it("should encode to a base64url string", () => {
      const encoded = encodeCursor({ id: 123 });

      expect(encoded).toBe(Buffer.from('{"id":123}').toString("base64url"));
      expect(encoded).not.toMatch(/[+/=]/);
    });

    it("should decode a cursor it issued", () => {
      expect(decodeCursor(encodeCursor({ id: 42 }))).toEqual({ id: 42 });
    });

    it("should return null for garbage", () => {
      expect(decodeCursor("not-a-cursor")).toBeNull();
    });

    it("should return null for JSON without a usable id", () => {
      const cursor = (value: unknown) =>
        Buffer.from(JSON.stringify(value)).toString("base64url");

      expect(decodeCursor(cursor({ id: "7" }))).toBeNull();
      expect(decodeCursor(cursor({ id: 1.5 }))).toBeNull();
      expect(decodeCursor(cursor({ id: -1 }))).toBeNull();
      expect(decodeCursor(cursor([1]))).toBeNull();
      expect(decodeCursor(cursor(null))).toBeNull();
    });
  });

  describe("createPaginationMeta", () => {
    it("should point the cursor at the last item when there is more", () => {
      const meta = createPaginationMeta([{ id: 1 }, { id: 5 }], 2, true, 10);

      expect(meta).toEqual({
        cursor: encodeCursor({ id: 5 }),
        hasMore: true,
        limit: 2,
        total: 10,
      });
    });

    it("should return a null cursor on the last page", () => {
      const meta = createPaginationMeta([{ id: 1 }], 2, false, 1);

      expect(meta.cursor).toBeNull();
      expect(meta.hasMore).toBe(false);
    });

    it("should return a null cursor for an empty page", () => {
      expect(createPaginationMeta([], 2, true).cursor).toBeNull();
    });
  });

  describe("parseLimit", () => {
    it("should return the default for undefined", () => {
      expect(parseLimit(undefined)).toBe(50);
      expect(parseLimit(undefined, 20)).toBe(20);
    });

    it("should parse numeric strings", () => {
      expect(parseLimit("30")).toBe(30);
    });

    it("should clamp to the maximum", () => {
      expect(parseLimit(500)).toBe(100);
      expect(parseLimit("500", 50, 200)).toBe(200);
    });

    it("should fall back to the default for invalid values", () => {
      expect(parseLimit("abc")).toBe(50);
      expect(parseLimit(0)).toBe(50);
      expect(parseLimit(-5)).toBe(50);
    });
  });
});
