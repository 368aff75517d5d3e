import { describe, it, expect, vi } from "vitest";

import { DummyJsonProvider } from "../../../src/providers/dummyjson.js";
import { ProviderError } from "../../../src/services/sync/errors.js";

import type { FetchFn } from "../../../src/providers/http.js";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init,
  });
}

function createProvider(fetchImpl: FetchFn) {
  return new DummyJsonProvider({
    baseUrl: "https://provider.test/products",
    pageSize: 2,
    timeoutMs: 1000,
    fetch: fetchImpl,
  });
}

async function pageError(
  provider: DummyJsonProvider,
  cursor = 0,
  signal?: AbortSignal
): Promise<unknown> {
  return provider.fetchPage(cursor, signal).then(
    () => null,
    (error: unknown) => error
  );
}

describe("providers/dummyjson", () => {
  it("should request limit and skip", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ products: [], total: 0, skip: 4, limit: 2 })
    );

    await createProvider(fetchMock).fetchPage(4);

    const [url] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe("https://provider.test/products?limit=2&skip=4");
  });

  it("should normalize a page and advance the cursor", async () => {
    const provider = createProvider(
      vi.fn<FetchFn>().mockResolvedValue(
        jsonResponse({
          products: [
            { id: 1, title: "Lamp", price: 10, dimensions: { width: 3 } },
            { id: 2, title: "Desk", price: 20 },
          ],
          total: 3,
          skip: 0,
          limit: 2,
        })
      )
    );

    const page = await provider.fetchPage(0);

    expect(page.records.map((record) => record.externalId)).toEqual(["1", "2"]);
    expect(page.records[0]).toMatchObject({
      name: "Lamp",
      price: 10,
      length: 3,
      source: "dummyjson",
    });
    expect(page.skipped).toEqual([]);
    expect(page.nextCursor).toBe(2);
  });

  it("should end the listing at the total", async () => {
    const provider = createProvider(
      vi.fn<FetchFn>().mockResolvedValue(
        jsonResponse({
          products: [{ id: 3, title: "Rug", price: 5 }],
          total: 3,
          skip: 2,
          limit: 2,
        })
      )
    );

    expect((await provider.fetchPage(2)).nextCursor).toBeNull();
  });

  it("should end the listing on an empty page", async () => {
    const provider = createProvider(
      vi.fn<FetchFn>().mockResolvedValue(
        jsonResponse({ products: [], total: 10, skip: 10, limit: 2 })
      )
    );

    expect((await provider.fetchPage(10)).nextCursor).toBeNull();
  });

  it("should report malformed items as skipped, counting them toward the cursor", async () => {
    const provider = createProvider(
      vi.fn<FetchFn>().mockResolvedValue(
        jsonResponse({
          products: [
            { id: 1, title: "Lamp", price: -4 },
            { id: 2, title: "Desk", price: 20 },
          ],
          total: 5,
          skip: 0,
          limit: 2,
        })
      )
    );

    const page = await provider.fetchPage(0);

    expect(page.records).toHaveLength(1);
    expect(page.skipped).toEqual([{ externalId: "1", reason: "invalid price" }]);
    expect(page.nextCursor).toBe(2);
  });

  it("should fail on a non-2xx status", async () => {
    const provider = createProvider(
      vi.fn<FetchFn>().mockResolvedValue(
        new Response("down", { status: 500, statusText: "Internal Server Error" })
      )
    );

    const error = await pageError(provider, 2);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      provider: "dummyjson",
      cursor: 2,
      message: "unexpected status 500 Internal Server Error",
    });
  });

  it("should fail on a body that is not JSON", async () => {
    const provider = createProvider(
      vi.fn<FetchFn>().mockResolvedValue(new Response("<html>"))
    );

    const error = await pageError(provider);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toHaveProperty(
      "message",
      expect.stringMatching(/^invalid JSON body: /)
    );
  });

  it("should fail on an unexpected envelope", async () => {
    const provider = createProvider(
      vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ items: [] }))
    );

    const error = await pageError(provider);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toHaveProperty(
      "message",
      expect.stringMatching(/^unexpected response envelope at \/products: /)
    );
  });

  it("should fail when the request cannot be made", async () => {
    const provider = createProvider(
      vi.fn<FetchFn>().mockRejectedValue(new TypeError("fetch failed"))
    );

    const error = await pageError(provider);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toHaveProperty("message", "request failed: fetch failed");
  });

  it("should pass the caller's abort to the request", async () => {
    const fetchMock = vi.fn<FetchFn>((_url, init) => {
      const signal = init?.signal;
      if (signal?.aborted === true) {
        return Promise.reject(signal.reason);
      }
      return Promise.resolve(jsonResponse({ products: [], total: 0, skip: 0, limit: 2 }));
    });
    const controller = new AbortController();
    controller.abort(new Error("run cancelled"));

    const error = await pageError(createProvider(fetchMock), 0, controller.signal);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toHaveProperty("message", "request failed: run cancelled");
  });
});
