import { ProviderError } from "../services/sync/errors.js";

import type { ProductProvider, ProviderPage } from "./types.js";

export interface CursorPage extends ProviderPage {
  cursor: number;
}

/**
 * Walk a provider listing from the first page until it reports no next
 * cursor. Pages are fetched lazily, one per iteration.
 */
export async function* iterateProviderPages(
  provider: ProductProvider,
  options: { signal?: AbortSignal } = {}
): AsyncGenerator<CursorPage, void, undefined> {
  let cursor: number | null = 0;

  while (cursor !== null) {
    const page = await provider.fetchPage(cursor, options.signal);
    yield { ...page, cursor };

    if (page.nextCursor !== null && page.nextCursor <= cursor) {
      throw new ProviderError(
        provider.name,
        cursor,
        `cursor did not advance (next ${String(page.nextCursor)})`
      );
    }
    cursor = page.nextCursor;
  }
}
