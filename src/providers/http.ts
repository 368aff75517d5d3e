import { providerLogger } from "../logger.js";
import { ProviderError } from "../services/sync/errors.js";
import { describeError } from "../utils/errors.js";
import { normalizeItem } from "./normalize.js";

import type { FieldMap } from "./mapping.js";
import type {
  ExternalRecord,
  ProductProvider,
  ProviderPage,
  RecordWarning,
} from "./types.js";

export type FetchFn = typeof fetch;

export interface HttpProviderOptions {
  baseUrl: string;
  pageSize: number;
  timeoutMs: number;
  /** injected for tests; defaults to the global fetch */
  fetch?: FetchFn;
}

/** Listing slice pulled out of a decoded response body */
export interface ListingSlice {
  items: unknown[];
  total: number | null;
}

/**
 * Base for providers that page through a JSON listing with offset/limit
 * query parameters.
 */
export abstract class HttpJsonProvider implements ProductProvider {
  abstract readonly name: string;

  protected abstract readonly fields: FieldMap;

  protected readonly priceScale: number = 1;

  private readonly fetchImpl: FetchFn;

  constructor(protected readonly options: HttpProviderOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  protected abstract buildUrl(cursor: number): URL;

  /** Throws when the body does not have the provider's listing shape */
  protected abstract extractListing(body: unknown): ListingSlice;

  async fetchPage(cursor: number, signal?: AbortSignal): Promise<ProviderPage> {
    const url = this.buildUrl(cursor);
    const timeout = AbortSignal.timeout(this.options.timeoutMs);
    const requestSignal =
      signal !== undefined ? AbortSignal.any([signal, timeout]) : timeout;

    providerLogger.debug(
      { provider: this.name, url: url.toString(), cursor },
      "Fetching provider page"
    );

    const startTime = performance.now();
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { accept: "application/json" },
        signal: requestSignal,
      });
    } catch (error) {
      throw this.fail(cursor, `request failed: ${describeError(error)}`, error);
    }
    const duration = Math.round(performance.now() - startTime);

    if (!response.ok) {
      throw this.fail(
        cursor,
        `unexpected status ${String(response.status)} ${response.statusText}`.trim()
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw this.fail(cursor, `invalid JSON body: ${describeError(error)}`, error);
    }

    let listing: ListingSlice;
    try {
      listing = this.extractListing(body);
    } catch (error) {
      throw this.fail(cursor, describeError(error), error);
    }

    const page = this.normalizeListing(listing, cursor);

    providerLogger.debug(
      {
        provider: this.name,
        cursor,
        items: listing.items.length,
        records: page.records.length,
        skipped: page.skipped.length,
        nextCursor: page.nextCursor,
        duration: `${String(duration)}ms`,
      },
      "Received provider page"
    );

    return page;
  }

  private normalizeListing(listing: ListingSlice, cursor: number): ProviderPage {
    const records: ExternalRecord[] = [];
    const skipped: RecordWarning[] = [];

    for (const item of listing.items) {
      const outcome = normalizeItem(item, this.fields, {
        source: this.name,
        priceScale: this.priceScale,
      });

      if (outcome.kind === "skipped") {
        providerLogger.warn(
          { provider: this.name, cursor, ...outcome.warning },
          "Dropping malformed provider item"
        );
        skipped.push(outcome.warning);
        continue;
      }

      if (outcome.droppedFields.length > 0) {
        providerLogger.warn(
          {
            provider: this.name,
            externalId: outcome.record.externalId,
            droppedFields: outcome.droppedFields,
          },
          "Dropping malformed fields from provider item"
        );
      }
      records.push(outcome.record);
    }

    return {
      records,
      skipped,
      nextCursor: this.nextCursor(cursor, listing),
    };
  }

  private nextCursor(cursor: number, listing: ListingSlice): number | null {
    const count = listing.items.length;
    if (count === 0) {
      return null;
    }

    const next = cursor + count;
    if (listing.total !== null) {
      return next < listing.total ? next : null;
    }
    // Without a total, a short page is the last one
    return count < this.options.pageSize ? null : next;
  }

  private fail(cursor: number, message: string, cause?: unknown): ProviderError {
    providerLogger.error(
      { provider: this.name, cursor, reason: message },
      "Provider page fetch failed"
    );
    return new ProviderError(this.name, cursor, message, { cause });
  }
}
