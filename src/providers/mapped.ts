/**
 * Generic JSON listing described by a ProviderMapping
 */

import { HttpJsonProvider, type HttpProviderOptions, type ListingSlice } from "./http.js";
import { getPath, type FieldMap, type ProviderMapping } from "./mapping.js";

export class MappedJsonProvider extends HttpJsonProvider {
  readonly name = "mapped";

  protected readonly fields: FieldMap;

  protected override readonly priceScale: number;

  constructor(
    options: HttpProviderOptions,
    private readonly mapping: ProviderMapping
  ) {
    super(options);
    this.fields = mapping.fields;
    this.priceScale = mapping.priceScale;
  }

  protected buildUrl(cursor: number): URL {
    const url = new URL(this.options.baseUrl);
    url.searchParams.set(this.mapping.limitParam, String(this.options.pageSize));
    url.searchParams.set(this.mapping.offsetParam, String(cursor));
    return url;
  }

  protected extractListing(body: unknown): ListingSlice {
    const items = getPath(body, this.mapping.itemsPath);
    if (!Array.isArray(items)) {
      throw new TypeError(
        `expected an array at "${this.mapping.itemsPath || "<body>"}"`
      );
    }

    if (this.mapping.totalPath === undefined) {
      return { items, total: null };
    }

    const total = getPath(body, this.mapping.totalPath);
    if (typeof total !== "number" || !Number.isFinite(total)) {
      throw new TypeError(`expected a number at "${this.mapping.totalPath}"`);
    }
    return { items, total };
  }
}
