/**
 * Provider selection
 */

import { ConfigError, type ProviderConfig, type ProviderKind } from "../config.js";
import { DummyJsonProvider } from "./dummyjson.js";
import { MappedJsonProvider } from "./mapped.js";

import type { FetchFn } from "./http.js";
import type { ProductProvider } from "./types.js";

export interface ProviderDescriptor {
  name: ProviderKind;
  description: string;
}

export const AVAILABLE_PROVIDERS: readonly ProviderDescriptor[] = [
  {
    name: "dummyjson",
    description:
      "DummyJSON-style listing paged with limit/skip and a { products, total } envelope",
  },
  {
    name: "mapped",
    description:
      "Any JSON listing described by PROVIDER_MAPPING (items path, field paths, paging parameters)",
  },
];

/**
 * Build the provider selected by configuration
 */
export function createProvider(
  config: ProviderConfig,
  options: { fetch?: FetchFn } = {}
): ProductProvider {
  const httpOptions = {
    baseUrl: config.baseUrl,
    pageSize: config.pageSize,
    timeoutMs: config.timeoutMs,
    fetch: options.fetch,
  };

  switch (config.kind) {
    case "dummyjson":
      return new DummyJsonProvider(httpOptions);
    case "mapped":
      if (config.mapping === null) {
        throw new ConfigError(["PROVIDER_MAPPING: required when PROVIDER=mapped"]);
      }
      return new MappedJsonProvider(httpOptions, config.mapping);
  }
}

export { iterateProviderPages } from "./pages.js";
export type { ExternalRecord, ProductProvider, ProviderPage, RecordWarning } from "./types.js";
