/**
 * Provider adapter contract
 */

export interface ExternalRecord {
  externalId: string;
  name: string;
  description: string | null;
  price: number;
  category: string | null;
  height: number | null;
  length: number | null;
  depth: number | null;
  /** provider name the record came from */
  source: string;
  rawPayload: Record<string, unknown>;
}

/** An item the adapter dropped instead of normalizing */
export interface RecordWarning {
  externalId: string | null;
  reason: string;
}

export interface ProviderPage {
  records: ExternalRecord[];
  skipped: RecordWarning[];
  /** null once the listing is exhausted */
  nextCursor: number | null;
}

/**
 * One external product listing. Cursor 0 is the first page.
 *
 * Implementations do not retry; a failed page rejects with ProviderError.
 */
export interface ProductProvider {
  readonly name: string;
  fetchPage(cursor: number, signal?: AbortSignal): Promise<ProviderPage>;
}
