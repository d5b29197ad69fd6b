import { ProviderRecord, ProviderTag, RawRating } from '../dto/provider-record.dto';

export interface LookupOptions {
  signal?: AbortSignal;
  /** Defaults to true; health probes bypass the response cache. */
  useCache?: boolean;
  maxRetries?: number;
}

export interface CrossRefLookupOptions extends LookupOptions {
  /** Used by providers that fall back to a title search when the direct lookup comes back empty. */
  title?: string | null;
  year?: number | null;
}

export interface CatalogAdapter {
  readonly tag: ProviderTag;

  searchByTitle(title: string, year?: number | null, page?: number, options?: LookupOptions): Promise<ProviderRecord[]>;

  /** Null when the provider has no such film or answers with a different film. */
  getByNativeId(id: string, options?: LookupOptions): Promise<ProviderRecord | null>;

  /** Present only on providers that can look a film up by cross-reference ID. */
  getByCrossRefId?(id: string, options?: CrossRefLookupOptions): Promise<ProviderRecord | null>;

  /** Present only on providers whose title search benefits from a sanitized query. */
  sanitizeTitle?(title: string): string;

  /** Every rating the provider publishes for a resolved record. */
  collectRatings(record: ProviderRecord, options?: LookupOptions): Promise<RawRating[]>;
}
