import { Logger } from '@nestjs/common';
import { QueryParams, RequestGateway } from '../../gateway/request-gateway';
import { ProviderRecord, ProviderTag, RawRating } from '../dto/provider-record.dto';
import { CatalogAdapter, LookupOptions } from './catalog-adapter.interface';

export abstract class BaseCatalogAdapter implements CatalogAdapter {
  abstract readonly tag: ProviderTag;
  protected abstract readonly logger: Logger;

  constructor(protected readonly gateway: RequestGateway) {}

  abstract searchByTitle(
    title: string,
    year?: number | null,
    page?: number,
    options?: LookupOptions,
  ): Promise<ProviderRecord[]>;

  abstract getByNativeId(id: string, options?: LookupOptions): Promise<ProviderRecord | null>;

  /** Search results may come without ratings; those are read from the detail record. */
  async collectRatings(record: ProviderRecord, options: LookupOptions = {}): Promise<RawRating[]> {
    if (record.ratings.length) return [...record.ratings];
    const detail = await this.getByNativeId(record.nativeId, options);
    return detail ? [...detail.ratings] : [];
  }

  clearAllCache(): Promise<number> {
    return this.gateway.clearAllCache();
  }

  protected fetch(endpoint: string, params: QueryParams, options: LookupOptions): Promise<unknown> {
    return this.gateway.get(endpoint, {
      params,
      useCache: options.useCache ?? true,
      maxRetries: options.maxRetries,
      signal: options.signal,
    });
  }
}
