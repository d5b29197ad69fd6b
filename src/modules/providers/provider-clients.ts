import axios, { AxiosInstance } from 'axios';
import { ProviderSettings } from '../../config/providers.config';
import { CacheStore } from '../gateway/cache/cache-store.interface';
import { RequestGateway } from '../gateway/request-gateway';
import { ProviderTag } from './dto/provider-record.dto';

export const USER_AGENT = 'FilmRatingAggregator/1.0';

/** Credential placement per provider; OMDb takes its key as a query parameter. */
export function authHeaders(tag: ProviderTag, apiKey: string): Record<string, string> {
  if (!apiKey) return {};
  switch (tag) {
    case 'primary':
      return { Authorization: `Bearer ${apiKey}` };
    case 'regional':
      return { 'X-API-KEY': apiKey };
    case 'ratings':
      return {};
  }
}

export function createProviderClient(tag: ProviderTag, settings: ProviderSettings): AxiosInstance {
  return axios.create({
    headers: {
      'User-Agent': USER_AGENT,
      Accept: 'application/json',
      ...authHeaders(tag, settings.apiKey),
    },
  });
}

export function createProviderGateway(
  tag: ProviderTag,
  settings: ProviderSettings,
  cache: CacheStore,
  client: AxiosInstance = createProviderClient(tag, settings),
): RequestGateway {
  return new RequestGateway(
    {
      provider: tag,
      baseUrl: settings.baseUrl,
      timeoutMs: settings.timeoutMs,
      maxRetries: settings.maxRetries,
      backoffBaseMs: settings.backoffBaseMs,
      cacheTtlSec: settings.cacheTtlSec,
      authParams: tag === 'ratings' && settings.apiKey ? { apikey: settings.apiKey } : undefined,
    },
    cache,
    client,
  );
}
