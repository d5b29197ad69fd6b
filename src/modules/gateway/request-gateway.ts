import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { errorMessage } from '../../common/error-message';
import { CacheStore } from './cache/cache-store.interface';
import { FailedOutcome, RequestOutcome, classifyResponse, describeOutcome } from './request-outcome';
import { DeadlineExceededError, RequestError } from './request.errors';
import { sha256 } from './utils/hash';
import { stableStringify } from './utils/stable-stringify';

export type HttpMethod = 'GET' | 'POST';
export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | undefined>;

export const CACHE_KEY_PREFIX = 'api_cache:';

export interface GatewayOptions {
  /** Provider label used in logs and errors. */
  provider: string;
  baseUrl: string;
  timeoutMs: number;
  maxRetries: number;
  backoffBaseMs: number;
  cacheTtlSec: number;
  /** When false a 4xx other than 429 ends the loop on first sight. */
  retryClientErrors?: boolean;
  /** Sent with every request, never part of the cache key. */
  authParams?: Record<string, string>;
}

export interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  useCache?: boolean;
  cacheTtlSec?: number;
  maxRetries?: number;
  signal?: AbortSignal;
}

export type WaitFn = (ms: number, signal?: AbortSignal) => Promise<void>;

function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return;
  if (signal?.aborted) throw abortError();

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      reject(abortError());
    };

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function joinUrl(baseUrl: string, endpoint: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
}

function compactParams(params: QueryParams): Record<string, QueryValue> {
  const out: Record<string, QueryValue> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Outbound JSON call primitive for one provider: response cache, bounded
 * timeout, and a retry loop driven by the classified outcome of each attempt.
 */
export class RequestGateway {
  private readonly logger = new Logger(RequestGateway.name);

  constructor(
    private readonly options: GatewayOptions,
    private readonly cache: CacheStore,
    private readonly client: AxiosInstance = axios.create(),
    private readonly wait: WaitFn = abortableSleep,
  ) {}

  get provider(): string {
    return this.options.provider;
  }

  get(endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request('GET', endpoint, options);
  }

  async request(method: HttpMethod, endpoint: string, options: RequestOptions = {}): Promise<unknown> {
    const params = compactParams(options.params ?? {});
    const maxRetries = Math.max(1, options.maxRetries ?? this.options.maxRetries);
    const cacheKey = options.useCache && method === 'GET' ? this.cacheKey(method, endpoint, params) : null;

    if (cacheKey) {
      const cached = await this.readCache(cacheKey);
      if (cached !== undefined) return cached;
    }

    const url = joinUrl(this.options.baseUrl, endpoint);
    let attempts = 0;
    let last: FailedOutcome | null = null;

    for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
      if (options.signal?.aborted) throw new DeadlineExceededError(this.provider, endpoint);

      attempts = attempt;
      const outcome = await this.attempt(method, url, endpoint, params, options);
      if (outcome.kind === 'ok') {
        if (cacheKey) {
          await this.writeCache(cacheKey, outcome.raw, options.cacheTtlSec ?? this.options.cacheTtlSec);
        }
        return outcome.body;
      }

      last = outcome;
      if (!this.isRetryable(outcome) || attempt === maxRetries) break;

      const waitMs = this.backoffMs(outcome, attempt);
      this.logger.warn(
        `[GATEWAY] retry provider=${this.provider} endpoint=${endpoint} attempt=${attempt} outcome=${outcome.kind}${
          'status' in outcome ? ` status=${outcome.status}` : ''
        } waitMs=${waitMs}`,
      );
      try {
        await this.wait(waitMs, options.signal);
      } catch {
        throw new DeadlineExceededError(this.provider, endpoint);
      }
    }

    const cause: FailedOutcome = last ?? { kind: 'transport_error', message: 'no attempt made', code: null };
    this.logger.error(
      `[GATEWAY] failed provider=${this.provider} endpoint=${endpoint} attempts=${attempts} reason=${describeOutcome(cause)}`,
    );
    throw new RequestError(this.provider, endpoint, attempts, cause);
  }

  cacheKey(method: HttpMethod, endpoint: string, params: QueryParams = {}): string {
    const raw = `${method}:${this.options.baseUrl}:${endpoint}:${stableStringify(compactParams(params))}`;
    return `${CACHE_KEY_PREFIX}${sha256(raw)}`;
  }

  async clearCacheForRequest(method: HttpMethod, endpoint: string, params: QueryParams = {}): Promise<void> {
    await this.cache.delete(this.cacheKey(method, endpoint, params));
  }

  /** Drops every cached response, including those written by other gateways on the same store. */
  async clearAllCache(): Promise<number> {
    return this.cache.deleteByPrefix(CACHE_KEY_PREFIX);
  }

  backoffMs(outcome: FailedOutcome, attempt: number): number {
    const base = this.options.backoffBaseMs * attempt;
    return outcome.kind === 'rate_limited' ? base * 2 : base;
  }

  private isRetryable(outcome: FailedOutcome): boolean {
    if (outcome.kind === 'client_error') return this.options.retryClientErrors !== false;
    return true;
  }

  private async attempt(
    method: HttpMethod,
    url: string,
    endpoint: string,
    params: Record<string, QueryValue>,
    options: RequestOptions,
  ): Promise<RequestOutcome> {
    try {
      const res = await this.client.request<unknown>({
        method,
        url,
        params: { ...params, ...this.options.authParams },
        data: options.body,
        timeout: this.options.timeoutMs,
        signal: options.signal,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      });
      const text = typeof res.data === 'string' ? res.data : JSON.stringify(res.data ?? null);
      return classifyResponse(res.status, text);
    } catch (error) {
      if (options.signal?.aborted || axios.isCancel(error)) {
        throw new DeadlineExceededError(this.provider, endpoint);
      }
      if (axios.isAxiosError(error)) {
        return { kind: 'transport_error', message: error.message, code: error.code ?? null };
      }
      return {
        kind: 'transport_error',
        message: errorMessage(error),
        code: null,
      };
    }
  }

  private async readCache(key: string): Promise<unknown> {
    let raw: string | null;
    try {
      raw = await this.cache.get(key);
    } catch (error) {
      this.logger.warn(`[GATEWAY] cache read failed provider=${this.provider} error=${errorMessage(error)}`);
      return undefined;
    }
    if (raw === null) return undefined;

    try {
      return JSON.parse(raw);
    } catch {
      this.logger.warn(`[GATEWAY] dropping unparseable cache entry provider=${this.provider} key=${key}`);
      await this.dropCacheEntry(key);
      return undefined;
    }
  }

  private async dropCacheEntry(key: string): Promise<void> {
    try {
      await this.cache.delete(key);
    } catch (error) {
      this.logger.warn(`[GATEWAY] cache delete failed provider=${this.provider} error=${errorMessage(error)}`);
    }
  }

  private async writeCache(key: string, raw: string, ttlSec: number): Promise<void> {
    try {
      await this.cache.set(key, raw, ttlSec);
    } catch (error) {
      this.logger.warn(`[GATEWAY] cache write failed provider=${this.provider} error=${errorMessage(error)}`);
    }
  }
}
