export const CACHE_STORE = Symbol('CACHE_STORE');

/**
 * Key-value store with per-entry TTL shared by every provider gateway.
 * Concurrent writers to one key are allowed; the last write wins.
 */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSec: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Removes every key starting with `prefix` and returns how many were removed. */
  deleteByPrefix(prefix: string): Promise<number>;
}
