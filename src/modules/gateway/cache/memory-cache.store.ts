import { CacheStore } from './cache-store.interface';

type Entry = { value: string; expiresAt: number };

export class MemoryCacheStore implements CacheStore {
  private readonly store = new Map<string, Entry>();

  constructor(private readonly maxSize: number = 5000) {}

  async get(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (Date.now() >= entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    // refresh LRU position
    this.store.delete(key);
    this.store.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: string, ttlSec: number): Promise<void> {
    if (this.store.has(key)) {
      this.store.delete(key);
    }

    while (this.store.size >= this.maxSize) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }

    this.store.set(key, { value, expiresAt: Date.now() + ttlSec * 1000 });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    let removed = 0;
    for (const key of [...this.store.keys()]) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.store.size;
  }
}
