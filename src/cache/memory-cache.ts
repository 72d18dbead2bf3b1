import type { CacheManager } from './cache.types.js';
import { DEFAULT_TTL_SECONDS } from './cache.types.js';

interface CacheEntry<T> {
  value: T;
  /** Epoch ms, or null for no expiry */
  expiresAt: number | null;
}

export interface MemoryCacheOptions {
  maxSize?: number;
  now?: () => number;
}

/**
 * In-process TTL cache with least-recently-used eviction.
 */
export class MemoryCache<T> implements CacheManager<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(options: MemoryCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  async set(key: string, value: T, ttlSeconds = DEFAULT_TTL_SECONDS): Promise<void> {
    this.entries.delete(key);
    this.cleanupExpired();
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : null,
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  private cleanupExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}

export default MemoryCache;
