/**
 * Shared TTL cache contract. Values round-trip through JSON in the Redis
 * implementation, so only plain data should be cached.
 */
export interface CacheManager<T> {
  get(key: string): Promise<T | null>;
  set(key: string, value: T, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  has(key: string): Promise<boolean>;
  clear(): Promise<void>;
}

export const DEFAULT_TTL_SECONDS = 3600;
