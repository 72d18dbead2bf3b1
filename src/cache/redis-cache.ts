import type { ZodType, ZodTypeDef } from 'zod';
import type { CacheManager } from './cache.types.js';
import { DEFAULT_TTL_SECONDS } from './cache.types.js';
import { errorMessage } from '../errors/index.js';
import logger from '../utils/logger.js';

/**
 * The ioredis commands the cache needs.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  exists(...keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
}

export interface RedisCacheOptions<T> {
  schema: ZodType<T, ZodTypeDef, unknown>;
  prefix?: string;
}

/**
 * Redis-backed TTL cache. Cached values are JSON and re-validated on read;
 * entries that no longer match the schema are treated as misses.
 */
export class RedisCache<T> implements CacheManager<T> {
  private readonly prefix: string;
  private readonly schema: ZodType<T, ZodTypeDef, unknown>;

  constructor(private readonly redis: RedisCacheClient, options: RedisCacheOptions<T>) {
    this.prefix = options.prefix ?? 'care_agent:';
    this.schema = options.schema;
  }

  private makeKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async get(key: string): Promise<T | null> {
    const data = await this.redis.get(this.makeKey(key));
    if (data === null) {
      return null;
    }

    try {
      const parsed = this.schema.safeParse(JSON.parse(data));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn('Discarding cache entry with unexpected shape', { key });
    } catch (error) {
      logger.warn('Discarding unreadable cache entry', { key, error: errorMessage(error) });
    }
    await this.redis.del(this.makeKey(key));
    return null;
  }

  async set(key: string, value: T, ttlSeconds = DEFAULT_TTL_SECONDS): Promise<void> {
    const payload = JSON.stringify(value);
    if (ttlSeconds > 0) {
      await this.redis.setex(this.makeKey(key), ttlSeconds, payload);
    } else {
      await this.redis.set(this.makeKey(key), payload);
    }
  }

  async delete(key: string): Promise<boolean> {
    return (await this.redis.del(this.makeKey(key))) > 0;
  }

  async has(key: string): Promise<boolean> {
    return (await this.redis.exists(this.makeKey(key))) > 0;
  }

  async clear(): Promise<void> {
    const keys = await this.redis.keys(`${this.prefix}*`);
    if (keys.length > 0) {
      await this.redis.del(...keys);
    }
  }
}

export default RedisCache;
