export { MemoryCache } from './memory-cache.js';
export { RedisCache } from './redis-cache.js';
export type { RedisCacheClient } from './redis-cache.js';
export type { CacheManager } from './cache.types.js';
export { DEFAULT_TTL_SECONDS } from './cache.types.js';
