import { Redis } from 'ioredis';
import type { Config } from '../config/index.js';
import logger from '../utils/logger.js';

export function createRedisClient(settings: Config['redis']): Redis {
  const redis = new Redis({
    host: settings.host,
    port: settings.port,
    password: settings.password || undefined,
    maxRetriesPerRequest: 3,
    lazyConnect: true,
    retryStrategy(times) {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  redis.on('error', (err) => {
    logger.error('Redis error', { error: err.message });
  });

  redis.on('reconnecting', () => {
    logger.warn('Redis reconnecting');
  });

  return redis;
}

export default { createRedisClient };
