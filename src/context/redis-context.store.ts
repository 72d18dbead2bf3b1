import type { ConversationTurn } from '../types/index.js';
import type { ContextStore } from './context.types.js';
import { CONTEXT_LIMITS, CONTEXT_REDIS_KEYS, conversationTurnSchema } from './context.types.js';
import logger from '../utils/logger.js';

/**
 * The ioredis list commands the store needs.
 */
export interface RedisListClient {
  rpush(key: string, ...values: string[]): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<unknown>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  expire(key: string, seconds: number): Promise<number>;
}

/**
 * Session history as a Redis list per session, newest last.
 */
export class RedisContextStore implements ContextStore {
  constructor(
    private readonly redis: RedisListClient,
    private readonly maxTurns: number = CONTEXT_LIMITS.MAX_TURNS,
    private readonly ttlSeconds: number = CONTEXT_LIMITS.TTL_SECONDS
  ) {}

  async get(userId: string, sessionId: string): Promise<ConversationTurn[]> {
    const raw = await this.redis.lrange(CONTEXT_REDIS_KEYS.SESSION_TURNS(userId, sessionId), 0, -1);

    const turns: ConversationTurn[] = [];
    for (const entry of raw) {
      let value: unknown;
      try {
        value = JSON.parse(entry);
      } catch {
        logger.warn('Skipping unreadable context entry', { userId, sessionId });
        continue;
      }
      const parsed = conversationTurnSchema.safeParse(value);
      if (parsed.success) {
        turns.push(parsed.data);
      } else {
        logger.warn('Skipping malformed context entry', { userId, sessionId });
      }
    }
    return turns;
  }

  async put(userId: string, sessionId: string, turn: ConversationTurn): Promise<void> {
    const key = CONTEXT_REDIS_KEYS.SESSION_TURNS(userId, sessionId);
    await this.redis.rpush(key, JSON.stringify(turn));
    await this.redis.ltrim(key, -this.maxTurns, -1);
    await this.redis.expire(key, this.ttlSeconds);
  }
}

export default RedisContextStore;
