import { describe, it, expect } from 'vitest';
import { MemoryContextStore } from './memory-context.store.js';
import { RedisContextStore, type RedisListClient } from './redis-context.store.js';
import type { ConversationTurn } from '../types/index.js';

/**
 * In-memory stand-in for the ioredis list commands the store uses.
 */
class FakeRedisLists implements RedisListClient {
  readonly lists = new Map<string, string[]>();
  readonly expiries = new Map<string, number>();

  async rpush(key: string, ...values: string[]) {
    const list = [...(this.lists.get(key) ?? []), ...values];
    this.lists.set(key, list);
    return list.length;
  }
  async ltrim(key: string, start: number, stop: number) {
    const list = this.lists.get(key) ?? [];
    const from = start < 0 ? Math.max(0, list.length + start) : start;
    const to = stop < 0 ? list.length + stop : stop;
    this.lists.set(key, list.slice(from, to + 1));
    return 'OK';
  }
  async lrange(key: string, start: number, stop: number) {
    const list = this.lists.get(key) ?? [];
    const to = stop < 0 ? list.length + stop : stop;
    return list.slice(start, to + 1);
  }
  async expire(key: string, seconds: number) {
    this.expiries.set(key, seconds);
    return 1;
  }
}

function turn(content: string, role: ConversationTurn['role'] = 'user'): ConversationTurn {
  return { role, content, timestamp: `2026-01-01T00:00:0${content.length % 10}.000Z` };
}

describe('MemoryContextStore', () => {
  it('should keep turns per session, newest last', async () => {
    const store = new MemoryContextStore(2);

    await store.put('u1', 's1', turn('one'));
    await store.put('u1', 's1', turn('two'));
    await store.put('u1', 's1', turn('three'));
    await store.put('u1', 's2', turn('other'));

    expect((await store.get('u1', 's1')).map((t) => t.content)).toEqual(['two', 'three']);
    expect((await store.get('u1', 's2')).map((t) => t.content)).toEqual(['other']);
    expect(await store.get('u2', 's1')).toEqual([]);
  });
});

describe('RedisContextStore', () => {
  it('should append, trim and refresh the TTL', async () => {
    const redis = new FakeRedisLists();
    const store = new RedisContextStore(redis, 2, 60);

    await store.put('u1', 's1', turn('one'));
    await store.put('u1', 's1', turn('two', 'assistant'));
    await store.put('u1', 's1', turn('three'));

    const turns = await store.get('u1', 's1');
    expect(turns.map((t) => [t.role, t.content])).toEqual([
      ['assistant', 'two'],
      ['user', 'three'],
    ]);
    expect(redis.expiries.get('care_agent:u1:context:s1')).toBe(60);
  });

  it('should skip entries that cannot be read', async () => {
    const redis = new FakeRedisLists();
    redis.lists.set('care_agent:u1:context:s1', [
      '{broken',
      JSON.stringify({ role: 'system', content: 'x', timestamp: 't' }),
      JSON.stringify(turn('kept')),
    ]);
    const store = new RedisContextStore(redis);

    expect((await store.get('u1', 's1')).map((t) => t.content)).toEqual(['kept']);
  });
});
