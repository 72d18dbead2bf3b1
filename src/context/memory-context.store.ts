import type { ConversationTurn } from '../types/index.js';
import type { ContextStore } from './context.types.js';
import { CONTEXT_LIMITS, CONTEXT_REDIS_KEYS } from './context.types.js';

/**
 * In-process session history, trimmed to the most recent turns.
 */
export class MemoryContextStore implements ContextStore {
  private readonly sessions = new Map<string, ConversationTurn[]>();

  constructor(private readonly maxTurns: number = CONTEXT_LIMITS.MAX_TURNS) {}

  async get(userId: string, sessionId: string): Promise<ConversationTurn[]> {
    return [...(this.sessions.get(CONTEXT_REDIS_KEYS.SESSION_TURNS(userId, sessionId)) ?? [])];
  }

  async put(userId: string, sessionId: string, turn: ConversationTurn): Promise<void> {
    const key = CONTEXT_REDIS_KEYS.SESSION_TURNS(userId, sessionId);
    const turns = [...(this.sessions.get(key) ?? []), turn];
    this.sessions.set(key, turns.slice(-this.maxTurns));
  }
}

export default MemoryContextStore;
