export { ConversationCompressor } from './conversation-compressor.js';
export { MemoryContextStore } from './memory-context.store.js';
export { RedisContextStore } from './redis-context.store.js';
export type { RedisListClient } from './redis-context.store.js';
export type { ContextStore } from './context.types.js';
export { CONTEXT_LIMITS } from './context.types.js';
