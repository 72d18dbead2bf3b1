import OpenAI from 'openai';
import { ProviderUnavailableError } from '../errors/index.js';
import logger from '../utils/logger.js';

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface OpenAIEmbedderSettings {
  apiKey: string;
  model: string;
  client?: OpenAI;
}

interface CacheEntry {
  embedding: number[];
  timestamp: number;
}

const EMBEDDING_CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes
const EMBEDDING_CACHE_MAX_SIZE = 100;

/**
 * Query embeddings from the OpenAI embeddings API, with a small TTL cache
 * keyed on the first 1000 characters of the text.
 */
export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(private readonly settings: OpenAIEmbedderSettings) {
    this.client = settings.client ?? new OpenAI({ apiKey: settings.apiKey });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const cacheKey = text.slice(0, 1000);
    const now = Date.now();

    const cached = this.cache.get(cacheKey);
    if (cached && now - cached.timestamp < EMBEDDING_CACHE_TTL_MS) {
      logger.debug('Embedding cache hit', { keyLength: cacheKey.length });
      return cached.embedding;
    }

    try {
      const response = await this.client.embeddings.create(
        { model: this.settings.model, input: text },
        { signal }
      );
      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error('Embedding response contained no vectors');
      }

      this.cache.set(cacheKey, { embedding, timestamp: now });
      this.evict(now);
      return embedding;
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionError && !(error instanceof OpenAI.APIUserAbortError)) {
        throw new ProviderUnavailableError('openai', 'Embedding request failed', { cause: error });
      }
      throw error;
    }
  }

  private evict(now: number): void {
    for (const [key, entry] of this.cache.entries()) {
      if (now - entry.timestamp > EMBEDDING_CACHE_TTL_MS) {
        this.cache.delete(key);
      }
    }
    // Map keeps insertion order, so the first keys are the oldest
    while (this.cache.size > EMBEDDING_CACHE_MAX_SIZE) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}

export default OpenAIEmbedder;
