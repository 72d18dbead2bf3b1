/**
 * Knowledge Search
 *
 * Queries the vector store for twice the requested number of hits, ranks
 * them, keeps the top `maxResults` and caches the ranked result.
 */

import { createHash } from 'crypto';
import type { RetrievalResult } from '../types/index.js';
import type { RetrievalPolicy } from '../config/policy.js';
import type { CacheManager } from '../cache/cache.types.js';
import { RetrievalDegradation, errorMessage } from '../errors/index.js';
import type {
  KnowledgeSearchOptions,
  KnowledgeSource,
  KnowledgeStore,
  RawHit,
  SearchFilters,
} from './retrieval.types.js';
import { RetrievalScorer } from './retrieval-scorer.service.js';
import logger from '../utils/logger.js';

const CACHE_KEY_PREFIX = 'rag:';

export class KnowledgeSearch implements KnowledgeSource {
  constructor(
    private readonly store: KnowledgeStore,
    private readonly scorer: RetrievalScorer,
    private readonly policy: RetrievalPolicy,
    private readonly cache?: CacheManager<RetrievalResult>
  ) {}

  async search(query: string, options: KnowledgeSearchOptions = {}): Promise<RetrievalResult> {
    const maxResults = options.maxResults ?? this.policy.maxResults;
    const includeLowConfidence = options.includeLowConfidence ?? false;
    const cacheKey = this.cacheKey(query, maxResults, includeLowConfidence, options.filters);

    if (this.cache) {
      const cached = await this.cache.get(cacheKey);
      if (cached) {
        logger.debug('Knowledge search cache hit', { maxResults });
        return cached;
      }
    }

    let hits: RawHit[];
    try {
      hits = await this.store.search(query, maxResults * 2, options.filters, options.signal);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      logger.error('Knowledge store search failed', { error: errorMessage(error) });
      throw new RetrievalDegradation('Knowledge store search failed', { cause: error });
    }

    const ranked = this.scorer.rank(hits, query, { includeLowConfidence, maxResults });
    const result: RetrievalResult = {
      ...ranked,
      searchMetadata: { ...ranked.searchMetadata, maxResults, filters: options.filters ?? {} },
    };

    if (this.cache) {
      await this.cache.set(cacheKey, result, this.policy.cacheTtlSeconds);
    }

    logger.info('Knowledge search completed', {
      results: result.documents.length,
      hits: hits.length,
    });

    return result;
  }

  searchBySpecialty(
    query: string,
    medicalSpecialty: string,
    options: Omit<KnowledgeSearchOptions, 'filters'> = {}
  ): Promise<RetrievalResult> {
    return this.search(query, { ...options, filters: { medicalSpecialty } });
  }

  searchBySource(
    query: string,
    source: string,
    options: Omit<KnowledgeSearchOptions, 'filters'> = {}
  ): Promise<RetrievalResult> {
    return this.search(query, { ...options, filters: { source } });
  }

  private cacheKey(
    query: string,
    maxResults: number,
    includeLowConfidence: boolean,
    filters: SearchFilters = {}
  ): string {
    const sortedFilters = Object.fromEntries(
      Object.entries(filters)
        .filter(([, value]) => value !== undefined)
        .sort(([a], [b]) => a.localeCompare(b))
    );
    const payload = JSON.stringify({ query, maxResults, includeLowConfidence, filters: sortedFilters });
    return `${CACHE_KEY_PREFIX}${createHash('md5').update(payload).digest('hex')}`;
  }
}

export default KnowledgeSearch;
