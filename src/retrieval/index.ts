export { RetrievalScorer } from './retrieval-scorer.service.js';
export { KnowledgeSearch } from './knowledge-search.service.js';
export { PgVectorKnowledgeStore } from './pgvector.store.js';
export { retrievalResultSchema } from './retrieval.types.js';
export type {
  DocumentMetadata,
  KnowledgeSearchOptions,
  KnowledgeSource,
  KnowledgeStore,
  RawHit,
  SearchFilters,
} from './retrieval.types.js';
