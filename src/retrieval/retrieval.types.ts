/**
 * Retrieval Types
 */

import { z } from 'zod';
import type { RetrievalResult } from '../types/index.js';

export type DocumentMetadata = {
  title?: string;
  url?: string;
  source?: string;
  documentType?: string;
  /** ISO-8601 date */
  publicationDate?: string;
  authors?: string[];
  doi?: string;
  medicalSpecialty?: string;
  keywords?: string[];
};

/**
 * One vector-store hit before scoring. `similarity` is in [0, 1] for
 * similarity-based stores; values above 1 are read as distances.
 */
export interface RawHit {
  content: string;
  similarity: number;
  metadata: DocumentMetadata;
}

export interface SearchFilters {
  source?: string;
  medicalSpecialty?: string;
  documentType?: string;
}

/**
 * Vector knowledge store collaborator. Index construction lives elsewhere.
 */
export interface KnowledgeStore {
  search(query: string, maxResults: number, filters?: SearchFilters, signal?: AbortSignal): Promise<RawHit[]>;
}

export interface KnowledgeSearchOptions {
  maxResults?: number;
  includeLowConfidence?: boolean;
  filters?: SearchFilters;
  signal?: AbortSignal;
}

/**
 * The capability the pipeline consumes at the knowledge_retrieval stage.
 */
export interface KnowledgeSource {
  search(query: string, options?: KnowledgeSearchOptions): Promise<RetrievalResult>;
}

export interface RankOptions {
  includeLowConfidence?: boolean;
  /** Applied before citations are built, so every citation belongs to a returned document. */
  maxResults?: number;
}

const citationSchema = z.object({
  title: z.string(),
  source: z.string(),
  url: z.string(),
  authors: z.array(z.string()),
  relevanceScore: z.number(),
  publicationDate: z.string().optional(),
  doi: z.string().optional(),
  excerpt: z.string().optional(),
});

/** Shape check for cached results */
export const retrievalResultSchema = z.object({
  documents: z.array(
    z.object({
      content: z.string(),
      source: z.string(),
      confidenceScore: z.number().min(0).max(1),
      metadata: z.record(z.unknown()),
    })
  ),
  citations: z.array(citationSchema),
  searchMetadata: z.record(z.unknown()).optional(),
});
