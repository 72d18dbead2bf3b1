/**
 * Retrieval Scorer
 *
 * confidence = 0.4·similarity + 0.2·sourceReliability + 0.15·documentType
 *            + 0.1·recency + 0.1·queryRelevance + 0.05·citationQuality
 *
 * Ranked output is sorted by confidence, then source reliability, then recency.
 */

import type { Citation, RetrievalResult, RetrievedDocument } from '../types/index.js';
import type { RetrievalPolicy } from '../config/policy.js';
import type { DocumentMetadata, RankOptions, RawHit } from './retrieval.types.js';

const DAYS_PER_YEAR = 365.25;
const MS_PER_DAY = 24 * 60 * 60 * 1000;
const EXCERPT_LENGTH = 200;

interface ScoredHit {
  hit: RawHit;
  confidence: number;
  reliability: number;
  recency: number;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function queryWords(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter(Boolean);
}

export class RetrievalScorer {
  constructor(
    private readonly policy: RetrievalPolicy,
    private readonly now: () => Date = () => new Date()
  ) {}

  score(hit: RawHit, query: string): number {
    const weights = this.policy.weights;
    const confidence =
      this.normalizeSimilarity(hit.similarity) * weights.similarity +
      this.sourceReliability(hit.metadata) * weights.sourceReliability +
      this.documentTypeWeight(hit.metadata) * weights.documentType +
      this.recencyFactor(hit.metadata.publicationDate) * weights.recency +
      this.queryRelevance(query, hit.metadata) * weights.queryRelevance +
      this.citationQuality(hit.metadata) * weights.citationQuality;

    return clamp01(confidence);
  }

  rank(hits: readonly RawHit[], query: string, options: RankOptions = {}): RetrievalResult {
    const scored: ScoredHit[] = hits.map((hit) => ({
      hit,
      confidence: this.score(hit, query),
      reliability: this.sourceReliability(hit.metadata),
      recency: this.recencyFactor(hit.metadata.publicationDate),
    }));

    const kept = scored
      .filter((entry) => options.includeLowConfidence || entry.confidence >= this.policy.confidenceThreshold)
      .sort(
        (a, b) =>
          b.confidence - a.confidence ||
          b.reliability - a.reliability ||
          b.recency - a.recency
      )
      .slice(0, options.maxResults ?? hits.length);

    const documents: RetrievedDocument[] = kept.map(({ hit, confidence }) => ({
      content: hit.content,
      source: hit.metadata.source ?? 'unknown',
      confidenceScore: confidence,
      metadata: hit.metadata,
    }));

    const citations = kept.flatMap(({ hit, confidence }) => {
      const citation = this.toCitation(hit, confidence);
      return citation ? [citation] : [];
    });

    return {
      documents,
      citations,
      searchMetadata: {
        query,
        totalHits: hits.length,
        returned: documents.length,
        filteredOut: hits.length - documents.length,
        confidenceThreshold: this.policy.confidenceThreshold,
      },
    };
  }

  /** Values above 1 are distances, not similarities. */
  normalizeSimilarity(similarity: number): number {
    if (!Number.isFinite(similarity)) {
      return 0;
    }
    return similarity > 1 ? Math.max(0, 1 - similarity) : clamp01(similarity);
  }

  sourceReliability(metadata: DocumentMetadata): number {
    const source = metadata.source ?? 'unknown';
    return this.policy.sourceReliability[source] ?? this.policy.defaultSourceReliability;
  }

  documentTypeWeight(metadata: DocumentMetadata): number {
    const documentType = metadata.documentType ?? 'document';
    return this.policy.documentTypeWeights[documentType] ?? this.policy.defaultDocumentTypeWeight;
  }

  /**
   * Stepwise decay: ≤1y 1.0, ≤3y 0.9, ≤5y 0.8, ≤10y 0.6, older 0.4. Unknown dates score 0.5.
   */
  recencyFactor(publicationDate: string | undefined): number {
    if (!publicationDate) {
      return 0.5;
    }
    const published = Date.parse(publicationDate);
    if (Number.isNaN(published)) {
      return 0.5;
    }

    const yearsOld = (this.now().getTime() - published) / MS_PER_DAY / DAYS_PER_YEAR;
    if (yearsOld <= 1) return 1.0;
    if (yearsOld <= 3) return 0.9;
    if (yearsOld <= 5) return 0.8;
    if (yearsOld <= 10) return 0.6;
    return 0.4;
  }

  queryRelevance(query: string, metadata: DocumentMetadata): number {
    const words = queryWords(query);
    if (words.length === 0) {
      return 0;
    }

    const title = (metadata.title ?? '').toLowerCase();
    const titleRelevance = words.filter((word) => title.includes(word)).length / words.length;

    const specialty = (metadata.medicalSpecialty ?? '').toLowerCase();
    const specialtyRelevance = specialty && words.some((word) => specialty.includes(word)) ? 0.2 : 0;

    const keywordMatches = (metadata.keywords ?? []).filter((keyword) => {
      const lower = keyword.toLowerCase();
      return words.some((word) => lower.includes(word));
    }).length;
    const keywordRelevance = Math.min(0.3, keywordMatches * 0.1);

    return Math.min(1, titleRelevance * 0.6 + specialtyRelevance + keywordRelevance);
  }

  citationQuality(metadata: DocumentMetadata): number {
    let quality = 0.5;
    if (metadata.doi) quality += 0.2;
    if (metadata.authors && metadata.authors.length > 0) quality += 0.2;
    if (metadata.publicationDate) quality += 0.1;
    return Math.min(1, quality);
  }

  private toCitation(hit: RawHit, confidence: number): Citation | null {
    const { title, url } = hit.metadata;
    if (!title || !url) {
      return null;
    }
    return {
      title,
      url,
      source: hit.metadata.source ?? 'unknown',
      authors: hit.metadata.authors ?? [],
      relevanceScore: confidence,
      ...(hit.metadata.publicationDate ? { publicationDate: hit.metadata.publicationDate } : {}),
      ...(hit.metadata.doi ? { doi: hit.metadata.doi } : {}),
      excerpt: hit.content.slice(0, EXCERPT_LENGTH),
    };
  }
}

export default RetrievalScorer;
