/**
 * Medical Image Search
 *
 * Searches a catalogue of images from approved medical sources. Images whose
 * text carries blocked content markers are never returned; images with
 * content warnings are returned only on request.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { MedicalImage } from '../types/index.js';
import { dataFilePath } from '../config/policy.js';
import type { CacheManager } from '../cache/cache.types.js';
import { MemoryCache } from '../cache/memory-cache.js';
import logger from '../utils/logger.js';

const imageCatalogSchema = z.object({
  sources: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      baseUrl: z.string().url(),
      license: z.string(),
      trustScore: z.number().min(0).max(1),
    })
  ),
  blockedContent: z.array(z.string()),
  warningContent: z.array(z.string()),
  images: z.array(
    z.object({
      sourceId: z.string(),
      path: z.string(),
      title: z.string(),
      description: z.string(),
      tags: z.array(z.string()),
      category: z.string(),
    })
  ),
});

export type ImageCatalog = z.infer<typeof imageCatalogSchema>;
type CatalogImage = ImageCatalog['images'][number];
type CatalogSource = ImageCatalog['sources'][number];

export function loadImageCatalog(path = dataFilePath('image-catalog.json')): ImageCatalog {
  return imageCatalogSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

export interface ImageSearchOptions {
  maxResults?: number;
  minRelevance?: number;
  /** Restrict to these source ids */
  sources?: string[];
  includeWarnings?: boolean;
  signal?: AbortSignal;
}

/**
 * The capability the pipeline consumes at the image_search stage.
 */
export interface ImageSource {
  search(query: string, options?: ImageSearchOptions): Promise<MedicalImage[]>;
}

export type ContentSafety = 'safe' | 'warning' | 'blocked';

const MIN_SOURCE_TRUST = 0.8;
const CACHE_TTL_SECONDS = 3600;

const MEDICAL_CATEGORIES: ReadonlyArray<[string, string[]]> = [
  ['anatomy', ['brain', 'heart', 'lung', 'liver', 'kidney', 'bone', 'muscle']],
  ['symptoms', ['rash', 'swelling', 'inflammation', 'lesion', 'bruise', 'insomnia', 'panic']],
  ['conditions', ['depression', 'anxiety', 'bipolar', 'ptsd', 'diabetes', 'hypertension']],
  ['treatments', ['surgery', 'therapy', 'medication', 'exercise', 'diet', 'cbt', 'ssri']],
  ['diagnostics', ['xray', 'mri', 'ct scan', 'ultrasound', 'blood test']],
];

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean));
}

/**
 * Share of query words found in the text.
 */
export function textOverlap(query: string, text: string): number {
  const queryWords = words(query);
  if (queryWords.size === 0) {
    return 0;
  }
  const textWords = words(text);
  let hits = 0;
  for (const word of queryWords) {
    if (textWords.has(word)) hits++;
  }
  return hits / queryWords.size;
}

function categoryRelevance(query: string, category: string): number {
  const lowerQuery = query.toLowerCase();
  const lowerCategory = category.toLowerCase();
  let score = 0;
  for (const [name, keywords] of MEDICAL_CATEGORIES) {
    if (!keywords.some((keyword) => lowerQuery.includes(keyword))) continue;
    if (lowerCategory.includes(name)) {
      return 1;
    }
    score = 0.5;
  }
  return score;
}

export class CatalogImageSource implements ImageSource {
  private readonly sources: Map<string, CatalogSource>;

  constructor(
    private readonly catalog: ImageCatalog = loadImageCatalog(),
    private readonly cache: CacheManager<MedicalImage[]> = new MemoryCache<MedicalImage[]>({ maxSize: 200 })
  ) {
    this.sources = new Map(catalog.sources.map((source) => [source.id, source]));
  }

  /**
   * Title 0.4, description 0.3, tags 0.2, category 0.1.
   */
  relevance(query: string, image: CatalogImage): number {
    const score =
      textOverlap(query, image.title) * 0.4 +
      textOverlap(query, image.description) * 0.3 +
      textOverlap(query, image.tags.join(' ')) * 0.2 +
      categoryRelevance(query, image.category) * 0.1;
    return Math.min(1, Math.max(0, score));
  }

  contentSafety(image: CatalogImage): ContentSafety {
    const text = `${image.title} ${image.description} ${image.tags.join(' ')}`.toLowerCase();
    if (this.catalog.blockedContent.some((marker) => text.includes(marker))) {
      return 'blocked';
    }
    if (this.catalog.warningContent.some((marker) => text.includes(marker))) {
      return 'warning';
    }
    return 'safe';
  }

  async search(query: string, options: ImageSearchOptions = {}): Promise<MedicalImage[]> {
    const maxResults = options.maxResults ?? 10;
    const minRelevance = options.minRelevance ?? 0.3;
    const includeWarnings = options.includeWarnings ?? false;
    const cacheKey = JSON.stringify({
      query: query.toLowerCase(),
      maxResults,
      minRelevance,
      sources: options.sources ?? null,
      includeWarnings,
    });

    const cached = await this.cache.get(cacheKey);
    if (cached) {
      logger.debug('Image search cache hit', { maxResults });
      return cached;
    }

    const allowed = this.allowedSources(options.sources);

    const results = this.catalog.images
      .flatMap((image): MedicalImage[] => {
        const source = allowed.get(image.sourceId);
        if (!source) return [];

        const safety = this.contentSafety(image);
        if (safety === 'blocked' || (safety === 'warning' && !includeWarnings)) return [];

        const relevanceScore = this.relevance(query, image);
        if (relevanceScore < minRelevance) return [];

        return [
          {
            url: `${source.baseUrl}${image.path}`,
            caption: image.title,
            source: source.id,
            license: source.license,
            altText: image.description || image.title,
            relevanceScore,
          },
        ];
      })
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .slice(0, maxResults);

    await this.cache.set(cacheKey, results, CACHE_TTL_SECONDS);
    logger.info('Medical image search completed', { results: results.length });
    return results;
  }

  private allowedSources(requested?: string[]): Map<string, CatalogSource> {
    const allowed = new Map<string, CatalogSource>();
    for (const source of this.sources.values()) {
      const selected = requested ? requested.includes(source.id) : source.trustScore >= MIN_SOURCE_TRUST;
      if (selected) {
        allowed.set(source.id, source);
      }
    }
    return allowed;
  }
}

export default CatalogImageSource;
