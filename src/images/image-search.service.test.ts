import { describe, it, expect } from 'vitest';
import { CatalogImageSource, loadImageCatalog, textOverlap, type ImageCatalog } from './image-search.service.js';
import { MemoryCache } from '../cache/memory-cache.js';
import type { MedicalImage } from '../types/index.js';

function testCatalog(): ImageCatalog {
  return {
    sources: [
      { id: 'atlas', name: 'Atlas', baseUrl: 'https://images.example.org', license: 'CC-BY', trustScore: 0.9 },
      { id: 'misc', name: 'Misc', baseUrl: 'https://low.example.org', license: 'unknown', trustScore: 0.5 },
    ],
    blockedContent: ['graphic'],
    warningContent: ['surgical'],
    images: [
      {
        sourceId: 'atlas',
        path: '/brain.png',
        title: 'Brain anatomy',
        description: 'Diagram of the human brain',
        tags: ['brain', 'neurology'],
        category: 'anatomy',
      },
      {
        sourceId: 'atlas',
        path: '/surgery.png',
        title: 'Brain surgery',
        description: 'Surgical view of the brain',
        tags: ['brain'],
        category: 'treatments',
      },
      {
        sourceId: 'atlas',
        path: '/injury.png',
        title: 'Brain injury',
        description: 'graphic injury photo',
        tags: ['brain'],
        category: 'conditions',
      },
      {
        sourceId: 'misc',
        path: '/scan.png',
        title: 'Brain scan',
        description: 'Low trust brain scan',
        tags: ['brain'],
        category: 'diagnostics',
      },
    ],
  };
}

describe('textOverlap', () => {
  it('should return the share of query words present', () => {
    expect(textOverlap('Brain Scan', 'a brain')).toBe(0.5);
    expect(textOverlap('', 'anything')).toBe(0);
  });
});

describe('CatalogImageSource', () => {
  it('should return safe images from trusted sources', async () => {
    const source = new CatalogImageSource(testCatalog());

    const results = await source.search('brain');

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      url: 'https://images.example.org/brain.png',
      caption: 'Brain anatomy',
      source: 'atlas',
      license: 'CC-BY',
      altText: 'Diagram of the human brain',
    });
    expect(results[0]?.relevanceScore).toBeCloseTo(1, 6);
  });

  it('should include warned images only on request', async () => {
    const source = new CatalogImageSource(testCatalog());

    const results = await source.search('brain', { includeWarnings: true });

    expect(results.map((image) => image.url)).toEqual([
      'https://images.example.org/brain.png',
      'https://images.example.org/surgery.png',
    ]);
    expect(results[1]?.relevanceScore).toBeCloseTo(0.95, 6);
  });

  it('should restrict to the requested sources', async () => {
    const source = new CatalogImageSource(testCatalog());

    const results = await source.search('brain', { sources: ['misc'] });

    expect(results.map((image) => image.url)).toEqual(['https://low.example.org/scan.png']);
  });

  it('should classify content safety', () => {
    const catalog = testCatalog();
    const source = new CatalogImageSource(catalog);

    expect(catalog.images.map((image) => source.contentSafety(image))).toEqual([
      'safe',
      'warning',
      'blocked',
      'safe',
    ]);
  });

  it('should drop images below the relevance floor', async () => {
    const source = new CatalogImageSource(testCatalog());

    expect(await source.search('panic attack')).toEqual([]);
  });

  it('should serve repeated searches from the cache', async () => {
    const catalog = testCatalog();
    const source = new CatalogImageSource(catalog, new MemoryCache<MedicalImage[]>());

    const first = await source.search('brain');
    catalog.images.length = 0;
    const second = await source.search('brain');

    expect(second).toEqual(first);
    expect(await source.search('brain', { maxResults: 5 })).toEqual([]);
  });

  it('should load the bundled catalog', () => {
    const catalog = loadImageCatalog();

    expect(catalog.sources.length).toBeGreaterThan(0);
    expect(catalog.images.every((image) => catalog.sources.some((s) => s.id === image.sourceId))).toBe(true);
  });
});
