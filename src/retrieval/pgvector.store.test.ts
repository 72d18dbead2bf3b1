import { describe, it, expect, vi } from 'vitest';
import { PgVectorKnowledgeStore } from './pgvector.store.js';
import type { Queryable } from '../db/postgres.js';
import type { Embedder } from '../llm/embedding.service.js';

const embedder: Embedder = { embed: async () => [0.1, 0.2, 0.3] };

function row(overrides: Record<string, unknown> = {}) {
  return {
    content: 'Sleep and mood are closely linked.',
    title: 'Sleep and mood',
    url: 'https://example.org/sleep',
    source: 'nih',
    document_type: 'fact_sheet',
    publication_date: new Date('2024-02-01T00:00:00Z'),
    authors: ['Test Author'],
    doi: null,
    medical_specialty: 'psychiatry',
    keywords: ['sleep'],
    distance: '0.25',
    ...overrides,
  };
}

describe('PgVectorKnowledgeStore', () => {
  it('should query by cosine distance and map rows to hits', async () => {
    const query = vi.fn<Parameters<Queryable['query']>, ReturnType<Queryable['query']>>(async () => ({
      rows: [row()],
    }));
    const store = new PgVectorKnowledgeStore({ query }, embedder);

    const hits = await store.search('sleep problems', 5);

    expect(query).toHaveBeenCalledTimes(1);
    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('embedding <=> $1::vector AS distance');
    expect(sql).toContain('LIMIT $2');
    expect(params).toEqual(['[0.1,0.2,0.3]', 5]);

    expect(hits).toEqual([
      {
        content: 'Sleep and mood are closely linked.',
        similarity: 0.75,
        metadata: {
          title: 'Sleep and mood',
          url: 'https://example.org/sleep',
          source: 'nih',
          documentType: 'fact_sheet',
          publicationDate: '2024-02-01T00:00:00.000Z',
          authors: ['Test Author'],
          doi: undefined,
          medicalSpecialty: 'psychiatry',
          keywords: ['sleep'],
        },
      },
    ]);
  });

  it('should add filters as numbered parameters', async () => {
    const query = vi.fn<Parameters<Queryable['query']>, ReturnType<Queryable['query']>>(async () => ({ rows: [] }));
    const store = new PgVectorKnowledgeStore({ query }, embedder);

    await store.search('sleep', 3, { source: 'cdc', documentType: 'fact_sheet' });

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('AND source = $2');
    expect(sql).toContain('AND document_type = $3');
    expect(sql).toContain('LIMIT $4');
    expect(params).toEqual(['[0.1,0.2,0.3]', 'cdc', 'fact_sheet', 3]);
  });

  it('should reject rows with an unexpected shape', async () => {
    const store = new PgVectorKnowledgeStore({ query: async () => ({ rows: [{ content: 42 }] }) }, embedder);

    await expect(store.search('sleep', 3)).rejects.toThrow();
  });
});
