import { z } from 'zod';
import type { Queryable } from '../db/postgres.js';
import type { Embedder } from '../llm/embedding.service.js';
import type { KnowledgeStore, RawHit, SearchFilters } from './retrieval.types.js';
import logger from '../utils/logger.js';

const knowledgeRowSchema = z.object({
  content: z.string(),
  title: z.string().nullable(),
  url: z.string().nullable(),
  source: z.string().nullable(),
  document_type: z.string().nullable(),
  publication_date: z.union([z.string(), z.date()]).nullable(),
  authors: z.array(z.string()).nullable(),
  doi: z.string().nullable(),
  medical_specialty: z.string().nullable(),
  keywords: z.array(z.string()).nullable(),
  distance: z.coerce.number(),
});

type KnowledgeRow = z.infer<typeof knowledgeRowSchema>;

const FILTER_COLUMNS: ReadonlyArray<[keyof SearchFilters, string]> = [
  ['source', 'source'],
  ['medicalSpecialty', 'medical_specialty'],
  ['documentType', 'document_type'],
];

function toIsoDate(value: string | Date | null): string | undefined {
  if (value === null) return undefined;
  return value instanceof Date ? value.toISOString() : value;
}

function mapRow(row: KnowledgeRow): RawHit {
  return {
    content: row.content,
    // pgvector cosine distance is in [0, 2]
    similarity: Math.max(0, 1 - row.distance),
    metadata: {
      title: row.title ?? undefined,
      url: row.url ?? undefined,
      source: row.source ?? undefined,
      documentType: row.document_type ?? undefined,
      publicationDate: toIsoDate(row.publication_date),
      authors: row.authors ?? undefined,
      doi: row.doi ?? undefined,
      medicalSpecialty: row.medical_specialty ?? undefined,
      keywords: row.keywords ?? undefined,
    },
  };
}

/**
 * Knowledge store over a pgvector table (`knowledge_documents`), ranked by cosine distance.
 */
export class PgVectorKnowledgeStore implements KnowledgeStore {
  constructor(
    private readonly db: Queryable,
    private readonly embedder: Embedder
  ) {}

  async search(query: string, maxResults: number, filters: SearchFilters = {}, signal?: AbortSignal): Promise<RawHit[]> {
    const queryEmbedding = await this.embedder.embed(query, signal);
    const embeddingValue = `[${queryEmbedding.join(',')}]`;

    let sql = `
      SELECT content, title, url, source, document_type, publication_date, authors, doi,
             medical_specialty, keywords, embedding <=> $1::vector AS distance
      FROM knowledge_documents
      WHERE embedding IS NOT NULL
    `;
    const params: (string | number)[] = [embeddingValue];

    for (const [key, column] of FILTER_COLUMNS) {
      const value = filters[key];
      if (value) {
        params.push(value);
        sql += ` AND ${column} = $${params.length}`;
      }
    }

    sql += ` ORDER BY distance ASC LIMIT $${params.length + 1}`;
    params.push(maxResults);

    const result = await this.db.query(sql, params);
    const rows = z.array(knowledgeRowSchema).parse(result.rows);

    logger.debug('pgvector search executed', { rows: rows.length, maxResults });
    return rows.map(mapRow);
  }
}

export default PgVectorKnowledgeStore;
