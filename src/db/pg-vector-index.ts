/**
 * PostgreSQL + pgvector implementation of the vector index
 */

import postgres from 'postgres';
import { getConnection } from './connection.js';
import type { IndexEntry, IndexHit, SearchFilters } from '../types/index.js';
import type { VectorIndex } from './vector-index.js';

const EMBEDDING_VERSION_KEY = 'embedding_version';

interface HitRow {
  key: string;
  sourceUrl: string;
  generation: string;
  sequence: number;
  start: number;
  end: number;
  tags: string[];
  retrievedAt: Date;
  score: number;
}

export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

export class PgVectorIndex implements VectorIndex {
  constructor(private readonly sql: postgres.Sql = getConnection()) {}

  async upsert(entries: IndexEntry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.sql.begin(async (tx) => {
      for (const entry of entries) {
        await tx`
          INSERT INTO chunk_embeddings (
            source_url,
            chunk_key,
            generation,
            sequence,
            start_offset,
            end_offset,
            tags,
            retrieved_at,
            embedding
          ) VALUES (
            ${entry.sourceUrl},
            ${entry.key},
            ${entry.generation},
            ${entry.sequence},
            ${entry.start},
            ${entry.end},
            ${entry.tags},
            ${entry.retrievedAt},
            ${toVectorLiteral(entry.embedding)}::vector
          )
          ON CONFLICT (source_url, chunk_key) DO UPDATE SET
            generation = EXCLUDED.generation,
            sequence = EXCLUDED.sequence,
            start_offset = EXCLUDED.start_offset,
            end_offset = EXCLUDED.end_offset,
            tags = EXCLUDED.tags,
            retrieved_at = EXCLUDED.retrieved_at,
            embedding = EXCLUDED.embedding
        `;
      }
    });
  }

  async deleteByKeys(sourceUrl: string, keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    const result = await this.sql`
      DELETE FROM chunk_embeddings
      WHERE source_url = ${sourceUrl} AND chunk_key = ANY(${keys}::text[])
    `;
    return result.count;
  }

  async listKeys(sourceUrl: string, generation: string): Promise<string[]> {
    const rows = await this.sql<Array<{ key: string }>>`
      SELECT chunk_key as "key" FROM chunk_embeddings
      WHERE source_url = ${sourceUrl} AND generation = ${generation}
      ORDER BY sequence
    `;
    return rows.map(row => row.key);
  }

  async activateGeneration(sourceUrl: string, generation: string): Promise<string | null> {
    return await this.sql.begin(async (tx) => {
      const previous = await tx<Array<{ generation: string }>>`
        SELECT generation FROM active_generations WHERE source_url = ${sourceUrl} FOR UPDATE
      `;
      await tx`
        INSERT INTO active_generations (source_url, generation, activated_at)
        VALUES (${sourceUrl}, ${generation}, NOW())
        ON CONFLICT (source_url) DO UPDATE SET
          generation = EXCLUDED.generation,
          activated_at = EXCLUDED.activated_at
      `;
      return previous[0]?.generation ?? null;
    }) as string | null;
  }

  async getActiveGeneration(sourceUrl: string): Promise<string | null> {
    const rows = await this.sql<Array<{ generation: string }>>`
      SELECT generation FROM active_generations WHERE source_url = ${sourceUrl}
    `;
    return rows[0]?.generation ?? null;
  }

  async deactivate(sourceUrl: string): Promise<string | null> {
    const rows = await this.sql<Array<{ generation: string }>>`
      DELETE FROM active_generations WHERE source_url = ${sourceUrl}
      RETURNING generation
    `;
    return rows[0]?.generation ?? null;
  }

  async deleteGeneration(sourceUrl: string, generation: string): Promise<number> {
    const result = await this.sql`
      DELETE FROM chunk_embeddings
      WHERE source_url = ${sourceUrl} AND generation = ${generation}
    `;
    return result.count;
  }

  async setTags(sourceUrl: string, tags: string[]): Promise<number> {
    const result = await this.sql`
      UPDATE chunk_embeddings
      SET tags = ${tags}::text[]
      WHERE source_url = ${sourceUrl} AND tags IS DISTINCT FROM ${tags}::text[]
    `;
    return result.count;
  }

  async search(embedding: number[], k: number, filters: SearchFilters = {}): Promise<IndexHit[]> {
    if (k <= 0) return [];
    const sql = this.sql;
    const vector = toVectorLiteral(embedding);
    const tags = filters.tags && filters.tags.length > 0 ? filters.tags : null;

    const rows = await sql<HitRow[]>`
      SELECT
        ce.chunk_key as "key",
        ce.source_url as "sourceUrl",
        ce.generation,
        ce.sequence,
        ce.start_offset as "start",
        ce.end_offset as "end",
        ce.tags,
        ce.retrieved_at as "retrievedAt",
        (1 - (ce.embedding <=> ${vector}::vector))::float8 as "score"
      FROM chunk_embeddings ce
      JOIN active_generations ag
        ON ag.source_url = ce.source_url AND ag.generation = ce.generation
      WHERE (${filters.sourceUrl ?? null}::text IS NULL OR ce.source_url = ${filters.sourceUrl ?? null})
        AND (${tags}::text[] IS NULL OR ce.tags && ${tags}::text[])
        AND (${filters.since ?? null}::timestamptz IS NULL OR ce.retrieved_at >= ${filters.since ?? null})
        AND (${filters.until ?? null}::timestamptz IS NULL OR ce.retrieved_at <= ${filters.until ?? null})
      ORDER BY "score" DESC, ce.retrieved_at DESC, ce.chunk_key ASC
      LIMIT ${k}
    `;

    return rows.map(({ score, ...entry }) => ({ entry, score: Number(score) }));
  }

  async count(sourceUrl?: string): Promise<number> {
    const rows = await this.sql<Array<{ count: string }>>`
      SELECT COUNT(*) as "count" FROM chunk_embeddings
      WHERE ${sourceUrl ?? null}::text IS NULL OR source_url = ${sourceUrl ?? null}
    `;
    return Number(rows[0]?.count ?? 0);
  }

  async getEmbeddingVersion(): Promise<string | null> {
    const rows = await this.sql<Array<{ value: string }>>`
      SELECT value FROM index_meta WHERE key = ${EMBEDDING_VERSION_KEY}
    `;
    return rows[0]?.value ?? null;
  }

  async setEmbeddingVersion(version: string): Promise<void> {
    await this.sql`
      INSERT INTO index_meta (key, value, updated_at)
      VALUES (${EMBEDDING_VERSION_KEY}, ${version}, NOW())
      ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = EXCLUDED.updated_at
    `;
  }

  async clear(): Promise<void> {
    await this.sql.begin(async (tx) => {
      await tx`DELETE FROM active_generations`;
      await tx`DELETE FROM chunk_embeddings`;
      await tx`DELETE FROM index_meta WHERE key = ${EMBEDDING_VERSION_KEY}`;
    });
  }
}
