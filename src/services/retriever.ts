/**
 * Retriever
 * Query embedding + top-k search over active generations. Passage text is
 * resolved from the owning content record, never from the index.
 */

import type { ContentStore } from '../db/content-store.js';
import type { VectorIndex } from '../db/vector-index.js';
import type { EmbeddingProvider } from '../providers/embedding.js';
import type { ContentRecord, RetrievedChunk, SearchFilters } from '../types/index.js';
import { EmbeddingVersionMismatch } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retriever');

export interface RetrieverDeps {
  index: VectorIndex;
  store: ContentStore;
  embedder: EmbeddingProvider;
}

const refKey = (sourceUrl: string, fingerprint: string) => `${sourceUrl}\u0000${fingerprint}`;

export class Retriever {
  constructor(private readonly deps: RetrieverDeps) {}

  /**
   * Fails fast when stored vectors were produced by another embedding model.
   * An empty, unstamped index is compatible with anything.
   */
  async assertCompatible(): Promise<void> {
    const indexVersion = await this.deps.index.getEmbeddingVersion();
    if (indexVersion !== null && indexVersion !== this.deps.embedder.version) {
      throw new EmbeddingVersionMismatch(indexVersion, this.deps.embedder.version);
    }
  }

  async search(query: string, k: number, filters?: SearchFilters): Promise<RetrievedChunk[]> {
    await this.assertCompatible();
    if (k <= 0 || query.trim().length === 0) return [];

    const [embedding] = await this.deps.embedder.embed([query]);
    const hits = await this.deps.index.search(embedding, k, filters);
    if (hits.length === 0) return [];

    const refs = new Map<string, { sourceUrl: string; fingerprint: string }>();
    for (const hit of hits) {
      refs.set(refKey(hit.entry.sourceUrl, hit.entry.generation), {
        sourceUrl: hit.entry.sourceUrl,
        fingerprint: hit.entry.generation,
      });
    }
    const records = new Map<string, ContentRecord>(
      (await this.deps.store.findRecords([...refs.values()]))
        .map(record => [refKey(record.sourceUrl, record.fingerprint), record])
    );

    const results: RetrievedChunk[] = [];
    for (const hit of hits) {
      const record = records.get(refKey(hit.entry.sourceUrl, hit.entry.generation));
      if (!record) {
        // Record pruned between search and hydration
        log.debug({ sourceUrl: hit.entry.sourceUrl, key: hit.entry.key }, 'Dropping hit without record');
        continue;
      }
      results.push({
        key: hit.entry.key,
        sourceUrl: hit.entry.sourceUrl,
        recordId: record.id,
        sequence: hit.entry.sequence,
        title: record.title,
        text: record.text.slice(hit.entry.start, hit.entry.end),
        score: hit.score,
        retrievedAt: hit.entry.retrievedAt,
        tags: hit.entry.tags,
      });
    }

    log.debug({ k, hits: hits.length, returned: results.length }, 'Vector search complete');
    return results;
  }
}
