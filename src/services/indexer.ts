/**
 * Chunk Indexer
 *
 * Owns every write to the vector index. A record is indexed as a generation
 * (keyed by its content fingerprint):
 *   stage (upsert) -> verify staged keys -> activate -> retire previous keys
 * Readers only ever see the active generation of a source, so a swap never
 * exposes a mix of old and new chunks and never leaves the source empty.
 */

import type { ContentStore } from '../db/content-store.js';
import type { VectorIndex } from '../db/vector-index.js';
import type { EmbeddingProvider } from '../providers/embedding.js';
import type { Chunk, ContentRecord, IndexEntry } from '../types/index.js';
import { computeChunkFingerprint } from '../utils/crypto.js';
import { EmbeddingVersionMismatch, IndexConsistencyError, isFatal } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Chunker } from './chunker.js';

const log = createLogger('indexer');

// ============================================================================
// TYPES
// ============================================================================

export interface IndexResult {
  sourceUrl: string;
  generation: string;
  chunksIndexed: number;
  retiredChunks: number;
}

export interface PruneResult {
  recordsDeleted: number;
  chunksDeleted: number;
  sourcesDeactivated: string[];
}

export interface ReindexSummary {
  recordsIndexed: number;
  chunksIndexed: number;
  failures: Array<{ sourceUrl: string; error: string }>;
  embeddingVersion: string;
}

export interface ChunkIndexerDeps {
  index: VectorIndex;
  store: ContentStore;
  embedder: EmbeddingProvider;
  chunker: Chunker;
}

// ============================================================================
// INDEXER
// ============================================================================

export class ChunkIndexer {
  private readonly vectorIndex: VectorIndex;
  private readonly store: ContentStore;
  private readonly embedder: EmbeddingProvider;
  private readonly chunker: Chunker;

  constructor(deps: ChunkIndexerDeps) {
    this.vectorIndex = deps.index;
    this.store = deps.store;
    this.embedder = deps.embedder;
    this.chunker = deps.chunker;
  }

  /**
   * Throw EmbeddingVersionMismatch when the index was built by another model.
   * An unstamped index is stamped with the provider's version.
   */
  async assertCompatible(): Promise<void> {
    const indexVersion = await this.vectorIndex.getEmbeddingVersion();
    if (indexVersion === null) {
      await this.vectorIndex.setEmbeddingVersion(this.embedder.version);
      return;
    }
    if (indexVersion !== this.embedder.version) {
      throw new EmbeddingVersionMismatch(indexVersion, this.embedder.version);
    }
  }

  buildChunks(record: ContentRecord): Chunk[] {
    return this.chunker.chunk(record.text).map(span => ({
      ...span,
      key: computeChunkFingerprint(record.fingerprint, span.sequence),
      recordId: record.id,
      sourceUrl: record.sourceUrl,
    }));
  }

  /**
   * Make `record` the visible generation of its source.
   */
  async index(record: ContentRecord, tags: string[]): Promise<IndexResult> {
    await this.assertCompatible();

    const sourceUrl = record.sourceUrl;
    const generation = record.fingerprint;
    const chunks = this.buildChunks(record);

    // One batched embedding call per record
    const embeddings = chunks.length > 0 ? await this.embedder.embed(chunks.map(c => c.text)) : [];
    if (embeddings.length !== chunks.length) {
      throw new IndexConsistencyError(
        sourceUrl,
        `Embedding provider returned ${embeddings.length} vectors for ${chunks.length} chunks`
      );
    }

    const entries: IndexEntry[] = chunks.map((chunk, i) => ({
      key: chunk.key,
      sourceUrl,
      generation,
      sequence: chunk.sequence,
      start: chunk.start,
      end: chunk.end,
      tags,
      retrievedAt: record.retrievedAt,
      embedding: embeddings[i],
    }));

    const previous = await this.vectorIndex.getActiveGeneration(sourceUrl);

    // Stage
    await this.vectorIndex.upsert(entries);

    // Verify
    const staged = new Set(await this.vectorIndex.listKeys(sourceUrl, generation));
    const expected = chunks.map(c => c.key);
    const consistent = staged.size === expected.length && expected.every(key => staged.has(key));
    if (!consistent) {
      if (previous !== generation) {
        await this.vectorIndex.deleteGeneration(sourceUrl, generation);
      }
      throw new IndexConsistencyError(
        sourceUrl,
        `Staged generation has ${staged.size} chunks, expected ${expected.length}`
      );
    }

    // Activate, then retire what it replaced
    const replaced = await this.vectorIndex.activateGeneration(sourceUrl, generation);
    let retiredChunks = 0;
    if (replaced !== null && replaced !== generation) {
      retiredChunks = await this.vectorIndex.deleteGeneration(sourceUrl, replaced);
    }

    log.info({ sourceUrl, recordId: record.id, chunks: chunks.length, retiredChunks }, 'Indexed record');
    return { sourceUrl, generation, chunksIndexed: chunks.length, retiredChunks };
  }

  /**
   * Whether the active generation of the source is exactly this record's chunks.
   */
  async verify(sourceUrl: string, record: ContentRecord): Promise<boolean> {
    const active = await this.vectorIndex.getActiveGeneration(sourceUrl);
    if (active !== record.fingerprint) return false;

    const keys = new Set(await this.vectorIndex.listKeys(sourceUrl, active));
    const expected = this.buildChunks(record).map(c => c.key);
    return keys.size === expected.length && expected.every(key => keys.has(key));
  }

  /**
   * Bring the indexed tags of a source in line with its current tags.
   */
  async retag(sourceUrl: string, tags: string[]): Promise<number> {
    const changed = await this.vectorIndex.setTags(sourceUrl, tags);
    if (changed > 0) {
      log.info({ sourceUrl, tags, changed }, 'Re-tagged source chunks');
    }
    return changed;
  }

  /**
   * Remove the source's active generation from search and delete its chunks.
   */
  async retire(sourceUrl: string): Promise<number> {
    const generation = await this.vectorIndex.deactivate(sourceUrl);
    if (generation === null) return 0;
    const deleted = await this.vectorIndex.deleteGeneration(sourceUrl, generation);
    log.info({ sourceUrl, deleted }, 'Retired source chunks');
    return deleted;
  }

  /**
   * Delete records retrieved before `olderThan` and the chunks built from them.
   */
  async prune(olderThan: Date): Promise<PruneResult> {
    const pruned = await this.store.pruneRecords(olderThan);

    const refs = new Map<string, { sourceUrl: string; fingerprint: string }>();
    for (const record of pruned) {
      refs.set(`${record.sourceUrl}\u0000${record.fingerprint}`, {
        sourceUrl: record.sourceUrl,
        fingerprint: record.fingerprint,
      });
    }

    // A newer record with identical content keeps its generation alive
    const surviving = new Set(
      (await this.store.findRecords([...refs.values()])).map(r => `${r.sourceUrl}\u0000${r.fingerprint}`)
    );

    let chunksDeleted = 0;
    const sourcesDeactivated: string[] = [];
    for (const [key, ref] of refs) {
      if (surviving.has(key)) continue;
      if ((await this.vectorIndex.getActiveGeneration(ref.sourceUrl)) === ref.fingerprint) {
        await this.vectorIndex.deactivate(ref.sourceUrl);
        sourcesDeactivated.push(ref.sourceUrl);
      }
      chunksDeleted += await this.vectorIndex.deleteGeneration(ref.sourceUrl, ref.fingerprint);
    }

    log.info({ olderThan, recordsDeleted: pruned.length, chunksDeleted }, 'Pruned expired content');
    return { recordsDeleted: pruned.length, chunksDeleted, sourcesDeactivated };
  }

  /**
   * Rebuild the whole index from the current record of every source with the
   * current embedding provider. Required after an embedding model change.
   */
  async reindexAll(): Promise<ReindexSummary> {
    const records = await this.store.listCurrentRecords();
    const sources = await this.store.listSources();
    const tagsBySource = new Map(sources.map(source => [source.url, source.tags]));

    await this.vectorIndex.clear();
    await this.vectorIndex.setEmbeddingVersion(this.embedder.version);

    const summary: ReindexSummary = {
      recordsIndexed: 0,
      chunksIndexed: 0,
      failures: [],
      embeddingVersion: this.embedder.version,
    };

    for (const record of records) {
      try {
        const result = await this.index(record, tagsBySource.get(record.sourceUrl) ?? []);
        summary.recordsIndexed++;
        summary.chunksIndexed += result.chunksIndexed;
      } catch (error) {
        if (isFatal(error)) throw error;
        const message = error instanceof Error ? error.message : String(error);
        log.error({ sourceUrl: record.sourceUrl, error: message }, 'Re-index failed for record');
        summary.failures.push({ sourceUrl: record.sourceUrl, error: message });
        await this.store.updateSource(record.sourceUrl, { needsReindex: true });
      }
    }

    log.info({
      recordsIndexed: summary.recordsIndexed,
      chunksIndexed: summary.chunksIndexed,
      failures: summary.failures.length,
    }, 'Re-index complete');
    return summary;
  }
}
