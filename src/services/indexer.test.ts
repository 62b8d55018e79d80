import { describe, it, expect, beforeEach } from 'vitest';
import { ChunkIndexer } from './indexer.js';
import { Chunker } from './chunker.js';
import { MemoryVectorIndex } from '../db/memory-vector-index.js';
import { MemoryContentStore } from '../__mocks__/memory-content-store.js';
import { FakeEmbedder } from '../__mocks__/fake-embedder.js';
import { computeContentHash } from '../utils/crypto.js';
import { EmbeddingVersionMismatch, IndexConsistencyError } from '../utils/errors.js';
import type { ContentRecord, IndexEntry } from '../types/index.js';

const URL = 'https://example.com/post';
const V1 = 'Node streams move data in chunks. Backpressure keeps producers in check. Pipelines connect streams safely.';
const V2 = 'Postgres indexes speed up reads. Vacuum reclaims space after updates. Plans show how queries run.';

/** Records which generations search could see after every mutation */
class ObservedIndex extends MemoryVectorIndex {
  readonly visible: string[][] = [];

  private async observe(): Promise<void> {
    const hits = await this.search(new Array<number>(32).fill(1), 1000, { sourceUrl: URL });
    this.visible.push([...new Set(hits.map(h => h.entry.generation))]);
  }

  override async upsert(entries: IndexEntry[]): Promise<void> {
    await super.upsert(entries);
    await this.observe();
  }

  override async activateGeneration(sourceUrl: string, generation: string): Promise<string | null> {
    const previous = await super.activateGeneration(sourceUrl, generation);
    await this.observe();
    return previous;
  }

  override async deleteGeneration(sourceUrl: string, generation: string): Promise<number> {
    const deleted = await super.deleteGeneration(sourceUrl, generation);
    await this.observe();
    return deleted;
  }
}

describe('ChunkIndexer', () => {
  let store: MemoryContentStore;
  let index: ObservedIndex;
  let embedder: FakeEmbedder;
  let indexer: ChunkIndexer;
  const chunker = new Chunker({ chunkSize: 50, chunkOverlap: 10 });

  const addRecord = (text: string, retrievedAt?: Date): Promise<ContentRecord> =>
    store.insertRecord({
      sourceUrl: URL,
      title: 'Post',
      text,
      fingerprint: computeContentHash(text),
      retrievedAt,
      publishedAt: null,
      wordCount: text.split(' ').length,
      contentKind: 'ARTICLE',
      metadata: {},
    });

  beforeEach(() => {
    store = new MemoryContentStore();
    index = new ObservedIndex();
    embedder = new FakeEmbedder();
    indexer = new ChunkIndexer({ index, store, embedder, chunker });
  });

  it('indexes a record as the active generation in one embedding call', async () => {
    const record = await addRecord(V1);
    const expected = chunker.chunk(V1).length;

    const result = await indexer.index(record, ['node']);

    expect(expected).toBeGreaterThan(1);
    expect(result).toEqual({ sourceUrl: URL, generation: record.fingerprint, chunksIndexed: expected, retiredChunks: 0 });
    expect(embedder.calls).toHaveLength(1);
    expect(await index.getActiveGeneration(URL)).toBe(record.fingerprint);
    expect(await index.count(URL)).toBe(expected);
    expect(await index.getEmbeddingVersion()).toBe('fake:v1');
    expect(await indexer.verify(URL, record)).toBe(true);
  });

  it('swaps generations without exposing a mixed or empty source', async () => {
    const first = await addRecord(V1);
    await indexer.index(first, []);
    index.visible.length = 0;

    const second = await addRecord(V2);
    const result = await indexer.index(second, []);

    expect(result.retiredChunks).toBe(chunker.chunk(V1).length);
    expect(index.visible.length).toBeGreaterThan(0);
    for (const generations of index.visible) {
      expect(generations).toHaveLength(1);
    }
    expect(index.visible[index.visible.length - 1]).toEqual([second.fingerprint]);
    expect(await index.listKeys(URL, first.fingerprint)).toEqual([]);
    expect(await indexer.verify(URL, first)).toBe(false);
    expect(await indexer.verify(URL, second)).toBe(true);
  });

  it('overwrites identical content in place', async () => {
    const first = await addRecord(V1);
    await indexer.index(first, []);
    const again = await addRecord(V1);

    const result = await indexer.index(again, []);

    expect(result.retiredChunks).toBe(0);
    expect(await index.count(URL)).toBe(chunker.chunk(V1).length);
    expect(await index.getActiveGeneration(URL)).toBe(first.fingerprint);
  });

  it('refuses to mix embedding models', async () => {
    await index.setEmbeddingVersion('openai:other-model');
    const record = await addRecord(V1);

    await expect(indexer.index(record, [])).rejects.toBeInstanceOf(EmbeddingVersionMismatch);
    expect(embedder.calls).toHaveLength(0);
  });

  it('keeps the previous generation when embeddings come back short', async () => {
    const first = await addRecord(V1);
    await indexer.index(first, []);

    class ShortEmbedder extends FakeEmbedder {
      override async embed(texts: string[]): Promise<number[][]> {
        return (await super.embed(texts)).slice(1);
      }
    }
    const broken = new ChunkIndexer({ index, store, embedder: new ShortEmbedder(), chunker });
    const second = await addRecord(V2);

    await expect(broken.index(second, [])).rejects.toBeInstanceOf(IndexConsistencyError);
    expect(await index.getActiveGeneration(URL)).toBe(first.fingerprint);
    expect(await indexer.verify(URL, first)).toBe(true);
  });

  it('retires a source', async () => {
    const record = await addRecord(V1);
    await indexer.index(record, []);

    expect(await indexer.retire(URL)).toBe(chunker.chunk(V1).length);
    expect(await index.count(URL)).toBe(0);
    expect(await indexer.retire(URL)).toBe(0);
  });

  it('prunes expired records and their chunks', async () => {
    const old = await addRecord(V1, new Date('2026-01-01T00:00:00Z'));
    await indexer.index(old, []);

    const result = await indexer.prune(new Date('2026-02-01T00:00:00Z'));

    expect(result).toEqual({
      recordsDeleted: 1,
      chunksDeleted: chunker.chunk(V1).length,
      sourcesDeactivated: [URL],
    });
    expect(await index.getActiveGeneration(URL)).toBeNull();
    expect(store.records).toHaveLength(0);
  });

  it('keeps chunks that a newer identical record still owns', async () => {
    const old = await addRecord(V1, new Date('2026-01-01T00:00:00Z'));
    await indexer.index(old, []);
    await addRecord(V1, new Date('2026-03-01T00:00:00Z'));

    const result = await indexer.prune(new Date('2026-02-01T00:00:00Z'));

    expect(result).toEqual({ recordsDeleted: 1, chunksDeleted: 0, sourcesDeactivated: [] });
    expect(await index.getActiveGeneration(URL)).toBe(old.fingerprint);
  });

  it('rebuilds the index for a new embedding model', async () => {
    await store.upsertSource({ url: URL, tags: ['node'] });
    const record = await addRecord(V1);
    await index.setEmbeddingVersion('openai:old-model');

    const summary = await indexer.reindexAll();

    expect(summary).toEqual({
      recordsIndexed: 1,
      chunksIndexed: chunker.chunk(V1).length,
      failures: [],
      embeddingVersion: 'fake:v1',
    });
    expect(await index.getEmbeddingVersion()).toBe('fake:v1');
    expect(await indexer.verify(URL, record)).toBe(true);
    const hits = await index.search(new Array<number>(32).fill(1), 1);
    expect(hits[0].entry.tags).toEqual(['node']);
  });
});
