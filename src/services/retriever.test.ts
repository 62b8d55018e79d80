import { describe, it, expect, beforeEach } from 'vitest';
import { Retriever } from './retriever.js';
import { ChunkIndexer } from './indexer.js';
import { Chunker } from './chunker.js';
import { MemoryVectorIndex } from '../db/memory-vector-index.js';
import { MemoryContentStore } from '../__mocks__/memory-content-store.js';
import { FakeEmbedder } from '../__mocks__/fake-embedder.js';
import { computeContentHash } from '../utils/crypto.js';
import { EmbeddingVersionMismatch } from '../utils/errors.js';

const STREAMS_URL = 'https://example.com/streams';
const VACUUM_URL = 'https://example.com/vacuum';
const STREAMS = 'Node streams handle backpressure between a fast producer and a slow consumer.';
const VACUUM = 'Postgres vacuum reclaims storage held by dead tuples after updates and deletes.';

describe('Retriever', () => {
  let store: MemoryContentStore;
  let index: MemoryVectorIndex;
  let embedder: FakeEmbedder;
  let retriever: Retriever;

  const ingest = async (sourceUrl: string, text: string, tags: string[]) => {
    const record = await store.insertRecord({
      sourceUrl,
      title: `Title of ${sourceUrl}`,
      text,
      fingerprint: computeContentHash(text),
      publishedAt: null,
      wordCount: text.split(' ').length,
      contentKind: 'ARTICLE',
      metadata: {},
    });
    await new ChunkIndexer({ index, store, embedder, chunker: new Chunker() }).index(record, tags);
    return record;
  };

  beforeEach(() => {
    store = new MemoryContentStore();
    index = new MemoryVectorIndex();
    embedder = new FakeEmbedder();
    retriever = new Retriever({ index, store, embedder });
    embedder
      .set(STREAMS, [1, 0, 0])
      .set(VACUUM, [0, 1, 0])
      .set('how does backpressure work', [0.9, 0.1, 0]);
  });

  it('returns the closest chunks with text from the owning record', async () => {
    const streams = await ingest(STREAMS_URL, STREAMS, ['node']);
    await ingest(VACUUM_URL, VACUUM, ['postgres']);

    const results = await retriever.search('how does backpressure work', 2);

    expect(results.map(r => r.sourceUrl)).toEqual([STREAMS_URL, VACUUM_URL]);
    expect(results[0]).toMatchObject({
      recordId: streams.id,
      sequence: 0,
      title: `Title of ${STREAMS_URL}`,
      text: STREAMS,
      tags: ['node'],
    });
    expect(results[0].score).toBeGreaterThan(results[1].score);
  });

  it('passes filters to the index', async () => {
    await ingest(STREAMS_URL, STREAMS, ['node']);
    await ingest(VACUUM_URL, VACUUM, ['postgres']);

    const results = await retriever.search('how does backpressure work', 5, { tags: ['postgres'] });

    expect(results.map(r => r.sourceUrl)).toEqual([VACUUM_URL]);
  });

  it('drops hits whose record no longer exists', async () => {
    await ingest(STREAMS_URL, STREAMS, []);
    store.records.length = 0;

    expect(await retriever.search('how does backpressure work', 5)).toEqual([]);
  });

  it('returns nothing for k = 0 or a blank query without embedding', async () => {
    expect(await retriever.search('anything', 0)).toEqual([]);
    expect(await retriever.search('   ', 5)).toEqual([]);
    expect(embedder.calls).toHaveLength(0);
  });

  it('fails fast on an index built by another model', async () => {
    await index.setEmbeddingVersion('openai:other-model');

    await expect(retriever.search('how does backpressure work', 5)).rejects.toBeInstanceOf(EmbeddingVersionMismatch);
  });
});
