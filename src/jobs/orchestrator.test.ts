import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ContentRetrievalOrchestrator, formatSummary, runFromCLI, type OrchestratorOptions } from './orchestrator.js';
import { createAppContext } from '../app-context.js';
import { loadSettings } from '../config/settings.js';
import { MemoryVectorIndex } from '../db/memory-vector-index.js';
import { Chunker } from '../services/chunker.js';
import { ChunkIndexer } from '../services/indexer.js';
import { DeduplicationLedger } from '../services/ledger.js';
import { ContentNormalizer } from '../services/normalizer.js';
import { SourceManager } from '../services/source-manager.js';
import { Summarizer } from '../services/summarizer.js';
import { MemoryContentStore } from '../__mocks__/memory-content-store.js';
import { FakeEmbedder } from '../__mocks__/fake-embedder.js';
import { FakeFetcher } from '../__mocks__/fake-fetcher.js';
import { FakeLanguageModel } from '../__mocks__/fake-llm.js';
import { FakeWebSearch } from '../__mocks__/fake-web-search.js';
import { Retriever } from '../services/retriever.js';
import { ConfigurationError, EmbeddingVersionMismatch, NotFoundError } from '../utils/errors.js';
import type { SourceCheckUpdate } from '../types/index.js';

const BLOG = 'https://example.com/blog';
const POST = 'https://example.com/articles/streams';
const DAY_MS = 24 * 60 * 60 * 1000;

const postUrl = (n: number) => `${BLOG}/post-${n}`;

class FailingEmbedder extends FakeEmbedder {
  constructor(private readonly error: Error) {
    super();
  }

  override async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    throw this.error;
  }
}

class BrokenCheckStore extends MemoryContentStore {
  constructor(private readonly brokenUrl: string) {
    super();
  }

  override async recordCheck(url: string, update: SourceCheckUpdate): Promise<void> {
    if (url === this.brokenUrl) throw new Error('status write failed');
    return super.recordCheck(url, update);
  }
}

function blogIndex(count: number): string {
  const items = Array.from({ length: count }, (_, i) => `<li><a href="/blog/post-${i + 1}">Post ${i + 1}</a></li>`);
  return `<html><head><title>Blog</title></head><body><main><h1>All posts</h1><ul>${items.join('')}</ul></main></body></html>`;
}

function article(title: string, body: string): string {
  return `<html><head><title>${title}</title></head><body><main><p>${body}</p></main></body></html>`;
}

const V1 = 'Readable streams buffer data until the consumer asks for more, and pipes connect them to writable streams.';
const V2 = 'Writable streams signal a full buffer by returning false, and producers wait for the drain event before writing.';

describe('ContentRetrievalOrchestrator', () => {
  let store: MemoryContentStore;
  let index: MemoryVectorIndex;
  let embedder: FakeEmbedder;
  let fetcher: FakeFetcher;
  let llm: FakeLanguageModel;
  let sources: SourceManager;

  const build = (options: Partial<OrchestratorOptions> = {}) =>
    new ContentRetrievalOrchestrator(
      {
        store,
        fetcher,
        normalizer: new ContentNormalizer(),
        ledger: new DeduplicationLedger(store),
        indexer: new ChunkIndexer({ index, store, embedder, chunker: new Chunker() }),
        summarizer: new Summarizer(store, llm),
        sources,
      },
      options
    );

  beforeEach(() => {
    store = new MemoryContentStore();
    index = new MemoryVectorIndex();
    embedder = new FakeEmbedder();
    fetcher = new FakeFetcher();
    llm = new FakeLanguageModel();
    sources = new SourceManager(store);
    for (let n = 1; n <= 5; n++) {
      fetcher.serve(postUrl(n), article(`Post ${n}`, `Post ${n} walks through one idea about streams and buffers in enough words to count as a body.`));
    }
  });

  describe('index pages', () => {
    it('indexes nothing for the listing and ingests each discovered post', async () => {
      await sources.addSource({ url: BLOG, typeHint: 'blog_index', tags: ['Node'], checkFrequencyHours: 6 });
      fetcher.serve(BLOG, blogIndex(5));

      const outcome = await build().runIngestionCycle(BLOG);

      expect(outcome.finalState).toBe('DONE');
      expect(outcome.contentKind).toBe('INDEX');
      expect(outcome.transitions).toEqual(['PENDING', 'FETCHING', 'NORMALIZING', 'SKIP', 'DONE']);
      expect(outcome.chunksIndexed).toBe(0);
      expect(outcome.deferredFollowUps).toBe(0);
      expect(await index.count(BLOG)).toBe(0);
      expect(store.records.filter(r => r.sourceUrl === BLOG)).toHaveLength(0);

      expect(outcome.followUps.map(f => f.sourceUrl)).toEqual([1, 2, 3, 4, 5].map(postUrl));
      for (const followUp of outcome.followUps) {
        expect(followUp.finalState).toBe('DONE');
        expect(followUp.decision).toBe('NEW');
        expect(followUp.chunksIndexed).toBe(1);
      }

      const registered = await store.getSource(postUrl(1));
      expect(registered).toMatchObject({
        typeHint: 'blog_post',
        tags: ['node'],
        checkFrequencyHours: 6,
        addedBy: 'follow-up',
        parentUrl: BLOG,
      });
      expect(await index.count()).toBe(5);
    });

    it('reports a failing post without failing the listing or its siblings', async () => {
      store = new BrokenCheckStore(postUrl(2));
      sources = new SourceManager(store);
      await sources.addSource({ url: BLOG, typeHint: 'blog_index' });
      fetcher.serve(BLOG, blogIndex(3));

      const outcome = await build().runIngestionCycle(BLOG);

      expect(outcome.finalState).toBe('DONE');
      expect(outcome.followUps.map(f => f.finalState)).toEqual(['DONE', 'FAILED', 'DONE']);
      expect(outcome.followUps[1]).toMatchObject({ sourceUrl: postUrl(2), error: 'status write failed' });
      expect(await index.count(postUrl(3))).toBe(1);
    });

    it('registers at most maxFollowUpsPerRun posts per run', async () => {
      await sources.addSource({ url: BLOG });
      fetcher.serve(BLOG, blogIndex(5));

      const outcome = await build({ maxFollowUpsPerRun: 3 }).runIngestionCycle(BLOG);

      expect(outcome.followUps.map(f => f.sourceUrl)).toEqual([1, 2, 3].map(postUrl));
      expect(outcome.deferredFollowUps).toBe(2);
      expect(store.sources.size).toBe(4);
    });

    it('leaves already monitored posts to their own schedule', async () => {
      await sources.addSource({ url: BLOG });
      await sources.addSource({ url: postUrl(1) });
      fetcher.serve(BLOG, blogIndex(3));

      const outcome = await build().runIngestionCycle(BLOG);

      expect(outcome.followUps.map(f => f.sourceUrl)).toEqual([postUrl(2), postUrl(3)]);
      expect(fetcher.requests).not.toContain(postUrl(1));
    });
  });

  describe('articles', () => {
    beforeEach(async () => {
      await sources.addSource({ url: POST, tags: ['streams'] });
    });

    it('stores and indexes new content', async () => {
      fetcher.serve(POST, { body: article('Streams', V1), lastModified: new Date('2026-03-01T00:00:00Z') });

      const outcome = await build().runIngestionCycle(POST);

      expect(outcome.transitions).toEqual(['PENDING', 'FETCHING', 'NORMALIZING', 'DEDUPING', 'INDEXING', 'DONE']);
      expect(outcome.decision).toBe('NEW');
      expect(outcome.recordId).toBe(store.records[0].id);
      expect(store.records[0]).toMatchObject({ sourceUrl: POST, title: 'Streams', text: V1, contentKind: 'ARTICLE' });
      expect(store.records[0].metadata).toMatchObject({ httpStatus: 200, finalUrl: POST });
      expect(await index.getActiveGeneration(POST)).toBe(store.records[0].fingerprint);

      const source = await store.getSource(POST);
      expect(source?.lastStatus).toBe('DONE');
      expect(source?.lastModifiedAt).toEqual(new Date('2026-03-01T00:00:00Z'));
    });

    it('skips identical content without embedding again', async () => {
      fetcher.serve(POST, article('Streams', V1));
      const orchestrator = build();
      await orchestrator.runIngestionCycle(POST);
      await store.recordCheck(POST, { lastCheckedAt: new Date(0), lastStatus: 'DONE' });

      const outcome = await orchestrator.runIngestionCycle(POST);

      expect(outcome.decision).toBe('UNCHANGED');
      expect(outcome.skippedReason).toBe('unchanged');
      expect(outcome.transitions).toEqual(['PENDING', 'FETCHING', 'NORMALIZING', 'DEDUPING', 'SKIP', 'DONE']);
      expect(embedder.calls).toHaveLength(1);
      expect(store.records).toHaveLength(1);
      expect((await store.getSource(POST))?.lastCheckedAt?.getTime()).toBeGreaterThan(0);
    });

    it('replaces the indexed generation when content changes', async () => {
      const orchestrator = build();
      fetcher.serve(POST, article('Streams', V1));
      await orchestrator.runIngestionCycle(POST);
      fetcher.serve(POST, article('Streams', V2));

      const outcome = await orchestrator.runIngestionCycle(POST);

      expect(outcome.decision).toBe('CHANGED');
      expect(store.records).toHaveLength(2);
      expect(await index.getActiveGeneration(POST)).toBe(store.records[1].fingerprint);
      expect(await index.count(POST)).toBe(1);
    });

    it('keeps indexed content when a fetch fails', async () => {
      const orchestrator = build();
      fetcher.serve(POST, article('Streams', V1));
      await orchestrator.runIngestionCycle(POST);
      fetcher.fail(POST, 503);

      const outcome = await orchestrator.runIngestionCycle(POST);

      expect(outcome.finalState).toBe('FAILED');
      expect(outcome.transitions).toEqual(['PENDING', 'FETCHING', 'FAILED']);
      expect(outcome.error).toBe('HTTP 503');
      expect(await index.count(POST)).toBe(1);
      expect(await index.getActiveGeneration(POST)).toBe(store.records[0].fingerprint);

      const source = await store.getSource(POST);
      expect(source).toMatchObject({ lastStatus: 'FAILED', lastError: 'HTTP 503', errorCount: 1 });
    });

    it('re-indexes unchanged content whose chunks went missing', async () => {
      const orchestrator = build();
      fetcher.serve(POST, article('Streams', V1));
      await orchestrator.runIngestionCycle(POST);
      await index.deleteGeneration(POST, store.records[0].fingerprint);

      const outcome = await orchestrator.runIngestionCycle(POST);

      expect(outcome.decision).toBe('UNCHANGED');
      expect(outcome.transitions).toContain('INDEXING');
      expect(outcome.chunksIndexed).toBe(1);
      expect(store.records).toHaveLength(1);
      expect(await index.count(POST)).toBe(1);
    });

    it('re-indexes when the source is flagged and clears the flag', async () => {
      const orchestrator = build();
      fetcher.serve(POST, article('Streams', V1));
      await orchestrator.runIngestionCycle(POST);
      await store.updateSource(POST, { needsReindex: true });

      const outcome = await orchestrator.runIngestionCycle(POST);

      expect(outcome.chunksIndexed).toBe(1);
      expect(embedder.calls).toHaveLength(2);
      expect((await store.getSource(POST))?.needsReindex).toBe(false);
    });

    it('refreshes indexed tags when the source tags change', async () => {
      const orchestrator = build();
      fetcher.serve(POST, article('Streams', V1));
      await orchestrator.runIngestionCycle(POST);
      await sources.updateSource(POST, { tags: ['Buffers'] });

      const outcome = await orchestrator.runIngestionCycle(POST);

      expect(outcome.decision).toBe('UNCHANGED');
      expect(embedder.calls).toHaveLength(1);
      const retriever = new Retriever({ index, store, embedder });
      expect(await retriever.search('readable streams', 5, { tags: ['buffers'] })).toHaveLength(1);
      expect(await retriever.search('readable streams', 5, { tags: ['streams'] })).toHaveLength(0);
    });

    it('flags the source for re-indexing when indexing fails', async () => {
      embedder = new FailingEmbedder(new Error('embedding service unavailable'));
      fetcher.serve(POST, article('Streams', V1));

      const outcome = await build().runIngestionCycle(POST);

      expect(outcome.finalState).toBe('FAILED');
      expect(outcome.transitions).toEqual(['PENDING', 'FETCHING', 'NORMALIZING', 'DEDUPING', 'INDEXING', 'FAILED']);
      expect(store.records).toHaveLength(1);
      expect(await store.getSource(POST)).toMatchObject({ lastStatus: 'FAILED', needsReindex: true });
    });

    it('refuses to ingest into an index built by another embedding model', async () => {
      await index.setEmbeddingVersion('other:v0');
      fetcher.serve(POST, article('Streams', V1));

      await expect(build().runIngestionCycle(POST)).rejects.toBeInstanceOf(EmbeddingVersionMismatch);

      expect(fetcher.requests).toEqual([]);
      expect(store.records).toHaveLength(0);
      expect(await store.getSource(POST)).toMatchObject({ lastStatus: null, needsReindex: false });
    });

    it('stops the cycle on configuration errors raised while indexing', async () => {
      embedder = new FailingEmbedder(new ConfigurationError('embedding API key missing'));
      fetcher.serve(POST, article('Streams', V1));

      await expect(build().runIngestionCycle(POST)).rejects.toBeInstanceOf(ConfigurationError);
      expect((await store.getSource(POST))?.lastStatus).not.toBe('FAILED');
    });

    it('skips pages without text', async () => {
      fetcher.serve(POST, '<html><body><main></main></body></html>');

      const outcome = await build().runIngestionCycle(POST);

      expect(outcome.skippedReason).toBe('empty');
      expect(store.records).toHaveLength(0);
    });

    it('skips inactive sources without fetching', async () => {
      await sources.deactivateSource(POST);

      const outcome = await build().runIngestionCycle(POST);

      expect(outcome.skippedReason).toBe('inactive');
      expect(outcome.transitions).toEqual(['PENDING', 'SKIP', 'DONE']);
      expect(fetcher.requests).toEqual([]);
    });
  });

  it('rejects sources that are not monitored', async () => {
    await expect(build().runIngestionCycle('https://example.com/unknown')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('serializes concurrent runs for the same source', async () => {
    await sources.addSource({ url: POST });
    fetcher.serve(POST, article('Streams', V1));
    const orchestrator = build();

    const [first, second] = await Promise.all([
      orchestrator.runIngestionCycle(POST),
      orchestrator.runIngestionCycle(POST),
    ]);

    expect(first.decision).toBe('NEW');
    expect(second.decision).toBe('UNCHANGED');
    expect(store.records).toHaveLength(1);
  });

  it('runs only the sources that are due', async () => {
    const now = new Date();
    await sources.addSource({ url: POST });
    await sources.addSource({ url: postUrl(1) });
    await store.recordCheck(postUrl(1), { lastCheckedAt: now, lastStatus: 'DONE' });
    fetcher.serve(POST, article('Streams', V1));

    const summary = await build().runDueSources(now);

    expect(fetcher.requests).toEqual([POST]);
    expect(summary).toMatchObject({ sourcesProcessed: 1, recordsCreated: 1, chunksIndexed: 1, failures: 0 });
    expect(formatSummary(summary).split('\n')).toEqual([
      'Sources processed: 1',
      'Records created:   1',
      'Chunks indexed:    1',
      'Failures:          0',
    ]);
  });

  it('runs no due source against an index built by another embedding model', async () => {
    await index.setEmbeddingVersion('openai:old-model');
    for (const n of [1, 2, 3]) await sources.addSource({ url: postUrl(n) });

    await expect(build().runDueSources(new Date())).rejects.toBeInstanceOf(EmbeddingVersionMismatch);

    expect(fetcher.requests).toEqual([]);
    expect(store.records).toHaveLength(0);
    for (const n of [1, 2, 3]) {
      expect((await store.getSource(postUrl(n)))?.needsReindex).toBe(false);
    }
  });

  it('registers unknown URLs on manual ingestion', async () => {
    fetcher.serve('https://example.com/notes', article('Notes', V1));

    const outcome = await build().ingestUrl('https://example.com/notes/', ['b', 'A']);

    expect(outcome.decision).toBe('NEW');
    expect(await store.getSource('https://example.com/notes')).toMatchObject({ addedBy: 'manual', tags: ['a', 'b'] });
  });

  it('prunes records past the retention horizon with their chunks', async () => {
    await sources.addSource({ url: POST });
    fetcher.serve(POST, article('Streams', V1));
    const orchestrator = build({ maxContentAgeDays: 30 });
    await orchestrator.runIngestionCycle(POST);

    const result = await orchestrator.runPrune(new Date(Date.now() + 31 * DAY_MS));

    expect(result).toEqual({ recordsDeleted: 1, chunksDeleted: 1, sourcesDeactivated: [POST] });
    expect(await index.count()).toBe(0);
  });

  it('summarizes the last day of content', async () => {
    await sources.addSource({ url: POST });
    fetcher.serve(POST, article('Streams', V1));
    const orchestrator = build();
    await orchestrator.runIngestionCycle(POST);

    const summary = await orchestrator.runDailySummary();

    expect(summary.summary).toBe('Fake answer [1]');
    expect(summary.contentCount).toBe(1);
    expect(summary.degraded).toBe(false);
  });
});

describe('runFromCLI', () => {
  const context = () => {
    const fetcher = new FakeFetcher().serve('https://example.com/notes', article('Notes', V1));
    return createAppContext(loadSettings({}), {
      store: new MemoryContentStore(),
      index: new MemoryVectorIndex(),
      embedder: new FakeEmbedder(),
      llm: new FakeLanguageModel(),
      webSearch: new FakeWebSearch(),
      fetcher,
    });
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    return () => vi.restoreAllMocks();
  });

  it('prints usage for help', async () => {
    expect(await runFromCLI(['help'], context())).toBe(0);
    expect(await runFromCLI(['bogus'], context())).toBe(1);
  });

  it('ingests a URL', async () => {
    const ctx = context();

    expect(await runFromCLI(['ingest', 'https://example.com/notes', 'streams'], ctx)).toBe(0);
    expect((await ctx.store.getSource('https://example.com/notes'))?.tags).toEqual(['streams']);
    expect(await ctx.index.count()).toBe(1);
  });

  it('rejects a non-positive day count', async () => {
    expect(await runFromCLI(['topic', 'streams', '0'], context())).toBe(1);
  });
});
