import { describe, it, expect, beforeEach } from 'vitest';
import { once } from 'events';
import { createApp, startServer, statusForError } from './server.js';
import { createAppContext, type AppContext } from '../app-context.js';
import { loadSettings } from '../config/settings.js';
import { MemoryVectorIndex } from '../db/memory-vector-index.js';
import { MemoryContentStore } from '../__mocks__/memory-content-store.js';
import { FakeEmbedder } from '../__mocks__/fake-embedder.js';
import { FakeFetcher } from '../__mocks__/fake-fetcher.js';
import { FakeLanguageModel } from '../__mocks__/fake-llm.js';
import { FakeWebSearch } from '../__mocks__/fake-web-search.js';
import {
  ConfigurationError,
  EmbeddingVersionMismatch,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';

describe('statusForError', () => {
  it('maps pipeline errors to HTTP statuses', () => {
    expect(statusForError(new ValidationError('bad'))).toBe(400);
    expect(statusForError(new NotFoundError('gone'))).toBe(404);
    expect(statusForError(new EmbeddingVersionMismatch('a:v1', 'b:v2'))).toBe(503);
    expect(statusForError(new ConfigurationError('missing key'))).toBe(500);
    expect(statusForError(new Error('boom'))).toBe(500);
  });
});

describe('API', () => {
  let context: AppContext;

  beforeEach(() => {
    context = createAppContext(loadSettings({}), {
      store: new MemoryContentStore(),
      index: new MemoryVectorIndex(),
      embedder: new FakeEmbedder(),
      llm: new FakeLanguageModel(),
      webSearch: new FakeWebSearch(),
      fetcher: new FakeFetcher(),
    });
  });

  /** Serves the app on an ephemeral loopback port for the duration of `fn` */
  async function withServer(fn: (base: string) => Promise<void>): Promise<void> {
    const server = createApp(context).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') {
      server.close();
      throw new Error('Server has no TCP address');
    }
    try {
      await fn(`http://127.0.0.1:${address.port}/api/v1`);
    } finally {
      await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
    }
  }

  const post = (url: string, body: unknown) =>
    fetch(url, { method: 'POST', headers: { 'content-type': 'application/json' }, body: JSON.stringify(body) });

  it('reports health', async () => {
    await withServer(async base => {
      const res = await fetch(`${base}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'healthy', database: 'connected' });
    });
  });

  it('registers and lists sources', async () => {
    await withServer(async base => {
      const created = await post(`${base}/sources`, { url: 'https://example.com/blog/', tags: ['Node'] });
      expect(created.status).toBe(201);
      expect(await created.json()).toMatchObject({ url: 'https://example.com/blog', tags: ['node'], addedBy: 'api' });

      const listed = await fetch(`${base}/sources?tag=node`);
      expect(await listed.json()).toMatchObject({ count: 1 });
    });
  });

  it('rejects invalid bodies with 400', async () => {
    await withServer(async base => {
      const res = await post(`${base}/ask`, { question: '' });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'VALIDATION' });
    });
  });

  it('answers with low confidence when nothing is indexed', async () => {
    await withServer(async base => {
      const res = await post(`${base}/ask`, { question: 'How do streams handle backpressure?' });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ confidence: 'LOW', citations: [], degraded: false });
    });
  });

  it('reports query and content metrics', async () => {
    await withServer(async base => {
      await post(`${base}/ask`, { question: 'How do streams handle backpressure?' });

      const res = await fetch(`${base}/metrics?days=7`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        days: 7,
        query: {
          totalQueries: 1,
          confidenceDistribution: { HIGH: 0, MEDIUM: 0, LOW: 1 },
          highConfidenceRate: 0,
          feedbackCount: 0,
          satisfactionRate: null,
          feedbackResponseRate: 0,
        },
        content: {
          monitoredSources: 0,
          averageFreshness: 0,
          sourcesWithRecentUpdates: 0,
          checkedSources: 0,
          successfulChecks: 0,
          retrievalSuccessRate: null,
        },
      });

      expect((await fetch(`${base}/metrics?days=0`)).status).toBe(400);
    });
  });

  it('refuses to start against an index built by another embedding model', async () => {
    await context.index.setEmbeddingVersion('openai:old-model');

    await expect(startServer(0, context)).rejects.toBeInstanceOf(EmbeddingVersionMismatch);
  });

  it('returns 404 for unknown queries and records', async () => {
    await withServer(async base => {
      const feedback = await post(`${base}/queries/00000000-0000-0000-0000-000000000000/feedback`, { score: 4 });
      expect(feedback.status).toBe(404);

      const record = await fetch(`${base}/records?sourceUrl=${encodeURIComponent('https://example.com/none')}`);
      expect(record.status).toBe(404);
    });
  });
});
