/**
 * Application wiring
 * Builds every service from settings; the API server, job CLI and scripts share it.
 */

import type postgres from 'postgres';
import type { PipelineSettings } from './config/settings.js';
import { getConnection } from './db/connection.js';
import { PostgresContentStore, type ContentStore } from './db/content-store.js';
import { MemoryVectorIndex } from './db/memory-vector-index.js';
import { PgVectorIndex } from './db/pg-vector-index.js';
import type { VectorIndex } from './db/vector-index.js';
import { ContentRetrievalOrchestrator } from './jobs/orchestrator.js';
import { OpenAIEmbeddingProvider, type EmbeddingProvider } from './providers/embedding.js';
import { OpenAIChatModel, type LanguageModel } from './providers/llm.js';
import { DisabledWebSearch, SearxngWebSearch, type WebSearch } from './providers/web-search.js';
import { Chunker } from './services/chunker.js';
import { AnswerComposer } from './services/composer.js';
import { HttpFetcher, type ContentFetcher } from './services/fetcher.js';
import { ChunkIndexer } from './services/indexer.js';
import { DeduplicationLedger } from './services/ledger.js';
import { ContentNormalizer } from './services/normalizer.js';
import { Retriever } from './services/retriever.js';
import { SourceManager } from './services/source-manager.js';
import { Summarizer } from './services/summarizer.js';

export interface AppContext {
  settings: PipelineSettings;
  store: ContentStore;
  index: VectorIndex;
  embedder: EmbeddingProvider;
  llm: LanguageModel;
  webSearch: WebSearch;
  fetcher: ContentFetcher;
  indexer: ChunkIndexer;
  retriever: Retriever;
  composer: AnswerComposer;
  summarizer: Summarizer;
  sources: SourceManager;
  orchestrator: ContentRetrievalOrchestrator;
}

/** Replaceable collaborators; anything omitted is built from settings */
export interface AppOverrides {
  sql?: postgres.Sql;
  store?: ContentStore;
  index?: VectorIndex;
  embedder?: EmbeddingProvider;
  llm?: LanguageModel;
  webSearch?: WebSearch;
  fetcher?: ContentFetcher;
}

export function createAppContext(settings: PipelineSettings, overrides: AppOverrides = {}): AppContext {
  const store = overrides.store ?? new PostgresContentStore(overrides.sql ?? getConnection());
  const index = overrides.index ?? (settings.vectorIndex === 'memory'
    ? new MemoryVectorIndex()
    : new PgVectorIndex(overrides.sql ?? getConnection()));

  const embedder = overrides.embedder ?? new OpenAIEmbeddingProvider({
    apiKey: settings.providers.openaiApiKey,
    model: settings.generation.embeddingModel,
  });
  const llm = overrides.llm ?? new OpenAIChatModel({
    apiKey: settings.providers.openaiApiKey,
    model: settings.generation.chatModel,
    temperature: settings.generation.temperature,
    maxTokens: settings.generation.maxTokens,
  });
  const webSearch = overrides.webSearch ?? (settings.providers.searxngUrl
    ? new SearxngWebSearch({ baseUrl: settings.providers.searxngUrl, timeoutMs: settings.fetch.timeoutMs })
    : new DisabledWebSearch());
  const fetcher = overrides.fetcher ?? new HttpFetcher(settings.fetch);

  const indexer = new ChunkIndexer({ index, store, embedder, chunker: new Chunker(settings.chunking) });
  const retriever = new Retriever({ index, store, embedder });
  const composer = new AnswerComposer(
    { retriever, webSearch, llm, store },
    { fusion: settings.fusion, confidence: settings.confidence, generation: settings.generation }
  );
  const summarizer = new Summarizer(store, llm, { timeoutMs: settings.generation.timeoutMs });
  const sources = new SourceManager(store, settings.ingestion.checkFrequencyHours);

  const orchestrator = new ContentRetrievalOrchestrator(
    {
      store,
      fetcher,
      normalizer: new ContentNormalizer(settings.classifier),
      ledger: new DeduplicationLedger(store),
      indexer,
      summarizer,
      sources,
    },
    settings.ingestion
  );

  return {
    settings,
    store,
    index,
    embedder,
    llm,
    webSearch,
    fetcher,
    indexer,
    retriever,
    composer,
    summarizer,
    sources,
    orchestrator,
  };
}
