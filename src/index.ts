/**
 * Knowledge Monitor - Main Entry Point
 * Monitors web sources, indexes their content and answers questions over it
 *
 * This module provides the main exports and entry points for:
 * - API server
 * - Ingestion and summary jobs
 * - Service classes
 */

// Load environment variables
import 'dotenv/config';
import { pathToFileURL } from 'url';

// Export core services
export { HttpFetcher, type ContentFetcher } from './services/fetcher.js';
export { ContentNormalizer } from './services/normalizer.js';
export { FeedParser } from './services/feed-parser.js';
export { DeduplicationLedger } from './services/ledger.js';
export { Chunker } from './services/chunker.js';
export { ChunkIndexer } from './services/indexer.js';
export { Retriever } from './services/retriever.js';
export { AnswerComposer } from './services/composer.js';
export { computeConfidence } from './services/confidence.js';
export { Summarizer } from './services/summarizer.js';
export { SourceManager } from './services/source-manager.js';

// Export providers
export { OpenAIEmbeddingProvider, type EmbeddingProvider } from './providers/embedding.js';
export { OpenAIChatModel, type LanguageModel } from './providers/llm.js';
export { SearxngWebSearch, DisabledWebSearch, type WebSearch } from './providers/web-search.js';

// Export job orchestrator
export { ContentRetrievalOrchestrator } from './jobs/orchestrator.js';
export { createAppContext, type AppContext } from './app-context.js';

// Export API server
export { createApp, startServer } from './api/server.js';

// Export storage
export { PostgresContentStore, type ContentStore } from './db/content-store.js';
export { PgVectorIndex } from './db/pg-vector-index.js';
export { MemoryVectorIndex } from './db/memory-vector-index.js';
export { getConnection, closeConnection, healthCheck } from './db/connection.js';
export type { ContentMetrics, QueryMetrics } from './db/metrics.js';

// Export configuration
export * from './config/constants.js';
export * from './config/database.js';
export { loadSettings, type PipelineSettings } from './config/settings.js';

// Export types
export type * from './types/index.js';
export * from './utils/errors.js';

// Export crypto utilities
export { computeContentHash, computeChunkFingerprint } from './utils/crypto.js';

// ============================================================================
// MAIN FUNCTION
// ============================================================================

import { createAppContext } from './app-context.js';
import { loadSettings } from './config/settings.js';
import { closeConnection, healthCheck } from './db/connection.js';

async function main(): Promise<number> {
  const command = process.argv[2];

  console.log('Knowledge Monitor v0.1.0');
  console.log('========================\n');

  switch (command) {
    case 'serve':
    case 'server':
    case 'api': {
      const { startServer } = await import('./api/server.js');
      const port = parseInt(process.env.PORT || '3000', 10);
      await startServer(port, createAppContext(loadSettings()));
      return 0;
    }

    case 'job': {
      const { runFromCLI } = await import('./jobs/orchestrator.js');
      try {
        return await runFromCLI(process.argv.slice(3), createAppContext(loadSettings()));
      } finally {
        await closeConnection();
      }
    }

    case 'migrate': {
      const { migrate } = await import('./db/migrate.js');
      try {
        const applied = await migrate();
        console.log(applied.length > 0 ? `Applied: ${applied.join(', ')}` : 'Schema is up to date');
        return 0;
      } finally {
        await closeConnection();
      }
    }

    case 'status':
    default: {
      try {
        return await showStatus();
      } finally {
        await closeConnection();
      }
    }
  }
}

async function showStatus(): Promise<number> {
  console.log('Checking database connection...');
  const isHealthy = await healthCheck();

  if (!isHealthy) {
    console.log('Database connection: FAILED');
    console.log('Check your database configuration in .env');
    return 1;
  }
  console.log('Database connection: OK\n');

  const { migrationStatus } = await import('./db/migrate.js');
  const migrations = await migrationStatus();
  if (migrations.pending.length > 0) {
    console.log(`Pending migrations: ${migrations.pending.join(', ')}`);
    console.log('Run migrations: npm run migrate');
    return 1;
  }

  const context = createAppContext(loadSettings());
  const stats = await context.store.getStats();
  const chunks = await context.index.count();
  const embeddingVersion = await context.index.getEmbeddingVersion();

  console.log('Counts:');
  console.log(`  sources:        ${stats.sources} (${stats.activeSources} active, ${stats.failingSources} failing)`);
  console.log(`  records:        ${stats.records}`);
  console.log(`  chunks:         ${chunks}`);
  console.log(`  queries:        ${stats.queries}`);
  console.log(`  avg feedback:   ${stats.averageFeedback?.toFixed(2) ?? 'n/a'}`);
  console.log(`\nEmbedding version: ${embeddingVersion ?? 'unstamped'}`);

  console.log('\n---');
  console.log('Commands:');
  console.log('  npm run dev                 - Start API server in development mode');
  console.log('  npm run serve               - Start API server');
  console.log('  npm run job -- due          - Ingest sources that are due');
  console.log('  npm run job -- daily        - Daily summary');
  console.log('  npm run job -- help         - All job commands');
  return 0;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Error:', error);
      process.exit(1);
    });
}
