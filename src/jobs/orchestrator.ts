/**
 * Content Retrieval Orchestrator
 * Runs ingestion cycles for monitored sources and the periodic maintenance jobs
 *
 * Per-source state machine:
 *   PENDING -> FETCHING -> NORMALIZING -> DEDUPING -> INDEXING | SKIP -> DONE
 *   any step may end in FAILED
 *
 * Scheduled jobs:
 * - due       - every active source whose check interval has elapsed
 * - prune     - drop records (and their chunks) past the retention horizon
 * - daily     - daily summary of new content
 * - topic     - topic summary over the last N days
 */

import type { AppContext } from '../app-context.js';
import { INGESTION_DEFAULTS } from '../config/constants.js';
import type { ContentStore } from '../db/content-store.js';
import type { ChunkIndexer, PruneResult } from '../services/indexer.js';
import type { ContentFetcher, FetchedPage } from '../services/fetcher.js';
import type { DeduplicationLedger } from '../services/ledger.js';
import type { ContentNormalizer, NormalizedContent } from '../services/normalizer.js';
import type { ContentSummary, Summarizer } from '../services/summarizer.js';
import type { SourceManager } from '../services/source-manager.js';
import type {
  ContentRecord,
  IngestionOutcome,
  IngestionState,
  IngestionSummary,
  MonitoredSource,
} from '../types/index.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { NotFoundError, errorMessage, isFatal } from '../utils/errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { createLogger } from '../utils/logger.js';
import { canonicalizeUrl } from '../utils/url.js';

const log = createLogger('orchestrator');

// ============================================================================
// TYPES
// ============================================================================

export interface OrchestratorDeps {
  store: ContentStore;
  fetcher: ContentFetcher;
  normalizer: ContentNormalizer;
  ledger: DeduplicationLedger;
  indexer: ChunkIndexer;
  summarizer: Summarizer;
  sources: SourceManager;
}

export interface OrchestratorOptions {
  maxFollowUpsPerRun: number;
  ingestConcurrency: number;
  maxContentAgeDays: number;
}

/** Mutable trace of one run, turned into an IngestionOutcome at the end */
class CycleTrace {
  readonly transitions: IngestionState[] = ['PENDING'];
  readonly startedAt = Date.now();
  contentKind: IngestionOutcome['contentKind'] = null;
  decision: IngestionOutcome['decision'] = null;
  recordId: string | null = null;
  chunksIndexed = 0;
  skippedReason: IngestionOutcome['skippedReason'] = null;
  followUpTargets: string[] = [];

  constructor(readonly sourceUrl: string) {}

  enter(state: IngestionState): void {
    this.transitions.push(state);
  }

  finish(finalState: 'DONE' | 'FAILED', error: string | null = null): IngestionOutcome {
    this.enter(finalState);
    return {
      sourceUrl: this.sourceUrl,
      finalState,
      transitions: [...this.transitions],
      contentKind: this.contentKind,
      decision: this.decision,
      recordId: this.recordId,
      chunksIndexed: this.chunksIndexed,
      followUps: [],
      deferredFollowUps: 0,
      skippedReason: this.skippedReason,
      error,
      durationMs: Date.now() - this.startedAt,
    };
  }
}

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class ContentRetrievalOrchestrator {
  private readonly locks = new KeyedMutex();
  private readonly options: OrchestratorOptions;

  constructor(private readonly deps: OrchestratorDeps, options: Partial<OrchestratorOptions> = {}) {
    this.options = {
      maxFollowUpsPerRun: options.maxFollowUpsPerRun ?? INGESTION_DEFAULTS.maxFollowUpsPerRun,
      ingestConcurrency: options.ingestConcurrency ?? INGESTION_DEFAULTS.ingestConcurrency,
      maxContentAgeDays: options.maxContentAgeDays ?? INGESTION_DEFAULTS.maxContentAgeDays,
    };
  }

  /**
   * One ingestion cycle for a source. Runs for the same source are serialized;
   * follow-ups discovered on index pages and feeds run after the parent's lock
   * is released. Rejects, before fetching anything, when the vector index was
   * built with another embedding model.
   */
  async runIngestionCycle(source: MonitoredSource | string): Promise<IngestionOutcome> {
    await this.deps.indexer.assertCompatible();
    return this.runCycle(typeof source === 'string' ? source : source.url, true);
  }

  private async runCycle(url: string, followLinks: boolean): Promise<IngestionOutcome> {
    const sourceUrl = canonicalizeUrl(url);
    const { outcome, followUpTargets } = await this.locks.runExclusive(sourceUrl, async () => {
      const trace = new CycleTrace(sourceUrl);
      const result = await this.runLocked(trace);
      return { outcome: result, followUpTargets: trace.followUpTargets };
    });

    if (followUpTargets.length > 0 && outcome.finalState === 'DONE') {
      await this.runFollowUps(sourceUrl, followUpTargets, outcome, followLinks);
    }
    return outcome;
  }

  /**
   * runCycle with non-fatal errors (a store failure while recording the
   * outcome, a source removed meanwhile) turned into a FAILED outcome.
   */
  private async runIsolated(url: string, followLinks: boolean): Promise<IngestionOutcome> {
    try {
      return await this.runCycle(url, followLinks);
    } catch (error) {
      if (isFatal(error)) throw error;
      log.error({ sourceUrl: url, error: errorMessage(error) }, 'Ingestion cycle aborted');
      return new CycleTrace(canonicalizeUrl(url)).finish('FAILED', errorMessage(error));
    }
  }

  private async runLocked(trace: CycleTrace): Promise<IngestionOutcome> {
    const { store } = this.deps;

    // Re-read under the lock: activation may have changed since scheduling
    const source = await store.getSource(trace.sourceUrl);
    if (!source) {
      throw new NotFoundError(`Source not monitored: ${trace.sourceUrl}`);
    }
    if (!source.isActive) {
      trace.skippedReason = 'inactive';
      trace.enter('SKIP');
      log.debug({ sourceUrl: source.url }, 'Skipping inactive source');
      return trace.finish('DONE');
    }

    // FETCHING
    trace.enter('FETCHING');
    let page: FetchedPage;
    try {
      page = await this.deps.fetcher.fetch(source.url);
    } catch (error) {
      return this.fail(trace, error);
    }

    // NORMALIZING
    trace.enter('NORMALIZING');
    let content: NormalizedContent;
    try {
      content = this.deps.normalizer.normalize({
        url: source.url,
        body: page.body,
        contentType: page.contentType,
        typeHint: source.typeHint,
      });
    } catch (error) {
      return this.fail(trace, error);
    }
    trace.contentKind = content.kind;

    if (content.kind === 'INDEX' || content.kind === 'FEED') {
      trace.followUpTargets = content.followUps;
      trace.enter('SKIP');
      await store.recordCheck(source.url, { lastCheckedAt: new Date(), lastStatus: 'DONE', lastError: null });
      log.info({ sourceUrl: source.url, kind: content.kind, links: content.followUps.length }, 'Listing page processed');
      return trace.finish('DONE');
    }

    if (content.text.length === 0) {
      trace.skippedReason = 'empty';
      trace.enter('SKIP');
      await store.recordCheck(source.url, { lastCheckedAt: new Date(), lastStatus: 'DONE', lastError: null });
      log.warn({ sourceUrl: source.url }, 'No extractable text');
      return trace.finish('DONE');
    }

    // DEDUPING
    trace.enter('DEDUPING');
    let record: ContentRecord;
    try {
      const verdict = await this.deps.ledger.decide(source.url, content.text);
      trace.decision = verdict.decision;

      if (verdict.decision === 'UNCHANGED' && verdict.previous) {
        const drifted = source.needsReindex || !(await this.deps.indexer.verify(source.url, verdict.previous));
        if (!drifted) {
          await this.deps.indexer.retag(source.url, source.tags);
          trace.skippedReason = 'unchanged';
          trace.recordId = verdict.previous.id;
          trace.enter('SKIP');
          await store.recordCheck(source.url, { lastCheckedAt: new Date(), lastStatus: 'DONE', lastError: null });
          log.debug({ sourceUrl: source.url }, 'Content unchanged');
          return trace.finish('DONE');
        }
        log.warn({ sourceUrl: source.url, needsReindex: source.needsReindex }, 'Index drift detected, re-indexing current record');
        record = verdict.previous;
      } else {
        record = await store.insertRecord({
          sourceUrl: source.url,
          title: content.title,
          text: content.text,
          fingerprint: verdict.fingerprint,
          publishedAt: content.publishedAt,
          wordCount: countWords(content.text),
          contentKind: content.kind,
          metadata: { ...content.metadata, httpStatus: page.status, finalUrl: page.finalUrl },
        });
      }
      trace.recordId = record.id;
    } catch (error) {
      return this.fail(trace, error);
    }

    // INDEXING
    trace.enter('INDEXING');
    try {
      const result = await this.deps.indexer.index(record, source.tags);
      trace.chunksIndexed = result.chunksIndexed;
    } catch (error) {
      return this.fail(trace, error, true);
    }

    await store.recordCheck(source.url, {
      lastCheckedAt: new Date(),
      lastStatus: 'DONE',
      lastError: null,
      lastModifiedAt: trace.decision === 'UNCHANGED' ? undefined : page.lastModified ?? new Date(),
      needsReindex: false,
    });
    log.info({
      sourceUrl: source.url,
      decision: trace.decision,
      recordId: record.id,
      chunks: trace.chunksIndexed,
    }, 'Source ingested');
    return trace.finish('DONE');
  }

  private async fail(trace: CycleTrace, error: unknown, needsReindex?: boolean): Promise<IngestionOutcome> {
    if (isFatal(error)) throw error;
    const message = errorMessage(error);
    log.error({ sourceUrl: trace.sourceUrl, state: trace.transitions[trace.transitions.length - 1], error: message }, 'Ingestion failed');
    await this.deps.store.recordCheck(trace.sourceUrl, {
      lastCheckedAt: new Date(),
      lastStatus: 'FAILED',
      lastError: message,
      needsReindex,
    });
    return trace.finish('FAILED', message);
  }

  /**
   * Register targets that are not yet monitored (bounded per run) and ingest
   * them. Targets over the bound are left for the next run of the parent.
   */
  private async runFollowUps(
    parentUrl: string,
    targets: string[],
    outcome: IngestionOutcome,
    followLinks: boolean
  ): Promise<void> {
    const parent = await this.deps.store.getSource(parentUrl);
    if (!parent) return;

    const unknown: string[] = [];
    for (const target of targets) {
      if (!(await this.deps.store.getSource(target))) unknown.push(target);
    }

    if (!followLinks) {
      outcome.deferredFollowUps = unknown.length;
      return;
    }

    const selected = unknown.slice(0, this.options.maxFollowUpsPerRun);
    outcome.deferredFollowUps = unknown.length - selected.length;

    for (const target of selected) {
      await this.deps.sources.addSource({
        url: target,
        typeHint: 'blog_post',
        tags: parent.tags,
        checkFrequencyHours: parent.checkFrequencyHours,
        addedBy: 'follow-up',
        parentUrl: parent.url,
      });
    }

    outcome.followUps = await mapWithConcurrency(
      selected,
      this.options.ingestConcurrency,
      target => this.runIsolated(target, false)
    );

    log.info({
      parentUrl,
      discovered: targets.length,
      registered: selected.length,
      deferred: outcome.deferredFollowUps,
    }, 'Follow-ups processed');
  }

  // ==========================================================================
  // SCHEDULED JOBS
  // ==========================================================================

  /**
   * Ingest every active source whose check interval has elapsed.
   */
  async runDueSources(now: Date = new Date()): Promise<IngestionSummary> {
    const startedAt = new Date();
    await this.deps.indexer.assertCompatible();
    const due = await this.deps.store.getDueSources(now);
    log.info({ due: due.length }, 'Starting scheduled ingestion');

    const outcomes = await mapWithConcurrency(
      due,
      this.options.ingestConcurrency,
      source => this.runIsolated(source.url, true)
    );

    const summary = summarize(startedAt, outcomes);
    log.info({
      sourcesProcessed: summary.sourcesProcessed,
      recordsCreated: summary.recordsCreated,
      chunksIndexed: summary.chunksIndexed,
      failures: summary.failures,
    }, 'Scheduled ingestion complete');
    return summary;
  }

  /**
   * Register the URL if it is not monitored yet, then run a cycle for it.
   */
  async ingestUrl(url: string, tags: string[] = []): Promise<IngestionOutcome> {
    await this.deps.indexer.assertCompatible();
    const existing = await this.deps.store.getSource(canonicalizeUrl(url));
    const source = existing ?? await this.deps.sources.addSource({ url, tags, addedBy: 'manual' });
    return this.runCycle(source.url, true);
  }

  async runPrune(now: Date = new Date()): Promise<PruneResult> {
    const olderThan = new Date(now.getTime() - this.options.maxContentAgeDays * 24 * 60 * 60 * 1000);
    return this.deps.indexer.prune(olderThan);
  }

  async runDailySummary(topic?: string): Promise<ContentSummary> {
    return this.deps.summarizer.createDailySummary(topic);
  }

  async runTopicSummary(topic: string, days?: number): Promise<ContentSummary> {
    return this.deps.summarizer.createTopicSummary(topic, days);
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

function flatten(outcomes: IngestionOutcome[]): IngestionOutcome[] {
  return outcomes.flatMap(outcome => [outcome, ...flatten(outcome.followUps)]);
}

export function summarize(startedAt: Date, outcomes: IngestionOutcome[]): IngestionSummary {
  const all = flatten(outcomes);
  return {
    startedAt,
    completedAt: new Date(),
    sourcesProcessed: all.length,
    recordsCreated: all.filter(o => o.decision === 'NEW' || o.decision === 'CHANGED').filter(o => o.recordId !== null).length,
    chunksIndexed: all.reduce((sum, o) => sum + o.chunksIndexed, 0),
    failures: all.filter(o => o.finalState === 'FAILED').length,
    outcomes,
  };
}

export function formatSummary(summary: IngestionSummary): string {
  const lines = [
    `Sources processed: ${summary.sourcesProcessed}`,
    `Records created:   ${summary.recordsCreated}`,
    `Chunks indexed:    ${summary.chunksIndexed}`,
    `Failures:          ${summary.failures}`,
  ];
  for (const outcome of flatten(summary.outcomes)) {
    if (outcome.finalState === 'FAILED') {
      lines.push(`  FAILED ${outcome.sourceUrl}: ${outcome.error ?? 'unknown error'}`);
    }
  }
  return lines.join('\n');
}

// ============================================================================
// CLI
// ============================================================================

const USAGE = `
Content Retrieval Jobs

Commands:
  due                          Ingest every source whose check interval has elapsed
  ingest <url> [tags...]       Ingest one URL (registered first if unknown)
  prune                        Delete content past the retention horizon
  daily [topic]                Daily summary of new content
  topic <topic> [days]         Topic summary over the last N days (default 7)
  reindex                      Rebuild the vector index with the current embedding model
  seed                         Register the sources in config/sources.json
`;

/**
 * Job entry point. Returns the process exit code.
 */
export async function runFromCLI(args: string[], context: AppContext): Promise<number> {
  const { orchestrator } = context;
  const command = args[0] ?? 'due';

  switch (command) {
    case 'due': {
      const summary = await orchestrator.runDueSources();
      console.log(formatSummary(summary));
      return summary.failures > 0 ? 1 : 0;
    }

    case 'ingest': {
      const url = args[1];
      if (!url) {
        console.log('Usage: npm run job -- ingest <url> [tags...]');
        return 1;
      }
      const outcome = await orchestrator.ingestUrl(url, args.slice(2));
      console.log(formatSummary(summarize(new Date(), [outcome])));
      return outcome.finalState === 'FAILED' ? 1 : 0;
    }

    case 'prune': {
      const result = await orchestrator.runPrune();
      console.log(`Records deleted: ${result.recordsDeleted}`);
      console.log(`Chunks deleted:  ${result.chunksDeleted}`);
      return 0;
    }

    case 'daily': {
      const summary = await orchestrator.runDailySummary(args[1]);
      console.log(summary.summary);
      return summary.degraded ? 1 : 0;
    }

    case 'topic': {
      const topic = args[1];
      if (!topic) {
        console.log('Usage: npm run job -- topic <topic> [days]');
        return 1;
      }
      const days = args[2] ? parseInt(args[2], 10) : undefined;
      if (days !== undefined && !(days > 0)) {
        console.log(`Invalid day count: ${args[2]}`);
        return 1;
      }
      const summary = await orchestrator.runTopicSummary(topic, days);
      console.log(summary.summary);
      return summary.degraded ? 1 : 0;
    }

    case 'reindex': {
      const summary = await context.indexer.reindexAll();
      console.log(`Embedding version: ${summary.embeddingVersion}`);
      console.log(`Records indexed:   ${summary.recordsIndexed}`);
      console.log(`Chunks indexed:    ${summary.chunksIndexed}`);
      for (const failure of summary.failures) {
        console.log(`  FAILED ${failure.sourceUrl}: ${failure.error}`);
      }
      return summary.failures.length > 0 ? 1 : 0;
    }

    case 'seed': {
      const result = await context.sources.seedSources();
      console.log(`Seeded ${result.seeded} sources`);
      return 0;
    }

    default:
      console.log(USAGE);
      return command === 'help' ? 0 : 1;
  }
}
