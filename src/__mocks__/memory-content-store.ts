/**
 * In-process ContentStore with the same semantics as the Postgres store
 */

import { randomUUID } from 'crypto';
import type { ContentStore, PrunedRecord, SourceListFilter, StoreStats } from '../db/content-store.js';
import {
  SATISFIED_FEEDBACK,
  toContentMetrics,
  toQueryMetrics,
  type ContentMetrics,
  type QueryMetrics,
} from '../db/metrics.js';
import type {
  ContentRecord,
  ContentSummaryRow,
  CreateSourceInput,
  MonitoredSource,
  NewContentRecord,
  NewQueryLogEntry,
  QueryLogEntry,
  RecordRef,
  SourceCheckUpdate,
  UpdateSourceInput,
} from '../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

function byNewest(a: ContentRecord, b: ContentRecord): number {
  return b.retrievedAt.getTime() - a.retrievedAt.getTime() || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0);
}

export class MemoryContentStore implements ContentStore {
  readonly sources = new Map<string, MonitoredSource>();
  readonly records: ContentRecord[] = [];
  readonly queries: QueryLogEntry[] = [];
  /** Fails logQuery when set */
  failQueryLog = false;
  private sequence = 0;

  async getSource(url: string): Promise<MonitoredSource | null> {
    const source = this.sources.get(url);
    return source ? { ...source, tags: [...source.tags] } : null;
  }

  async listSources(filter: SourceListFilter = {}): Promise<MonitoredSource[]> {
    return [...this.sources.values()]
      .filter(source => !filter.activeOnly || source.isActive)
      .filter(source => !filter.tag || source.tags.includes(filter.tag))
      .sort((a, b) => a.url.localeCompare(b.url))
      .map(source => ({ ...source, tags: [...source.tags] }));
  }

  async getDueSources(now: Date): Promise<MonitoredSource[]> {
    return (await this.listSources({ activeOnly: true })).filter(source =>
      source.lastCheckedAt === null
      || source.lastCheckedAt.getTime() <= now.getTime() - source.checkFrequencyHours * HOUR_MS
    );
  }

  async upsertSource(input: CreateSourceInput): Promise<MonitoredSource> {
    const existing = this.sources.get(input.url);
    const source: MonitoredSource = {
      url: input.url,
      isActive: input.isActive ?? true,
      tags: input.tags ?? [],
      typeHint: input.typeHint ?? 'page',
      checkFrequencyHours: input.checkFrequencyHours ?? 24,
      addedBy: existing?.addedBy ?? input.addedBy ?? null,
      parentUrl: existing ? existing.parentUrl : input.parentUrl ?? null,
      lastCheckedAt: existing?.lastCheckedAt ?? null,
      lastModifiedAt: existing?.lastModifiedAt ?? null,
      lastStatus: existing?.lastStatus ?? null,
      lastError: existing?.lastError ?? null,
      errorCount: existing?.errorCount ?? 0,
      needsReindex: existing?.needsReindex ?? false,
      createdAt: existing?.createdAt ?? new Date(),
    };
    this.sources.set(source.url, source);
    return { ...source };
  }

  async updateSource(url: string, input: UpdateSourceInput): Promise<MonitoredSource | null> {
    const source = this.sources.get(url);
    if (!source) return null;
    const updated: MonitoredSource = {
      ...source,
      isActive: input.isActive ?? source.isActive,
      tags: input.tags ?? source.tags,
      typeHint: input.typeHint ?? source.typeHint,
      checkFrequencyHours: input.checkFrequencyHours ?? source.checkFrequencyHours,
      needsReindex: input.needsReindex ?? source.needsReindex,
    };
    this.sources.set(url, updated);
    return { ...updated };
  }

  async recordCheck(url: string, update: SourceCheckUpdate): Promise<void> {
    const source = this.sources.get(url);
    if (!source) return;
    this.sources.set(url, {
      ...source,
      lastCheckedAt: update.lastCheckedAt,
      lastStatus: update.lastStatus,
      lastError: update.lastError ?? null,
      errorCount: update.lastStatus === 'FAILED' ? source.errorCount + 1 : 0,
      lastModifiedAt: update.lastModifiedAt ?? source.lastModifiedAt,
      needsReindex: update.needsReindex ?? source.needsReindex,
    });
  }

  async getLatestRecord(sourceUrl: string): Promise<ContentRecord | null> {
    return this.records.filter(r => r.sourceUrl === sourceUrl).sort(byNewest)[0] ?? null;
  }

  async findRecords(refs: RecordRef[]): Promise<ContentRecord[]> {
    const found: ContentRecord[] = [];
    for (const ref of refs) {
      const newest = this.records
        .filter(r => r.sourceUrl === ref.sourceUrl && r.fingerprint === ref.fingerprint)
        .sort(byNewest)[0];
      if (newest && !found.includes(newest)) found.push(newest);
    }
    return found;
  }

  async insertRecord(record: NewContentRecord): Promise<ContentRecord> {
    this.sequence++;
    const stored: ContentRecord = {
      ...record,
      id: randomUUID(),
      // Strictly increasing so that "latest" is unambiguous within one test
      retrievedAt: record.retrievedAt ?? new Date(Date.now() + this.sequence),
    };
    this.records.push(stored);
    return stored;
  }

  async listCurrentRecords(): Promise<ContentRecord[]> {
    const current = new Map<string, ContentRecord>();
    for (const record of [...this.records].sort(byNewest)) {
      if (!current.has(record.sourceUrl)) current.set(record.sourceUrl, record);
    }
    return [...current.values()].sort((a, b) => a.sourceUrl.localeCompare(b.sourceUrl));
  }

  async getContentSince(since: Date, topic?: string): Promise<ContentSummaryRow[]> {
    const needle = topic?.toLowerCase();
    return [...this.records]
      .sort(byNewest)
      .filter(record => record.retrievedAt >= since)
      .flatMap(record => {
        const tags = this.sources.get(record.sourceUrl)?.tags;
        if (!tags) return [];
        const matches = !needle
          || record.text.toLowerCase().includes(needle)
          || record.title.toLowerCase().includes(needle)
          || tags.includes(topic ?? '');
        return matches
          ? [{ sourceUrl: record.sourceUrl, title: record.title, text: record.text, retrievedAt: record.retrievedAt, tags }]
          : [];
      });
  }

  async pruneRecords(olderThan: Date): Promise<PrunedRecord[]> {
    const pruned: PrunedRecord[] = [];
    for (let i = this.records.length - 1; i >= 0; i--) {
      const record = this.records[i];
      if (record.retrievedAt < olderThan) {
        pruned.push({ id: record.id, sourceUrl: record.sourceUrl, fingerprint: record.fingerprint });
        this.records.splice(i, 1);
      }
    }
    return pruned.reverse();
  }

  async logQuery(entry: NewQueryLogEntry): Promise<QueryLogEntry> {
    if (this.failQueryLog) throw new Error('query log unavailable');
    const stored: QueryLogEntry = { ...entry, id: randomUUID(), feedback: null, createdAt: new Date() };
    this.queries.push(stored);
    return stored;
  }

  async recordFeedback(queryId: string, score: number): Promise<boolean> {
    const entry = this.queries.find(q => q.id === queryId);
    if (!entry) return false;
    entry.feedback = score;
    return true;
  }

  async getStats(): Promise<StoreStats> {
    const sources = [...this.sources.values()];
    const rated = this.queries.filter(q => q.feedback !== null);
    return {
      sources: sources.length,
      activeSources: sources.filter(s => s.isActive).length,
      failingSources: sources.filter(s => s.lastStatus === 'FAILED').length,
      records: this.records.length,
      queries: this.queries.length,
      averageFeedback: rated.length > 0
        ? rated.reduce((sum, q) => sum + (q.feedback ?? 0), 0) / rated.length
        : null,
    };
  }

  async getQueryMetrics(since: Date): Promise<QueryMetrics> {
    const logged = this.queries.filter(q => q.createdAt >= since);
    const latencies = logged.map(q => q.latencyMs).sort((a, b) => a - b);
    const ratings = logged.flatMap(q => (q.feedback === null ? [] : [q.feedback]));
    const count = (confidence: QueryLogEntry['confidence']) => logged.filter(q => q.confidence === confidence).length;
    return toQueryMetrics(since, {
      totalQueries: logged.length,
      avgLatencyMs: latencies.length > 0 ? latencies.reduce((sum, ms) => sum + ms, 0) / latencies.length : null,
      medianLatencyMs: latencies.length > 0 ? latencies[Math.ceil(latencies.length / 2) - 1] : null,
      maxLatencyMs: latencies.length > 0 ? latencies[latencies.length - 1] : null,
      confidence: { HIGH: count('HIGH'), MEDIUM: count('MEDIUM'), LOW: count('LOW') },
      feedbackCount: ratings.length,
      averageFeedback: ratings.length > 0 ? ratings.reduce((sum, r) => sum + r, 0) / ratings.length : null,
      satisfiedFeedback: ratings.filter(r => r >= SATISFIED_FEEDBACK).length,
    });
  }

  async getContentMetrics(now: Date = new Date()): Promise<ContentMetrics> {
    const active = [...this.sources.values()].filter(s => s.isActive);
    return toContentMetrics(active.map(source => {
      const newest = this.records.filter(r => r.sourceUrl === source.url).sort(byNewest)[0];
      return { lastStatus: source.lastStatus, lastContentAt: newest?.retrievedAt ?? null };
    }), now);
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
