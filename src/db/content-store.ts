/**
 * Content Store
 * Durable relational store for monitored sources, content records and query logs
 */

import postgres from 'postgres';
import { getConnection } from './connection.js';
import {
  SATISFIED_FEEDBACK,
  toContentMetrics,
  toQueryMetrics,
  type ContentMetrics,
  type QueryMetrics,
  type SourceActivity,
} from './metrics.js';
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

export interface SourceListFilter {
  activeOnly?: boolean;
  tag?: string;
}

export interface PrunedRecord {
  id: string;
  sourceUrl: string;
  fingerprint: string;
}

export interface StoreStats {
  sources: number;
  activeSources: number;
  failingSources: number;
  records: number;
  queries: number;
  averageFeedback: number | null;
}

export interface ContentStore {
  getSource(url: string): Promise<MonitoredSource | null>;
  listSources(filter?: SourceListFilter): Promise<MonitoredSource[]>;
  /** Active sources whose last check is older than their frequency (or never checked) */
  getDueSources(now: Date): Promise<MonitoredSource[]>;
  upsertSource(input: CreateSourceInput): Promise<MonitoredSource>;
  updateSource(url: string, input: UpdateSourceInput): Promise<MonitoredSource | null>;
  recordCheck(url: string, update: SourceCheckUpdate): Promise<void>;

  getLatestRecord(sourceUrl: string): Promise<ContentRecord | null>;
  /** Newest record for each (source, fingerprint) pair that still exists */
  findRecords(refs: RecordRef[]): Promise<ContentRecord[]>;
  insertRecord(record: NewContentRecord): Promise<ContentRecord>;
  /** Newest record of every source */
  listCurrentRecords(): Promise<ContentRecord[]>;
  getContentSince(since: Date, topic?: string): Promise<ContentSummaryRow[]>;
  pruneRecords(olderThan: Date): Promise<PrunedRecord[]>;

  logQuery(entry: NewQueryLogEntry): Promise<QueryLogEntry>;
  recordFeedback(queryId: string, score: number): Promise<boolean>;
  getStats(): Promise<StoreStats>;
  /** Latency, confidence and feedback over queries logged since the given time */
  getQueryMetrics(since: Date): Promise<QueryMetrics>;
  /** Freshness and last-check success over active sources */
  getContentMetrics(now?: Date): Promise<ContentMetrics>;
  ping(): Promise<boolean>;
}

// Column selection with aliases
const sourceColumns = `
  url,
  is_active as "isActive",
  tags,
  type_hint as "typeHint",
  check_frequency_hours as "checkFrequencyHours",
  added_by as "addedBy",
  parent_url as "parentUrl",
  last_checked_at as "lastCheckedAt",
  last_modified_at as "lastModifiedAt",
  last_status as "lastStatus",
  last_error as "lastError",
  error_count as "errorCount",
  needs_reindex as "needsReindex",
  created_at as "createdAt"
`;

const recordColumns = `
  id,
  source_url as "sourceUrl",
  title,
  content as "text",
  content_hash as "fingerprint",
  retrieved_at as "retrievedAt",
  published_at as "publishedAt",
  word_count as "wordCount",
  content_kind as "contentKind",
  metadata
`;

const queryLogColumns = `
  id,
  question,
  answer,
  citations,
  confidence,
  latency_ms as "latencyMs",
  feedback,
  session_id as "sessionId",
  degraded,
  web_search_used as "webSearchUsed",
  created_at as "createdAt"
`;

export class PostgresContentStore implements ContentStore {
  constructor(private readonly sql: postgres.Sql = getConnection()) {}

  // ============================================================================
  // SOURCES
  // ============================================================================

  async getSource(url: string): Promise<MonitoredSource | null> {
    const sql = this.sql;
    const result = await sql<MonitoredSource[]>`
      SELECT ${sql.unsafe(sourceColumns)} FROM monitored_sources WHERE url = ${url}
    `;
    return result[0] ?? null;
  }

  async listSources(filter: SourceListFilter = {}): Promise<MonitoredSource[]> {
    const sql = this.sql;
    return await sql<MonitoredSource[]>`
      SELECT ${sql.unsafe(sourceColumns)} FROM monitored_sources
      WHERE (${filter.activeOnly ?? false} = false OR is_active = true)
        AND (${filter.tag ?? null}::text IS NULL OR ${filter.tag ?? null} = ANY(tags))
      ORDER BY url
    `;
  }

  async getDueSources(now: Date): Promise<MonitoredSource[]> {
    const sql = this.sql;
    return await sql<MonitoredSource[]>`
      SELECT ${sql.unsafe(sourceColumns)} FROM monitored_sources
      WHERE is_active = true
        AND (
          last_checked_at IS NULL
          OR last_checked_at <= ${now}::timestamptz - (check_frequency_hours * INTERVAL '1 hour')
        )
      ORDER BY last_checked_at ASC NULLS FIRST, url
    `;
  }

  async upsertSource(input: CreateSourceInput): Promise<MonitoredSource> {
    const sql = this.sql;
    const result = await sql<MonitoredSource[]>`
      INSERT INTO monitored_sources (
        url,
        is_active,
        tags,
        type_hint,
        check_frequency_hours,
        added_by,
        parent_url
      ) VALUES (
        ${input.url},
        ${input.isActive ?? true},
        ${input.tags ?? []},
        ${input.typeHint ?? 'page'},
        ${input.checkFrequencyHours ?? 24},
        ${input.addedBy ?? null},
        ${input.parentUrl ?? null}
      )
      ON CONFLICT (url) DO UPDATE SET
        is_active = EXCLUDED.is_active,
        tags = EXCLUDED.tags,
        type_hint = EXCLUDED.type_hint,
        check_frequency_hours = EXCLUDED.check_frequency_hours,
        added_by = COALESCE(monitored_sources.added_by, EXCLUDED.added_by)
      RETURNING ${sql.unsafe(sourceColumns)}
    `;
    return result[0];
  }

  async updateSource(url: string, input: UpdateSourceInput): Promise<MonitoredSource | null> {
    const sql = this.sql;
    const result = await sql<MonitoredSource[]>`
      UPDATE monitored_sources SET
        is_active = COALESCE(${input.isActive ?? null}, is_active),
        tags = COALESCE(${input.tags ?? null}, tags),
        type_hint = COALESCE(${input.typeHint ?? null}, type_hint),
        check_frequency_hours = COALESCE(${input.checkFrequencyHours ?? null}, check_frequency_hours),
        needs_reindex = COALESCE(${input.needsReindex ?? null}, needs_reindex)
      WHERE url = ${url}
      RETURNING ${sql.unsafe(sourceColumns)}
    `;
    return result[0] ?? null;
  }

  async recordCheck(url: string, update: SourceCheckUpdate): Promise<void> {
    const sql = this.sql;
    const failed = update.lastStatus === 'FAILED';
    await sql`
      UPDATE monitored_sources SET
        last_checked_at = ${update.lastCheckedAt},
        last_status = ${update.lastStatus},
        last_error = ${update.lastError ?? null},
        error_count = CASE WHEN ${failed} THEN error_count + 1 ELSE 0 END,
        last_modified_at = COALESCE(${update.lastModifiedAt ?? null}, last_modified_at),
        needs_reindex = COALESCE(${update.needsReindex ?? null}, needs_reindex)
      WHERE url = ${url}
    `;
  }

  // ============================================================================
  // CONTENT RECORDS
  // ============================================================================

  async getLatestRecord(sourceUrl: string): Promise<ContentRecord | null> {
    const sql = this.sql;
    const result = await sql<ContentRecord[]>`
      SELECT ${sql.unsafe(recordColumns)} FROM content_records
      WHERE source_url = ${sourceUrl}
      ORDER BY retrieved_at DESC, id DESC
      LIMIT 1
    `;
    return result[0] ?? null;
  }

  async findRecords(refs: RecordRef[]): Promise<ContentRecord[]> {
    if (refs.length === 0) return [];
    const sql = this.sql;
    const urls = refs.map(ref => ref.sourceUrl);
    const fingerprints = refs.map(ref => ref.fingerprint);
    return await sql<ContentRecord[]>`
      SELECT DISTINCT ON (source_url, content_hash) ${sql.unsafe(recordColumns)}
      FROM content_records
      WHERE (source_url, content_hash) IN (
        SELECT * FROM unnest(${urls}::text[], ${fingerprints}::text[])
      )
      ORDER BY source_url, content_hash, retrieved_at DESC, id DESC
    `;
  }

  async insertRecord(record: NewContentRecord): Promise<ContentRecord> {
    const sql = this.sql;
    const result = await sql<ContentRecord[]>`
      INSERT INTO content_records (
        source_url,
        title,
        content,
        content_hash,
        retrieved_at,
        published_at,
        word_count,
        content_kind,
        metadata
      ) VALUES (
        ${record.sourceUrl},
        ${record.title},
        ${record.text},
        ${record.fingerprint},
        ${record.retrievedAt ?? new Date()},
        ${record.publishedAt},
        ${record.wordCount},
        ${record.contentKind},
        ${sql.json(record.metadata as postgres.JSONValue)}
      )
      RETURNING ${sql.unsafe(recordColumns)}
    `;
    return result[0];
  }

  async listCurrentRecords(): Promise<ContentRecord[]> {
    const sql = this.sql;
    return await sql<ContentRecord[]>`
      SELECT DISTINCT ON (source_url) ${sql.unsafe(recordColumns)}
      FROM content_records
      ORDER BY source_url, retrieved_at DESC, id DESC
    `;
  }

  async getContentSince(since: Date, topic?: string): Promise<ContentSummaryRow[]> {
    const sql = this.sql;
    const pattern = topic ? `%${topic}%` : null;
    return await sql<ContentSummaryRow[]>`
      SELECT
        cr.source_url as "sourceUrl",
        cr.title,
        cr.content as "text",
        cr.retrieved_at as "retrievedAt",
        ms.tags
      FROM content_records cr
      JOIN monitored_sources ms ON ms.url = cr.source_url
      WHERE cr.retrieved_at >= ${since}
        AND (
          ${topic ?? null}::text IS NULL
          OR cr.content ILIKE ${pattern}
          OR cr.title ILIKE ${pattern}
          OR ${topic ?? null} = ANY(ms.tags)
        )
      ORDER BY cr.retrieved_at DESC
    `;
  }

  async pruneRecords(olderThan: Date): Promise<PrunedRecord[]> {
    const sql = this.sql;
    return await sql<PrunedRecord[]>`
      DELETE FROM content_records
      WHERE retrieved_at < ${olderThan}
      RETURNING id, source_url as "sourceUrl", content_hash as "fingerprint"
    `;
  }

  // ============================================================================
  // QUERY LOG
  // ============================================================================

  async logQuery(entry: NewQueryLogEntry): Promise<QueryLogEntry> {
    const sql = this.sql;
    const result = await sql<QueryLogEntry[]>`
      INSERT INTO query_logs (
        question,
        answer,
        citations,
        confidence,
        latency_ms,
        session_id,
        degraded,
        web_search_used
      ) VALUES (
        ${entry.question},
        ${entry.answer},
        ${sql.json(entry.citations as unknown as postgres.JSONValue)},
        ${entry.confidence},
        ${Math.round(entry.latencyMs)},
        ${entry.sessionId},
        ${entry.degraded},
        ${entry.webSearchUsed}
      )
      RETURNING ${sql.unsafe(queryLogColumns)}
    `;
    return result[0];
  }

  async recordFeedback(queryId: string, score: number): Promise<boolean> {
    const sql = this.sql;
    const result = await sql`
      UPDATE query_logs SET feedback = ${score} WHERE id = ${queryId}
    `;
    return result.count > 0;
  }

  async getStats(): Promise<StoreStats> {
    const sql = this.sql;
    const rows = await sql<Array<{
      sources: string;
      activeSources: string;
      failingSources: string;
      records: string;
      queries: string;
      averageFeedback: string | null;
    }>>`
      SELECT
        (SELECT COUNT(*) FROM monitored_sources) as "sources",
        (SELECT COUNT(*) FROM monitored_sources WHERE is_active) as "activeSources",
        (SELECT COUNT(*) FROM monitored_sources WHERE last_status = 'FAILED') as "failingSources",
        (SELECT COUNT(*) FROM content_records) as "records",
        (SELECT COUNT(*) FROM query_logs) as "queries",
        (SELECT AVG(feedback) FROM query_logs WHERE feedback IS NOT NULL) as "averageFeedback"
    `;
    const row = rows[0];
    return {
      sources: Number(row.sources),
      activeSources: Number(row.activeSources),
      failingSources: Number(row.failingSources),
      records: Number(row.records),
      queries: Number(row.queries),
      averageFeedback: row.averageFeedback === null ? null : Number(row.averageFeedback),
    };
  }

  async getQueryMetrics(since: Date): Promise<QueryMetrics> {
    const sql = this.sql;
    const rows = await sql<Array<{
      totalQueries: string;
      avgLatencyMs: string | null;
      medianLatencyMs: number | null;
      maxLatencyMs: number | null;
      high: string;
      medium: string;
      low: string;
      feedbackCount: string;
      averageFeedback: string | null;
      satisfiedFeedback: string;
    }>>`
      SELECT
        COUNT(*) as "totalQueries",
        AVG(latency_ms) as "avgLatencyMs",
        PERCENTILE_DISC(0.5) WITHIN GROUP (ORDER BY latency_ms) as "medianLatencyMs",
        MAX(latency_ms) as "maxLatencyMs",
        COUNT(*) FILTER (WHERE confidence = 'HIGH') as "high",
        COUNT(*) FILTER (WHERE confidence = 'MEDIUM') as "medium",
        COUNT(*) FILTER (WHERE confidence = 'LOW') as "low",
        COUNT(feedback) as "feedbackCount",
        AVG(feedback) as "averageFeedback",
        COUNT(*) FILTER (WHERE feedback >= ${SATISFIED_FEEDBACK}) as "satisfiedFeedback"
      FROM query_logs
      WHERE created_at >= ${since}
    `;
    const row = rows[0];
    return toQueryMetrics(since, {
      totalQueries: Number(row.totalQueries),
      avgLatencyMs: row.avgLatencyMs === null ? null : Number(row.avgLatencyMs),
      medianLatencyMs: row.medianLatencyMs,
      maxLatencyMs: row.maxLatencyMs,
      confidence: { HIGH: Number(row.high), MEDIUM: Number(row.medium), LOW: Number(row.low) },
      feedbackCount: Number(row.feedbackCount),
      averageFeedback: row.averageFeedback === null ? null : Number(row.averageFeedback),
      satisfiedFeedback: Number(row.satisfiedFeedback),
    });
  }

  async getContentMetrics(now: Date = new Date()): Promise<ContentMetrics> {
    const rows = await this.sql<SourceActivity[]>`
      SELECT
        s.last_status as "lastStatus",
        MAX(r.retrieved_at) as "lastContentAt"
      FROM monitored_sources s
      LEFT JOIN content_records r ON r.source_url = s.url
      WHERE s.is_active
      GROUP BY s.url, s.last_status
    `;
    return toContentMetrics(rows, now);
  }

  async ping(): Promise<boolean> {
    const rows = await this.sql`SELECT 1 as ok`;
    return rows.length > 0;
  }
}
