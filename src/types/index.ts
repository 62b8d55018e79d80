/**
 * Knowledge Monitor Core Types
 * TypeScript type definitions for ingestion, indexing and answering
 */

// ============================================================================
// DATABASE ENTITY TYPES
// ============================================================================

export type SourceTypeHint = 'page' | 'blog_index' | 'blog_post' | 'feed';

export type SourceRunStatus = 'DONE' | 'FAILED';

export interface MonitoredSource {
  url: string; // canonical URL, identity
  isActive: boolean;
  tags: string[];
  typeHint: SourceTypeHint;
  checkFrequencyHours: number;
  addedBy: string | null;
  parentUrl: string | null; // index page this post was discovered from
  lastCheckedAt: Date | null;
  lastModifiedAt: Date | null;
  lastStatus: SourceRunStatus | null;
  lastError: string | null;
  errorCount: number;
  needsReindex: boolean;
  createdAt: Date;
}

export interface CreateSourceInput {
  url: string;
  tags?: string[];
  typeHint?: SourceTypeHint;
  checkFrequencyHours?: number;
  addedBy?: string;
  parentUrl?: string;
  isActive?: boolean;
}

export interface UpdateSourceInput {
  isActive?: boolean;
  tags?: string[];
  typeHint?: SourceTypeHint;
  checkFrequencyHours?: number;
  needsReindex?: boolean;
}

/** Fields the orchestrator writes after each fetch attempt */
export interface SourceCheckUpdate {
  lastCheckedAt: Date;
  lastStatus: SourceRunStatus;
  lastError?: string | null;
  lastModifiedAt?: Date;
  needsReindex?: boolean;
}

export type ContentKind = 'ARTICLE' | 'INDEX' | 'FEED' | 'UNKNOWN';

export interface ContentRecord {
  id: string;
  sourceUrl: string;
  title: string;
  text: string; // canonical text
  fingerprint: string;
  retrievedAt: Date;
  publishedAt: Date | null;
  wordCount: number;
  contentKind: ContentKind;
  metadata: Record<string, unknown>;
}

export type NewContentRecord = Omit<ContentRecord, 'id' | 'retrievedAt'> & {
  retrievedAt?: Date;
};

/** Identifies the record(s) a generation was built from */
export interface RecordRef {
  sourceUrl: string;
  fingerprint: string;
}

export interface ContentSummaryRow {
  sourceUrl: string;
  title: string;
  text: string;
  retrievedAt: Date;
  tags: string[];
}

// ============================================================================
// CHUNKS & INDEX
// ============================================================================

export interface ChunkSpan {
  sequence: number;
  start: number;
  end: number;
  overlap: number; // leading characters shared with the previous chunk
  text: string;
}

export interface Chunk extends ChunkSpan {
  key: string; // chunk fingerprint
  recordId: string;
  sourceUrl: string;
}

/** What the vector index holds: embedding, fingerprint, offsets and filter fields */
export interface IndexEntry {
  key: string;
  sourceUrl: string;
  generation: string; // fingerprint of the owning record
  sequence: number;
  start: number;
  end: number;
  tags: string[];
  retrievedAt: Date;
  embedding: number[];
}

export interface SearchFilters {
  tags?: string[];
  sourceUrl?: string;
  since?: Date;
  until?: Date;
}

export interface IndexHit {
  entry: Omit<IndexEntry, 'embedding'>;
  score: number;
}

export interface RetrievedChunk {
  key: string;
  sourceUrl: string;
  recordId: string;
  sequence: number;
  title: string;
  text: string;
  score: number;
  retrievedAt: Date;
  tags: string[];
}

// ============================================================================
// QUERY TYPES
// ============================================================================

export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
}

export type CitationKind = 'stored' | 'web';

export interface Citation {
  url: string;
  title: string;
  kind: CitationKind;
  chunkKeys: string[];
  score: number;
}

export interface AnswerRequest {
  question: string;
  chatHistory?: ChatMessage[];
  kVector?: number;
  useWebSearch?: boolean;
  filters?: SearchFilters;
  sessionId?: string;
}

export interface AnswerResult {
  answer: string;
  citations: Citation[];
  confidence: Confidence;
  degraded: boolean;
  webSearchUsed: boolean;
  latencyMs: number;
  queryLogId: string | null;
}

export interface QueryLogEntry {
  id: string;
  question: string;
  answer: string;
  citations: Citation[];
  confidence: Confidence;
  latencyMs: number;
  feedback: number | null;
  sessionId: string | null;
  degraded: boolean;
  webSearchUsed: boolean;
  createdAt: Date;
}

export type NewQueryLogEntry = Omit<QueryLogEntry, 'id' | 'feedback' | 'createdAt'>;

// ============================================================================
// INGESTION TYPES
// ============================================================================

export type IngestionState =
  | 'PENDING'
  | 'FETCHING'
  | 'NORMALIZING'
  | 'DEDUPING'
  | 'INDEXING'
  | 'SKIP'
  | 'DONE'
  | 'FAILED';

export type LedgerDecision = 'NEW' | 'CHANGED' | 'UNCHANGED';

export interface IngestionOutcome {
  sourceUrl: string;
  finalState: 'DONE' | 'FAILED';
  transitions: IngestionState[];
  contentKind: ContentKind | null;
  decision: LedgerDecision | null;
  recordId: string | null;
  chunksIndexed: number;
  followUps: IngestionOutcome[];
  deferredFollowUps: number;
  skippedReason: 'inactive' | 'unchanged' | 'empty' | null;
  error: string | null;
  durationMs: number;
}

export interface IngestionSummary {
  startedAt: Date;
  completedAt: Date;
  sourcesProcessed: number;
  recordsCreated: number;
  chunksIndexed: number;
  failures: number;
  outcomes: IngestionOutcome[];
}
