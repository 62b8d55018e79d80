/**
 * Knowledge Monitor Configuration Constants
 * Defaults for chunking, fetching, page classification, fusion and confidence
 */

// ============================================================================
// CHUNKING
// ============================================================================
// Character-based sizes; boundaries prefer paragraphs, then sentences, then words

export interface ChunkingConfig {
  chunkSize: number;      // Target maximum characters per chunk
  chunkOverlap: number;   // Characters shared with the previous chunk
  minChunkRatio: number;  // A break is only taken past this fraction of chunkSize
}

export const CHUNKING_DEFAULTS: ChunkingConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  minChunkRatio: 0.5,
};

// ============================================================================
// FETCHING
// ============================================================================

export const FETCH_DEFAULTS = {
  timeoutMs: 30000,
  maxRetries: 3,
  initialRetryDelayMs: 1000,
  maxRetryDelayMs: 8000,
  maxContentBytes: 2 * 1024 * 1024, // 2MB
  userAgent: 'KnowledgeMonitor/0.1 (+content monitoring)',
};

// HTTP statuses worth another attempt; other 4xx responses are final
export const RETRYABLE_HTTP_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

export const ACCEPTED_CONTENT_TYPES = [
  'text/html',
  'text/plain',
  'application/xhtml+xml',
  'application/xml',
  'text/xml',
  'application/rss+xml',
  'application/atom+xml',
  'application/json',
  'application/feed+json',
];

// ============================================================================
// PAGE CLASSIFICATION
// ============================================================================
// Blog-index heuristic: a page whose main region is mostly a repeated group of
// same-origin post links enumerates posts rather than containing an article.

export interface ClassifierConfig {
  minRepeatedLinks: number;    // Size of the largest same-shaped link group
  minLinkDensity: number;      // Anchor text / total text in the main region
  minRepeatedArticles: number; // Repeated <article> blocks that each hold a link
  minArticleChars: number;     // Below this (and without <main>/<article>) => UNKNOWN
  degradedBelowChars: number;  // Main region shorter than this falls back to whole-page text
}

export const CLASSIFIER_DEFAULTS: ClassifierConfig = {
  minRepeatedLinks: 3,
  minLinkDensity: 0.35,
  minRepeatedArticles: 3,
  minArticleChars: 200,
  degradedBelowChars: 100,
};

// Links to these never count as posts
export const NON_POST_PATH_PATTERNS: RegExp[] = [
  /\.(?:png|jpe?g|gif|svg|webp|ico|css|js|pdf|zip|mp3|mp4)$/i,
  /\/(?:tag|tags|category|categories|author|page|login|signup|search|feed|rss)(?:\/|$)/i,
];

// ============================================================================
// INGESTION
// ============================================================================

export const INGESTION_DEFAULTS = {
  maxFollowUpsPerRun: 10,
  ingestConcurrency: 4,
  checkFrequencyHours: 24,
  maxContentAgeDays: 30,
};

// ============================================================================
// RETRIEVAL & FUSION
// ============================================================================

export type WebSearchPolicy = 'auto' | 'always' | 'never';

export interface FusionConfig {
  kVector: number;
  webResultLimit: number;
  webSearchPolicy: WebSearchPolicy;
  similarityFloor: number;     // 'auto' policy: search the web when top similarity is below this
  minVectorResults: number;    // ...or when fewer vector results came back
  webBaseScore: number;        // Score of the first web result
  webRankDecay: number;        // Multiplier applied per rank below the first
  maxPassagesPerSource: number;
  maxContextChars: number;
  maxHistoryTurns: number;
  degradedSnippetCount: number;
}

export const FUSION_DEFAULTS: FusionConfig = {
  kVector: 5,
  webResultLimit: 5,
  webSearchPolicy: 'auto',
  similarityFloor: 0.5,
  minVectorResults: 2,
  webBaseScore: 0.6,
  webRankDecay: 0.9,
  maxPassagesPerSource: 3,
  maxContextChars: 6000,
  maxHistoryTurns: 6,
  degradedSnippetCount: 1,
};

// ============================================================================
// CONFIDENCE
// ============================================================================
// Cosine-similarity thresholds. HIGH needs a strong top match that is either
// corroborated by a second independent source or decisive on its own.

export interface ConfidenceThresholds {
  weak: number;
  strong: number;
  decisive: number;
}

export const CONFIDENCE_THRESHOLDS: ConfidenceThresholds = {
  weak: 0.45,
  strong: 0.75,
  decisive: 0.9,
};

// ============================================================================
// GENERATION
// ============================================================================

export const GENERATION_DEFAULTS = {
  chatModel: 'gpt-4o-mini',
  embeddingModel: 'text-embedding-3-small',
  temperature: 0.2,
  maxTokens: 800,
  timeoutMs: 30000,
  maxRetries: 1,
  retryDelayMs: 500,
  queryTimeoutMs: 45000,
};

export const GENERATION_FAILED_NOTICE =
  'Answer generation failed; showing the most relevant stored excerpt instead.';

export const NO_CONTEXT_NOTICE =
  'No relevant content was found for this question.';
