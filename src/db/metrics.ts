/**
 * Query and content metrics
 * Stores aggregate their rows; the rates are derived here so both backends agree.
 */

import type { Confidence, SourceRunStatus } from '../types/index.js';

/** Feedback scores at or above this count as a satisfied user */
export const SATISFIED_FEEDBACK = 4;

/** Content older than this has a freshness of 0 */
export const FRESHNESS_HORIZON_HOURS = 24;

const HOUR_MS = 60 * 60 * 1000;

export interface QueryAggregate {
  totalQueries: number;
  avgLatencyMs: number | null;
  /** Lower median, as PERCENTILE_DISC(0.5) */
  medianLatencyMs: number | null;
  maxLatencyMs: number | null;
  confidence: Record<Confidence, number>;
  feedbackCount: number;
  averageFeedback: number | null;
  satisfiedFeedback: number;
}

export interface QueryMetrics {
  since: Date;
  totalQueries: number;
  avgLatencyMs: number | null;
  medianLatencyMs: number | null;
  maxLatencyMs: number | null;
  confidenceDistribution: Record<Confidence, number>;
  highConfidenceRate: number | null;
  feedbackCount: number;
  averageFeedback: number | null;
  satisfactionRate: number | null;
  feedbackResponseRate: number | null;
}

export interface SourceActivity {
  lastStatus: SourceRunStatus | null;
  /** Retrieval time of the newest record, null when nothing was stored */
  lastContentAt: Date | null;
}

export interface ContentMetrics {
  monitoredSources: number;
  averageFreshness: number;
  sourcesWithRecentUpdates: number;
  checkedSources: number;
  successfulChecks: number;
  retrievalSuccessRate: number | null;
}

const ratio = (part: number, whole: number): number | null => (whole > 0 ? part / whole : null);

export function toQueryMetrics(since: Date, aggregate: QueryAggregate): QueryMetrics {
  return {
    since,
    totalQueries: aggregate.totalQueries,
    avgLatencyMs: aggregate.avgLatencyMs,
    medianLatencyMs: aggregate.medianLatencyMs,
    maxLatencyMs: aggregate.maxLatencyMs,
    confidenceDistribution: { ...aggregate.confidence },
    highConfidenceRate: ratio(aggregate.confidence.HIGH, aggregate.totalQueries),
    feedbackCount: aggregate.feedbackCount,
    averageFeedback: aggregate.averageFeedback,
    satisfactionRate: ratio(aggregate.satisfiedFeedback, aggregate.feedbackCount),
    feedbackResponseRate: ratio(aggregate.feedbackCount, aggregate.totalQueries),
  };
}

/**
 * Freshness decays linearly from 1 at retrieval to 0 after FRESHNESS_HORIZON_HOURS.
 * Sources with no stored content are counted but not scored.
 */
export function freshness(lastContentAt: Date, now: Date): number {
  const hours = (now.getTime() - lastContentAt.getTime()) / HOUR_MS;
  return Math.min(1, Math.max(0, 1 - hours / FRESHNESS_HORIZON_HOURS));
}

export function toContentMetrics(activeSources: SourceActivity[], now: Date): ContentMetrics {
  const scores = activeSources.flatMap(source =>
    source.lastContentAt ? [freshness(source.lastContentAt, now)] : []
  );
  const checked = activeSources.filter(source => source.lastStatus !== null);
  const successful = checked.filter(source => source.lastStatus === 'DONE').length;

  return {
    monitoredSources: activeSources.length,
    averageFreshness: scores.length > 0 ? scores.reduce((sum, score) => sum + score, 0) / scores.length : 0,
    sourcesWithRecentUpdates: scores.filter(score => score > 0.5).length,
    checkedSources: checked.length,
    successfulChecks: successful,
    retrievalSuccessRate: ratio(successful, checked.length),
  };
}
