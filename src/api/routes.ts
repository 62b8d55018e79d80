/**
 * Knowledge Monitor API Routes
 * REST endpoints for questions, sources, records and summaries
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppContext } from '../app-context.js';
import { SOURCE_TYPE_HINTS } from '../services/source-manager.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

// ============================================================================
// HELPERS
// ============================================================================

function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(details);
  }
  return result.data;
}

// ============================================================================
// SCHEMAS
// ============================================================================

const tagsSchema = z.array(z.string().min(1)).max(50);

const askSchema = z.object({
  question: z.string().min(1).max(4000),
  chatHistory: z.array(z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
  })).optional(),
  kVector: z.number().int().min(1).max(50).optional(),
  useWebSearch: z.boolean().optional(),
  filters: z.object({
    tags: tagsSchema.optional(),
    sourceUrl: z.string().url().optional(),
    since: z.coerce.date().optional(),
    until: z.coerce.date().optional(),
  }).optional(),
  sessionId: z.string().max(200).optional(),
});

const feedbackSchema = z.object({
  score: z.number(),
});

const createSourceSchema = z.object({
  url: z.string().url(),
  tags: tagsSchema.optional(),
  typeHint: z.enum(SOURCE_TYPE_HINTS).optional(),
  checkFrequencyHours: z.number().int().positive().optional(),
  isActive: z.boolean().optional(),
});

const updateSourceSchema = z.object({
  url: z.string().url(),
  isActive: z.boolean().optional(),
  tags: tagsSchema.optional(),
  typeHint: z.enum(SOURCE_TYPE_HINTS).optional(),
  checkFrequencyHours: z.number().int().positive().optional(),
});

const listSourcesSchema = z.object({
  activeOnly: z.enum(['true', 'false']).optional(),
  tag: z.string().min(1).optional(),
});

const ingestSchema = z.object({
  url: z.string().url(),
  tags: tagsSchema.optional(),
});

const recordsQuerySchema = z.object({
  sourceUrl: z.string().url().optional(),
});

const dailySummarySchema = z.object({
  topic: z.string().min(1).optional(),
});

const topicSummarySchema = z.object({
  topic: z.string().min(1),
  days: z.number().int().min(1).max(365).optional(),
});

const metricsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});

const DAY_MS = 24 * 60 * 60 * 1000;

// Records are listed without their full text
const EXCERPT_CHARS = 280;

// ============================================================================
// ROUTER
// ============================================================================

export function createRouter(context: AppContext): Router {
  const router = Router();
  const { composer, orchestrator, sources, store, summarizer } = context;

  /**
   * GET /health
   * Database connectivity check
   */
  router.get('/health', asyncHandler(async (_req, res) => {
    try {
      await store.ping();
      res.json({
        status: 'healthy',
        database: 'connected',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        database: 'disconnected',
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }));

  /**
   * GET /stats
   */
  router.get('/stats', asyncHandler(async (_req, res) => {
    const [stats, chunks, embeddingVersion] = await Promise.all([
      store.getStats(),
      context.index.count(),
      context.index.getEmbeddingVersion(),
    ]);
    res.json({ ...stats, chunks, embeddingVersion });
  }));

  /**
   * GET /metrics
   * Query performance over the last `days` days and current content freshness
   */
  router.get('/metrics', asyncHandler(async (req, res) => {
    const { days } = parse(metricsQuerySchema, req.query);
    const now = new Date();
    const [query, content] = await Promise.all([
      store.getQueryMetrics(new Date(now.getTime() - days * DAY_MS)),
      store.getContentMetrics(now),
    ]);
    res.json({ days, query, content });
  }));

  // ==========================================================================
  // QUESTIONS
  // ==========================================================================

  /**
   * POST /ask
   * Answer a question over stored content (and web results, per policy)
   */
  router.post('/ask', asyncHandler(async (req, res) => {
    const input = parse(askSchema, req.body);
    const result = await composer.answer(input);
    res.json(result);
  }));

  /**
   * POST /queries/:id/feedback
   * Rate an answer 1-5
   */
  router.post('/queries/:id/feedback', asyncHandler(async (req, res) => {
    const { score } = parse(feedbackSchema, req.body);
    await composer.recordFeedback(req.params.id, score);
    res.json({ success: true });
  }));

  // ==========================================================================
  // SOURCES
  // ==========================================================================

  router.get('/sources', asyncHandler(async (req, res) => {
    const query = parse(listSourcesSchema, req.query);
    const list = await sources.listSources({
      activeOnly: query.activeOnly === 'true',
      tag: query.tag,
    });
    res.json({ sources: list, count: list.length });
  }));

  router.post('/sources', asyncHandler(async (req, res) => {
    const input = parse(createSourceSchema, req.body);
    const source = await sources.addSource({ ...input, addedBy: 'api' });
    res.status(201).json(source);
  }));

  /**
   * PATCH /sources
   * Sources are keyed by URL, so the URL travels in the body
   */
  router.patch('/sources', asyncHandler(async (req, res) => {
    const { url, ...changes } = parse(updateSourceSchema, req.body);
    const source = await sources.updateSource(url, changes);
    res.json(source);
  }));

  /**
   * POST /sources/ingest
   * Run an ingestion cycle now, registering the URL if needed
   */
  router.post('/sources/ingest', asyncHandler(async (req, res) => {
    const { url, tags } = parse(ingestSchema, req.body);
    const outcome = await orchestrator.ingestUrl(url, tags);
    res.json(outcome);
  }));

  // ==========================================================================
  // RECORDS
  // ==========================================================================

  router.get('/records', asyncHandler(async (req, res) => {
    const { sourceUrl } = parse(recordsQuerySchema, req.query);

    if (sourceUrl) {
      const record = await store.getLatestRecord((await sources.getSource(sourceUrl)).url);
      if (!record) {
        throw new NotFoundError(`No content stored for ${sourceUrl}`);
      }
      res.json(record);
      return;
    }

    const records = await store.listCurrentRecords();
    res.json({
      records: records.map(({ text, ...record }) => ({
        ...record,
        excerpt: text.length > EXCERPT_CHARS ? `${text.slice(0, EXCERPT_CHARS)}...` : text,
      })),
      count: records.length,
    });
  }));

  // ==========================================================================
  // SUMMARIES
  // ==========================================================================

  router.post('/summaries/daily', asyncHandler(async (req, res) => {
    const { topic } = parse(dailySummarySchema, req.body ?? {});
    res.json(await summarizer.createDailySummary(topic));
  }));

  router.post('/summaries/topic', asyncHandler(async (req, res) => {
    const { topic, days } = parse(topicSummarySchema, req.body);
    res.json(await summarizer.createTopicSummary(topic, days));
  }));

  return router;
}
