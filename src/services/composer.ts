/**
 * Fusion & Answer Composer
 *
 * question (+ history)
 *   -> vector retrieval (+ web search per policy)
 *   -> fusion into a bounded, per-source grouped context
 *   -> language model (per-attempt timeout, one retry)
 *   -> confidence + citations of exactly what was in the context
 *
 * Generation failures and the overall query budget degrade to the top stored
 * snippet instead of throwing. Only configuration-level errors propagate.
 */

import {
  CONFIDENCE_THRESHOLDS,
  FUSION_DEFAULTS,
  GENERATION_DEFAULTS,
  GENERATION_FAILED_NOTICE,
  NO_CONTEXT_NOTICE,
  type ConfidenceThresholds,
  type FusionConfig,
} from '../config/constants.js';
import type { ContentStore } from '../db/content-store.js';
import type { LanguageModel, PromptMessage } from '../providers/llm.js';
import type { WebSearch } from '../providers/web-search.js';
import type {
  AnswerRequest,
  AnswerResult,
  ChatMessage,
  Citation,
  CitationKind,
  Confidence,
  RetrievedChunk,
  WebSearchResult,
} from '../types/index.js';
import {
  GenerationError,
  NotFoundError,
  ValidationError,
  errorMessage,
  isFatal,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { retryWithBackoff, withTimeout } from '../utils/retry.js';
import { computeConfidence } from './confidence.js';
import type { Retriever } from './retriever.js';

const log = createLogger('composer');

// ============================================================================
// TYPES
// ============================================================================

export interface GenerationSettings {
  maxTokens: number;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  queryTimeoutMs: number;
}

export interface ComposerOptions {
  fusion: FusionConfig;
  confidence: ConfidenceThresholds;
  generation: GenerationSettings;
}

export interface ComposerDeps {
  retriever: Retriever;
  webSearch: WebSearch;
  llm: LanguageModel;
  store: ContentStore;
}

/** A scored passage before fusion */
export interface Passage {
  kind: CitationKind;
  url: string;
  title: string;
  text: string;
  score: number;
  chunkKey: string | null;
}

/** One source in the prompt context with its passages */
export interface ContextBlock {
  kind: CitationKind;
  url: string;
  title: string;
  bestScore: number;
  passages: Passage[];
}

interface RetrievalState {
  vector: RetrievedChunk[];
  web: WebSearchResult[];
  webSearchUsed: boolean;
}

const SYSTEM_PROMPT = [
  'You answer questions using only the numbered context blocks provided.',
  'Cite the blocks you rely on with their numbers in square brackets, e.g. [1].',
  'If the context does not contain the answer, say so plainly instead of guessing.',
].join(' ');

// ============================================================================
// FUSION
// ============================================================================

export function webPassages(results: WebSearchResult[], fusion: FusionConfig): Passage[] {
  return results.map((result, rank) => ({
    kind: 'web',
    url: result.url,
    title: result.title,
    text: result.snippet,
    score: fusion.webBaseScore * Math.pow(fusion.webRankDecay, rank),
    chunkKey: null,
  }));
}

export function vectorPassages(chunks: RetrievedChunk[]): Passage[] {
  return chunks.map(chunk => ({
    kind: 'stored',
    url: chunk.sourceUrl,
    title: chunk.title,
    text: chunk.text,
    score: chunk.score,
    chunkKey: chunk.key,
  }));
}

function byScore(passages: Passage[]): Passage[] {
  // Stable: equal scores keep stored passages ahead of web ones
  return passages
    .map((passage, i) => ({ passage, i }))
    .sort((a, b) => b.passage.score - a.passage.score || a.i - b.i)
    .map(({ passage }) => passage);
}

/**
 * Interleave passages by score, group them by source (a source is placed at its
 * best score), cap passages per source, and stop adding at maxContextChars.
 */
export function fuseContext(passages: Passage[], fusion: FusionConfig): ContextBlock[] {
  const blocks = new Map<string, ContextBlock>();
  let used = 0;

  for (const passage of byScore(passages)) {
    const text = passage.text.trim();
    if (text.length === 0) continue;
    if (used + text.length > fusion.maxContextChars) continue;

    let block = blocks.get(passage.url);
    if (!block) {
      block = {
        kind: passage.kind,
        url: passage.url,
        title: passage.title,
        bestScore: passage.score,
        passages: [],
      };
      blocks.set(passage.url, block);
    }
    if (block.passages.length >= fusion.maxPassagesPerSource) continue;

    block.passages.push({ ...passage, text });
    used += text.length;
  }

  return [...blocks.values()];
}

export function citationsFor(blocks: ContextBlock[]): Citation[] {
  return blocks.map(block => ({
    url: block.url,
    title: block.title,
    kind: block.kind,
    chunkKeys: block.passages.flatMap(p => (p.chunkKey ? [p.chunkKey] : [])),
    score: block.bestScore,
  }));
}

export function buildPrompt(
  question: string,
  history: ChatMessage[],
  blocks: ContextBlock[],
  maxHistoryTurns: number
): PromptMessage[] {
  const context = blocks
    .map((block, i) => {
      const body = block.passages.map(p => p.text).join('\n\n');
      return `[${i + 1}] ${block.title} (${block.url})\n${body}`;
    })
    .join('\n\n---\n\n');

  const recent = maxHistoryTurns > 0 ? history.slice(-maxHistoryTurns) : [];

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    ...recent.map(message => ({ role: message.role, content: message.content })),
    { role: 'user', content: `Context:\n\n${context}\n\nQuestion: ${question}` },
  ];
}

// ============================================================================
// COMPOSER
// ============================================================================

export class AnswerComposer {
  private readonly options: ComposerOptions;

  constructor(private readonly deps: ComposerDeps, options: Partial<ComposerOptions> = {}) {
    this.options = {
      fusion: options.fusion ?? FUSION_DEFAULTS,
      confidence: options.confidence ?? CONFIDENCE_THRESHOLDS,
      generation: options.generation ?? GENERATION_DEFAULTS,
    };
  }

  async answer(request: AnswerRequest): Promise<AnswerResult> {
    const question = request.question.trim();
    if (question.length === 0) {
      throw new ValidationError('question must not be empty');
    }

    const startedAt = Date.now();
    const state: RetrievalState = { vector: [], web: [], webSearchUsed: false };
    const controller = new AbortController();

    let outcome: Omit<AnswerResult, 'latencyMs' | 'queryLogId'>;
    try {
      outcome = await withTimeout(
        this.compose(question, request, state, controller.signal),
        this.options.generation.queryTimeoutMs,
        () => new GenerationError(`Query exceeded ${this.options.generation.queryTimeoutMs}ms`)
      );
    } catch (error) {
      if (isFatal(error)) throw error;
      log.warn({ error: errorMessage(error) }, 'Answer degraded');
      outcome = this.degraded(state);
    } finally {
      controller.abort();
    }

    const latencyMs = Date.now() - startedAt;
    const queryLogId = await this.logQuery(question, request.sessionId, outcome, latencyMs);

    log.info({
      confidence: outcome.confidence,
      citations: outcome.citations.length,
      degraded: outcome.degraded,
      webSearchUsed: outcome.webSearchUsed,
      latencyMs,
    }, 'Answered question');

    return { ...outcome, latencyMs, queryLogId };
  }

  async recordFeedback(queryId: string, score: number): Promise<void> {
    if (!Number.isInteger(score) || score < 1 || score > 5) {
      throw new ValidationError(`feedback must be an integer from 1 to 5 (got ${score})`);
    }
    const updated = await this.deps.store.recordFeedback(queryId, score);
    if (!updated) {
      throw new NotFoundError(`Query not found: ${queryId}`);
    }
  }

  // ==========================================================================
  // PIPELINE
  // ==========================================================================

  private async compose(
    question: string,
    request: AnswerRequest,
    state: RetrievalState,
    signal: AbortSignal
  ): Promise<Omit<AnswerResult, 'latencyMs' | 'queryLogId'>> {
    const { fusion } = this.options;
    const k = request.kVector ?? fusion.kVector;

    state.vector = await this.retrieveStored(question, k, request);
    if (signal.aborted) throw new GenerationError('Query aborted');

    if (this.shouldSearchWeb(request.useWebSearch, state.vector)) {
      await this.searchWeb(question, state);
    }

    const blocks = fuseContext(
      [...vectorPassages(state.vector), ...webPassages(state.web, fusion)],
      fusion
    );

    if (blocks.length === 0) {
      return {
        answer: NO_CONTEXT_NOTICE,
        citations: [],
        confidence: 'LOW',
        degraded: false,
        webSearchUsed: state.webSearchUsed,
      };
    }

    const messages = buildPrompt(question, request.chatHistory ?? [], blocks, fusion.maxHistoryTurns);
    const answer = await this.generate(messages, signal);

    return {
      answer,
      citations: citationsFor(blocks),
      confidence: this.confidenceOf(blocks),
      degraded: false,
      webSearchUsed: state.webSearchUsed,
    };
  }

  private async retrieveStored(question: string, k: number, request: AnswerRequest): Promise<RetrievedChunk[]> {
    try {
      return await this.deps.retriever.search(question, k, request.filters);
    } catch (error) {
      if (isFatal(error)) throw error;
      log.warn({ error: errorMessage(error) }, 'Vector retrieval failed, continuing without stored context');
      return [];
    }
  }

  private shouldSearchWeb(useWebSearch: boolean | undefined, vector: RetrievedChunk[]): boolean {
    if (useWebSearch !== undefined) return useWebSearch;

    const { webSearchPolicy, minVectorResults, similarityFloor } = this.options.fusion;
    switch (webSearchPolicy) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'auto': {
        const top = vector.length > 0 ? Math.max(...vector.map(c => c.score)) : 0;
        return vector.length < minVectorResults || top < similarityFloor;
      }
    }
  }

  private async searchWeb(question: string, state: RetrievalState): Promise<void> {
    try {
      state.web = await this.deps.webSearch.search(question, this.options.fusion.webResultLimit);
      state.webSearchUsed = state.web.length > 0;
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Web search failed, treating as empty');
      state.web = [];
    }
  }

  private async generate(messages: PromptMessage[], signal: AbortSignal): Promise<string> {
    const { maxTokens, timeoutMs, maxRetries, retryDelayMs } = this.options.generation;

    return retryWithBackoff(
      async () => {
        const attempt = new AbortController();
        const onAbort = () => attempt.abort();
        signal.addEventListener('abort', onAbort, { once: true });
        try {
          const text = await withTimeout(
            this.deps.llm.complete(messages, { signal: attempt.signal, maxTokens }),
            timeoutMs,
            () => {
              attempt.abort();
              return new GenerationError(`Language model timed out after ${timeoutMs}ms`);
            }
          );
          if (text.trim().length === 0) {
            throw new GenerationError('Language model returned an empty answer');
          }
          return text.trim();
        } catch (error) {
          throw error instanceof GenerationError
            ? error
            : new GenerationError(`Language model call failed: ${errorMessage(error)}`, error);
        } finally {
          signal.removeEventListener('abort', onAbort);
        }
      },
      {
        maxRetries,
        initialDelay: retryDelayMs,
        maxDelay: retryDelayMs * 4,
        label: 'generate',
        signal,
      }
    );
  }

  private confidenceOf(blocks: ContextBlock[]): Confidence {
    return computeConfidence(
      {
        vectorSourceScores: blocks.filter(b => b.kind === 'stored').map(b => b.bestScore),
        webSourceCount: blocks.filter(b => b.kind === 'web').length,
      },
      this.options.confidence
    );
  }

  /**
   * Notice plus the top retrieved snippet(s); citations are those snippets' sources.
   */
  private degraded(state: RetrievalState): Omit<AnswerResult, 'latencyMs' | 'queryLogId'> {
    const { fusion } = this.options;
    const snippets = byScore([...vectorPassages(state.vector), ...webPassages(state.web, fusion)])
      .filter(p => p.text.trim().length > 0)
      .slice(0, fusion.degradedSnippetCount);

    const blocks = fuseContext(snippets, { ...fusion, maxContextChars: Number.POSITIVE_INFINITY });
    const body = snippets.map(p => p.text.trim()).join('\n\n');

    return {
      answer: body.length > 0 ? `${GENERATION_FAILED_NOTICE}\n\n${body}` : GENERATION_FAILED_NOTICE,
      citations: citationsFor(blocks),
      confidence: 'LOW',
      degraded: true,
      webSearchUsed: state.webSearchUsed,
    };
  }

  private async logQuery(
    question: string,
    sessionId: string | undefined,
    outcome: Omit<AnswerResult, 'latencyMs' | 'queryLogId'>,
    latencyMs: number
  ): Promise<string | null> {
    try {
      const entry = await this.deps.store.logQuery({
        question,
        answer: outcome.answer,
        citations: outcome.citations,
        confidence: outcome.confidence,
        latencyMs,
        sessionId: sessionId ?? null,
        degraded: outcome.degraded,
        webSearchUsed: outcome.webSearchUsed,
      });
      return entry.id;
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Failed to write query log');
      return null;
    }
  }
}
