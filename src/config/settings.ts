/**
 * Pipeline Settings
 * Environment-driven runtime configuration, validated once at startup
 */

import {
  CHUNKING_DEFAULTS,
  CLASSIFIER_DEFAULTS,
  CONFIDENCE_THRESHOLDS,
  FETCH_DEFAULTS,
  FUSION_DEFAULTS,
  GENERATION_DEFAULTS,
  INGESTION_DEFAULTS,
  type ChunkingConfig,
  type ClassifierConfig,
  type ConfidenceThresholds,
  type FusionConfig,
  type WebSearchPolicy,
} from './constants.js';
import {
  getEnvFloatOrDefault,
  getEnvIntOrDefault,
  getEnvOrDefault,
  type Env,
} from './env.js';
import { ConfigurationError } from '../utils/errors.js';

export type VectorIndexKind = 'postgres' | 'memory';

export interface PipelineSettings {
  chunking: ChunkingConfig;
  classifier: ClassifierConfig;
  fetch: {
    timeoutMs: number;
    maxRetries: number;
    initialRetryDelayMs: number;
    maxRetryDelayMs: number;
    maxContentBytes: number;
    userAgent: string;
  };
  ingestion: {
    maxFollowUpsPerRun: number;
    ingestConcurrency: number;
    checkFrequencyHours: number;
    maxContentAgeDays: number;
  };
  fusion: FusionConfig;
  confidence: ConfidenceThresholds;
  generation: {
    chatModel: string;
    embeddingModel: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    queryTimeoutMs: number;
  };
  providers: {
    openaiApiKey: string | null;
    searxngUrl: string | null;
  };
  vectorIndex: VectorIndexKind;
}

const WEB_SEARCH_POLICIES: readonly WebSearchPolicy[] = ['auto', 'always', 'never'];
const VECTOR_INDEX_KINDS: readonly VectorIndexKind[] = ['postgres', 'memory'];

function parseChoice<T extends string>(key: string, value: string, choices: readonly T[]): T {
  const match = choices.find(choice => choice === value);
  if (!match) {
    throw new ConfigurationError(`${key} must be one of ${choices.join(', ')} (got "${value}")`);
  }
  return match;
}

/**
 * Build settings from the environment. Throws ConfigurationError on
 * inconsistent values so the pipeline never starts half-configured.
 */
export function loadSettings(env: Env = process.env): PipelineSettings {
  const settings: PipelineSettings = {
    chunking: {
      chunkSize: getEnvIntOrDefault('CHUNK_SIZE', CHUNKING_DEFAULTS.chunkSize, env),
      chunkOverlap: getEnvIntOrDefault('CHUNK_OVERLAP', CHUNKING_DEFAULTS.chunkOverlap, env),
      minChunkRatio: CHUNKING_DEFAULTS.minChunkRatio,
    },
    classifier: { ...CLASSIFIER_DEFAULTS },
    fetch: {
      ...FETCH_DEFAULTS,
      timeoutMs: getEnvIntOrDefault('FETCH_TIMEOUT_MS', FETCH_DEFAULTS.timeoutMs, env),
      maxRetries: getEnvIntOrDefault('FETCH_MAX_RETRIES', FETCH_DEFAULTS.maxRetries, env),
      userAgent: getEnvOrDefault('FETCH_USER_AGENT', FETCH_DEFAULTS.userAgent, env),
    },
    ingestion: {
      maxFollowUpsPerRun: getEnvIntOrDefault('MAX_FOLLOW_UPS_PER_RUN', INGESTION_DEFAULTS.maxFollowUpsPerRun, env),
      ingestConcurrency: getEnvIntOrDefault('INGEST_CONCURRENCY', INGESTION_DEFAULTS.ingestConcurrency, env),
      checkFrequencyHours: getEnvIntOrDefault('CHECK_FREQUENCY_HOURS', INGESTION_DEFAULTS.checkFrequencyHours, env),
      maxContentAgeDays: getEnvIntOrDefault('MAX_CONTENT_AGE_DAYS', INGESTION_DEFAULTS.maxContentAgeDays, env),
    },
    fusion: {
      ...FUSION_DEFAULTS,
      webSearchPolicy: parseChoice(
        'WEB_SEARCH_POLICY',
        getEnvOrDefault('WEB_SEARCH_POLICY', FUSION_DEFAULTS.webSearchPolicy, env),
        WEB_SEARCH_POLICIES
      ),
      similarityFloor: getEnvFloatOrDefault('SIMILARITY_FLOOR', FUSION_DEFAULTS.similarityFloor, env),
      maxContextChars: getEnvIntOrDefault('MAX_CONTEXT_CHARS', FUSION_DEFAULTS.maxContextChars, env),
    },
    confidence: {
      weak: getEnvFloatOrDefault('CONFIDENCE_WEAK', CONFIDENCE_THRESHOLDS.weak, env),
      strong: getEnvFloatOrDefault('CONFIDENCE_STRONG', CONFIDENCE_THRESHOLDS.strong, env),
      decisive: getEnvFloatOrDefault('CONFIDENCE_DECISIVE', CONFIDENCE_THRESHOLDS.decisive, env),
    },
    generation: {
      ...GENERATION_DEFAULTS,
      chatModel: getEnvOrDefault('OPENAI_CHAT_MODEL', GENERATION_DEFAULTS.chatModel, env),
      embeddingModel: getEnvOrDefault('OPENAI_EMBEDDING_MODEL', GENERATION_DEFAULTS.embeddingModel, env),
      timeoutMs: getEnvIntOrDefault('LLM_TIMEOUT_MS', GENERATION_DEFAULTS.timeoutMs, env),
      queryTimeoutMs: getEnvIntOrDefault('QUERY_TIMEOUT_MS', GENERATION_DEFAULTS.queryTimeoutMs, env),
    },
    providers: {
      openaiApiKey: env.OPENAI_API_KEY ?? null,
      searxngUrl: env.SEARXNG_URL ?? null,
    },
    vectorIndex: parseChoice('VECTOR_INDEX', getEnvOrDefault('VECTOR_INDEX', 'postgres', env), VECTOR_INDEX_KINDS),
  };

  validateSettings(settings);
  return settings;
}

export function validateSettings(settings: PipelineSettings): void {
  const { chunkSize, chunkOverlap } = settings.chunking;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`CHUNK_SIZE must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new ConfigurationError(`CHUNK_OVERLAP must be in [0, CHUNK_SIZE) (got ${chunkOverlap})`);
  }

  const { weak, strong, decisive } = settings.confidence;
  if (!(weak <= strong && strong <= decisive)) {
    throw new ConfigurationError(`Confidence thresholds must satisfy weak <= strong <= decisive (got ${weak}, ${strong}, ${decisive})`);
  }

  const positives: Array<[string, number]> = [
    ['FETCH_TIMEOUT_MS', settings.fetch.timeoutMs],
    ['LLM_TIMEOUT_MS', settings.generation.timeoutMs],
    ['QUERY_TIMEOUT_MS', settings.generation.queryTimeoutMs],
    ['MAX_CONTEXT_CHARS', settings.fusion.maxContextChars],
    ['INGEST_CONCURRENCY', settings.ingestion.ingestConcurrency],
    ['MAX_CONTENT_AGE_DAYS', settings.ingestion.maxContentAgeDays],
  ];
  for (const [key, value] of positives) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`${key} must be positive (got ${value})`);
    }
  }

  if (!Number.isInteger(settings.fetch.maxRetries) || settings.fetch.maxRetries < 0) {
    throw new ConfigurationError(`FETCH_MAX_RETRIES must be a non-negative integer (got ${settings.fetch.maxRetries})`);
  }
  if (!Number.isInteger(settings.ingestion.maxFollowUpsPerRun) || settings.ingestion.maxFollowUpsPerRun < 0) {
    throw new ConfigurationError(`MAX_FOLLOW_UPS_PER_RUN must be a non-negative integer (got ${settings.ingestion.maxFollowUpsPerRun})`);
  }
}
