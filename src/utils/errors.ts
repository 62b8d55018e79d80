/**
 * Pipeline error taxonomy
 *
 * - FetchError: network, timeout or HTTP status failure (retryable when transient)
 * - IndexConsistencyError: staged chunks do not match the record (fatal for the run)
 * - GenerationError: language model call failed or timed out
 * - EmbeddingVersionMismatch: index and query embeddings come from different models
 * - ConfigurationError / ValidationError: bad settings or bad input
 */

export type PipelineErrorCode =
  | 'FETCH_FAILED'
  | 'INDEX_CONSISTENCY'
  | 'GENERATION_FAILED'
  | 'EMBEDDING_VERSION_MISMATCH'
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'NOT_FOUND';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly retryable: boolean;

  constructor(code: PipelineErrorCode, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

export class FetchError extends PipelineError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, options: { status?: number; retryable: boolean; cause?: unknown }) {
    super('FETCH_FAILED', message, options);
    this.url = url;
    this.status = options.status ?? null;
  }
}

export class IndexConsistencyError extends PipelineError {
  readonly sourceUrl: string;

  constructor(sourceUrl: string, message: string) {
    super('INDEX_CONSISTENCY', message);
    this.sourceUrl = sourceUrl;
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_FAILED', message, { retryable: true, cause });
  }
}

export class EmbeddingVersionMismatch extends PipelineError {
  readonly indexVersion: string;
  readonly providerVersion: string;

  constructor(indexVersion: string, providerVersion: string) {
    super(
      'EMBEDDING_VERSION_MISMATCH',
      `Vector index was built with "${indexVersion}" but the embedding provider is "${providerVersion}". Run a full re-index.`
    );
    this.indexVersion = indexVersion;
    this.providerVersion = providerVersion;
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class NotFoundError extends PipelineError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Errors that must stop the pipeline instead of failing one source or degrading one answer */
export function isFatal(error: unknown): boolean {
  return error instanceof EmbeddingVersionMismatch || error instanceof ConfigurationError;
}
