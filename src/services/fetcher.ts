/**
 * Fetcher Service
 * HTTP retrieval of monitored sources with timeout, bounded retries and
 * content-type/size checks. Parsing happens in the normalizer.
 */

import {
  ACCEPTED_CONTENT_TYPES,
  FETCH_DEFAULTS,
  RETRYABLE_HTTP_STATUSES,
} from '../config/constants.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';

const log = createLogger('fetcher');

// ============================================================================
// TYPES
// ============================================================================

export interface FetchedPage {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
  lastModified: Date | null;
}

export interface FetcherOptions {
  timeoutMs: number;
  maxRetries: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  maxContentBytes: number;
  userAgent: string;
}

/**
 * Anything that can turn a URL into a page body.
 * Implementations throw FetchError; `retryable` marks transient failures.
 */
export interface ContentFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

// ============================================================================
// HTTP FETCHER
// ============================================================================

export class HttpFetcher implements ContentFetcher {
  private readonly options: FetcherOptions;

  constructor(options: Partial<FetcherOptions> = {}) {
    this.options = { ...FETCH_DEFAULTS, ...options };
  }

  async fetch(url: string): Promise<FetchedPage> {
    return retryWithBackoff(
      () => this.fetchOnce(url),
      {
        maxRetries: this.options.maxRetries,
        initialDelay: this.options.initialRetryDelayMs,
        maxDelay: this.options.maxRetryDelayMs,
        shouldRetry: error => error instanceof FetchError && error.retryable,
        label: `fetch ${url}`,
      }
    );
  }

  private async fetchOnce(url: string): Promise<FetchedPage> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          signal: controller.signal,
          redirect: 'follow',
          headers: {
            'User-Agent': this.options.userAgent,
            'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,application/rss+xml,application/atom+xml,application/feed+json,*/*;q=0.8',
          },
        });
      } catch (error) {
        const timedOut = controller.signal.aborted;
        throw new FetchError(
          url,
          timedOut ? `Timed out after ${this.options.timeoutMs}ms` : `Network error: ${errorMessage(error)}`,
          { retryable: true, cause: error }
        );
      }

      if (!response.ok) {
        throw new FetchError(url, `HTTP ${response.status}: ${response.statusText}`, {
          status: response.status,
          retryable: RETRYABLE_HTTP_STATUSES.has(response.status),
        });
      }

      const contentType = (response.headers.get('content-type') ?? 'text/html').split(';')[0].trim().toLowerCase();
      if (!ACCEPTED_CONTENT_TYPES.includes(contentType)) {
        throw new FetchError(url, `Unsupported content type: ${contentType}`, {
          status: response.status,
          retryable: false,
        });
      }

      const declaredLength = Number(response.headers.get('content-length') ?? 0);
      if (declaredLength > this.options.maxContentBytes) {
        throw new FetchError(url, `Content too large: ${declaredLength} bytes`, {
          status: response.status,
          retryable: false,
        });
      }

      let body: string;
      try {
        body = await response.text();
      } catch (error) {
        throw new FetchError(url, `Failed reading body: ${errorMessage(error)}`, {
          status: response.status,
          retryable: true,
          cause: error,
        });
      }
      if (Buffer.byteLength(body, 'utf-8') > this.options.maxContentBytes) {
        throw new FetchError(url, `Content too large: over ${this.options.maxContentBytes} bytes`, {
          status: response.status,
          retryable: false,
        });
      }

      const lastModifiedHeader = response.headers.get('last-modified');
      const lastModified = lastModifiedHeader ? new Date(lastModifiedHeader) : null;

      log.debug({ url, status: response.status, contentType, bytes: body.length }, 'Fetched');

      return {
        url,
        finalUrl: response.url || url,
        status: response.status,
        contentType,
        body,
        lastModified: lastModified && !isNaN(lastModified.getTime()) ? lastModified : null,
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
