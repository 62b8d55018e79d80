/**
 * Live web search capability (SearXNG JSON API)
 */

import { z } from 'zod';
import type { WebSearchResult } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('web-search');

export interface WebSearch {
  search(query: string, limit: number): Promise<WebSearchResult[]>;
}

const searxngResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().default(''),
      url: z.string(),
      content: z.string().optional(),
    })
  ).default([]),
});

export interface SearxngOptions {
  baseUrl: string;
  timeoutMs: number;
  categories?: string[];
  language?: string;
}

export class SearxngWebSearch implements WebSearch {
  constructor(private readonly options: SearxngOptions) {}

  async search(query: string, limit: number): Promise<WebSearchResult[]> {
    const url = new URL('/search', this.options.baseUrl);
    url.searchParams.set('format', 'json');
    url.searchParams.set('q', query);
    if (this.options.categories?.length) {
      url.searchParams.set('categories', this.options.categories.join(','));
    }
    if (this.options.language) {
      url.searchParams.set('language', this.options.language);
    }

    const res = await fetch(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    if (!res.ok) {
      throw new Error(`SearXNG search failed: HTTP ${res.status} ${res.statusText}`);
    }

    const parsed = searxngResponseSchema.parse(await res.json());
    const results = parsed.results.slice(0, limit).map(result => ({
      title: result.title || result.url,
      url: result.url,
      snippet: result.content ?? '',
    }));

    log.debug({ query, count: results.length }, 'Web search complete');
    return results;
  }
}

/** Used when no search backend is configured */
export class DisabledWebSearch implements WebSearch {
  async search(): Promise<WebSearchResult[]> {
    return [];
  }
}
