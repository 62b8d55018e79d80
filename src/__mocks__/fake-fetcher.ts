/**
 * In-process fetcher serving canned pages by URL
 */

import type { ContentFetcher, FetchedPage } from '../services/fetcher.js';
import { FetchError } from '../utils/errors.js';

export interface FakePage {
  body: string;
  contentType?: string;
  lastModified?: Date;
}

export class FakeFetcher implements ContentFetcher {
  readonly requests: string[] = [];
  private readonly pages = new Map<string, FakePage | FetchError>();

  serve(url: string, page: FakePage | string): this {
    this.pages.set(url, typeof page === 'string' ? { body: page } : page);
    return this;
  }

  fail(url: string, status = 503): this {
    this.pages.set(url, new FetchError(url, `HTTP ${status}`, { status, retryable: status >= 500 }));
    return this;
  }

  async fetch(url: string): Promise<FetchedPage> {
    this.requests.push(url);
    const page = this.pages.get(url);
    if (!page) {
      throw new FetchError(url, 'HTTP 404', { status: 404, retryable: false });
    }
    if (page instanceof FetchError) throw page;
    return {
      url,
      finalUrl: url,
      status: 200,
      contentType: page.contentType ?? 'text/html; charset=utf-8',
      body: page.body,
      lastModified: page.lastModified ?? null,
    };
  }
}
