import type { WebSearch } from '../providers/web-search.js';
import type { WebSearchResult } from '../types/index.js';

export class FakeWebSearch implements WebSearch {
  readonly queries: string[] = [];
  failWith: Error | null = null;

  constructor(public results: WebSearchResult[] = []) {}

  async search(query: string, limit: number): Promise<WebSearchResult[]> {
    this.queries.push(query);
    if (this.failWith) throw this.failWith;
    return this.results.slice(0, limit);
  }
}
