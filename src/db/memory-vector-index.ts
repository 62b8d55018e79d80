/**
 * In-process vector index (VECTOR_INDEX=memory, tests)
 */

import type { IndexEntry, IndexHit, SearchFilters } from '../types/index.js';
import { compareHits, cosineSimilarity, matchesFilters, type VectorIndex } from './vector-index.js';

export class MemoryVectorIndex implements VectorIndex {
  // sourceUrl -> chunk key -> entry
  private entries = new Map<string, Map<string, IndexEntry>>();
  private active = new Map<string, string>();
  private embeddingVersion: string | null = null;

  async upsert(entries: IndexEntry[]): Promise<void> {
    for (const entry of entries) {
      let bySource = this.entries.get(entry.sourceUrl);
      if (!bySource) {
        bySource = new Map();
        this.entries.set(entry.sourceUrl, bySource);
      }
      bySource.set(entry.key, { ...entry, tags: [...entry.tags], embedding: [...entry.embedding] });
    }
  }

  async deleteByKeys(sourceUrl: string, keys: string[]): Promise<number> {
    const bySource = this.entries.get(sourceUrl);
    if (!bySource) return 0;
    let deleted = 0;
    for (const key of keys) {
      if (bySource.delete(key)) deleted++;
    }
    if (bySource.size === 0) this.entries.delete(sourceUrl);
    return deleted;
  }

  async listKeys(sourceUrl: string, generation: string): Promise<string[]> {
    const bySource = this.entries.get(sourceUrl);
    if (!bySource) return [];
    return [...bySource.values()]
      .filter(entry => entry.generation === generation)
      .sort((a, b) => a.sequence - b.sequence)
      .map(entry => entry.key);
  }

  async activateGeneration(sourceUrl: string, generation: string): Promise<string | null> {
    const previous = this.active.get(sourceUrl) ?? null;
    this.active.set(sourceUrl, generation);
    return previous;
  }

  async getActiveGeneration(sourceUrl: string): Promise<string | null> {
    return this.active.get(sourceUrl) ?? null;
  }

  async deactivate(sourceUrl: string): Promise<string | null> {
    const previous = this.active.get(sourceUrl) ?? null;
    this.active.delete(sourceUrl);
    return previous;
  }

  async deleteGeneration(sourceUrl: string, generation: string): Promise<number> {
    const keys = await this.listKeys(sourceUrl, generation);
    return this.deleteByKeys(sourceUrl, keys);
  }

  async setTags(sourceUrl: string, tags: string[]): Promise<number> {
    const bySource = this.entries.get(sourceUrl);
    if (!bySource) return 0;
    let changed = 0;
    for (const entry of bySource.values()) {
      if (entry.tags.length === tags.length && entry.tags.every((tag, i) => tag === tags[i])) continue;
      entry.tags = [...tags];
      changed++;
    }
    return changed;
  }

  async search(embedding: number[], k: number, filters?: SearchFilters): Promise<IndexHit[]> {
    if (k <= 0) return [];
    const hits: IndexHit[] = [];
    for (const [sourceUrl, bySource] of this.entries) {
      const generation = this.active.get(sourceUrl);
      if (!generation) continue;
      for (const entry of bySource.values()) {
        if (entry.generation !== generation) continue;
        const { embedding: stored, ...rest } = entry;
        if (!matchesFilters(rest, filters)) continue;
        hits.push({ entry: rest, score: cosineSimilarity(embedding, stored) });
      }
    }
    return hits.sort(compareHits).slice(0, k);
  }

  async count(sourceUrl?: string): Promise<number> {
    if (sourceUrl) return this.entries.get(sourceUrl)?.size ?? 0;
    let total = 0;
    for (const bySource of this.entries.values()) total += bySource.size;
    return total;
  }

  async getEmbeddingVersion(): Promise<string | null> {
    return this.embeddingVersion;
  }

  async setEmbeddingVersion(version: string): Promise<void> {
    this.embeddingVersion = version;
  }

  async clear(): Promise<void> {
    this.entries.clear();
    this.active.clear();
    this.embeddingVersion = null;
  }
}
