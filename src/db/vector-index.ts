/**
 * Vector Index
 * Chunk embeddings keyed by (source, chunk fingerprint), grouped in generations.
 * Only the active generation of each source is visible to search.
 */

import type { IndexEntry, IndexHit, SearchFilters } from '../types/index.js';

export interface VectorIndex {
  /** Insert or replace entries by key; staged entries stay invisible until activated */
  upsert(entries: IndexEntry[]): Promise<void>;
  deleteByKeys(sourceUrl: string, keys: string[]): Promise<number>;
  listKeys(sourceUrl: string, generation: string): Promise<string[]>;

  /** Point the source at a generation; returns the generation it replaced */
  activateGeneration(sourceUrl: string, generation: string): Promise<string | null>;
  getActiveGeneration(sourceUrl: string): Promise<string | null>;
  deactivate(sourceUrl: string): Promise<string | null>;
  deleteGeneration(sourceUrl: string, generation: string): Promise<number>;
  /** Replace the tags on every entry of the source; returns the entries changed */
  setTags(sourceUrl: string, tags: string[]): Promise<number>;

  /** Top-k over active generations: score desc, then retrievedAt desc, then key */
  search(embedding: number[], k: number, filters?: SearchFilters): Promise<IndexHit[]>;
  count(sourceUrl?: string): Promise<number>;

  getEmbeddingVersion(): Promise<string | null>;
  setEmbeddingVersion(version: string): Promise<void>;
  clear(): Promise<void>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function compareHits(a: IndexHit, b: IndexHit): number {
  if (b.score !== a.score) return b.score - a.score;
  const timeDiff = b.entry.retrievedAt.getTime() - a.entry.retrievedAt.getTime();
  if (timeDiff !== 0) return timeDiff;
  return a.entry.key < b.entry.key ? -1 : a.entry.key > b.entry.key ? 1 : 0;
}

export function matchesFilters(entry: Omit<IndexEntry, 'embedding'>, filters: SearchFilters = {}): boolean {
  if (filters.sourceUrl && entry.sourceUrl !== filters.sourceUrl) return false;
  if (filters.tags && filters.tags.length > 0 && !filters.tags.some(tag => entry.tags.includes(tag))) {
    return false;
  }
  if (filters.since && entry.retrievedAt < filters.since) return false;
  if (filters.until && entry.retrievedAt > filters.until) return false;
  return true;
}
