import { describe, it, expect } from 'vitest';
import { MemoryVectorIndex } from './memory-vector-index.js';
import { cosineSimilarity } from './vector-index.js';
import type { IndexEntry } from '../types/index.js';

function entry(overrides: Partial<IndexEntry> & Pick<IndexEntry, 'key' | 'sourceUrl' | 'generation' | 'embedding'>): IndexEntry {
  return {
    sequence: 0,
    start: 0,
    end: 10,
    tags: [],
    retrievedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('cosineSimilarity', () => {
  it('handles parallel, orthogonal and degenerate vectors', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1], [1, 0])).toBe(0);
  });
});

describe('MemoryVectorIndex', () => {
  it('hides staged entries until their generation is activated', async () => {
    const index = new MemoryVectorIndex();
    await index.upsert([entry({ key: 'k1', sourceUrl: 'https://a.test/', generation: 'g1', embedding: [1, 0] })]);

    expect(await index.search([1, 0], 5)).toEqual([]);

    expect(await index.activateGeneration('https://a.test/', 'g1')).toBeNull();
    const hits = await index.search([1, 0], 5);
    expect(hits.map(h => h.entry.key)).toEqual(['k1']);
    expect(hits[0].score).toBe(1);
  });

  it('searches only the active generation of each source', async () => {
    const index = new MemoryVectorIndex();
    await index.upsert([
      entry({ key: 'old', sourceUrl: 'https://a.test/', generation: 'g1', embedding: [1, 0] }),
      entry({ key: 'new', sourceUrl: 'https://a.test/', generation: 'g2', embedding: [1, 0] }),
    ]);
    await index.activateGeneration('https://a.test/', 'g1');

    expect(await index.activateGeneration('https://a.test/', 'g2')).toBe('g1');
    expect((await index.search([1, 0], 5)).map(h => h.entry.key)).toEqual(['new']);
  });

  it('replaces tags on every entry of a source', async () => {
    const index = new MemoryVectorIndex();
    await index.upsert([
      entry({ key: 'k1', sourceUrl: 'https://a.test/', generation: 'g', embedding: [1, 0], tags: ['old'] }),
      entry({ key: 'k2', sourceUrl: 'https://a.test/', generation: 'g', embedding: [0, 1], tags: ['old'] }),
    ]);
    await index.activateGeneration('https://a.test/', 'g');

    expect(await index.setTags('https://a.test/', ['new'])).toBe(2);
    expect(await index.setTags('https://a.test/', ['new'])).toBe(0);
    expect(await index.setTags('https://b.test/', ['new'])).toBe(0);
    expect(await index.search([1, 0], 5, { tags: ['old'] })).toEqual([]);
    expect((await index.search([1, 0], 5, { tags: ['new'] })).map(h => h.entry.key)).toEqual(['k1', 'k2']);
  });

  it('orders by score, then recency, then key', async () => {
    const index = new MemoryVectorIndex();
    await index.upsert([
      entry({ key: 'b', sourceUrl: 'https://a.test/', generation: 'g', embedding: [1, 0] }),
      entry({ key: 'a', sourceUrl: 'https://a.test/', generation: 'g', embedding: [1, 0], sequence: 1 }),
      entry({
        key: 'c',
        sourceUrl: 'https://b.test/',
        generation: 'g',
        embedding: [1, 0],
        retrievedAt: new Date('2026-02-01T00:00:00Z'),
      }),
      entry({ key: 'd', sourceUrl: 'https://b.test/', generation: 'g', embedding: [1, 1], sequence: 1 }),
    ]);
    await index.activateGeneration('https://a.test/', 'g');
    await index.activateGeneration('https://b.test/', 'g');

    const hits = await index.search([1, 0], 3);
    expect(hits.map(h => h.entry.key)).toEqual(['c', 'a', 'b']);
  });

  it('applies source, tag and date filters', async () => {
    const index = new MemoryVectorIndex();
    await index.upsert([
      entry({ key: 'k1', sourceUrl: 'https://a.test/', generation: 'g', embedding: [1, 0], tags: ['node'] }),
      entry({
        key: 'k2',
        sourceUrl: 'https://b.test/',
        generation: 'g',
        embedding: [1, 0],
        tags: ['postgres'],
        retrievedAt: new Date('2026-03-01T00:00:00Z'),
      }),
    ]);
    await index.activateGeneration('https://a.test/', 'g');
    await index.activateGeneration('https://b.test/', 'g');

    const keys = async (filters: Parameters<MemoryVectorIndex['search']>[2]) =>
      (await index.search([1, 0], 5, filters)).map(h => h.entry.key);

    expect(await keys({ sourceUrl: 'https://a.test/' })).toEqual(['k1']);
    expect(await keys({ tags: ['postgres', 'rust'] })).toEqual(['k2']);
    expect(await keys({ since: new Date('2026-02-01T00:00:00Z') })).toEqual(['k2']);
    expect(await keys({ until: new Date('2026-01-01T00:00:00Z') })).toEqual(['k1']);
  });

  it('deletes a generation and returns the count', async () => {
    const index = new MemoryVectorIndex();
    await index.upsert([
      entry({ key: 'k1', sourceUrl: 'https://a.test/', generation: 'g1', embedding: [1] }),
      entry({ key: 'k2', sourceUrl: 'https://a.test/', generation: 'g1', embedding: [1], sequence: 1 }),
      entry({ key: 'k3', sourceUrl: 'https://a.test/', generation: 'g2', embedding: [1] }),
    ]);

    expect(await index.listKeys('https://a.test/', 'g1')).toEqual(['k1', 'k2']);
    expect(await index.deleteGeneration('https://a.test/', 'g1')).toBe(2);
    expect(await index.count('https://a.test/')).toBe(1);
    expect(await index.count()).toBe(1);
  });

  it('clears entries, activations and the version stamp', async () => {
    const index = new MemoryVectorIndex();
    await index.setEmbeddingVersion('fake:v1');
    await index.upsert([entry({ key: 'k1', sourceUrl: 'https://a.test/', generation: 'g', embedding: [1] })]);
    await index.activateGeneration('https://a.test/', 'g');

    await index.clear();

    expect(await index.count()).toBe(0);
    expect(await index.getActiveGeneration('https://a.test/')).toBeNull();
    expect(await index.getEmbeddingVersion()).toBeNull();
  });
});
