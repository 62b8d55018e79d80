/**
 * Deterministic embedding provider for tests.
 * Texts registered with `set` get that vector; anything else gets a hashed
 * bag-of-words vector, so texts sharing words are similar.
 */

import { createHash } from 'crypto';
import type { EmbeddingProvider } from '../providers/embedding.js';

export class FakeEmbedder implements EmbeddingProvider {
  readonly version: string;
  readonly calls: string[][] = [];
  private readonly fixed = new Map<string, number[]>();

  constructor(version = 'fake:v1', private readonly dimensions = 32) {
    this.version = version;
  }

  set(text: string, vector: number[]): this {
    this.fixed.set(text, vector);
    return this;
  }

  get textsEmbedded(): number {
    return this.calls.reduce((sum, batch) => sum + batch.length, 0);
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map(text => this.fixed.get(text) ?? this.hashed(text));
  }

  private hashed(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const bucket = createHash('sha256').update(word).digest().readUInt32BE(0) % this.dimensions;
      vector[bucket] += 1;
    }
    return vector;
  }
}
