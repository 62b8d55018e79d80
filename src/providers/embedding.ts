/**
 * Embedding provider
 * The version string is stamped on the vector index; vectors from different
 * versions are never compared.
 */

import OpenAI from 'openai';
import { ConfigurationError } from '../utils/errors.js';
import { retryWithBackoff } from '../utils/retry.js';

export interface EmbeddingProvider {
  readonly version: string;
  /** One vector per input text, in input order */
  embed(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbeddingOptions {
  apiKey: string | null;
  model: string;
  maxRetries?: number;
}

// Inputs per request
const EMBED_BATCH_SIZE = 96;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly version: string;
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIEmbeddingOptions) {
    this.version = `openai:${options.model}`;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new ConfigurationError('Missing OPENAI_API_KEY. Set it in .env to enable embeddings.');
      }
      this.client = new OpenAI({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const client = this.getClient();
    const vectors: number[][] = [];

    for (let i = 0; i < texts.length; i += EMBED_BATCH_SIZE) {
      const batch = texts.slice(i, i + EMBED_BATCH_SIZE);
      const response = await retryWithBackoff(
        () => client.embeddings.create({ model: this.options.model, input: batch }),
        { maxRetries: this.options.maxRetries ?? 2, initialDelay: 500, label: 'embed' }
      );
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map(item => item.embedding));
    }

    return vectors;
  }
}
