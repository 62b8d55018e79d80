/**
 * Language model capability
 */

import OpenAI from 'openai';
import { ConfigurationError } from '../utils/errors.js';

export interface PromptMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  signal?: AbortSignal;
  maxTokens?: number;
}

export interface LanguageModel {
  complete(messages: PromptMessage[], options?: CompletionOptions): Promise<string>;
}

export interface OpenAIChatOptions {
  apiKey: string | null;
  model: string;
  temperature: number;
  maxTokens: number;
}

export class OpenAIChatModel implements LanguageModel {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIChatOptions) {}

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new ConfigurationError('Missing OPENAI_API_KEY. Set it in .env to enable answer generation.');
      }
      // Retries are owned by the caller
      this.client = new OpenAI({ apiKey: this.options.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async complete(messages: PromptMessage[], options: CompletionOptions = {}): Promise<string> {
    const res = await this.getClient().chat.completions.create(
      {
        model: this.options.model,
        messages,
        temperature: this.options.temperature,
        max_tokens: options.maxTokens ?? this.options.maxTokens,
      },
      { signal: options.signal }
    );
    return res.choices[0]?.message?.content?.trim() ?? '';
  }
}
