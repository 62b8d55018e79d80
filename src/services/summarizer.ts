/**
 * Summarizer
 * Highlights of recently ingested content, for the daily digest and per-topic
 * briefs. Delivery (email etc.) is left to the caller.
 */

import type { ContentStore } from '../db/content-store.js';
import type { LanguageModel, PromptMessage } from '../providers/llm.js';
import type { ContentSummaryRow } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';

const log = createLogger('summarizer');

export interface SummarySource {
  title: string;
  url: string;
}

export interface ContentSummary {
  summary: string;
  topic: string | null;
  periodDays: number;
  contentCount: number;
  sources: SummarySource[];
  degraded: boolean;
  generatedAt: Date;
}

export interface SummarizerOptions {
  timeoutMs: number;
  maxTokens: number;
  excerptChars: number;
  maxPromptChars: number;
}

const DEFAULT_OPTIONS: SummarizerOptions = {
  timeoutMs: 60000,
  maxTokens: 800,
  excerptChars: 500,
  maxPromptChars: 12000,
};

const DAILY_INSTRUCTIONS = [
  'Create a daily summary of the following newly collected content.',
  'Provide: key highlights (3-5 main points), important updates or changes,',
  'relevant trends or patterns, and follow-ups worth a closer look.',
  'Write clearly and concisely, suitable for an email digest.',
].join(' ');

function topicInstructions(topic: string): string {
  return [
    `Create a focused summary about "${topic}" from the following content.`,
    `Provide: an overview of ${topic} developments, key insights and trends,`,
    'notable changes or updates, and likely implications.',
    `Leave out anything unrelated to ${topic}.`,
  ].join(' ');
}

export class Summarizer {
  private readonly options: SummarizerOptions;

  constructor(
    private readonly store: ContentStore,
    private readonly llm: LanguageModel,
    options: Partial<SummarizerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Content retrieved in the last 24 hours, optionally narrowed to a topic */
  async createDailySummary(topic?: string, now: Date = new Date()): Promise<ContentSummary> {
    return this.summarize({
      topic: topic?.trim() || null,
      periodDays: 1,
      now,
      instructions: topic?.trim() ? `${DAILY_INSTRUCTIONS} Focus on "${topic.trim()}".` : DAILY_INSTRUCTIONS,
    });
  }

  async createTopicSummary(topic: string, days = 7, now: Date = new Date()): Promise<ContentSummary> {
    return this.summarize({
      topic: topic.trim(),
      periodDays: days,
      now,
      instructions: topicInstructions(topic.trim()),
    });
  }

  private async summarize(params: {
    topic: string | null;
    periodDays: number;
    now: Date;
    instructions: string;
  }): Promise<ContentSummary> {
    const since = new Date(params.now.getTime() - params.periodDays * 24 * 60 * 60 * 1000);
    const rows = await this.store.getContentSince(since, params.topic ?? undefined);
    const sources = uniqueSources(rows);

    const base = {
      topic: params.topic,
      periodDays: params.periodDays,
      contentCount: rows.length,
      sources,
      generatedAt: params.now,
    };

    if (rows.length === 0) {
      const scope = params.topic ? ` for topic "${params.topic}"` : '';
      return {
        ...base,
        summary: `No new content found${scope} in the last ${params.periodDays} day(s).`,
        degraded: false,
      };
    }

    const messages: PromptMessage[] = [
      { role: 'system', content: 'You write accurate, well-organized content summaries.' },
      { role: 'user', content: `${params.instructions}\n\n${this.renderContent(rows)}` },
    ];

    try {
      const summary = await withTimeout(
        this.llm.complete(messages, { maxTokens: this.options.maxTokens }),
        this.options.timeoutMs,
        () => new Error(`Summary generation timed out after ${this.options.timeoutMs}ms`)
      );
      if (summary.trim().length === 0) {
        throw new Error('Language model returned an empty summary');
      }
      log.info({ topic: params.topic, contentCount: rows.length }, 'Summary generated');
      return { ...base, summary: summary.trim(), degraded: false };
    } catch (error) {
      log.warn({ topic: params.topic, error: errorMessage(error) }, 'Summary generation failed, listing titles');
      const titles = sources.map(source => `- ${source.title} (${source.url})`).join('\n');
      return {
        ...base,
        summary: `Summary generation failed. New content:\n${titles}`,
        degraded: true,
      };
    }
  }

  private renderContent(rows: ContentSummaryRow[]): string {
    const parts: string[] = [];
    let used = 0;
    for (const row of rows) {
      const excerpt = row.text.length > this.options.excerptChars
        ? `${row.text.slice(0, this.options.excerptChars)}...`
        : row.text;
      const part = `Title: ${row.title}\nSource: ${row.sourceUrl}\nContent: ${excerpt}`;
      if (used + part.length > this.options.maxPromptChars) break;
      parts.push(part);
      used += part.length;
    }
    return parts.join('\n\n');
  }
}

function uniqueSources(rows: ContentSummaryRow[]): SummarySource[] {
  const seen = new Map<string, SummarySource>();
  for (const row of rows) {
    if (!seen.has(row.sourceUrl)) {
      seen.set(row.sourceUrl, { title: row.title, url: row.sourceUrl });
    }
  }
  return [...seen.values()];
}
