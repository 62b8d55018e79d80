/**
 * Chunker
 * Splits canonical text into overlapping slices. Boundaries prefer a paragraph
 * break, then a sentence end, then whitespace; each slice after the first
 * starts on a word boundary inside the previous one.
 *
 * Invariant: chunks[0].text + chunks[i].text.slice(chunks[i].overlap) for
 * i = 1..n-1 equals the input exactly.
 */

import { CHUNKING_DEFAULTS, type ChunkingConfig } from '../config/constants.js';
import type { ChunkSpan } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

const SENTENCE_END = /[.!?]["')\]]?\s/g;

export class Chunker {
  private readonly config: ChunkingConfig;

  constructor(config: Partial<ChunkingConfig> = {}) {
    this.config = { ...CHUNKING_DEFAULTS, ...config };
    const { chunkSize, chunkOverlap } = this.config;
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ConfigurationError(`chunkSize must be a positive integer (got ${chunkSize})`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ConfigurationError(`chunkOverlap must be in [0, chunkSize) (got ${chunkOverlap})`);
    }
  }

  chunk(text: string): ChunkSpan[] {
    const spans: ChunkSpan[] = [];
    if (text.length === 0) return spans;

    const { chunkSize } = this.config;
    let start = 0;
    let overlap = 0;

    for (let sequence = 0; ; sequence++) {
      const end = text.length - start <= chunkSize ? text.length : this.findBreak(text, start);
      spans.push({ sequence, start, end, overlap, text: text.slice(start, end) });
      if (end >= text.length) break;

      const next = this.nextStart(text, start, end);
      overlap = end - next;
      start = next;
    }

    return spans;
  }

  /** Exclusive end of the slice starting at `start` */
  private findBreak(text: string, start: number): number {
    const { chunkSize, minChunkRatio } = this.config;
    const limit = start + chunkSize;
    const minEnd = start + Math.max(1, Math.floor(chunkSize * minChunkRatio));
    const window = text.slice(start, limit);

    const paragraph = window.lastIndexOf('\n\n');
    if (paragraph >= 0 && start + paragraph + 2 >= minEnd) {
      return start + paragraph + 2;
    }

    let sentenceEnd = -1;
    for (const match of window.matchAll(SENTENCE_END)) {
      sentenceEnd = (match.index ?? 0) + match[0].length;
    }
    if (sentenceEnd >= 0 && start + sentenceEnd >= minEnd) {
      return start + sentenceEnd;
    }

    for (let i = window.length - 1; i >= 0; i--) {
      if (start + i + 1 < minEnd) break;
      if (/\s/.test(window[i])) return start + i + 1;
    }

    return limit;
  }

  /** First word start at or after end - overlap; always past `start` */
  private nextStart(text: string, start: number, end: number): number {
    const from = Math.max(end - this.config.chunkOverlap, start + 1);
    for (let i = from; i < end; i++) {
      if (/\s/.test(text[i - 1]) && !/\s/.test(text[i])) return i;
    }
    return end;
  }
}

/** Inverse of chunk(): drops each chunk's overlap and concatenates */
export function reconstructText(spans: ChunkSpan[]): string {
  return spans.map((span, i) => (i === 0 ? span.text : span.text.slice(span.overlap))).join('');
}
