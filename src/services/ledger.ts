/**
 * Deduplication Ledger
 * Decides whether freshly normalized text is new, changed or unchanged for a
 * source. It is the only gate in front of chunking and embedding.
 */

import type { ContentStore } from '../db/content-store.js';
import type { ContentRecord, LedgerDecision } from '../types/index.js';
import { computeContentHash } from '../utils/crypto.js';

export interface LedgerVerdict {
  decision: LedgerDecision;
  fingerprint: string;
  previous: ContentRecord | null;
}

export class DeduplicationLedger {
  constructor(private readonly store: ContentStore) {}

  async decide(sourceUrl: string, text: string): Promise<LedgerVerdict> {
    const fingerprint = computeContentHash(text);
    const previous = await this.store.getLatestRecord(sourceUrl);

    if (!previous) {
      return { decision: 'NEW', fingerprint, previous: null };
    }
    return {
      decision: previous.fingerprint === fingerprint ? 'UNCHANGED' : 'CHANGED',
      fingerprint,
      previous,
    };
  }
}
