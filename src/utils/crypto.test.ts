import { describe, it, expect } from 'vitest';
import { computeChunkFingerprint, computeContentHash, normalizeForFingerprint } from './crypto.js';

describe('fingerprints', () => {
  it('ignores whitespace and case differences', () => {
    expect(normalizeForFingerprint('  Hello\n\n  World  ')).toBe('hello world');
    expect(computeContentHash('Hello   World')).toBe(computeContentHash('hello world'));
  });

  it('differs for different text', () => {
    expect(computeContentHash('hello world')).not.toBe(computeContentHash('hello there'));
  });

  it('produces 64-char hex digests', () => {
    expect(computeContentHash('x')).toMatch(/^[0-9a-f]{64}$/);
    expect(computeChunkFingerprint('abc', 0)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('keys chunks by record fingerprint and sequence', () => {
    expect(computeChunkFingerprint('abc', 0)).toBe(computeChunkFingerprint('abc', 0));
    expect(computeChunkFingerprint('abc', 0)).not.toBe(computeChunkFingerprint('abc', 1));
    expect(computeChunkFingerprint('abc', 0)).not.toBe(computeChunkFingerprint('abd', 0));
  });
});
