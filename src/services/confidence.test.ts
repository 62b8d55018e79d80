import { describe, it, expect } from 'vitest';
import { computeConfidence } from './confidence.js';

describe('computeConfidence', () => {
  it('is LOW without stored sources, even with web results', () => {
    expect(computeConfidence({ vectorSourceScores: [], webSourceCount: 3 })).toBe('LOW');
  });

  it('is HIGH for a single decisive match', () => {
    expect(computeConfidence({ vectorSourceScores: [0.95], webSourceCount: 0 })).toBe('HIGH');
  });

  it('needs corroboration below the decisive threshold', () => {
    expect(computeConfidence({ vectorSourceScores: [0.8], webSourceCount: 0 })).toBe('MEDIUM');
    expect(computeConfidence({ vectorSourceScores: [0.8, 0.5], webSourceCount: 0 })).toBe('HIGH');
    expect(computeConfidence({ vectorSourceScores: [0.8], webSourceCount: 1 })).toBe('HIGH');
  });

  it('does not count weak sources as corroboration', () => {
    expect(computeConfidence({ vectorSourceScores: [0.8, 0.3], webSourceCount: 0 })).toBe('MEDIUM');
  });

  it('is MEDIUM between weak and strong, LOW below weak', () => {
    expect(computeConfidence({ vectorSourceScores: [0.6, 0.55], webSourceCount: 2 })).toBe('MEDIUM');
    expect(computeConfidence({ vectorSourceScores: [0.45], webSourceCount: 0 })).toBe('MEDIUM');
    expect(computeConfidence({ vectorSourceScores: [0.44], webSourceCount: 0 })).toBe('LOW');
  });

  it('honors custom thresholds', () => {
    const thresholds = { weak: 0.2, strong: 0.3, decisive: 0.4 };
    expect(computeConfidence({ vectorSourceScores: [0.41], webSourceCount: 0 }, thresholds)).toBe('HIGH');
  });
});
