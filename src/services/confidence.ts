/**
 * Confidence rule
 *
 * Pure function of the context that was actually placed in the prompt:
 * - HIGH:   top similarity >= strong, and either two or more independent
 *           sources (stored sources >= weak, plus web sources) or a top
 *           similarity >= decisive
 * - MEDIUM: top similarity >= weak
 * - LOW:    anything else, including web-only context
 */

import { CONFIDENCE_THRESHOLDS, type ConfidenceThresholds } from '../config/constants.js';
import type { Confidence } from '../types/index.js';

export interface ConfidenceInput {
  /** Best similarity per stored source included in the context */
  vectorSourceScores: number[];
  /** Distinct web sources included in the context */
  webSourceCount: number;
}

export function computeConfidence(
  input: ConfidenceInput,
  thresholds: ConfidenceThresholds = CONFIDENCE_THRESHOLDS
): Confidence {
  if (input.vectorSourceScores.length === 0) return 'LOW';

  const top = Math.max(...input.vectorSourceScores);
  const supportingVector = input.vectorSourceScores.filter(score => score >= thresholds.weak).length;
  const independentSources = supportingVector + input.webSourceCount;

  if (top >= thresholds.strong && (independentSources >= 2 || top >= thresholds.decisive)) {
    return 'HIGH';
  }
  if (top >= thresholds.weak) return 'MEDIUM';
  return 'LOW';
}
