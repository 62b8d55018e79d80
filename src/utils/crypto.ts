import { createHash } from 'crypto';

/**
 * Normalization applied before fingerprinting: trimmed, whitespace-collapsed,
 * lower-cased. Markup churn is already gone by the time text reaches here.
 */
export function normalizeForFingerprint(content: string): string {
  return content
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase();
}

/**
 * Content fingerprint of a record: sha256 hex (64 chars) of the normalized text.
 */
export function computeContentHash(content: string): string {
  return createHash('sha256')
    .update(normalizeForFingerprint(content))
    .digest('hex');
}

/**
 * Chunk fingerprint: sha256(recordFingerprint || ':' || sequence).
 */
export function computeChunkFingerprint(recordFingerprint: string, sequence: number): string {
  return createHash('sha256')
    .update(`${recordFingerprint}:${sequence}`)
    .digest('hex');
}
