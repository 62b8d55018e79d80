/**
 * Numeric character references (&#NNN; and &#xHH;)
 */

const REPLACEMENT_CHARACTER = '\uFFFD';

/** Character for a code point; U+FFFD for surrogates and values past U+10FFFF */
export function codePointToString(codePoint: number): string {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) return REPLACEMENT_CHARACTER;
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) return REPLACEMENT_CHARACTER;
  return String.fromCodePoint(codePoint);
}

export function decodeNumericEntities(text: string): string {
  return text
    .replace(/&#(\d+);/g, (_, num: string) => codePointToString(parseInt(num, 10)))
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => codePointToString(parseInt(hex, 16)));
}
