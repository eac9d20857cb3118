/**
 * Helpers shared by the identifier types.
 * @module ident/text
 */

/**
 * Structural delimiter between identifier components.
 */
export const DELIMITER = '-';

/**
 * Returns the offsets just past the first `count` delimiters in `text`,
 * or `null` if fewer than `count` are present.
 */
export function delimiterOffsets(text: string, count: number): number[] | null {
  const offsets: number[] = [];
  let from = 0;

  while (offsets.length < count) {
    const index = text.indexOf(DELIMITER, from);
    if (index === -1) {
      return null;
    }
    offsets.push(index + 1);
    from = index + 1;
  }

  return offsets;
}

/**
 * Compares two strings by Unicode code point.
 *
 * This agrees with a byte-wise comparison of their UTF-8 encodings, which
 * plain `<` on UTF-16 code units does not for characters above U+FFFF.
 */
export function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }

  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(j) ?? 0;
    if (ca !== cb) {
      return ca < cb ? -1 : 1;
    }
    i += ca > 0xffff ? 2 : 1;
    j += cb > 0xffff ? 2 : 1;
  }

  if (i < a.length) return 1;
  if (j < b.length) return -1;
  return 0;
}

/**
 * 32-bit FNV-1a hash over the UTF-16 code units of `text`.
 */
export function hashText(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
