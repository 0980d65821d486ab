// packages/solver-core/src/dictionary.ts
//
// Turns raw word-list text into a PrefixIndex.
//
// Rules:
//   • Each line is trimmed; blank lines are dropped.
//   • Only entries of 3–16 characters (counted after trimming, before
//     upper-casing) are kept. Shorter words are not playable and no path on
//     a 4×4 grid is longer than 16 cells.
//   • Kept entries are upper-cased to match the grid letters.

import { PrefixIndex } from './prefixIndex.js';
import { wordLength } from './ranking.js';

export const MIN_WORD_LENGTH = 3;
export const MAX_WORD_LENGTH = 16;

/**
 * normalizeEntry returns the upper-cased entry, or null when its trimmed
 * length falls outside MIN_WORD_LENGTH..MAX_WORD_LENGTH.
 *
 * Example:
 *   normalizeEntry('  sea ') → 'SEA'
 *   normalizeEntry('at')     → null
 */
export function normalizeEntry(raw: string): string | null {
  const trimmed = raw.trim();
  const length = wordLength(trimmed);
  if (length < MIN_WORD_LENGTH || length > MAX_WORD_LENGTH) return null;
  return trimmed.toUpperCase();
}

/** parseWordList splits text into trimmed lines (LF or CRLF). */
export function parseWordList(text: string): string[] {
  return text.split(/\r?\n/).map((line) => line.trim());
}

export function buildPrefixIndex(words: Iterable<string>): PrefixIndex {
  const index = new PrefixIndex();
  for (const raw of words) {
    const word = normalizeEntry(raw);
    if (word) index.insert(word);
  }
  return index;
}
