// packages/solver-core/src/ranking.ts
//
// Orders found words for the report: longest first, then A→Z among words of
// the same length. The report keeps the first RESULT_LIMIT entries.

export const RESULT_LIMIT = 6;

/** Length in characters (code points), as the dictionary filter counts it. */
export function wordLength(word: string): number {
  return Array.from(word).length;
}

export function compareByLength(a: string, b: string): number {
  const byLength = wordLength(b) - wordLength(a);
  if (byLength !== 0) return byLength;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * rankWords sorts a copy of `words` with compareByLength and keeps at most
 * `limit` entries.
 *
 * Example:
 *   rankWords(['SEA', 'SPUR', 'APE'], 2) → ['SPUR', 'APE']
 */
export function rankWords(
  words: Iterable<string>,
  limit: number = RESULT_LIMIT,
): string[] {
  return [...words].sort(compareByLength).slice(0, limit);
}
