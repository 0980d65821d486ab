// apps/cli/src/cli.ts
//
// Command-line front end for the word-grid solver.
//
//   wordgrid <row1> <row2> <row3> <row4>
//
// Flow:
//   1. Validate the four rows (exactly four letters each, any case).
//   2. Load the dictionary file into a PrefixIndex.
//   3. Solve the board and print two lines: the total, and the longest six.
//
// Nothing is searched when step 1 or 2 fails. Output goes through the
// injected `out`/`err` sinks so the whole flow runs in tests.

import type { Logger } from 'pino';

import { cliRows, type CliRows } from '@wordgrid/protocol';
import {
  DictionaryLoadError,
  RESULT_LIMIT,
  loadDictionary,
  solveGrid,
  type PrefixIndex,
} from '@wordgrid/solver-core';

export const EXIT_OK = 0;
export const EXIT_DICTIONARY = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  'Usage: wordgrid <row1> <row2> <row3> <row4>',
  'Example: wordgrid srps euim eahw wdzr',
];

export interface CliOptions {
  dictionaryFile: string;
  log: Logger;
  out: (line: string) => void;
  err: (line: string) => void;
}

/** ["A", "B"] style, one list on one line. */
export function formatWordList(words: readonly string[]): string {
  return `[${words.map((w) => JSON.stringify(w)).join(', ')}]`;
}

export function runCli(args: readonly string[], opts: CliOptions): number {
  const { dictionaryFile, log, out, err } = opts;

  const parsed = cliRows.safeParse(args);
  if (!parsed.success) {
    const badCount = parsed.error.issues.some((i) => i.path.length === 0);
    if (!badCount) err('Error: Each argument must be exactly 4 letters long.');
    USAGE.forEach((line) => err(line));
    return EXIT_USAGE;
  }
  const rows: CliRows = parsed.data;

  const started = performance.now();
  let index: PrefixIndex;
  try {
    index = loadDictionary(dictionaryFile);
  } catch (e) {
    if (!(e instanceof DictionaryLoadError)) throw e;
    log.debug({ err: e, path: e.path }, 'dictionary load failed');
    err(
      `Error loading dictionary: ${e.message}. Ensure ${e.path} exists and is readable.`,
    );
    return EXIT_DICTIONARY;
  }
  log.debug({ words: index.size, path: dictionaryFile }, 'dictionary loaded');

  const { total, longest } = solveGrid(rows, index);
  log.debug({ total, ms: Math.round(performance.now() - started) }, 'solved');

  out(`Total words found: ${total}`);
  out(`Longest ${RESULT_LIMIT} words: ${formatWordList(longest)}`);
  return EXIT_OK;
}
