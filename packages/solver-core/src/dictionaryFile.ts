// packages/solver-core/src/dictionaryFile.ts
//
// Loads a one-word-per-line text file into a PrefixIndex.
// Used by both the CLI and the HTTP server at startup.

import fs from 'node:fs';

import { buildPrefixIndex, parseWordList } from './dictionary.js';
import type { PrefixIndex } from './prefixIndex.js';

export class DictionaryLoadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`could not read dictionary file "${path}"`, { cause });
    this.name = 'DictionaryLoadError';
    this.path = path;
  }
}

/**
 * loadDictionary reads `path` as UTF-8 and indexes every acceptable line.
 * Throws DictionaryLoadError when the file is missing, unreadable, or not
 * valid UTF-8.
 */
export function loadDictionary(path: string): PrefixIndex {
  let raw: string;
  try {
    raw = new TextDecoder('utf-8', { fatal: true }).decode(fs.readFileSync(path));
  } catch (err) {
    throw new DictionaryLoadError(path, err);
  }
  return buildPrefixIndex(parseWordList(raw));
}
