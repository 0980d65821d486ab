// packages/solver-core/src/index.ts
//
// Entry point for the solver-core package.
// Re-exports all solver logic so consumers can import from one place.
//
// Includes:
//   • prefixIndex.ts    → trie over dictionary words (PrefixIndex)
//   • dictionary.ts     → word-list normalisation (buildPrefixIndex)
//   • dictionaryFile.ts → file loading (loadDictionary, DictionaryLoadError)
//   • grid.ts           → grid construction and neighbour offsets
//   • gridSearch.ts     → backtracking search (GridSearch, solveGrid)
//   • ranking.ts        → result ordering (rankWords, RESULT_LIMIT)
//
// Example usage:
//   import { loadDictionary, solveGrid } from '@wordgrid/solver-core';

export * from './prefixIndex.js';
export * from './dictionary.js';
export * from './dictionaryFile.js';
export * from './grid.js';
export * from './gridSearch.js';
export * from './ranking.js';
