// packages/solver-core/src/gridSearch.ts
//
// Backtracking depth-first search over a letter grid, guided by a
// PrefixIndex.
//
// From every start cell (row-major), the search steps into neighbouring
// cells while following the trie one letter at a time:
//
//   1. Off the grid, or cell already on the current path → stop.
//   2. Cell letter has no child under the current trie node → stop. This
//      skips every longer path through this cell with the same prefix.
//   3. Otherwise mark the cell, push its letter, record the path if the
//      child node ends a word, and try all 8 neighbours.
//   4. Pop the letter and unmark the cell.
//
// The visited mask and the path buffer are shared by the whole search.
// Step 4 runs in a `finally` block so they are back to empty whenever no
// step is active; sibling branches depend on that.
//
// Exports:
//   • GridSearch  — search over one grid/dictionary pair.
//   • SolveResult — { total, longest }.
//   • solveGrid   — build the grid from row strings and solve it.

import { createGrid, gridSize, NEIGHBOR_OFFSETS, type Grid } from './grid.js';
import type { PrefixIndex, PrefixNode } from './prefixIndex.js';
import { rankWords } from './ranking.js';

export interface SolveResult {
  /** Number of distinct words found. */
  total: number;
  /** Up to RESULT_LIMIT words, longest first, then A→Z. */
  longest: string[];
}

export class GridSearch {
  private readonly rows: number;
  private readonly cols: number;
  private readonly visited: boolean[][];
  private readonly path: string[] = [];

  constructor(
    private readonly grid: Grid,
    private readonly index: PrefixIndex,
  ) {
    const { rows, cols } = gridSize(grid);
    this.rows = rows;
    this.cols = cols;
    this.visited = Array.from({ length: rows }, () =>
      Array<boolean>(cols).fill(false),
    );
  }

  /** findWords returns every distinct dictionary word traceable on the grid. */
  findWords(): Set<string> {
    const found = new Set<string>();
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        this.step(row, col, this.index.root, found);
      }
    }
    return found;
  }

  solve(): SolveResult {
    const found = this.findWords();
    return { total: found.size, longest: rankWords(found) };
  }

  /** True when no cell is marked and the path buffer is empty. */
  isIdle(): boolean {
    return (
      this.path.length === 0 && this.visited.every((r) => r.every((v) => !v))
    );
  }

  private step(
    row: number,
    col: number,
    node: PrefixNode,
    found: Set<string>,
  ): void {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) return;
    if (this.visited[row][col]) return;

    const letter = this.grid[row][col];
    const next = this.index.childFor(node, letter);
    if (!next) return;

    this.visited[row][col] = true;
    this.path.push(letter);
    try {
      if (this.index.isTerminal(next)) found.add(this.path.join(''));
      for (const { rowOffset, colOffset } of NEIGHBOR_OFFSETS) {
        this.step(row + rowOffset, col + colOffset, next, found);
      }
    } finally {
      this.path.pop();
      this.visited[row][col] = false;
    }
  }
}

/**
 * solveGrid runs one search over `rows` (strings, any case).
 *
 * Example:
 *   solveGrid(['SRPS', 'EUIM', 'EAHW', 'WDZR'], buildPrefixIndex(['sea', 'spur', 'rise']))
 *   → { total: 2, longest: ['SPUR', 'SEA'] }
 */
export function solveGrid(
  rows: readonly string[],
  index: PrefixIndex,
): SolveResult {
  return new GridSearch(createGrid(rows), index).solve();
}
