// packages/solver-core/src/grid.ts
//
// Letter grid helpers. A grid is a rectangle of single upper-case
// characters; the shape itself is validated upstream (see @wordgrid/protocol).

export type Grid = ReadonlyArray<ReadonlyArray<string>>;

export interface Offset {
  readonly rowOffset: number;
  readonly colOffset: number;
}

/** The 8 neighbours of a cell, row-offset major then column-offset. */
export const NEIGHBOR_OFFSETS: readonly Offset[] = [
  { rowOffset: -1, colOffset: -1 },
  { rowOffset: -1, colOffset: 0 },
  { rowOffset: -1, colOffset: 1 },
  { rowOffset: 0, colOffset: -1 },
  { rowOffset: 0, colOffset: 1 },
  { rowOffset: 1, colOffset: -1 },
  { rowOffset: 1, colOffset: 0 },
  { rowOffset: 1, colOffset: 1 },
];

export function createGrid(rows: readonly string[]): Grid {
  return rows.map((row) => Array.from(row.toUpperCase()));
}

export function gridSize(grid: Grid): { rows: number; cols: number } {
  return { rows: grid.length, cols: grid.length > 0 ? grid[0].length : 0 };
}
