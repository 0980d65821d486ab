// packages/protocol/src/index.ts
//
// Shared protocol definitions for the word-grid CLI and server.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - cliRows:  the four command-line rows of a 4×4 board.
//   - solveReq: request body for POST /api/solve (any rectangular board).
//   - solveRes: response body for POST /api/solve.
//
// Both input schemas accept letters in any case and hand back upper case,
// which is what the solver indexes.

import { z } from 'zod';

export const CLI_BOARD_SIZE = 4;
export const MAX_BOARD_SIDE = 16;
export const MAX_LONGEST = 6;

const toUpper = (rows: string[]) => rows.map((r) => r.toUpperCase());

/* -------------------------------------------------------------------------- */
/*                               Command line                                 */
/* -------------------------------------------------------------------------- */

/**
 * Exactly four arguments, each exactly four letters (A–Z, case-insensitive).
 * An issue with an empty path means the argument count is wrong; an issue
 * under an index means that row is malformed.
 */
export const cliRows = z
  .array(z.string().regex(/^[A-Za-z]{4}$/))
  .length(CLI_BOARD_SIZE)
  .transform(toUpper);
export type CliRows = z.infer<typeof cliRows>;

/* -------------------------------------------------------------------------- */
/*                            /api/solve endpoint                             */
/* -------------------------------------------------------------------------- */

/**
 * Request to solve a board.
 *  - rows: 1–16 rows of 1–16 letters, all the same length
 */
export const solveReq = z.object({
  rows: z
    .array(z.string().regex(/^[A-Za-z]{1,16}$/))
    .min(1)
    .max(MAX_BOARD_SIDE)
    .refine((rows) => rows.every((r) => r.length === rows[0].length), {
      message: 'All rows must have the same length',
    })
    .transform(toUpper),
});
export type SolveReq = z.infer<typeof solveReq>;

/**
 * Response to /api/solve:
 *  - id:      identifier of this solve (appears in server logs)
 *  - total:   number of distinct words found
 *  - longest: up to 6 words, longest first, then A→Z
 */
export const solveRes = z.object({
  id: z.string(),
  total: z.number().int().min(0),
  longest: z.array(z.string()).max(MAX_LONGEST),
});
export type SolveRes = z.infer<typeof solveRes>;
