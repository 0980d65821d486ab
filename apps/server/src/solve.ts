// apps/server/src/solve.ts
//
// Request handling for POST /api/solve, kept free of Express so it can be
// called directly. The route in app.ts only maps the outcome to a status.

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { ZodFormattedError } from 'zod';

import { solveReq, solveRes, type SolveReq, type SolveRes } from '@wordgrid/protocol';
import { solveGrid, type PrefixIndex } from '@wordgrid/solver-core';

export type SolveOutcome =
  | { ok: true; body: SolveRes }
  | { ok: false; error: ZodFormattedError<SolveReq> };

export function solveRequest(
  index: PrefixIndex,
  body: unknown,
  log: Logger,
): SolveOutcome {
  const parsed = solveReq.safeParse(body);
  if (!parsed.success) return { ok: false, error: parsed.error.format() };

  const id = nanoid();
  const started = performance.now();
  const { total, longest } = solveGrid(parsed.data.rows, index);
  log.info(
    { id, rows: parsed.data.rows.length, total, ms: Math.round(performance.now() - started) },
    'solved',
  );

  return { ok: true, body: solveRes.parse({ id, total, longest }) };
}
