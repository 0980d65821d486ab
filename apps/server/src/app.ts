// apps/server/src/app.ts
//
// Express application for the solver service. The dictionary is loaded by
// the caller (see index.ts) and shared read-only by every request; each
// request runs its own search.
//
// Routes:
//   POST /api/solve  → solveReq body, solveRes reply (400 on invalid body)
//   GET  /api/health → { ok, words }

import cors from 'cors';
import express from 'express';
import type { Logger } from 'pino';

import type { PrefixIndex } from '@wordgrid/solver-core';

import { solveRequest } from './solve.js';

export function createApp(index: PrefixIndex, log: Logger) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.post('/api/solve', (req, res) => {
    const outcome = solveRequest(index, req.body, log);
    if (!outcome.ok) return res.status(400).json(outcome.error);
    res.json(outcome.body);
  });

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, words: index.size });
  });

  return app;
}
