// apps/server/src/__tests__/app.test.ts
//
// Route tests for createApp(). The app listens on an ephemeral loopback
// port inside the test process and is closed afterwards.

import type { Server } from 'node:http';
import pino from 'pino';

import { buildPrefixIndex } from '@wordgrid/solver-core';

import { createApp } from '../app.js';

const index = buildPrefixIndex(['sea', 'spur', 'rise']);

let server: Server;
let base: string;

beforeAll(async () => {
  server = await new Promise<Server>((resolve) => {
    const s = createApp(index, pino({ enabled: false })).listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('no port');
  base = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve())),
  );
});

const post = (body: unknown) =>
  fetch(`${base}/api/solve`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  });

describe('createApp', () => {
  it('solves a board on POST /api/solve', async () => {
    const res = await post({ rows: ['srps', 'euim', 'eahw', 'wdzr'] });

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ total: 2, longest: ['SPUR', 'SEA'] });
    expect(body).toHaveProperty('id');
  });

  it('answers 400 with the formatted error for an invalid body', async () => {
    const res = await post({ rows: ['SRPS', 'EUI'] });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      rows: { _errors: ['All rows must have the same length'] },
    });
  });

  it('reports the dictionary size on GET /api/health', async () => {
    const res = await fetch(`${base}/api/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, words: 3 });
  });
});
