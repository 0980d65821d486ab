// apps/cli/src/index.ts
//
// Process entry point for the CLI. Wires the environment into runCli():
//   • DICTIONARY_FILE → word list path (default "words.txt", relative to cwd)
//   • LOG_LEVEL       → pino level on stderr (default "warn")

import 'dotenv/config';
import pino from 'pino';

import { runCli } from './cli.js';

const log = pino(
  { level: process.env.LOG_LEVEL ?? 'warn' },
  pino.destination(2),
);

process.exitCode = runCli(process.argv.slice(2), {
  dictionaryFile: process.env.DICTIONARY_FILE ?? 'words.txt',
  log,
  out: (line) => console.log(line),
  err: (line) => console.error(line),
});
