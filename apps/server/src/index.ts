// apps/server/src/index.ts
//
// Boots the solver HTTP service.
//
// Environment:
//   • DICTIONARY_FILE → word list path (default "words.txt", relative to cwd)
//   • LOG_LEVEL       → pino level (default "info")
//   • PORT            → listen port (default 3001)
//
// The dictionary is read once here. If it cannot be read the process exits
// before listening.

import 'dotenv/config';
import pino from 'pino';

import { DictionaryLoadError, loadDictionary, type PrefixIndex } from '@wordgrid/solver-core';

import { createApp } from './app.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });
const dictionaryFile = process.env.DICTIONARY_FILE ?? 'words.txt';

let index: PrefixIndex;
try {
  index = loadDictionary(dictionaryFile);
} catch (err) {
  if (!(err instanceof DictionaryLoadError)) throw err;
  log.fatal({ err, path: err.path }, 'dictionary load failed');
  process.exit(1);
}
log.info({ words: index.size, path: dictionaryFile }, 'dictionary loaded');

const port = Number(process.env.PORT ?? 3001);
createApp(index, log).listen(port, () => log.info({ port }, 'server up'));
