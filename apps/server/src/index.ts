// apps/server/src/index.ts
//
// Boot: load config, seed the word bank once, serve the API.
//
// Game state lives in a MemoryStore; restarting loses everything. Swap in
// another `Store` implementation for persistence.

import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { HangmanService } from './service.js';
import { MemoryStore } from './store.js';
import { loadWordSeed, seedWordBank } from './words.js';

const config = loadConfig();
const log = createLogger(config.LOG_LEVEL);

const store = new MemoryStore();
await seedWordBank(store, loadWordSeed(config.WORDS_FILE), log);

const service = new HangmanService({ store, log });
const app = createApp({ service, log, corsOrigin: config.CORS_ORIGIN });

app.listen(config.PORT, () => log.info({ port: config.PORT }, 'server up'));
