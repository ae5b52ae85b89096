// apps/server/src/words.ts
//
// Word bank seeding.
//
// The seed is a JSON array of { name, clue } read from WORDS_FILE, or from
// the list bundled under apps/server/data/ when no file is configured.
// Seeding is idempotent: it only writes when the store holds no words, and
// runs once at boot rather than on every request.

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { normalizeWordName, type Word } from '@hangman/game-core';

import type { Logger } from './logger.js';
import type { Store } from './store.js';

export const DEFAULT_WORDS_FILE = fileURLToPath(
  new URL('../data/words.json', import.meta.url),
);

const wordSeedSchema = z
  .array(
    z.object({
      name: z.string().min(1),
      clue: z.string().min(1),
    }),
  )
  .min(1);

export type WordSeed = z.infer<typeof wordSeedSchema>;

/**
 * Parse a seed list and give every word a fresh key.
 *
 * @throws ZodError for a malformed list, ValidationError for a non-letter word.
 */
export function parseWordSeed(raw: unknown): Word[] {
  return wordSeedSchema.parse(raw).map((w) => ({
    key: nanoid(),
    name: normalizeWordName(w.name),
    clue: w.clue.trim(),
  }));
}

export function loadWordSeed(path: string = DEFAULT_WORDS_FILE): Word[] {
  const raw: unknown = JSON.parse(fs.readFileSync(path, 'utf8'));
  return parseWordSeed(raw);
}

/** @returns the number of words written (0 when the bank was already seeded) */
export async function seedWordBank(
  store: Store,
  words: readonly Word[],
  log?: Logger,
): Promise<number> {
  const existing = await store.listWords();
  if (existing.length > 0) {
    log?.debug({ words: existing.length }, 'word bank already seeded');
    return 0;
  }
  await store.putWords(words);
  log?.info({ words: words.length }, 'word bank seeded');
  return words.length;
}
