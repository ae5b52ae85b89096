// packages/game-core/src/words.ts
//
// Word bank: random selection over a fixed list of words, plus the
// "unused for this user" policy that avoids repeating words a player has
// already seen.
//
// The bank is read-only once built. Selection draws from an injectable
// random source so the server (and tests) can make it deterministic.

import { ValidationError } from './errors.js';
import type { Random, Word } from './types.js';

const LETTERS = /^[A-Z]+$/;

/**
 * normalizeWordName upper-cases and trims a word read from a seed file.
 *
 * @throws ValidationError if the result is empty or contains non-letters.
 */
export function normalizeWordName(raw: string): string {
  const name = raw.trim().toUpperCase();
  if (!LETTERS.test(name)) {
    throw new ValidationError(`Word "${raw}" must contain only letters A-Z`);
  }
  return name;
}

export class WordBank {
  private readonly words: readonly Word[];

  constructor(
    words: readonly Word[],
    private readonly random: Random = Math.random,
  ) {
    if (words.length === 0) throw new Error('Word bank is empty');
    this.words = [...words];
  }

  get size(): number {
    return this.words.length;
  }

  /** Uniform pick over the whole bank. */
  randomWord(): Word {
    return this.pick(this.words);
  }

  /**
   * unusedWordFor picks a word the user has not played yet.
   *
   * Candidates are the bank minus `usedKeys`; when that leaves nothing (the
   * user has seen every word) the whole bank is used and repeats are allowed.
   *
   * @param usedKeys - word keys from every level of every game of the user
   */
  unusedWordFor(usedKeys: Iterable<string>): Word {
    const used = new Set(usedKeys);
    const candidates = this.words.filter((w) => !used.has(w.key));
    return this.pick(candidates.length > 0 ? candidates : this.words);
  }

  private pick(list: readonly Word[]): Word {
    const i = Math.min(Math.floor(this.random() * list.length), list.length - 1);
    return list[i];
  }
}
