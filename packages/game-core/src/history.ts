// packages/game-core/src/history.ts
//
// Move-by-move replay of a game, level by level.

import { maskWord } from './mask.js';
import type { Level, Word } from './types.js';

export interface Move {
  level: number;
  guess: string;
  /** Mask of the word right after this guess. */
  guessedWord: string;
  /** The guess appears in the word (letter present, or whole word right). */
  correct: boolean;
}

/**
 * gameHistory replays every accepted guess of a game.
 *
 * @param levels - all levels of the game, in any order
 * @param words  - words by key; must hold the word of every level
 * @throws Error if a level's word is missing from `words`
 */
export function gameHistory(
  levels: readonly Level[],
  words: ReadonlyMap<string, Word>,
): Move[] {
  const moves: Move[] = [];
  const ordered = [...levels].sort((a, b) => a.levelNumber - b.levelNumber);
  for (const level of ordered) {
    const word = words.get(level.wordKey);
    if (!word) throw new Error(`Word ${level.wordKey} not found for level ${level.key}`);
    level.guesses.forEach((guess, i) => {
      moves.push({
        level: level.levelNumber,
        guess,
        guessedWord: maskWord(word.name, level.guesses.slice(0, i + 1)),
        correct: word.name.includes(guess),
      });
    });
  }
  return moves;
}
