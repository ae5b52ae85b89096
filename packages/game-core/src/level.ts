// packages/game-core/src/level.ts
//
// Level state machine: one word-guessing round.
//
//   active ──guess──▶ active
//     │
//     ├── word fully revealed / whole word guessed ──▶ complete (won)
//     └── attempts exhausted ─────────────────────────▶ complete (lost)
//
// `complete` only ever flips false → true; once set, no further guesses are
// accepted. Levels are treated as values: acceptGuess returns a new Level.

import { ValidationError } from './errors.js';
import { isRevealed, maskWord } from './mask.js';
import type { Level, Word } from './types.js';

/**
 * Outcome of a single accepted guess:
 *  - "won"       → the guess completed the level
 *  - "lost"      → the guess used the last attempt
 *  - "correct"   → letter is in the word, no attempt lost
 *  - "incorrect" → attempt lost, level still active
 */
export type GuessResult = 'won' | 'lost' | 'correct' | 'incorrect';

export interface NewLevelParams {
  key: string;
  gameKey: string;
  levelNumber: number;
  word: Word;
  attemptsAllowed: number;
}

export function createLevel(params: NewLevelParams): Level {
  return {
    key: params.key,
    gameKey: params.gameKey,
    levelNumber: params.levelNumber,
    wordKey: params.word.key,
    guesses: [],
    attemptsRemaining: params.attemptsAllowed,
    complete: false,
    won: false,
  };
}

/**
 * acceptGuess applies one guess to an active level.
 *
 * @param guess - upper-case letter, or a string as long as the word
 * @throws ValidationError if the level is already complete or the guess was
 *         already made; the level is left as it was.
 *
 * Example:
 *   word "CAT", 3 attempts, guesses X, C, A, T
 *   → attempts 2 after X, level won after T with 2 attempts left
 */
export function acceptGuess(
  level: Level,
  word: Word,
  guess: string,
): { level: Level; result: GuessResult } {
  if (level.complete) throw new ValidationError('Level already complete!');
  if (level.guesses.includes(guess)) {
    throw new ValidationError('You already made this guess!');
  }

  const guesses = [...level.guesses, guess];
  let { attemptsRemaining } = level;
  let won = false;

  if (guess === word.name) {
    won = true;
  } else if (guess.length === 1) {
    if (isRevealed(maskWord(word.name, guesses))) won = true;
    else if (!word.name.includes(guess)) attemptsRemaining -= 1;
  } else {
    attemptsRemaining -= 1;
  }

  const lost = !won && attemptsRemaining < 1;
  const next: Level = {
    ...level,
    guesses,
    attemptsRemaining: Math.max(attemptsRemaining, 0),
    complete: won || lost,
    won,
  };

  let result: GuessResult;
  if (won) result = 'won';
  else if (lost) result = 'lost';
  else result = attemptsRemaining < level.attemptsRemaining ? 'incorrect' : 'correct';

  return { level: next, result };
}
