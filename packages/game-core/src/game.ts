// packages/game-core/src/game.ts
//
// Game orchestration over already-fetched entities.
//
// A game is a run of levels played with the same number of attempts. Each
// won level adds its remaining attempts to the score; the first lost level
// ends the game and folds the score into the player's totals.
//
// Moves against a finished game or a complete level are answered with a
// `rejected` result carrying an informational message. Malformed moves
// throw ValidationError. Neither changes any entity.

import { ValidationError } from './errors.js';
import { acceptGuess, createLevel, type GuessResult } from './level.js';
import { recordGameOver } from './ranking.js';
import type { Game, Level, User, Word } from './types.js';

export const MIN_ATTEMPTS = 1;
export const MAX_ATTEMPTS = 9;
export const DEFAULT_ATTEMPTS = 6;

/** Entities a move reads: the game, its current level and word, its player. */
export interface GameState {
  game: Game;
  level: Level;
  word: Word;
  user: User;
}

export type Rejected = { status: 'rejected'; message: string };

export type MoveOutcome =
  | Rejected
  | {
      status: 'accepted';
      game: Game;
      level: Level;
      /** Present only when the move ended the game. */
      user?: User;
      result: GuessResult;
      message: string;
    };

export type NextLevelOutcome =
  | Rejected
  | { status: 'accepted'; game: Game; level: Level; message: string };

export type CancelOutcome = Rejected | { status: 'accepted'; message: string };

export function assertAttemptsAllowed(n: number): void {
  if (!Number.isInteger(n) || n < MIN_ATTEMPTS || n > MAX_ATTEMPTS) {
    throw new ValidationError(
      `Attempts allowed must be between ${MIN_ATTEMPTS} and ${MAX_ATTEMPTS}!`,
    );
  }
}

/**
 * normalizeGuess trims and upper-cases a raw guess.
 *
 * @throws ValidationError for empty or non-alphabetic input.
 */
export function normalizeGuess(raw: string): string {
  const guess = raw.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(guess)) {
    throw new ValidationError('Guess should be at least 1 letter!');
  }
  return guess;
}

export function welcomeMessage(userName: string): string {
  return `Make your move, ${userName}!`;
}

export interface StartGameParams {
  gameKey: string;
  levelKey: string;
  user: User;
  attemptsAllowed: number;
  /** First word, normally chosen with WordBank.unusedWordFor. */
  word: Word;
  date: string;
}

export function startGame(params: StartGameParams): { game: Game; level: Level } {
  assertAttemptsAllowed(params.attemptsAllowed);
  const level = createLevel({
    key: params.levelKey,
    gameKey: params.gameKey,
    levelNumber: 1,
    word: params.word,
    attemptsAllowed: params.attemptsAllowed,
  });
  const game: Game = {
    key: params.gameKey,
    userKey: params.user.key,
    attemptsAllowed: params.attemptsAllowed,
    gameOver: false,
    currentLevelKey: level.key,
    date: params.date,
    score: 0,
  };
  return { game, level };
}

/**
 * makeMove applies a normalized guess to the game's current level.
 *
 * Checks, in order: game over, level complete (both rejected), guess
 * length, duplicate guess (both ValidationError).
 */
export function makeMove(state: GameState, guess: string): MoveOutcome {
  const { game, level, word, user } = state;
  if (game.gameOver) return { status: 'rejected', message: 'Game already over!' };
  if (level.complete) {
    return {
      status: 'rejected',
      message: 'Level already complete, get the next level!',
    };
  }
  if (guess.length !== 1 && guess.length !== word.name.length) {
    throw new ValidationError('Guess 1 letter or the whole word!');
  }
  if (level.guesses.includes(guess)) {
    throw new ValidationError('You already made this guess!');
  }

  const { level: nextLevel, result } = acceptGuess(level, word, guess);

  if (result === 'won') {
    return {
      status: 'accepted',
      game: { ...game, score: game.score + nextLevel.attemptsRemaining },
      level: nextLevel,
      result,
      message: 'Level complete, get the next level.',
    };
  }
  if (result === 'lost') {
    const over: Game = { ...game, gameOver: true };
    return {
      status: 'accepted',
      game: over,
      level: nextLevel,
      user: recordGameOver(user, over.score),
      result,
      message: `Game Over! You scored ${over.score}.`,
    };
  }
  return {
    status: 'accepted',
    game,
    level: nextLevel,
    result,
    message: word.name.includes(guess) ? 'You chose well!' : 'You chose poorly!',
  };
}

/** Why the game cannot move to its next level yet, if it cannot. */
export function nextLevelBlocked(game: Game, level: Level): Rejected | undefined {
  if (game.gameOver) return { status: 'rejected', message: 'Game already over!' };
  if (!level.complete) {
    return { status: 'rejected', message: 'Current level is not complete!' };
  }
  return undefined;
}

/**
 * startNextLevel replaces a complete level with a fresh one.
 * Attempts are reset to the game's allowance.
 */
export function startNextLevel(
  game: Game,
  level: Level,
  next: { levelKey: string; word: Word; userName: string },
): NextLevelOutcome {
  const blocked = nextLevelBlocked(game, level);
  if (blocked) return blocked;
  const fresh = createLevel({
    key: next.levelKey,
    gameKey: game.key,
    levelNumber: level.levelNumber + 1,
    word: next.word,
    attemptsAllowed: game.attemptsAllowed,
  });
  return {
    status: 'accepted',
    game: { ...game, currentLevelKey: fresh.key },
    level: fresh,
    message: welcomeMessage(next.userName),
  };
}

/** Only unfinished games may be cancelled; the caller deletes them. */
export function cancelGame(game: Game): CancelOutcome {
  if (game.gameOver) {
    return { status: 'rejected', message: 'Game completed. Cannot delete.' };
  }
  return { status: 'accepted', message: 'Game deleted.' };
}

/** Status line shown when a game is fetched without making a move. */
export function describeGame(game: Game, level: Level, userName: string): string {
  if (game.gameOver) return `You scored ${game.score}.`;
  if (level.complete) return 'Level complete.';
  return welcomeMessage(userName);
}
