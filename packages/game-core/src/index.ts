// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • types.ts   → Word, Level, Game, User entity shapes
//   • errors.ts  → ValidationError, NotFoundError, ConflictError
//   • words.ts   → WordBank (random + unused-for-user selection)
//   • mask.ts    → masked rendering of a word
//   • level.ts   → level state machine (acceptGuess)
//   • game.ts    → game orchestration (startGame, makeMove, startNextLevel, ...)
//   • ranking.ts → user aggregates, rankings, high scores
//   • history.ts → move-by-move replay
//   • stats.ts   → average attempts remaining
//
// Example usage:
//   import { makeMove, WordBank, rankUsers } from '@hangman/game-core';

export * from './types.js';
export * from './errors.js';
export * from './words.js';
export * from './mask.js';
export * from './level.js';
export * from './game.js';
export * from './ranking.js';
export * from './history.js';
export * from './stats.js';
