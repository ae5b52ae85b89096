// packages/game-core/src/types.ts
//
// Entity shapes shared by the core and its storage collaborator.
// Every entity is identified by an opaque string `key`; references between
// entities (game → user, level → game/word) hold that key.

/** A word from the bank and the clue shown while it is being guessed. */
export interface Word {
  key: string;
  /** Upper-case letters A–Z only. */
  name: string;
  clue: string;
}

/** One word-guessing round inside a game. */
export interface Level {
  key: string;
  gameKey: string;
  /** 1-based position of the level within its game. */
  levelNumber: number;
  wordKey: string;
  /** Accepted guesses, oldest first. */
  guesses: string[];
  attemptsRemaining: number;
  complete: boolean;
  won: boolean;
}

export interface Game {
  key: string;
  userKey: string;
  attemptsAllowed: number;
  gameOver: boolean;
  currentLevelKey: string;
  /** Start date, YYYY-MM-DD. */
  date: string;
  score: number;
}

export interface User {
  key: string;
  name: string;
  email?: string;
  totalScore: number;
  totalPlayed: number;
  averageScore: number;
}

/** Uniform random number in [0, 1). */
export type Random = () => number;
