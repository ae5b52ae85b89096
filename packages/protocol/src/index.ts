// packages/protocol/src/index.ts
//
// Shared protocol definitions for the hangman client and server.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines request/response shapes for:
//   - users:    creation, rankings
//   - games:    new game, get, move, next level, cancel, history
//   - scores:   high scores, average attempts remaining
//
// The server validates every inbound body/query with these schemas and
// `.parse`s every outbound body, so clients can rely on the inferred types.

import { z } from 'zod';

const userName = z.string().trim().min(1).max(64);

/* -------------------------------------------------------------------------- */
/*                                   Users                                    */
/* -------------------------------------------------------------------------- */

/**
 * Request to create a user.
 *  - userName: unique display name
 *  - email:    optional contact address
 */
export const createUserReq = z.object({
  userName,
  email: z.string().email().optional(),
});
export type CreateUserReq = z.infer<typeof createUserReq>;

export const userRes = z.object({
  userName: z.string(),
  email: z.string().optional(),
  totalScore: z.number().int().min(0),
  totalPlayed: z.number().int().min(0),
  averageScore: z.number().int().min(0),
});
export type UserRes = z.infer<typeof userRes>;

/**
 * One row of the user rankings (total score desc, then games played asc).
 */
export const rankRes = userRes.omit({ email: true });
export const rankingsRes = z.object({ items: z.array(rankRes) });
export type RankingsRes = z.infer<typeof rankingsRes>;

/* -------------------------------------------------------------------------- */
/*                                   Games                                    */
/* -------------------------------------------------------------------------- */

/**
 * Request to start a new game. The user is created if the name is unseen.
 *  - attemptsAllowed: wrong guesses allowed per level (1–9), defaults to 6
 */
export const newGameReq = z.object({
  userName,
  email: z.string().email().optional(),
  attemptsAllowed: z.number().int().min(1).max(9).default(6),
});
export type NewGameReq = z.infer<typeof newGameReq>;

/**
 * Request to make a move.
 *  - guess: one letter, or the whole word (letters only, case-insensitive)
 */
export const moveReq = z.object({
  guess: z.string().regex(/^\s*[A-Za-z]+\s*$/, 'Guess should be at least 1 letter!'),
});
export type MoveReq = z.infer<typeof moveReq>;

/**
 * Game state as seen by the player.
 *  - guessedWord: masked word ("C_T"), or the full word once the game is over
 *  - message:     outcome of the last request
 */
export const gameRes = z.object({
  urlsafeKey: z.string(),
  userName: z.string(),
  gameOver: z.boolean(),
  message: z.string(),
  guessedWord: z.string(),
  guesses: z.array(z.string()),
  clue: z.string(),
  date: z.string(),
  score: z.number().int().min(0),
  levelNumber: z.number().int().min(1),
  levelComplete: z.boolean(),
  attemptsRemaining: z.number().int().min(0),
});
export type GameRes = z.infer<typeof gameRes>;

export const gamesRes = z.object({ items: z.array(gameRes) });
export type GamesRes = z.infer<typeof gamesRes>;

/**
 * Response to cancelling a game.
 *  - deleted: false when the game was already over (then `game` is its state)
 */
export const cancelRes = z.object({
  deleted: z.boolean(),
  message: z.string(),
  game: gameRes.optional(),
});
export type CancelRes = z.infer<typeof cancelRes>;

export const userGamesQuery = z.object({
  completed: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

/* -------------------------------------------------------------------------- */
/*                                  History                                   */
/* -------------------------------------------------------------------------- */

export const moveRes = z.object({
  level: z.number().int().min(1),
  guess: z.string(),
  guessedWord: z.string(),
  correct: z.boolean(),
});

export const historyRes = z.object({
  urlsafeKey: z.string(),
  userName: z.string(),
  date: z.string(),
  score: z.number().int().min(0),
  moves: z.array(moveRes),
});
export type HistoryRes = z.infer<typeof historyRes>;

/* -------------------------------------------------------------------------- */
/*                                   Scores                                   */
/* -------------------------------------------------------------------------- */

/**
 * Query for the high scores. An absent or empty `numberOfResults`
 * (`?numberOfResults=`) means the top 10.
 */
export const highScoresQuery = z.object({
  numberOfResults: z.preprocess(
    (v) => (v === '' ? undefined : v),
    z.coerce.number().int().min(1).max(100).default(10),
  ),
});

export const scoreRes = z.object({
  userName: z.string(),
  date: z.string(),
  score: z.number().int().min(0),
});
export const scoresRes = z.object({ items: z.array(scoreRes) });
export type ScoresRes = z.infer<typeof scoresRes>;

export const averageAttemptsRes = z.object({
  averageAttemptsRemaining: z.number().min(0),
});
export type AverageAttemptsRes = z.infer<typeof averageAttemptsRes>;

/* -------------------------------------------------------------------------- */
/*                                   Errors                                   */
/* -------------------------------------------------------------------------- */

export const errorRes = z.object({
  error: z.string(),
  code: z.string().optional(),
});
export type ErrorRes = z.infer<typeof errorRes>;
