// packages/game-core/src/ranking.ts
//
// Per-user aggregates and the leaderboards built from them.
// Aggregates change only when a game ends; rankings are recomputed on read.

import type { Game, User } from './types.js';

export const DEFAULT_HIGH_SCORES = 10;

/** Folds a finished game's score into the user's totals. */
export function recordGameOver(user: User, score: number): User {
  const totalPlayed = user.totalPlayed + 1;
  const totalScore = user.totalScore + score;
  return {
    ...user,
    totalPlayed,
    totalScore,
    averageScore: Math.round(totalScore / totalPlayed),
  };
}

/**
 * rankUsers orders users by total score (highest first); for equal scores
 * the user with fewer games played ranks higher.
 *
 * Example:
 *   [(A,10,2), (B,10,1), (C,5,1)] → [B, A, C]
 */
export function rankUsers(users: readonly User[]): User[] {
  return [...users].sort(
    (a, b) => b.totalScore - a.totalScore || a.totalPlayed - b.totalPlayed,
  );
}

/** Finished games with the best scores, highest first. */
export function highScores(
  games: readonly Game[],
  limit: number = DEFAULT_HIGH_SCORES,
): Game[] {
  return games
    .filter((g) => g.gameOver)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}
