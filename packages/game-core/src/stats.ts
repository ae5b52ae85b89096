// packages/game-core/src/stats.ts
//
// Non-authoritative statistics, computed on demand.

import type { Level } from './types.js';

/**
 * Mean attempts remaining over the given levels, 0 when there are none.
 * The server passes the current level of every unfinished game.
 */
export function averageAttemptsRemaining(levels: readonly Level[]): number {
  if (levels.length === 0) return 0;
  const total = levels.reduce((sum, l) => sum + l.attemptsRemaining, 0);
  return total / levels.length;
}
