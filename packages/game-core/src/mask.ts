// packages/game-core/src/mask.ts
//
// Masked rendering of a word given the guesses made so far.
//
//   word = "CAT", guesses = ["X", "C"]      → "C__"
//   word = "CAT", guesses = ["C", "CAT"]    → "CAT"  (whole word guessed)
//
// Only single-letter guesses reveal positions. A correct whole-word guess
// reveals the entire word; a wrong one reveals nothing.

export const PLACEHOLDER = '_';

export function maskWord(name: string, guesses: readonly string[]): string {
  if (guesses.includes(name)) return name;

  const letters = new Set(guesses.filter((g) => g.length === 1));
  let out = '';
  for (const c of name) out += letters.has(c) ? c : PLACEHOLDER;
  return out;
}

/** True once every position of the word is revealed. */
export function isRevealed(mask: string): boolean {
  return !mask.includes(PLACEHOLDER);
}
