// packages/game-core/src/__tests__/history.test.ts
//
// Unit tests for gameHistory() and averageAttemptsRemaining().

import { averageAttemptsRemaining, gameHistory, type Level, type Word } from '../index.js';

const CAT: Word = { key: 'w-cat', name: 'CAT', clue: 'Says meow' };
const DOG: Word = { key: 'w-dog', name: 'DOG', clue: 'Says woof' };
const words = new Map([
  [CAT.key, CAT],
  [DOG.key, DOG],
]);

function level(levelNumber: number, word: Word, guesses: string[], attemptsRemaining = 3): Level {
  return {
    key: `l${levelNumber}`,
    gameKey: 'g1',
    levelNumber,
    wordKey: word.key,
    guesses,
    attemptsRemaining,
    complete: false,
    won: false,
  };
}

describe('gameHistory', () => {
  it('replays every guess with the mask at that point, level by level', () => {
    const levels = [level(2, DOG, ['O', 'DIG']), level(1, CAT, ['X', 'C', 'CAT'])];
    expect(gameHistory(levels, words)).toEqual([
      { level: 1, guess: 'X', guessedWord: '___', correct: false },
      { level: 1, guess: 'C', guessedWord: 'C__', correct: true },
      { level: 1, guess: 'CAT', guessedWord: 'CAT', correct: true },
      { level: 2, guess: 'O', guessedWord: '_O_', correct: true },
      { level: 2, guess: 'DIG', guessedWord: '_O_', correct: false },
    ]);
  });

  it('is empty for a game without guesses', () => {
    expect(gameHistory([level(1, CAT, [])], words)).toEqual([]);
  });

  it('fails when a level refers to an unknown word', () => {
    const stray: Word = { key: 'w-owl', name: 'OWL', clue: 'Hoots' };
    expect(() => gameHistory([level(1, stray, ['O'])], words)).toThrow('Word w-owl not found');
  });
});

describe('averageAttemptsRemaining', () => {
  it('is 0 without levels', () => {
    expect(averageAttemptsRemaining([])).toBe(0);
  });

  it('averages attempts remaining', () => {
    const levels = [level(1, CAT, [], 3), level(1, DOG, [], 2)];
    expect(averageAttemptsRemaining(levels)).toBe(2.5);
  });
});
