// packages/game-core/src/__tests__/mask.test.ts
//
// Unit tests for maskWord(): only guessed letters are revealed, except
// that a correct whole-word guess reveals everything.

import { isRevealed, maskWord } from '../index.js';

describe('maskWord', () => {
  it('hides every position before any guess', () => {
    expect(maskWord('CAT', [])).toBe('___');
  });

  it('reveals every position of a guessed letter', () => {
    expect(maskWord('BANANA', ['A'])).toBe('_A_A_A');
    expect(maskWord('BANANA', ['A', 'N'])).toBe('_ANANA');
  });

  it('ignores letters not in the word and wrong whole-word guesses', () => {
    expect(maskWord('CAT', ['X', 'COT', 'C'])).toBe('C__');
  });

  it('reveals the whole word on an exact whole-word guess', () => {
    expect(maskWord('CAT', ['X', 'CAT'])).toBe('CAT');
  });

  it('never reveals a position whose letter was not guessed', () => {
    const word = 'PUZZLE';
    const guesses = ['Z', 'E', 'Q'];
    const mask = maskWord(word, guesses);
    for (let i = 0; i < word.length; i++) {
      expect(mask[i] === '_' || guesses.includes(word[i])).toBe(true);
    }
    expect(mask).toBe('__ZZ_E');
  });
});

describe('isRevealed', () => {
  it('is true only without placeholders', () => {
    expect(isRevealed('CA_')).toBe(false);
    expect(isRevealed('CAT')).toBe(true);
  });
});
