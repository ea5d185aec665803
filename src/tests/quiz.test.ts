import { describe, test, expect } from 'vitest';
import { classifyOption, optionLetter } from '../utils/quiz';

describe('classifyOption', () => {
  test.each([
    [false, false, false, 'neutral'],
    [true, false, false, 'selected'],
    [false, true, false, 'neutral'],
    [true, true, false, 'selected'],
    [false, false, true, 'neutral'],
    [true, false, true, 'revealedIncorrectSelected'],
    [false, true, true, 'revealedCorrect'],
    [true, true, true, 'revealedCorrect'],
  ])('selected=%s correct=%s revealed=%s → %s', (isSelected, isCorrect, isRevealed, expected) => {
    expect(classifyOption(isSelected, isCorrect, isRevealed)).toBe(expected);
  });
});

describe('optionLetter', () => {
  test('maps index to an uppercase badge', () => {
    expect(optionLetter(0)).toBe('A');
    expect(optionLetter(3)).toBe('D');
  });
});
