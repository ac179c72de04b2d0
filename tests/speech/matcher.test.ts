import { isMatch, matchTokens, overlapRatio, wordCount, wordCountAtLeast } from '../../src/speech/matcher';
import { normalizeForMatch, sanitizedTokens } from '../../src/speech/sanitize';

describe('speech matcher', () => {
  test('case and punctuation do not matter', () => {
    expect(isMatch('The quick brown fox', 'the Quick, brown FOX!', 0.4)).toBe(true);
    expect(overlapRatio('The quick brown fox', 'the Quick, brown FOX!')).toBe(1);
  });

  test('unrelated speech does not match', () => {
    expect(isMatch('hello there', 'completely different sentence', 0.4)).toBe(false);
    expect(overlapRatio('hello there', 'completely different sentence')).toBe(0);
  });

  test('ratio is measured against the expected unit', () => {
    expect(overlapRatio('brown fox', 'the quick brown fox')).toBe(0.5);
    expect(overlapRatio('the quick brown fox jumps high', 'brown fox')).toBe(1);
  });

  test('threshold is inclusive', () => {
    expect(overlapRatio('a b', 'a b c d e')).toBe(0.4);
    expect(isMatch('a b', 'a b c d e', 0.4)).toBe(true);
    expect(isMatch('a b', 'a b c d e', 0.41)).toBe(false);
  });

  test('empty sides never match', () => {
    expect(isMatch('', 'anything at all')).toBe(false);
    expect(isMatch('words', '')).toBe(false);
    expect(overlapRatio('...', 'fine')).toBe(0);
  });

  test('spelled numbers and digits are the same word', () => {
    expect(overlapRatio('3 blind mice', 'Three blind mice.')).toBe(1);
  });

  test('fillers are dropped and apostrophes removed', () => {
    expect(matchTokens('Um, so uh yes')).toEqual(['so', 'yes']);
    expect(matchTokens("Don't stop")).toEqual(['dont', 'stop']);
  });

  test('normalization is applied the same way to both sides', () => {
    const unit = 'We’ll ship it, on Monday!';
    expect(isMatch("WE'LL SHIP IT ON MONDAY", unit, 1)).toBe(true);
    expect(normalizeForMatch(unit)).toBe('well ship it on monday');
  });

  test('sanitizedTokens of blank input is empty', () => {
    expect(sanitizedTokens('  ,  ')).toEqual([]);
  });

  test('word counting for the minimum-words trigger', () => {
    expect(wordCount('yes I agree completely')).toBe(4);
    expect(wordCountAtLeast('ok', 3)).toBe(false);
    expect(wordCountAtLeast('yes I agree completely', 3)).toBe(true);
    expect(wordCountAtLeast('um uh er', 1)).toBe(false);
  });
});
