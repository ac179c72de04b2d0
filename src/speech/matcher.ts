// Matcher: decides when a transcript counts as "said".
// Unordered bag-of-words overlap, tolerant of transcription noise and
// word order. No edit distance, no phonetics.
import { sanitizedTokens } from './sanitize';

export const DEFAULT_MATCH_THRESHOLD = 0.4;

const NUMBER_TOKENS: Record<string, string> = {
  zero: '0',
  one: '1',
  two: '2',
  three: '3',
  four: '4',
  five: '5',
  six: '6',
  seven: '7',
  eight: '8',
  nine: '9',
  ten: '10',
  eleven: '11',
  twelve: '12',
  thirteen: '13',
  fourteen: '14',
  fifteen: '15',
  sixteen: '16',
  seventeen: '17',
  eighteen: '18',
  nineteen: '19',
  twenty: '20',
  thirty: '30',
  forty: '40',
  fifty: '50',
  sixty: '60',
  seventy: '70',
  eighty: '80',
  ninety: '90',
  hundred: '100',
};

const FILLER_TOKENS = new Set([
  'um',
  'uh',
  'erm',
  'er',
  'ah',
  'hmm',
  'mm',
  'mmm',
  'uhh',
  'uhm',
]);

/**
 * Normalized words with hesitation fillers dropped and spelled numbers
 * mapped to digits, so "three" and "3" are the same word.
 */
export function matchTokens(s: string): string[] {
  return sanitizedTokens(s)
    .map((token) => NUMBER_TOKENS[token] ?? token)
    .filter((token) => !FILLER_TOKENS.has(token));
}

function tokenSets(spokenText: string, expectedUnit: string): { expected: Set<string>; spoken: Set<string> } {
  return { expected: new Set(matchTokens(expectedUnit)), spoken: new Set(matchTokens(spokenText)) };
}

function ratioOf(expected: Set<string>, spoken: Set<string>): number {
  if (!expected.size || !spoken.size) return 0;
  let hit = 0;
  for (const tok of expected) {
    if (spoken.has(tok)) hit += 1;
  }
  return hit / expected.size;
}

/** |expected ∩ spoken| / |expected| over distinct words; 0 if either is empty. */
export function overlapRatio(spokenText: string, expectedUnit: string): number {
  const { expected, spoken } = tokenSets(spokenText, expectedUnit);
  return ratioOf(expected, spoken);
}

export function isMatch(spokenText: string, expectedUnit: string, threshold = DEFAULT_MATCH_THRESHOLD): boolean {
  const { expected, spoken } = tokenSets(spokenText, expectedUnit);
  if (!expected.size || !spoken.size) return false;
  return ratioOf(expected, spoken) >= threshold;
}

export function wordCount(spokenText: string): number {
  return matchTokens(spokenText).length;
}

export function wordCountAtLeast(spokenText: string, n: number): boolean {
  return wordCount(spokenText) >= n;
}
