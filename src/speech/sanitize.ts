// sanitize.ts — prepares script or transcript text for matching.
// Applied identically to both sides before any comparison.

export function normalizeForMatch(s: string): string {
  return String(s || '')
    .toLowerCase()
    .replace(/[\u2018\u2019\u201B\u2032']/g, '')  // drop apostrophes: "don't" → "dont"
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')           // other punctuation splits words
    .replace(/\s+/g, ' ')                         // collapse whitespace
    .trim();
}

// Convenience token helper built atop normalizeForMatch
export function sanitizedTokens(s: string): string[] {
  const normalized = normalizeForMatch(s);
  return normalized ? normalized.split(' ') : [];
}
