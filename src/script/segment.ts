// Segmenter: raw script text → ordered display units.
import { EmptyScriptError } from '../core/errors';
import { collapseWhitespace, normalizeScriptText } from './normalize';

export type ScriptUnit = string;

export type SegmentMode = 'sentence' | 'paragraph' | 'flat';

export interface SegmentOptions {
  /** Sentence mode only: units longer than this are re-split on commas. */
  maxLength?: number;
}

export const DEFAULT_MAX_UNIT_LENGTH = 150;

const SENTENCE_BREAK = /(?<=[.!?])\s+/;
const COMMA_BREAK = /(?<=,)\s+/;
const BLANK_LINES = /\n[ \t]*\n\s*/;

function clean(parts: string[]): string[] {
  const out: string[] = [];
  for (const part of parts) {
    const unit = collapseWhitespace(part);
    if (unit) out.push(unit);
  }
  return out;
}

/**
 * Greedy comma packing: consecutive clauses are joined while they fit.
 * A single clause longer than `maxLength` is kept whole.
 */
export function splitLongUnit(unit: string, maxLength: number): string[] {
  if (unit.length <= maxLength) return [unit];
  const clauses = clean(unit.split(COMMA_BREAK));
  const out: string[] = [];
  let current = '';
  for (const clause of clauses) {
    if (!current) {
      current = clause;
      continue;
    }
    const joined = `${current} ${clause}`;
    if (joined.length <= maxLength) {
      current = joined;
    } else {
      out.push(current);
      current = clause;
    }
  }
  if (current) out.push(current);
  return out;
}

export function splitSentences(text: string, maxLength = DEFAULT_MAX_UNIT_LENGTH): string[] {
  const limit = Math.max(1, Math.floor(maxLength));
  const out: string[] = [];
  for (const sentence of clean(text.split(SENTENCE_BREAK))) {
    out.push(...splitLongUnit(sentence, limit));
  }
  return out;
}

export function splitParagraphs(text: string): string[] {
  return clean(text.split(BLANK_LINES));
}

export function flatten(text: string): string[] {
  return clean([text]);
}

/**
 * Pure and deterministic for a given input and mode.
 * Throws EmptyScriptError when nothing readable is left.
 */
export function segment(rawText: string, mode: SegmentMode, opts: SegmentOptions = {}): ScriptUnit[] {
  const text = normalizeScriptText(rawText);
  const units = mode === 'paragraph'
    ? splitParagraphs(text)
    : mode === 'flat'
      ? flatten(text)
      : splitSentences(text, opts.maxLength ?? DEFAULT_MAX_UNIT_LENGTH);
  if (!units.length) throw new EmptyScriptError();
  return units;
}
