// src/script/normalize.ts
// Gentle normalizer applied to every script before segmentation:
// quotes, line endings, BOM and stray trailing whitespace. No reflow.

export function normalizeScriptText(input = ''): string {
  let text = String(input ?? '');

  text = text
    .replace(/^\uFEFF/, '')
    .replace(/[\u2018\u2019\u201B]/g, "'")  // curly single quotes → '
    .replace(/[\u201C\u201D]/g, '"')       // curly double quotes → "
    .replace(/\u00A0/g, ' ');              // non-breaking space → regular space

  text = text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n');

  // Trim trailing whitespace on each line
  text = text.replace(/[ \t]+$/gm, '');

  return text;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
