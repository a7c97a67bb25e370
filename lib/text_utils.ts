/**
 * Shared tokenization helpers for the analyzers.
 * Words are alphanumeric runs; sentences end at runs of . ! or ?;
 * paragraphs are blocks separated by blank lines.
 */

const WORD_PATTERN = /[a-z0-9]+/gi;

// CRLF and lone CR become LF
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

export function tokenizeWords(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => tokenizeWords(sentence).length > 0);
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(/\r?\n[ \t]*\r?\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

// Non-overlapping occurrences of a literal substring
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;

  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}
