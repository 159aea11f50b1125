import type { DocumentLine } from '../types';

const INVISIBLE_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F\u00AD\u200B-\u200D\u2060\uFEFF]/g;

export function cleanText(value: string): string {
  return value
    .replace(INVISIBLE_CHARACTERS, '')
    .replace(/\t+/g, ' | ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function toDocumentLine(value: DocumentLine | string): DocumentLine {
  if (typeof value === 'string') {
    return { text: cleanText(value) };
  }
  return { ...value, text: cleanText(value.text) };
}

/**
 * Cleans every line, collapses runs of blank lines into one and drops blanks at
 * either end. An input made only of blanks normalizes to an empty array.
 */
export function normalizeLines(input: ReadonlyArray<DocumentLine | string>): DocumentLine[] {
  const lines: DocumentLine[] = [];
  for (const raw of input) {
    // Multi-line strings are split so callers can pass raw text blocks.
    const pieces = typeof raw === 'string' ? raw.split(/\r?\n/) : [raw];
    for (const piece of pieces) {
      const line = toDocumentLine(piece);
      if (!line.text && (lines.length === 0 || !lines[lines.length - 1].text)) {
        continue;
      }
      lines.push(line);
    }
  }
  while (lines.length > 0 && !lines[lines.length - 1].text) {
    lines.pop();
  }
  return lines;
}

export function wordCount(value: string): number {
  const trimmed = value.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function isUpperCaseText(value: string): boolean {
  return /\p{L}/u.test(value) && value === value.toLocaleUpperCase('pt-BR') && value !== value.toLocaleLowerCase('pt-BR');
}

export function startsWithLowerCase(value: string): boolean {
  return /^\p{Ll}/u.test(value);
}

/** Removes separators, dangling punctuation and empty brackets left behind after cutting text out of a line. */
export function tidyFragment(value: string): string {
  return value
    .replace(/\(\s*\)|\[\s*\]/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^[\s|,;:·•@–—-]+|[\s|,;:·•@–—-]+$/g, '')
    .trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
