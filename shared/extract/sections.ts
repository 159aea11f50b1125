import type { DocumentLine, SectionKind } from '../types';
import { isUpperCaseText, tidyFragment, wordCount } from '../util/text';
import { findDateRange } from './dates';
import {
  HEADING_BREAKING_SEPARATORS,
  HEADING_FILLERS,
  HEADING_MAX_WORDS,
  SECTION_KEYWORDS,
  SECTION_ORDER,
  keywordPattern,
} from './rules';

export type SegmentKind = SectionKind | 'unassigned';

export interface Section {
  kind: SegmentKind;
  heading?: string;
  lines: DocumentLine[];
}

interface KeywordMatcher {
  kind: SectionKind;
  keyword: string;
  pattern: RegExp;
}

const KEYWORD_MATCHERS: KeywordMatcher[] = SECTION_ORDER.flatMap((kind) =>
  SECTION_KEYWORDS[kind].map((keyword) => ({ kind, keyword, pattern: keywordPattern(keyword) })),
);

export function normalizeHeadingText(text: string): string {
  return text
    .toLocaleLowerCase('pt-BR')
    .replace(/^[^\p{L}]+|[^\p{L}]+$/gu, '')
    .replace(/\s+/g, ' ');
}

export interface HeadingMatch {
  kind: SectionKind;
  /** Text on the heading line besides the keyword, when it carries content. */
  rest?: string;
}

const DECORATION_WORDS = new Set(
  [...HEADING_FILLERS, ...SECTION_ORDER.flatMap((kind) => SECTION_KEYWORDS[kind])]
    .flatMap((value) => value.split(/\s+/))
    .map((word) => word.toLocaleLowerCase('pt-BR')),
);

function carriesContent(text: string): boolean {
  return text
    .toLocaleLowerCase('pt-BR')
    .split(/[^\p{L}\p{N}]+/u)
    .some((word) => word.length > 0 && !DECORATION_WORDS.has(word));
}

/** A title separator or a date range next to the keyword marks an entry title. */
function looksLikeEntryTitle(rest: string): boolean {
  const lowered = ` ${rest.toLocaleLowerCase('pt-BR')} `;
  return HEADING_BREAKING_SEPARATORS.some((separator) => lowered.includes(separator)) || findDateRange(rest) !== undefined;
}

/**
 * Classifies a line as a section heading. An exact keyword match always counts;
 * a keyword inside a longer line counts only when the line looks like a heading
 * (layout hint or all caps), is short, and the rest of the line is not an entry
 * title. When several kinds match, the one whose keyword starts first wins, then
 * the longer keyword, then table order.
 */
export function matchSectionHeading(line: DocumentLine): HeadingMatch | undefined {
  const normalized = normalizeHeadingText(line.text);
  if (!normalized) {
    return undefined;
  }

  const exact = KEYWORD_MATCHERS.find((matcher) => matcher.keyword === normalized);
  if (exact) {
    return { kind: exact.kind };
  }

  const headingLike = line.headingHint === true || isUpperCaseText(line.text);
  if (!headingLike || wordCount(line.text) > HEADING_MAX_WORDS) {
    return undefined;
  }

  let best: { kind: SectionKind; index: number; length: number; rest: string } | undefined;
  for (const matcher of KEYWORD_MATCHERS) {
    const match = matcher.pattern.exec(line.text);
    if (!match) {
      continue;
    }
    const rest = `${line.text.slice(0, match.index)} ${line.text.slice(match.index + match[0].length)}`.replace(/\s+/g, ' ');
    if (looksLikeEntryTitle(rest)) {
      continue;
    }
    const candidate = { kind: matcher.kind, index: match.index, length: matcher.keyword.length, rest };
    if (
      !best ||
      candidate.index < best.index ||
      (candidate.index === best.index && candidate.length > best.length)
    ) {
      best = candidate;
    }
  }
  if (!best) {
    return undefined;
  }
  const rest = tidyFragment(best.rest);
  return rest && carriesContent(rest) ? { kind: best.kind, rest } : { kind: best.kind };
}

export function detectSectionHeading(line: DocumentLine): SectionKind | undefined {
  return matchSectionHeading(line)?.kind;
}

/**
 * Splits the line sequence at detected headings. Lines before the first heading
 * form an `unassigned` section. Heading lines are not kept in `lines`, except
 * for content that shared the line with the keyword, which opens the section.
 */
export function segmentSections(lines: DocumentLine[]): Section[] {
  const sections: Section[] = [];
  let current: Section = { kind: 'unassigned', lines: [] };

  for (const line of lines) {
    const heading = line.text ? matchSectionHeading(line) : undefined;
    if (heading) {
      if (current.kind !== 'unassigned' || current.lines.length > 0) {
        sections.push(current);
      }
      current = { kind: heading.kind, heading: line.text, lines: heading.rest ? [{ ...line, text: heading.rest }] : [] };
      continue;
    }
    current.lines.push(line);
  }
  if (current.kind !== 'unassigned' || current.lines.length > 0) {
    sections.push(current);
  }
  return sections;
}
