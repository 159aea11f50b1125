import type { SectionKind } from '../types';
import { escapeRegExp } from '../util/text';
import vocabulary from './vocabulary.json';

/**
 * Heading keywords per section kind. Declaration order is the last tie-break
 * when one line matches several kinds at the same position with keywords of the
 * same length.
 */
export const SECTION_KEYWORDS: Readonly<Record<SectionKind, readonly string[]>> = {
  summary: vocabulary.sections.summary,
  experience: vocabulary.sections.experience,
  education: vocabulary.sections.education,
  skills: vocabulary.sections.skills,
  projects: vocabulary.sections.projects,
  other: vocabulary.sections.other,
};

export const SECTION_ORDER: readonly SectionKind[] = ['summary', 'experience', 'education', 'skills', 'projects', 'other'];

/** Lines longer than this are never headings, even with a heading hint. */
export const HEADING_MAX_WORDS = 6;

export const MONTHS: Readonly<Record<string, number>> = vocabulary.months;
export const ONGOING_MARKERS: readonly string[] = vocabulary.ongoing;
export const DEGREE_KEYWORDS: readonly string[] = vocabulary.degrees;

/** Words that decorate a heading ("Minhas", "Técnicas") without carrying content of their own. */
export const HEADING_FILLERS: readonly string[] = vocabulary.headingFillers;

export const BULLET_PATTERN = /^(?:[•·▪◦●■►➢✓✔*>]\s*|[-–—]\s+|\d{1,2}[.)]\s+)/u;

export const URL_PATTERN = /(?:https?:\/\/|www\.)[^\s|,;<>]+/i;

// Experience titles: "Role — Org", "Role at Org", "Role na Org".
export const EXPERIENCE_TITLE_SEPARATORS: readonly string[] = [' — ', ' – ', ' - ', ' | ', ' @ ', ' at ', ' na ', ' no ', ' em '];
export const EDUCATION_TITLE_SEPARATORS: readonly string[] = [' — ', ' – ', ' - ', ' | ', ', ', ' at '];
// A keyword next to one of these is part of an entry title, not a heading.
export const HEADING_BREAKING_SEPARATORS: readonly string[] = [
  ...new Set([...EXPERIENCE_TITLE_SEPARATORS, ...EDUCATION_TITLE_SEPARATORS]),
];
export const PROJECT_TITLE_SEPARATORS: readonly string[] = [' — ', ' – ', ' - ', ': ', ' | '];

export const DETAILS_JOINER = '; ';

const LETTER_OR_DIGIT_BEFORE = '(?<![\\p{L}\\p{N}])';
const LETTER_OR_DIGIT_AFTER = '(?![\\p{L}\\p{N}])';

function alternation(values: readonly string[]): string {
  return [...values]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

const MONTH_NAMES = alternation(Object.keys(MONTHS));

/** "Jan 2020", "janeiro de 2020", "jan/2020", "01/2020", "01.2020", "2020". */
export const DATE_TOKEN = `(?:(?:${MONTH_NAMES})\\.?\\s*(?:de\\s+)?\\/?\\s*\\d{4}|\\d{1,2}[/.]\\d{4}|\\d{4})`;
export const ONGOING_TOKEN = `(?:${alternation(ONGOING_MARKERS)})`;
const RANGE_SEPARATOR = '(?:\\s*[-–—]\\s*|\\s+(?:to|until|até|ate|a)\\s+)';

export const DATE_RANGE_PATTERN = new RegExp(
  `${LETTER_OR_DIGIT_BEFORE}(${DATE_TOKEN})${RANGE_SEPARATOR}(${DATE_TOKEN}|${ONGOING_TOKEN})${LETTER_OR_DIGIT_AFTER}`,
  'iu',
);

export const ONGOING_PATTERN = new RegExp(`^${ONGOING_TOKEN}$`, 'iu');

export function keywordPattern(keyword: string): RegExp {
  return new RegExp(`${LETTER_OR_DIGIT_BEFORE}${escapeRegExp(keyword)}${LETTER_OR_DIGIT_AFTER}`, 'iu');
}

export const DEGREE_PATTERN = new RegExp(`^(?:${alternation(DEGREE_KEYWORDS)})${LETTER_OR_DIGIT_AFTER}`, 'iu');
