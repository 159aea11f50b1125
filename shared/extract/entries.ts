import type { DocumentLine, EducationEntry, ExperienceEntry, ProjectEntry } from '../types';
import { startsWithLowerCase, tidyFragment } from '../util/text';
import { findDateRange, orderDateRange, removeDateRange, type DateRange } from './dates';
import {
  BULLET_PATTERN,
  DEGREE_PATTERN,
  DETAILS_JOINER,
  EDUCATION_TITLE_SEPARATORS,
  EXPERIENCE_TITLE_SEPARATORS,
  PROJECT_TITLE_SEPARATORS,
  URL_PATTERN,
} from './rules';

export type EntryKind = 'experience' | 'education' | 'projects';

export interface EntryLine {
  text: string;
  /** Text without its bullet marker. */
  body: string;
  bullet: boolean;
  headingHint: boolean;
  indent: number;
  range?: DateRange;
}

type Boundary = 'before' | 'before-previous';

interface BoundaryRule {
  name: string;
  test: (line: EntryLine, current: EntryLine[], kind: EntryKind) => Boundary | undefined;
}

const TITLE_SEPARATORS: Record<EntryKind, readonly string[]> = {
  experience: EXPERIENCE_TITLE_SEPARATORS,
  education: EDUCATION_TITLE_SEPARATORS,
  projects: PROJECT_TITLE_SEPARATORS,
};

export function toEntryLine(line: DocumentLine): EntryLine {
  const marker = BULLET_PATTERN.exec(line.text);
  const body = marker ? line.text.slice(marker[0].length).trim() : line.text;
  return {
    text: line.text,
    body,
    bullet: marker !== null && body.length > 0,
    headingHint: line.headingHint === true,
    indent: line.indent ?? 0,
    range: findDateRange(body),
  };
}

function findSeparator(text: string, separators: readonly string[]): string | undefined {
  const lowered = text.toLocaleLowerCase('pt-BR');
  return separators.find((separator) => {
    const index = lowered.indexOf(separator);
    return index > 0 && index + separator.length < text.length;
  });
}

function isContinuation(line: EntryLine, previous: EntryLine | undefined): boolean {
  return (
    previous !== undefined &&
    previous.bullet &&
    !line.bullet &&
    !line.range &&
    (startsWithLowerCase(line.body) || line.indent > previous.indent)
  );
}

function isDateOnly(line: EntryLine): boolean {
  return line.range !== undefined && tidyFragment(removeDateRange(line.body, line.range)) === '';
}

/** Ordered rules deciding where a new entry starts; blank lines always end the current one. */
const BOUNDARY_RULES: BoundaryRule[] = [
  {
    name: 'heading-hint',
    test: (line) => (line.headingHint && !line.bullet ? 'before' : undefined),
  },
  {
    name: 'title-after-bullets',
    test: (line, current, kind) => {
      const previous = current[current.length - 1];
      if (line.bullet || !previous.bullet || isContinuation(line, previous)) {
        return undefined;
      }
      if (kind === 'projects' || line.range || findSeparator(line.body, TITLE_SEPARATORS[kind])) {
        return 'before';
      }
      return undefined;
    },
  },
  {
    name: 'second-date-range',
    test: (line, current) => {
      if (!line.range || !current.some((entryLine) => entryLine.range)) {
        return undefined;
      }
      const previous = current[current.length - 1];
      if (isDateOnly(line) && current.length > 1 && !previous.bullet && !previous.range) {
        return 'before-previous';
      }
      return 'before';
    },
  },
  {
    name: 'second-degree',
    test: (line, current, kind) =>
      kind === 'education' &&
      DEGREE_PATTERN.test(line.body) &&
      current.some((entryLine) => DEGREE_PATTERN.test(entryLine.body))
        ? 'before'
        : undefined,
  },
];

export function groupEntries(lines: DocumentLine[], kind: EntryKind): EntryLine[][] {
  const entries: EntryLine[][] = [];
  let current: EntryLine[] = [];
  const flush = () => {
    if (current.length > 0) {
      entries.push(current);
      current = [];
    }
  };

  for (const line of lines) {
    if (!line.text) {
      flush();
      continue;
    }
    const entryLine = toEntryLine(line);
    if (current.length > 0) {
      const boundary = BOUNDARY_RULES.map((rule) => rule.test(entryLine, current, kind)).find(Boolean);
      if (boundary === 'before') {
        flush();
      } else if (boundary === 'before-previous') {
        const moved = current.pop();
        flush();
        if (moved) {
          current.push(moved);
        }
      }
    }
    current.push(entryLine);
  }
  flush();
  return entries;
}

/** Splits at the first occurrence of the first separator (in table order) present in the text. */
export function splitAtSeparator(text: string, separators: readonly string[]): [string, string | undefined] {
  const separator = findSeparator(text, separators);
  if (!separator) {
    return [text, undefined];
  }
  const index = text.toLocaleLowerCase('pt-BR').indexOf(separator);
  return [text.slice(0, index).trim(), text.slice(index + separator.length).trim()];
}

/** Splits at every occurrence of the chosen separator. */
export function splitTitle(text: string, separators: readonly string[]): string[] {
  const separator = findSeparator(text, separators);
  if (!separator) {
    return [text];
  }
  const parts: string[] = [];
  const lowered = text.toLocaleLowerCase('pt-BR');
  let cursor = 0;
  let index = lowered.indexOf(separator);
  while (index >= 0) {
    parts.push(text.slice(cursor, index));
    cursor = index + separator.length;
    index = lowered.indexOf(separator, cursor);
  }
  parts.push(text.slice(cursor));
  return parts.map((part) => part.trim()).filter(Boolean);
}

interface EntryScan {
  title: string;
  titleIndex: number;
  range?: DateRange;
}

/**
 * Finds the entry's title (the first non-bullet line with text besides a date
 * range) and its date range (the first one in the entry).
 */
function scanEntry(entry: EntryLine[]): EntryScan {
  const range = entry.find((line) => line.range)?.range;
  const titleIndex = entry.findIndex((line) => !line.bullet && !isDateOnly(line));
  if (titleIndex < 0) {
    return { title: '', titleIndex, range };
  }
  const line = entry[titleIndex];
  const title = line.range ? tidyFragment(removeDateRange(line.body, line.range)) : tidyFragment(line.body);
  return { title, titleIndex, range };
}

/** Text of a non-title line with its date range cut out. */
function remainder(line: EntryLine): string {
  return line.range ? tidyFragment(removeDateRange(line.body, line.range)) : line.body;
}

export function parseExperienceEntry(entry: EntryLine[]): ExperienceEntry {
  const { title, titleIndex, range } = scanEntry(entry);
  const [role, organization] = splitAtSeparator(title, EXPERIENCE_TITLE_SEPARATORS);
  const achievements: string[] = [];
  const summary: string[] = [];

  let previous: EntryLine | undefined;
  entry.forEach((line, index) => {
    if (index === titleIndex) {
      previous = line;
      return;
    }
    if (line.bullet) {
      achievements.push(line.body);
    } else if (isContinuation(line, previous) && achievements.length > 0) {
      achievements[achievements.length - 1] = `${achievements[achievements.length - 1]} ${line.body}`;
      // A wrapped line keeps the bullet context for the next wrapped line.
      previous = { ...line, bullet: true, indent: previous?.indent ?? 0 };
      return;
    } else {
      const text = remainder(line);
      if (text) {
        summary.push(text);
      }
    }
    previous = line;
  });

  const experience: ExperienceEntry = { role, isCurrent: false, achievements };
  if (organization) {
    experience.organization = organization;
  }
  if (range) {
    const { start, end } = orderDateRange(range);
    experience.startDate = start;
    experience.endDate = end;
    experience.isCurrent = range.isCurrent;
  }
  if (summary.length > 0) {
    experience.summary = summary.join(' ');
  }
  return experience;
}

export function parseEducationEntry(entry: EntryLine[]): EducationEntry {
  const { title, titleIndex, range } = scanEntry(entry);
  const [degree = '', institution, ...extraParts] = splitTitle(title, EDUCATION_TITLE_SEPARATORS);
  const details: string[] = [...extraParts];
  if (range) {
    details.push(range.text.trim());
  }
  entry.forEach((line, index) => {
    if (index === titleIndex) {
      return;
    }
    const text = remainder(line);
    if (text) {
      details.push(text);
    }
  });

  const education: EducationEntry = { degree };
  if (institution) {
    education.institution = institution;
  }
  if (details.length > 0) {
    education.details = details.join(DETAILS_JOINER);
  }
  return education;
}

export function parseProjectEntry(entry: EntryLine[]): ProjectEntry {
  let link: string | undefined;
  const texts: string[] = [];
  for (const line of entry) {
    let text = line.body;
    const url = URL_PATTERN.exec(text);
    if (url && !link) {
      link = url[0].replace(/[).,]+$/, '');
      text = tidyFragment(text.replace(url[0], ' '));
    }
    if (text) {
      texts.push(text);
    }
  }

  const [title = '', ...rest] = texts;
  const [name, lead] = splitAtSeparator(title, PROJECT_TITLE_SEPARATORS);
  const description = lead ? [lead, ...rest] : rest;

  const project: ProjectEntry = { name };
  if (description.length > 0) {
    project.description = description.join(' ');
  }
  if (link) {
    project.link = link;
  }
  return project;
}
