import { DATE_RANGE_PATTERN, MONTHS, ONGOING_PATTERN } from './rules';

export interface DateRange {
  /** The matched text, as it appears in the line. */
  text: string;
  index: number;
  start: string;
  end: string;
  isCurrent: boolean;
}

export interface PartialDate {
  year: number;
  month?: number;
}

export function findDateRange(text: string): DateRange | undefined {
  const match = DATE_RANGE_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  const [matched, start, end] = match;
  return {
    text: matched,
    index: match.index,
    start: start.trim(),
    end: end.trim(),
    isCurrent: ONGOING_PATTERN.test(end.trim()),
  };
}

export function removeDateRange(text: string, range: DateRange): string {
  return `${text.slice(0, range.index)} ${text.slice(range.index + range.text.length)}`;
}

export function parsePartialDate(token: string): PartialDate | undefined {
  const normalized = token.trim().toLocaleLowerCase('pt-BR');
  const numeric = normalized.match(/^(\d{1,2})[/.](\d{4})$/);
  if (numeric) {
    const month = Number(numeric[1]);
    return month >= 1 && month <= 12 ? { year: Number(numeric[2]), month } : undefined;
  }
  if (/^\d{4}$/.test(normalized)) {
    return { year: Number(normalized) };
  }
  const named = normalized.match(/^(\p{L}+)\.?\s*(?:de\s+)?\/?\s*(\d{4})$/u);
  if (named) {
    const month = MONTHS[named[1]];
    return month ? { year: Number(named[2]), month } : undefined;
  }
  return undefined;
}

/** Negative when `a` is earlier; a missing month only compares by year. */
export function comparePartialDates(a: PartialDate, b: PartialDate): number {
  if (a.year !== b.year) {
    return a.year - b.year;
  }
  if (a.month === undefined || b.month === undefined) {
    return 0;
  }
  return a.month - b.month;
}

/**
 * Returns the start and end tokens in chronological order. Pairs that do not
 * both parse are returned as found.
 */
export function orderDateRange(range: DateRange): { start: string; end: string } {
  if (range.isCurrent) {
    return { start: range.start, end: range.end };
  }
  const start = parsePartialDate(range.start);
  const end = parsePartialDate(range.end);
  if (start && end && comparePartialDates(start, end) > 0) {
    return { start: range.end, end: range.start };
  }
  return { start: range.start, end: range.end };
}
