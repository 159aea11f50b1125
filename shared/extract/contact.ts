import type { Contact, DocumentLine } from '../types';
import { tidyFragment, wordCount } from '../util/text';

type ContactField = Exclude<keyof Contact, 'fullName'>;

interface ContactMatcher {
  field: ContactField;
  /** Searched inside a segment; the first capture group, when present, is the value. */
  pattern: RegExp;
  /** The pattern must cover the whole segment. */
  whole?: boolean;
}

export interface HeaderExtraction {
  contact: Contact;
  /** Header text that matched no contact pattern and was not taken as the name. */
  leftovers: string[];
}

const CONTACT_MATCHERS: ContactMatcher[] = [
  { field: 'email', pattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)+/ },
  { field: 'linkedin', pattern: /(?:https?:\/\/)?(?:[\w-]+\.)?linkedin\.com\/[^\s|,;]+/i },
  { field: 'linkedin', pattern: /linkedin\s*[:/]\s*([\w.-]+)/i },
  { field: 'website', pattern: /(?:https?:\/\/|www\.)[^\s|,;]+/i },
  {
    field: 'website',
    pattern: /(?<![@\w.-])[a-z0-9-]+(?:\.[a-z0-9-]+)*\.(?:com|dev|io|me|org|app|site|tech)(?:\.br)?(?![\w-])(?:\/[^\s|,;]*)?/i,
  },
  { field: 'phone', pattern: /(?:\+\d{1,3}[\s.-]?)?\(?\d{2,4}\)?[\s.-]?\d{3,5}[\s.-]?\d{4}(?!\d)/ },
  { field: 'location', pattern: /^\p{Lu}[\p{L} .'-]*?(?:,\s*\p{Lu}[\p{L} .'-]*|\s[-–/]\s*\p{Lu}{2})$/u, whole: true },
];

const SEGMENT_SEPARATOR = /\s*[|•·;]\s*/;
const FIELD_LABEL = /^(?:e-?mail|telefone|tel|celular|whatsapp|phone|mobile|linkedin|site|website|portf[oó]lio|github|endere[cç]o|localiza[cç][aã]o|location|cidade)\s*:?$/i;
const LABEL_PREFIX = /^(?:e-?mail|telefone|tel|celular|whatsapp|phone|mobile|site|website|portf[oó]lio|endere[cç]o|localiza[cç][aã]o|location|cidade)\s*:\s*/i;
const NAME_MAX_WORDS = 8;
const LOCATION_MAX_WORDS = 5;

function isNameCandidate(text: string): boolean {
  return wordCount(text) <= NAME_MAX_WORDS && !/[.:!?]$/.test(text) && !/\d/.test(text);
}

/**
 * Applies the contact matchers to one segment. Matched text is cut out of the
 * segment so later matchers (website after email, for instance) only see what
 * is left.
 */
function matchSegment(segment: string, contact: Contact): { matched: boolean; rest: string } {
  let rest = segment.replace(LABEL_PREFIX, '');
  let matched = false;
  for (const matcher of CONTACT_MATCHERS) {
    if (matcher.whole && (wordCount(rest) > LOCATION_MAX_WORDS || /\d/.test(rest))) {
      continue;
    }
    const match = matcher.pattern.exec(rest);
    if (!match) {
      continue;
    }
    matched = true;
    if (contact[matcher.field] === undefined) {
      contact[matcher.field] = (match[1] ?? match[0]).trim();
      rest = tidyFragment(`${rest.slice(0, match.index)} ${rest.slice(match.index + match[0].length)}`);
    }
  }
  return { matched, rest: FIELD_LABEL.test(rest) ? '' : rest };
}

/**
 * Reads contact details from the lines before the first section heading. The
 * first line that matches no pattern, seen before any contact detail, is taken
 * as the full name.
 */
export function extractContact(lines: DocumentLine[]): HeaderExtraction {
  const contact: Contact = { fullName: '' };
  const leftovers: string[] = [];
  let sawContactDetail = false;

  for (const line of lines) {
    if (!line.text) {
      continue;
    }
    const segments = line.text.split(SEGMENT_SEPARATOR).filter(Boolean);
    const results = segments.map((segment) => matchSegment(segment, contact));
    const lineMatched = results.some((result) => result.matched);

    if (!lineMatched && !sawContactDetail && !contact.fullName && isNameCandidate(line.text)) {
      contact.fullName = line.text;
      continue;
    }
    sawContactDetail = sawContactDetail || lineMatched;

    const rest = results
      .map((result) => result.rest)
      .filter(Boolean)
      .join(' ');
    if (rest) {
      leftovers.push(rest);
    }
  }

  return { contact, leftovers };
}
