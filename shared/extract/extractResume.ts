import { EmptyDocumentError } from '../errors';
import {
  createEmptyResume,
  type DocumentLine,
  type ExtractionReport,
  type ExtractionResult,
  type Resume,
  type ReviewField,
  type SectionKind,
} from '../types';
import { normalizeLines } from '../util/text';
import { extractContact } from './contact';
import { groupEntries, parseEducationEntry, parseExperienceEntry, parseProjectEntry } from './entries';
import { segmentSections, type SegmentKind } from './sections';
import { extractSkills } from './skills';

type SectionLines = Record<SegmentKind, DocumentLine[]>;

function collectSectionLines(lines: DocumentLine[]): { byKind: SectionLines; order: SectionKind[] } {
  const byKind: SectionLines = {
    unassigned: [],
    summary: [],
    experience: [],
    education: [],
    skills: [],
    projects: [],
    other: [],
  };
  const order: SectionKind[] = [];
  for (const section of segmentSections(lines)) {
    const target = byKind[section.kind];
    // Repeated sections of one kind are read as one, kept apart by a blank line.
    if (target.length > 0) {
      target.push({ text: '' });
    }
    target.push(...section.lines);
    if (section.kind !== 'unassigned') {
      order.push(section.kind);
    }
  }
  return { byKind, order };
}

const REVIEW_CHECKS: { field: ReviewField; isMissing: (resume: Resume) => boolean }[] = [
  { field: 'fullName', isMissing: (resume) => !resume.contact.fullName },
  { field: 'email', isMissing: (resume) => !resume.contact.email },
  { field: 'phone', isMissing: (resume) => !resume.contact.phone },
  { field: 'summary', isMissing: (resume) => !resume.summary },
  { field: 'experience', isMissing: (resume) => resume.experience.length === 0 },
  { field: 'education', isMissing: (resume) => resume.education.length === 0 },
  { field: 'skills', isMissing: (resume) => resume.skills.length === 0 },
];

export function buildReport(resume: Resume, sections: SectionKind[], unmapped: string[]): ExtractionReport {
  const missing = REVIEW_CHECKS.filter((check) => check.isMissing(resume)).map((check) => check.field);
  return {
    needsReview: missing.length > 0 || unmapped.length > 0,
    missing,
    unmapped,
    sections,
  };
}

/**
 * Heuristically maps a line sequence onto the resume schema. Content that fits
 * nowhere ends up in the least structured field available or in
 * `report.unmapped`; the only failure is an input with no text at all.
 */
export function extractResumeWithReport(input: ReadonlyArray<DocumentLine | string>): ExtractionResult {
  const lines = normalizeLines(input);
  if (lines.length === 0) {
    throw new EmptyDocumentError();
  }

  const { byKind, order } = collectSectionLines(lines);
  const resume = createEmptyResume();

  const header = extractContact(byKind.unassigned);
  resume.contact = header.contact;
  resume.summary = [...header.leftovers, ...byKind.summary.map((line) => line.text).filter(Boolean)].join(' ');
  resume.experience = groupEntries(byKind.experience, 'experience').map(parseExperienceEntry);
  resume.education = groupEntries(byKind.education, 'education').map(parseEducationEntry);
  const skills = extractSkills(byKind.skills);
  resume.skills = skills.skills;
  resume.projects = groupEntries(byKind.projects, 'projects').map(parseProjectEntry);

  const unmapped = [...skills.labels, ...byKind.other.map((line) => line.text).filter(Boolean)];
  return { resume, report: buildReport(resume, order, unmapped) };
}

export function extractResume(input: ReadonlyArray<DocumentLine | string>): Resume {
  return extractResumeWithReport(input).resume;
}
