export type DocumentFormat = 'pdf' | 'docx';

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['pdf', 'docx'];

export interface Contact {
  fullName: string;
  email?: string;
  phone?: string;
  location?: string;
  linkedin?: string;
  website?: string;
}

export interface ExperienceEntry {
  role: string;
  organization?: string;
  startDate?: string;
  /** Raw end token; keeps the ongoing marker text ("Atual", "Present") when `isCurrent` is set. */
  endDate?: string;
  isCurrent: boolean;
  summary?: string;
  achievements: string[];
}

export interface EducationEntry {
  degree: string;
  institution?: string;
  details?: string;
}

export interface ProjectEntry {
  name: string;
  description?: string;
  link?: string;
}

export interface Resume {
  contact: Contact;
  summary: string;
  experience: ExperienceEntry[];
  education: EducationEntry[];
  skills: string[];
  projects: ProjectEntry[];
}

export type SectionKind = 'summary' | 'experience' | 'education' | 'skills' | 'projects' | 'other';

export interface DocumentLine {
  /** Empty text marks a blank-line boundary. */
  text: string;
  headingHint?: boolean;
  indent?: number;
  page?: number;
}

export type ReaderWarningKind = 'multi-column-layout' | 'docx-conversion' | 'empty-page' | 'unreadable-page';

export interface ReaderWarning {
  kind: ReaderWarningKind;
  message: string;
  page?: number;
}

export interface ReadResult {
  format: DocumentFormat;
  lines: DocumentLine[];
  warnings: ReaderWarning[];
}

export type ReviewField = 'fullName' | 'email' | 'phone' | 'summary' | 'experience' | 'education' | 'skills';

export interface ExtractionReport {
  needsReview: boolean;
  missing: ReviewField[];
  unmapped: string[];
  sections: SectionKind[];
}

export interface ExtractionResult {
  resume: Resume;
  report: ExtractionReport;
}

export function createEmptyResume(): Resume {
  return {
    contact: { fullName: '' },
    summary: '',
    experience: [],
    education: [],
    skills: [],
    projects: [],
  };
}
