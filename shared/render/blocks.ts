import type { LayoutDefinition, LayoutStyle, RenderSection } from '../layouts/catalog';
import type { Contact, EducationEntry, ExperienceEntry, ProjectEntry, Resume } from '../types';

export type EntrySection = 'experience' | 'education' | 'projects';

export interface ContactBlock {
  type: 'contact';
  name: string;
  details: string[];
  /** Details joined with the layout's contact separator. */
  line: string;
}

export interface HeadingBlock {
  type: 'heading';
  section: RenderSection;
  title: string;
}

export interface SummaryBlock {
  type: 'summary';
  text: string;
}

export interface EntryBlock {
  type: 'entry';
  section: EntrySection;
  heading: string;
  period?: string;
  details?: string;
  link?: string;
  /** Display labels, marker included. */
  achievements: string[];
}

export interface SkillsBlock {
  type: 'skills';
  items: string[];
  text: string;
}

export type ContentBlock = ContactBlock | HeadingBlock | SummaryBlock | EntryBlock | SkillsBlock;

const CONTACT_FIELDS: readonly (keyof Contact)[] = ['email', 'phone', 'location', 'linkedin', 'website'];

function joinPresent(parts: (string | undefined)[], joiner: string): string {
  return parts
    .map((part) => part?.trim())
    .filter(Boolean)
    .join(joiner);
}

export function formatPeriod(entry: ExperienceEntry, style: LayoutStyle): string | undefined {
  const start = entry.startDate?.trim();
  const end = entry.endDate?.trim() || (entry.isCurrent ? style.currentLabel : undefined);
  if (!start && !end) {
    return undefined;
  }
  return joinPresent([start, end], style.periodSeparator);
}

export function achievementLabel(text: string, index: number, style: LayoutStyle): string {
  return style.achievementMarker === 'number' ? `${index + 1}. ${text}` : `${style.bulletGlyph} ${text}`;
}

function contactBlock(contact: Contact, style: LayoutStyle): ContactBlock {
  const details = CONTACT_FIELDS.map((field) => contact[field]?.trim() ?? '').filter(Boolean);
  return {
    type: 'contact',
    name: contact.fullName.trim(),
    details,
    line: details.join(style.contactSeparator),
  };
}

function experienceBlock(entry: ExperienceEntry, style: LayoutStyle): EntryBlock {
  const achievements = entry.achievements.map((text) => text.trim()).filter(Boolean);
  return withOptional({
    type: 'entry',
    section: 'experience',
    heading: joinPresent([entry.role, entry.organization], style.organizationJoiner),
    period: formatPeriod(entry, style),
    details: entry.summary?.trim(),
    achievements: achievements.map((text, index) => achievementLabel(text, index, style)),
  });
}

function educationBlock(entry: EducationEntry, style: LayoutStyle): EntryBlock {
  return withOptional({
    type: 'entry',
    section: 'education',
    heading: joinPresent([entry.degree, entry.institution], style.organizationJoiner),
    details: entry.details?.trim(),
    achievements: [],
  });
}

function projectBlock(entry: ProjectEntry): EntryBlock {
  return withOptional({
    type: 'entry',
    section: 'projects',
    heading: entry.name.trim(),
    details: entry.description?.trim(),
    link: entry.link?.trim(),
    achievements: [],
  });
}

/** Drops optional fields that ended up empty so encoders can test for presence. */
function withOptional(block: EntryBlock): EntryBlock {
  const result: EntryBlock = {
    type: block.type,
    section: block.section,
    heading: block.heading,
    achievements: block.achievements,
  };
  if (block.period) {
    result.period = block.period;
  }
  if (block.details) {
    result.details = block.details;
  }
  if (block.link) {
    result.link = block.link;
  }
  return result;
}

function isEmptyEntry(block: EntryBlock): boolean {
  return !block.heading && !block.period && !block.details && !block.link && block.achievements.length === 0;
}

function section(
  kind: RenderSection,
  style: LayoutStyle,
  blocks: ContentBlock[],
): ContentBlock[] {
  return blocks.length > 0 ? [{ type: 'heading', section: kind, title: style.sectionTitles[kind] }, ...blocks] : [];
}

/**
 * Turns a resume into the block sequence both encoders draw: the contact block,
 * the summary, then experience, education, skills and projects, each with its
 * heading and only when it has content.
 */
export function buildContentBlocks(resume: Resume, layout: LayoutDefinition): ContentBlock[] {
  const { style } = layout;
  const blocks: ContentBlock[] = [contactBlock(resume.contact, style)];

  const summary = resume.summary.trim();
  if (summary) {
    blocks.push(...section('summary', style, [{ type: 'summary', text: summary }]));
  }

  const experience = resume.experience.map((entry) => experienceBlock(entry, style)).filter((block) => !isEmptyEntry(block));
  blocks.push(...section('experience', style, experience));

  const education = resume.education.map((entry) => educationBlock(entry, style)).filter((block) => !isEmptyEntry(block));
  blocks.push(...section('education', style, education));

  const skills = resume.skills.map((skill) => skill.trim()).filter(Boolean);
  if (skills.length > 0) {
    blocks.push(...section('skills', style, [{ type: 'skills', items: skills, text: skills.join(style.skillSeparator) }]));
  }

  const projects = resume.projects.map(projectBlock).filter((block) => !isEmptyEntry(block));
  blocks.push(...section('projects', style, projects));

  return blocks;
}
