import type { DocumentLine } from '../types';
import { BULLET_PATTERN } from './rules';

const SKILL_DELIMITER = /\s*[,;|•·▪]\s*/u;
const LIST_LABEL = /^(\p{L}[\p{L}\s/&-]{0,39}):\s+/u;
const FINAL_CONJUNCTION = /\s+(?:e|and)\s+/i;

/** Deduplicates case-insensitively, keeping the first spelling and order. */
export function uniqueSkills(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const skills: string[] = [];
  for (const value of values) {
    const key = value.toLocaleLowerCase('pt-BR');
    if (!seen.has(key)) {
      seen.add(key);
      skills.push(value);
    }
  }
  return skills;
}

export interface SkillLine {
  /** Category label such as "Linguagens" in "Linguagens: TypeScript, Go". */
  label?: string;
  skills: string[];
}

export function parseSkillLine(text: string): SkillLine {
  const withoutMarker = text.replace(BULLET_PATTERN, '');
  const labelMatch = LIST_LABEL.exec(withoutMarker);
  const tokens = (labelMatch ? withoutMarker.slice(labelMatch[0].length) : withoutMarker).split(SKILL_DELIMITER);
  if (tokens.length > 1) {
    // "Java, Python e Go": the conjunction only splits the last item of a list.
    const last = tokens.pop() ?? '';
    tokens.push(...last.split(FINAL_CONJUNCTION));
  }
  const skills = tokens
    .map((token) => token.replace(BULLET_PATTERN, '').replace(/\.+$/, '').trim())
    .filter((token) => token.length > 0);
  return labelMatch ? { label: labelMatch[1].trim(), skills } : { skills };
}

export function splitSkillLine(text: string): string[] {
  return parseSkillLine(text).skills;
}

export interface SkillsResult {
  skills: string[];
  labels: string[];
}

export function extractSkills(lines: DocumentLine[]): SkillsResult {
  const parsed = lines.filter((line) => line.text).map((line) => parseSkillLine(line.text));
  return {
    skills: uniqueSkills(parsed.flatMap((line) => line.skills)),
    labels: parsed.flatMap((line) => (line.label ? [line.label] : [])),
  };
}
