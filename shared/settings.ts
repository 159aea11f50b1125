export type PageSize = 'letter' | 'a4';

export interface CoreSettings {
  pageSize: PageSize;
  /** A PDF line whose glyph height is this many times the page's body height is treated as heading-like. */
  headingScale: number;
  /** Vertical gap, in multiples of the typical line pitch, that counts as a blank line in PDFs. */
  blankLineGap: number;
}

export const DEFAULT_SETTINGS: Readonly<CoreSettings> = Object.freeze({
  pageSize: 'letter',
  headingScale: 1.18,
  blankLineGap: 1.6,
});

export const PAGE_DIMENSIONS: Readonly<Record<PageSize, { width: number; height: number }>> = Object.freeze({
  letter: { width: 612, height: 792 },
  a4: { width: 595.28, height: 841.89 },
});

type SettingsEnv = Record<string, string | undefined>;

export function loadSettings(env: SettingsEnv = process.env): CoreSettings {
  return normalizeSettings({
    pageSize: parsePageSize(env.RESUME_PAGE_SIZE),
    headingScale: parseNumber(env.RESUME_HEADING_SCALE),
    blankLineGap: parseNumber(env.RESUME_BLANK_LINE_GAP),
  });
}

export function normalizeSettings(settings: Partial<CoreSettings> = {}): CoreSettings {
  const pageSize: PageSize = settings.pageSize === 'a4' ? 'a4' : 'letter';
  const headingScale =
    settings.headingScale !== undefined && settings.headingScale > 1 ? settings.headingScale : DEFAULT_SETTINGS.headingScale;
  const blankLineGap =
    settings.blankLineGap !== undefined && settings.blankLineGap > 1 ? settings.blankLineGap : DEFAULT_SETTINGS.blankLineGap;
  return { pageSize, headingScale, blankLineGap };
}

function parsePageSize(value: string | undefined): PageSize | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'a4' || normalized === 'letter') {
    return normalized;
  }
  return undefined;
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value?.trim()) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
