import { readDocument, type ReadOptions } from './document/reader';
import { extractResumeWithReport } from './extract/extractResume';
import { getLayout } from './layouts/registry';
import { MIME_TYPES, parseRenderFormat, renderResume } from './render/renderer';
import type { CoreSettings } from './settings';
import type { DocumentFormat, ExtractionReport, ReaderWarning, Resume } from './types';
import { coerceResume } from './validate';

export interface ParseResult {
  format: DocumentFormat;
  resume: Resume;
  report: ExtractionReport;
  warnings: ReaderWarning[];
}

export interface RenderedDocument {
  bytes: Uint8Array;
  mimeType: string;
  fileName: string;
}

/** Reads an uploaded PDF or Word file and maps its text onto a resume. */
export async function parseResumeDocument(bytes: Uint8Array, options: ReadOptions = {}): Promise<ParseResult> {
  const { format, lines, warnings } = await readDocument(bytes, options);
  const { resume, report } = extractResumeWithReport(lines);
  return { format, resume, report, warnings };
}

/**
 * Validates a caller-edited resume payload and renders it. The layout and the
 * format are checked before the payload.
 */
export async function renderResumeDocument(
  payload: unknown,
  layoutId: string,
  format: string,
  settings: Partial<CoreSettings> = {},
): Promise<RenderedDocument> {
  const layout = getLayout(layoutId);
  const target = parseRenderFormat(format);
  const resume = coerceResume(payload);
  const bytes = await renderResume(resume, layout, target, settings);
  return {
    bytes,
    mimeType: MIME_TYPES[target],
    fileName: `curriculo-${layout.id}.${target}`,
  };
}

export { readDocument, type ReadOptions } from './document/reader';
export { detectFormat, sniffFormat, type FormatHints } from './document/sniff';
export { extractResume, extractResumeWithReport } from './extract/extractResume';
export { getLayout, isLayoutId, listLayouts } from './layouts/registry';
export type { LayoutDefinition, LayoutId, LayoutStyle } from './layouts/catalog';
export { buildContentBlocks, type ContentBlock } from './render/blocks';
export { MIME_TYPES, parseRenderFormat, renderResume } from './render/renderer';
export { DEFAULT_SETTINGS, loadSettings, normalizeSettings, type CoreSettings, type PageSize } from './settings';
export { coerceResume, validateResume, type ValidationResult } from './validate';
export * from './errors';
export * from './types';
