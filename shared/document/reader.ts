import { extractLinesFromDocx } from '../docx/extractLines';
import { extractLinesFromPdf } from '../pdf/extractLines';
import { normalizeSettings, type CoreSettings } from '../settings';
import type { DocumentFormat, DocumentLine, ReadResult, ReaderWarning } from '../types';
import { normalizeLines } from '../util/text';
import { detectFormat, type FormatHints } from './sniff';

export interface ReadOptions extends FormatHints {
  settings?: Partial<CoreSettings>;
}

type FormatReader = (
  bytes: Uint8Array,
  settings: CoreSettings,
) => Promise<{ lines: DocumentLine[]; warnings: ReaderWarning[] }>;

const READERS: Record<DocumentFormat, FormatReader> = {
  pdf: extractLinesFromPdf,
  docx: (bytes) => extractLinesFromDocx(bytes),
};

export async function readDocument(bytes: Uint8Array, options: ReadOptions = {}): Promise<ReadResult> {
  const format = detectFormat(bytes, options);
  const settings = normalizeSettings(options.settings);
  const { lines, warnings } = await READERS[format](bytes, settings);
  return {
    format,
    lines: normalizeLines(lines),
    warnings,
  };
}
