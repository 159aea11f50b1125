import { createRequire } from 'node:module';
import path from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import { CorruptDocumentError } from '../errors';
import { DEFAULT_SETTINGS, type CoreSettings } from '../settings';
import type { DocumentLine, ReaderWarning } from '../types';

const Y_BUCKET_SIZE = 2;
const INDENT_STEP = 12;
const COLUMN_GAP_MIN = 36;
const COLUMN_LINES_MIN = 3;
const COLUMN_SHARE_MIN = 0.25;
const INNER_EDGE_OFFSET_MIN = 72;
const INNER_EDGE_LINES_MIN = 2;

interface LineFragment {
  x: number;
  width: number;
  height: number;
  str: string;
}

/** A run of fragments on one line with no gap wider than the glyph height. */
export interface LineSegment {
  start: number;
  end: number;
}

export interface PageLine {
  y: number;
  x: number;
  height: number;
  text: string;
  widestGap: number;
  segments: LineSegment[];
}

export interface PdfLinesResult {
  lines: DocumentLine[];
  warnings: ReaderWarning[];
}

const requireFromHere = createRequire(import.meta.url);
const STANDARD_FONT_DATA_URL = `${path.join(path.dirname(requireFromHere.resolve('pdfjs-dist/package.json')), 'standard_fonts')}${path.sep}`;

function bucketY(value: number): number {
  return Math.round(value / Y_BUCKET_SIZE);
}

function median(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

function joinFragments(fragments: LineFragment[]): { text: string; widestGap: number; segments: LineSegment[] } {
  let text = '';
  let widestGap = 0;
  const segments: LineSegment[] = [];
  let previous: LineFragment | undefined;
  for (const fragment of fragments) {
    const end = fragment.x + fragment.width;
    if (previous) {
      const gap = fragment.x - (previous.x + previous.width);
      widestGap = Math.max(widestGap, gap);
      // pdfjs splits words at kerning boundaries; only a visible gap is a space.
      if (gap > previous.height * 0.15 && !text.endsWith(' ') && !fragment.str.startsWith(' ')) {
        text += ' ';
      }
      const current = segments[segments.length - 1];
      if (gap < previous.height) {
        current.end = Math.max(current.end, end);
      } else {
        segments.push({ start: fragment.x, end });
      }
    } else {
      segments.push({ start: fragment.x, end });
    }
    text += fragment.str;
    previous = fragment;
  }
  return { text, widestGap, segments };
}

function buildPageLines(items: TextItem[]): PageLine[] {
  const buckets = new Map<number, LineFragment[]>();

  for (const item of items) {
    if (!item.str?.trim()) {
      continue;
    }

    const transform = item.transform ?? [];
    const y = bucketY(transform[5] ?? 0);
    const x = transform[4] ?? 0;

    const fragments = buckets.get(y) ?? [];
    fragments.push({ x, width: item.width ?? 0, height: item.height ?? 0, str: item.str });
    buckets.set(y, fragments);
  }

  return Array.from(buckets.entries())
    .sort((a, b) => b[0] - a[0])
    .map(([bucket, fragments]) => {
      const ordered = fragments.sort((a, b) => a.x - b.x);
      const { text, widestGap, segments } = joinFragments(ordered);
      return {
        y: bucket * Y_BUCKET_SIZE,
        x: ordered[0].x,
        height: Math.max(...ordered.map((fragment) => fragment.height)),
        text,
        widestGap,
        segments,
      };
    });
}

/**
 * Turns positioned page lines into document lines: heading hints come from glyph
 * height relative to the page's body text, blank lines from unusually wide
 * vertical gaps and indentation from the left offset.
 */
export function toDocumentLines(pageLines: PageLine[], pageNumber: number, settings: CoreSettings): DocumentLine[] {
  if (pageLines.length === 0) {
    return [];
  }
  const bodyHeight = median(pageLines.map((line) => line.height));
  const pitches = pageLines.slice(1).map((line, index) => pageLines[index].y - line.y).filter((pitch) => pitch > 0);
  const typicalPitch = median(pitches);
  const leftEdge = Math.min(...pageLines.map((line) => line.x));

  const lines: DocumentLine[] = [];
  pageLines.forEach((line, index) => {
    if (index > 0 && typicalPitch > 0 && pageLines[index - 1].y - line.y > typicalPitch * settings.blankLineGap) {
      lines.push({ text: '', page: pageNumber });
    }
    const documentLine: DocumentLine = { text: line.text, page: pageNumber };
    if (bodyHeight > 0 && line.height >= bodyHeight * settings.headingScale) {
      documentLine.headingHint = true;
    }
    const indent = Math.round((line.x - leftEdge) / INDENT_STEP);
    if (indent > 0) {
      documentLine.indent = indent;
    }
    lines.push(documentLine);
  });
  return lines;
}

/**
 * Finds a left edge well inside the page where text starts on several lines.
 * Segments sharing both their start and their end are right-aligned labels such
 * as dates, not a column.
 */
export function findInnerColumnEdge(pageLines: PageLine[]): number | undefined {
  if (pageLines.length === 0) {
    return undefined;
  }
  const leftEdge = Math.min(...pageLines.map((line) => line.x));
  const edges = new Map<number, { lines: Set<number>; ends: Set<number> }>();
  pageLines.forEach((line, index) => {
    for (const segment of line.segments) {
      if (segment.start - leftEdge < INNER_EDGE_OFFSET_MIN) {
        continue;
      }
      const key = Math.round(segment.start);
      const edge = edges.get(key) ?? { lines: new Set<number>(), ends: new Set<number>() };
      edge.lines.add(index);
      edge.ends.add(Math.round(segment.end));
      edges.set(key, edge);
    }
  });
  for (const [x, edge] of edges) {
    if (edge.lines.size >= INNER_EDGE_LINES_MIN && edge.ends.size > 1) {
      return x;
    }
  }
  return undefined;
}

export function looksMultiColumn(pageLines: PageLine[]): boolean {
  const gapped = pageLines.filter((line) => line.widestGap >= Math.max(COLUMN_GAP_MIN, line.height * 4));
  if (gapped.length >= COLUMN_LINES_MIN && gapped.length / pageLines.length >= COLUMN_SHARE_MIN) {
    return true;
  }
  return findInnerColumnEdge(pageLines) !== undefined;
}

export async function extractLinesFromPdf(
  bytes: Uint8Array,
  settings: CoreSettings = DEFAULT_SETTINGS,
): Promise<PdfLinesResult> {
  const loadingTask = getDocument({
    // pdfjs rejects Node Buffers and may detach the array it is given.
    data: new Uint8Array(bytes),
    standardFontDataUrl: STANDARD_FONT_DATA_URL,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  });

  const pdf = await loadingTask.promise.catch(async (error: unknown) => {
    await loadingTask.destroy();
    throw new CorruptDocumentError('pdf', error);
  });

  try {
    const lines: DocumentLine[] = [];
    const warnings: ReaderWarning[] = [];

    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
      let pageLines: PageLine[];
      try {
        const page = await pdf.getPage(pageNumber);
        const content = await page.getTextContent();
        pageLines = buildPageLines(content.items.filter(isTextItem));
      } catch (error) {
        console.warn(`Unable to read text from PDF page ${pageNumber}`, error);
        warnings.push({ kind: 'unreadable-page', page: pageNumber, message: `Page ${pageNumber} could not be read.` });
        continue;
      }
      if (pageLines.length === 0) {
        warnings.push({ kind: 'empty-page', page: pageNumber, message: `Page ${pageNumber} has no extractable text.` });
        continue;
      }
      if (looksMultiColumn(pageLines)) {
        warnings.push({
          kind: 'multi-column-layout',
          page: pageNumber,
          message: `Page ${pageNumber} looks like a multi-column layout; text was read left-to-right, top-to-bottom.`,
        });
      }
      if (lines.length > 0) {
        lines.push({ text: '', page: pageNumber });
      }
      lines.push(...toDocumentLines(pageLines, pageNumber, settings));
    }

    return { lines, warnings };
  } finally {
    await pdf.destroy();
  }
}
