import { PDFDocument, StandardFonts } from 'pdf-lib';
import { describe, expect, it } from 'vitest';
import { CorruptDocumentError } from '../../../shared/errors';
import {
  extractLinesFromPdf,
  findInnerColumnEdge,
  looksMultiColumn,
  toDocumentLines,
  type PageLine,
} from '../../../shared/pdf/extractLines';
import { renderResume } from '../../../shared/render/renderer';
import { DEFAULT_SETTINGS } from '../../../shared/settings';
import { createEmptyResume } from '../../../shared/types';
import { sampleResume } from '../../fixtures/resumes';

function pageLine(y: number, text: string, overrides: Partial<PageLine> = {}): PageLine {
  const x = overrides.x ?? 54;
  return { y, x, height: 10, text, widestGap: 0, segments: [{ start: x, end: x + 200 }], ...overrides };
}

async function buildPdf(pages: { text: string; y: number; size: number }[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const items of pages) {
    const page = doc.addPage([612, 792]);
    for (const item of items) {
      page.drawText(item.text, { x: 54, y: item.y, size: item.size, font });
    }
  }
  return doc.save();
}

describe('toDocumentLines', () => {
  it('derives heading hints, blank lines and indentation from positions', () => {
    const lines = toDocumentLines(
      [
        pageLine(700, 'Maria Silva', { height: 20 }),
        pageLine(680, 'maria@example.com'),
        pageLine(666, 'Line A'),
        pageLine(652, '• Bullet', { x: 66 }),
        pageLine(610, 'After gap'),
      ],
      1,
      DEFAULT_SETTINGS,
    );

    expect(lines).toEqual([
      { text: 'Maria Silva', page: 1, headingHint: true },
      { text: 'maria@example.com', page: 1 },
      { text: 'Line A', page: 1 },
      { text: '• Bullet', page: 1, indent: 1 },
      { text: '', page: 1 },
      { text: 'After gap', page: 1 },
    ]);
  });

  it('returns nothing for an empty page', () => {
    expect(toDocumentLines([], 3, DEFAULT_SETTINGS)).toEqual([]);
  });
});

describe('looksMultiColumn', () => {
  it('flags pages where many lines have a wide horizontal gap', () => {
    const lines = [
      pageLine(700, 'Skills Experience', { widestGap: 120 }),
      pageLine(686, 'TypeScript Senior Developer', { widestGap: 120 }),
      pageLine(672, 'SQL Led the migration', { widestGap: 120 }),
      pageLine(658, 'Footer'),
    ];
    expect(looksMultiColumn(lines)).toBe(true);
  });

  it('ignores a single right-aligned date', () => {
    const lines = [
      pageLine(700, 'Senior Developer Jan 2020 - Atual', { widestGap: 200 }),
      pageLine(686, 'Line'),
      pageLine(672, 'Line'),
      pageLine(658, 'Line'),
    ];
    expect(looksMultiColumn(lines)).toBe(false);
  });
});

describe('findInnerColumnEdge', () => {
  it('finds a second left edge shared by several lines', () => {
    const lines = [
      pageLine(700, 'Senior Developer Led the migration', {
        x: 36,
        segments: [
          { start: 36, end: 180 },
          { start: 234, end: 410 },
        ],
      }),
      pageLine(686, 'Jan 2020 - Atual', { x: 36, segments: [{ start: 36, end: 110 }] }),
      pageLine(672, 'Bacharelado 2012 - 2016', {
        x: 36,
        segments: [
          { start: 36, end: 150 },
          { start: 234, end: 290 },
        ],
      }),
    ];
    expect(findInnerColumnEdge(lines)).toBe(234);
    expect(looksMultiColumn(lines)).toBe(true);
  });

  it('ignores right-aligned labels of equal width', () => {
    const lines = [
      pageLine(700, 'Developer 02/2011 - 12/2012', {
        segments: [
          { start: 54, end: 150 },
          { start: 480, end: 558 },
        ],
      }),
      pageLine(686, 'Analyst 03/2012 - 12/2013', {
        segments: [
          { start: 54, end: 140 },
          { start: 480, end: 558 },
        ],
      }),
    ];
    expect(findInnerColumnEdge(lines)).toBeUndefined();
    expect(looksMultiColumn(lines)).toBe(false);
  });
});

describe('extractLinesFromPdf', () => {
  it('reads text lines top to bottom', async () => {
    const bytes = await buildPdf([
      [
        { text: 'Maria Silva', y: 740, size: 20 },
        { text: 'maria@example.com', y: 716, size: 10 },
        { text: 'Experiência', y: 690, size: 14 },
        { text: 'Senior Developer — Tech Corp', y: 672, size: 10 },
        { text: 'Jan 2020 - Atual', y: 658, size: 10 },
        { text: '• Led the migration', y: 644, size: 10 },
      ],
    ]);

    const { lines, warnings } = await extractLinesFromPdf(bytes);

    expect(lines.map((line) => line.text)).toEqual([
      'Maria Silva',
      'maria@example.com',
      'Experiência',
      'Senior Developer — Tech Corp',
      'Jan 2020 - Atual',
      '• Led the migration',
    ]);
    expect(lines[0].headingHint).toBe(true);
    expect(lines[1].headingHint).toBeUndefined();
    expect(warnings).toEqual([]);
  });

  it('warns about pages without text', async () => {
    const bytes = await buildPdf([[], [{ text: 'Only page with text', y: 700, size: 11 }]]);

    const { lines, warnings } = await extractLinesFromPdf(bytes);

    expect(lines).toEqual([{ text: 'Only page with text', page: 2 }]);
    expect(warnings).toEqual([{ kind: 'empty-page', page: 1, message: 'Page 1 has no extractable text.' }]);
  });

  it('warns about the two-column layout', async () => {
    const bytes = await renderResume(sampleResume(), 'minimalista-grade', 'pdf');

    const { warnings } = await extractLinesFromPdf(bytes);

    expect(warnings).toEqual([
      {
        kind: 'multi-column-layout',
        page: 1,
        message: 'Page 1 looks like a multi-column layout; text was read left-to-right, top-to-bottom.',
      },
    ]);
  });

  it('does not warn about single-column layouts', async () => {
    const bytes = await renderResume(sampleResume(), 'moderno-azul', 'pdf');
    const { warnings } = await extractLinesFromPdf(bytes);
    expect(warnings).toEqual([]);
  });

  it('writes common symbols the standard fonts lack as plain text', async () => {
    const resume = createEmptyResume();
    resume.summary = 'Plataforma → pagamentos ≥ 99%';
    const bytes = await renderResume(resume, 'moderno-azul', 'pdf');

    const { lines } = await extractLinesFromPdf(bytes);

    expect(lines.map((line) => line.text)).toContain('Plataforma -> pagamentos >= 99%');
  });

  it('rejects bytes that are not a readable PDF', async () => {
    const bytes = new TextEncoder().encode('%PDF-1.7 this is not a real document');
    await expect(extractLinesFromPdf(bytes)).rejects.toBeInstanceOf(CorruptDocumentError);
  });
});
