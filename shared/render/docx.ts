import {
  AlignmentType,
  BorderStyle,
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  Tab,
  TabStopType,
  Table,
  TableCell,
  TableLayoutType,
  TableRow,
  TextRun,
  WidthType,
} from 'docx';
import JSZip from 'jszip';
import type { LayoutDefinition, LayoutStyle, Typography } from '../layouts/catalog';
import { PAGE_DIMENSIONS, type CoreSettings } from '../settings';
import type { ContactBlock, ContentBlock, EntryBlock, HeadingBlock } from './blocks';

const FONT_NAMES: Record<Typography, string> = {
  sans: 'Calibri',
  serif: 'Times New Roman',
};

export const FIXED_PACKAGE_DATE = new Date(Date.UTC(2000, 0, 1));
const FIXED_CORE_TIMESTAMP = '2000-01-01T00:00:00Z';
const CORE_PROPERTIES_PATH = 'docProps/core.xml';
const CORE_DATE_PATTERN = /(<dcterms:(created|modified)\b[^>]*>)[^<]*(<\/dcterms:\2>)/g;

const GRID_LEFT_SHARE = 0.34;
const ACHIEVEMENT_INDENT = 284;

/** docx sizes: twips for lengths, half-points for font sizes. */
const twips = (points: number): number => Math.round(points * 20);
const halfPoints = (points: number): number => Math.round(points * 2);
const docxColor = (hex: string): string => hex.replace(/^#/, '').toUpperCase();

interface DocxContext {
  style: LayoutStyle;
  font: string;
  /** Usable width between the margins, in twips. */
  contentWidth: number;
}

function contactParagraphs(block: ContactBlock, context: DocxContext): Paragraph[] {
  const { style } = context;
  const alignment = style.headerAlignment === 'center' ? AlignmentType.CENTER : AlignmentType.LEFT;
  const paragraphs = [
    new Paragraph({
      alignment,
      spacing: { after: 60 },
      children: [
        new TextRun({
          text: block.name,
          bold: true,
          size: halfPoints(style.fontSizes.name),
          color: docxColor(style.accentColor),
        }),
      ],
    }),
  ];
  if (block.line) {
    paragraphs.push(
      new Paragraph({
        alignment,
        spacing: { after: 120 },
        border: style.headingRule
          ? { bottom: { style: BorderStyle.SINGLE, size: 12, color: docxColor(style.accentColor), space: 4 } }
          : undefined,
        children: [
          new TextRun({
            text: block.line,
            size: halfPoints(style.fontSizes.small),
            color: docxColor(style.mutedColor),
          }),
        ],
      }),
    );
  }
  return paragraphs;
}

function headingParagraph(block: HeadingBlock, context: DocxContext): Paragraph {
  const { style } = context;
  return new Paragraph({
    heading: HeadingLevel.HEADING_2,
    keepNext: true,
    spacing: { before: 240, after: 80 },
    border: style.headingRule
      ? { bottom: { style: BorderStyle.SINGLE, size: 6, color: docxColor(style.accentColor), space: 2 } }
      : undefined,
    children: [
      new TextRun({
        text: block.title,
        bold: true,
        font: context.font,
        size: halfPoints(style.fontSizes.heading),
        color: docxColor(style.accentColor),
      }),
    ],
  });
}

function bodyParagraph(text: string, indent?: number): Paragraph {
  return new Paragraph({
    spacing: { after: 60 },
    indent: indent ? { left: indent } : undefined,
    children: [new TextRun({ text })],
  });
}

function mutedParagraph(text: string, context: DocxContext): Paragraph {
  return new Paragraph({
    spacing: { after: 40 },
    children: [
      new TextRun({
        text,
        italics: true,
        size: halfPoints(context.style.fontSizes.small),
        color: docxColor(context.style.mutedColor),
      }),
    ],
  });
}

/** Entry heading with the period pushed to a right tab stop at the margin. */
function entryTitleParagraph(block: EntryBlock, context: DocxContext): Paragraph {
  const children: TextRun[] = [new TextRun({ text: block.heading, bold: true })];
  if (block.period) {
    children.push(
      new TextRun({
        children: [new Tab(), block.period],
        color: docxColor(context.style.mutedColor),
      }),
    );
  }
  return new Paragraph({
    keepNext: true,
    spacing: { before: 120, after: 40 },
    tabStops: [{ type: TabStopType.RIGHT, position: context.contentWidth }],
    children,
  });
}

function entryBodyParagraphs(block: EntryBlock, context: DocxContext, achievementIndent: number): Paragraph[] {
  const paragraphs: Paragraph[] = [];
  if (block.details) {
    paragraphs.push(bodyParagraph(block.details));
  }
  if (block.link) {
    paragraphs.push(mutedParagraph(block.link, context));
  }
  for (const achievement of block.achievements) {
    paragraphs.push(bodyParagraph(achievement, achievementIndent));
  }
  return paragraphs;
}

function entryParagraphs(block: EntryBlock, context: DocxContext): Paragraph[] {
  const title = block.heading || block.period ? [entryTitleParagraph(block, context)] : [];
  return [...title, ...entryBodyParagraphs(block, context, ACHIEVEMENT_INDENT)];
}

const NO_BORDER = { style: BorderStyle.NONE, size: 0, color: 'FFFFFF' } as const;

/** Two-column layouts: one table per section, one row per entry. */
function entryTable(blocks: EntryBlock[], context: DocxContext): Table {
  const left = Math.round(context.contentWidth * GRID_LEFT_SHARE);
  const right = context.contentWidth - left;
  const rows = blocks.map((block) => {
    const leftChildren: Paragraph[] = [];
    if (block.heading) {
      leftChildren.push(new Paragraph({ children: [new TextRun({ text: block.heading, bold: true })] }));
    }
    if (block.period) {
      leftChildren.push(mutedParagraph(block.period, context));
    }
    const rightChildren = entryBodyParagraphs(block, context, 0);
    return new TableRow({
      children: [
        new TableCell({
          width: { size: left, type: WidthType.DXA },
          children: leftChildren.length > 0 ? leftChildren : [new Paragraph({})],
        }),
        new TableCell({
          width: { size: right, type: WidthType.DXA },
          children: rightChildren.length > 0 ? rightChildren : [new Paragraph({})],
        }),
      ],
    });
  });
  return new Table({
    rows,
    width: { size: context.contentWidth, type: WidthType.DXA },
    columnWidths: [left, right],
    layout: TableLayoutType.FIXED,
    borders: {
      top: NO_BORDER,
      bottom: NO_BORDER,
      left: NO_BORDER,
      right: NO_BORDER,
      insideHorizontal: NO_BORDER,
      insideVertical: NO_BORDER,
    },
  });
}

function buildBody(blocks: ContentBlock[], context: DocxContext): (Paragraph | Table)[] {
  const children: (Paragraph | Table)[] = [];
  let pendingGrid: EntryBlock[] = [];
  const flushGrid = () => {
    if (pendingGrid.length > 0) {
      children.push(entryTable(pendingGrid, context));
      pendingGrid = [];
    }
  };

  for (const block of blocks) {
    if (block.type === 'entry' && context.style.columns === 2) {
      pendingGrid.push(block);
      continue;
    }
    flushGrid();
    switch (block.type) {
      case 'contact':
        children.push(...contactParagraphs(block, context));
        break;
      case 'heading':
        children.push(headingParagraph(block, context));
        break;
      case 'summary':
        children.push(bodyParagraph(block.text));
        break;
      case 'entry':
        children.push(...entryParagraphs(block, context));
        break;
      case 'skills':
        children.push(bodyParagraph(block.text));
        break;
    }
  }
  flushGrid();
  return children;
}

/**
 * Re-zips a generated package with fixed entry timestamps and fixed core
 * property dates. Entry order is kept.
 */
export async function normalizeDocxPackage(bytes: Uint8Array): Promise<Uint8Array> {
  const source = await JSZip.loadAsync(bytes);
  const target = new JSZip();
  const entries: JSZip.JSZipObject[] = [];
  source.forEach((_path, entry) => {
    if (!entry.dir) {
      entries.push(entry);
    }
  });
  for (const entry of entries) {
    const options = { date: FIXED_PACKAGE_DATE, createFolders: false };
    if (entry.name === CORE_PROPERTIES_PATH) {
      const xml = await entry.async('string');
      target.file(entry.name, xml.replace(CORE_DATE_PATTERN, `$1${FIXED_CORE_TIMESTAMP}$3`), options);
    } else {
      target.file(entry.name, await entry.async('uint8array'), options);
    }
  }
  return target.generateAsync({ type: 'uint8array', compression: 'DEFLATE', compressionOptions: { level: 6 } });
}

export async function encodeDocx(
  blocks: ContentBlock[],
  layout: LayoutDefinition,
  settings: CoreSettings,
): Promise<Uint8Array> {
  const { style } = layout;
  const page = PAGE_DIMENSIONS[settings.pageSize];
  const context: DocxContext = {
    style,
    font: FONT_NAMES[style.typography],
    contentWidth: twips(page.width - style.margins.left - style.margins.right),
  };
  const contact = blocks.find((block): block is ContactBlock => block.type === 'contact');
  const name = contact?.name ?? '';

  const document = new Document({
    creator: name || layout.name,
    title: name ? `${name} - ${layout.name}` : layout.name,
    description: layout.description,
    styles: {
      default: {
        document: {
          run: {
            font: context.font,
            size: halfPoints(style.fontSizes.body),
            color: docxColor(style.textColor),
          },
        },
      },
    },
    sections: [
      {
        properties: {
          page: {
            size: { width: twips(page.width), height: twips(page.height) },
            margin: {
              top: twips(style.margins.top),
              right: twips(style.margins.right),
              bottom: twips(style.margins.bottom),
              left: twips(style.margins.left),
            },
          },
        },
        children: buildBody(blocks, context),
      },
    ],
  });

  const packed = await Packer.toBuffer(document);
  return normalizeDocxPackage(packed);
}
