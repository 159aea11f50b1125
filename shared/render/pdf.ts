import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage, type RGB } from 'pdf-lib';
import type { LayoutDefinition, LayoutStyle, Typography } from '../layouts/catalog';
import { PAGE_DIMENSIONS, type CoreSettings } from '../settings';
import type { ContactBlock, ContentBlock, EntryBlock, HeadingBlock } from './blocks';

interface FontSet {
  regular: PDFFont;
  bold: PDFFont;
  italic: PDFFont;
}

interface Palette {
  accent: RGB;
  text: RGB;
  muted: RGB;
}

interface TextOptions {
  font?: PDFFont;
  size?: number;
  color?: RGB;
  /** Offset from the left margin. */
  indent?: number;
  /** Extra offset for wrapped continuation lines. */
  hangingIndent?: number;
  align?: 'left' | 'center';
}

interface StyledLine {
  text: string;
  font: PDFFont;
  size: number;
  color: RGB;
}

const FONT_FAMILIES: Record<Typography, Record<keyof FontSet, StandardFonts>> = {
  sans: { regular: StandardFonts.Helvetica, bold: StandardFonts.HelveticaBold, italic: StandardFonts.HelveticaOblique },
  serif: { regular: StandardFonts.TimesRoman, bold: StandardFonts.TimesRomanBold, italic: StandardFonts.TimesRomanItalic },
};

const LINE_HEIGHT = 1.35;
const GRID_LEFT_SHARE = 0.34;
const GRID_GUTTER = 14;
const ACHIEVEMENT_INDENT = 10;
const PERIOD_GAP = 12;

/** Plain spellings for symbols the standard fonts cannot encode. */
const SYMBOL_FALLBACKS: Readonly<Record<string, string>> = {
  '→': '->',
  '←': '<-',
  '↔': '<->',
  '⇒': '=>',
  '≥': '>=',
  '≤': '<=',
  '≠': '!=',
  '−': '-',
  '‐': '-',
  '‑': '-',
  '✓': 'v',
  '✔': 'v',
  '▪': '•',
  '◦': '•',
  '●': '•',
  '■': '•',
  '►': '>',
  '➢': '>',
};

export function hexToRgb(hex: string): RGB {
  const match = /^#?([0-9a-f]{6})$/i.exec(hex.trim());
  if (!match) {
    return rgb(0, 0, 0);
  }
  const value = Number.parseInt(match[1], 16);
  return rgb(((value >> 16) & 0xff) / 255, ((value >> 8) & 0xff) / 255, (value & 0xff) / 255);
}

/**
 * Lays content out top to bottom on pdf-lib pages, breaking to a new page when
 * the next line would cross the bottom margin. Text is reduced to what the
 * standard fonts can encode before it is measured or drawn.
 */
class PdfComposer {
  private page: PDFPage;
  private y: number;
  private readonly charsets = new Map<PDFFont, Set<number>>();

  constructor(
    private readonly doc: PDFDocument,
    private readonly fonts: FontSet,
    private readonly palette: Palette,
    private readonly style: LayoutStyle,
    private readonly size: { width: number; height: number },
  ) {
    this.page = this.addPage();
    this.y = this.size.height - this.style.margins.top;
  }

  get contentWidth(): number {
    return this.size.width - this.style.margins.left - this.style.margins.right;
  }

  private addPage(): PDFPage {
    return this.doc.addPage([this.size.width, this.size.height]);
  }

  private lineHeight(size: number): number {
    return size * LINE_HEIGHT;
  }

  ensureSpace(height: number): void {
    if (this.y - height < this.style.margins.bottom) {
      this.page = this.addPage();
      this.y = this.size.height - this.style.margins.top;
    }
  }

  gap(points: number): void {
    this.y -= points;
  }

  private charsetOf(font: PDFFont): Set<number> {
    let charset = this.charsets.get(font);
    if (!charset) {
      charset = new Set(font.getCharacterSet());
      this.charsets.set(font, charset);
    }
    return charset;
  }

  sanitize(text: string, font: PDFFont): string {
    const charset = this.charsetOf(font);
    const encodable = (value: string): boolean =>
      [...value].every((char) => {
        const code = char.codePointAt(0);
        return code !== undefined && charset.has(code);
      });
    let result = '';
    for (const char of text.replace(/\s+/g, ' ')) {
      const fallback = SYMBOL_FALLBACKS[char];
      if (encodable(char)) {
        result += char;
      } else if (fallback !== undefined && encodable(fallback)) {
        result += fallback;
      } else {
        result += '?';
      }
    }
    return result;
  }

  wrap(text: string, font: PDFFont, size: number, width: number, hangingIndent = 0): string[] {
    const words = this.sanitize(text, font).trim().split(' ').filter(Boolean);
    const lines: string[] = [];
    let current = '';
    for (const word of words) {
      const candidate = current ? `${current} ${word}` : word;
      const limit = lines.length === 0 ? width : width - hangingIndent;
      if (current && font.widthOfTextAtSize(candidate, size) > limit) {
        lines.push(current);
        current = word;
      } else {
        current = candidate;
      }
    }
    if (current) {
      lines.push(current);
    }
    return lines;
  }

  text(value: string, options: TextOptions = {}): void {
    const font = options.font ?? this.fonts.regular;
    const size = options.size ?? this.style.fontSizes.body;
    const color = options.color ?? this.palette.text;
    const indent = options.indent ?? 0;
    const hanging = options.hangingIndent ?? 0;
    const width = this.contentWidth - indent;
    const lines = this.wrap(value, font, size, width, hanging);
    lines.forEach((line, index) => {
      this.ensureSpace(this.lineHeight(size));
      this.y -= size;
      let x = this.style.margins.left + indent + (index > 0 ? hanging : 0);
      if (options.align === 'center') {
        x = this.style.margins.left + (this.contentWidth - font.widthOfTextAtSize(line, size)) / 2;
      }
      this.page.drawText(line, { x, y: this.y, size, font, color });
      this.y -= this.lineHeight(size) - size;
    });
  }

  rule(color: RGB, thickness = 0.75): void {
    this.y -= 2;
    this.page.drawLine({
      start: { x: this.style.margins.left, y: this.y },
      end: { x: this.size.width - this.style.margins.right, y: this.y },
      thickness,
      color,
    });
    this.y -= 4;
  }

  /** One wrapped line on the left and a right-aligned label on the same baseline. */
  lineWithTrailer(value: string, trailer: string, font: PDFFont, trailerFont: PDFFont, size: number): void {
    const trailerText = this.sanitize(trailer, trailerFont);
    const trailerWidth = trailerFont.widthOfTextAtSize(trailerText, size);
    const lines = this.wrap(value, font, size, this.contentWidth - trailerWidth - PERIOD_GAP);
    const rows = lines.length > 0 ? lines : [''];
    rows.forEach((line, index) => {
      this.ensureSpace(this.lineHeight(size));
      this.y -= size;
      if (line) {
        this.page.drawText(line, { x: this.style.margins.left, y: this.y, size, font, color: this.palette.text });
      }
      if (index === 0) {
        this.page.drawText(trailerText, {
          x: this.size.width - this.style.margins.right - trailerWidth,
          y: this.y,
          size,
          font: trailerFont,
          color: this.palette.muted,
        });
      }
      this.y -= this.lineHeight(size) - size;
    });
  }

  /** Draws two columns line by line so a row can continue on the next page. */
  gridRow(left: StyledLine[], right: StyledLine[]): void {
    const leftWidth = this.contentWidth * GRID_LEFT_SHARE;
    const rightX = this.style.margins.left + leftWidth + GRID_GUTTER;
    const rows = Math.max(left.length, right.length);
    for (let index = 0; index < rows; index += 1) {
      const size = Math.max(left[index]?.size ?? 0, right[index]?.size ?? 0);
      this.ensureSpace(this.lineHeight(size));
      this.y -= size;
      for (const [cell, x] of [
        [left[index], this.style.margins.left],
        [right[index], rightX],
      ] as const) {
        if (cell?.text) {
          this.page.drawText(cell.text, { x, y: this.y, size: cell.size, font: cell.font, color: cell.color });
        }
      }
      this.y -= this.lineHeight(size) - size;
    }
  }

  styledLines(value: string, font: PDFFont, size: number, color: RGB, width: number): StyledLine[] {
    return this.wrap(value, font, size, width).map((text) => ({ text, font, size, color }));
  }

  get gridColumnWidths(): { left: number; right: number } {
    const left = this.contentWidth * GRID_LEFT_SHARE;
    return { left, right: this.contentWidth - left - GRID_GUTTER };
  }
}

function drawContact(composer: PdfComposer, block: ContactBlock, fonts: FontSet, palette: Palette, style: LayoutStyle): void {
  const align = style.headerAlignment;
  if (block.name) {
    composer.text(block.name, { font: fonts.bold, size: style.fontSizes.name, color: palette.accent, align });
  }
  if (block.line) {
    composer.gap(2);
    composer.text(block.line, { size: style.fontSizes.small, color: palette.muted, align });
  }
  if (style.headingRule && (block.name || block.line)) {
    composer.gap(4);
    composer.rule(palette.accent, 1.25);
  }
}

function drawHeading(composer: PdfComposer, block: HeadingBlock, fonts: FontSet, palette: Palette, style: LayoutStyle): void {
  composer.gap(style.fontSizes.heading * 0.8);
  // Keep a heading together with at least one body line.
  composer.ensureSpace(style.fontSizes.heading * LINE_HEIGHT + style.fontSizes.body * LINE_HEIGHT * 2);
  composer.text(block.title, { font: fonts.bold, size: style.fontSizes.heading, color: palette.accent });
  if (style.headingRule) {
    composer.rule(palette.accent);
  } else {
    composer.gap(3);
  }
}

function drawEntry(composer: PdfComposer, block: EntryBlock, fonts: FontSet, palette: Palette, style: LayoutStyle): void {
  const { body, small } = style.fontSizes;
  if (block.heading && block.period) {
    composer.lineWithTrailer(block.heading, block.period, fonts.bold, fonts.regular, body);
  } else if (block.heading) {
    composer.text(block.heading, { font: fonts.bold });
  } else if (block.period) {
    composer.text(block.period, { size: small, color: palette.muted });
  }
  if (block.details) {
    composer.text(block.details);
  }
  if (block.link) {
    composer.text(block.link, { font: fonts.italic, size: small, color: palette.muted });
  }
  for (const achievement of block.achievements) {
    composer.text(achievement, { indent: ACHIEVEMENT_INDENT, hangingIndent: ACHIEVEMENT_INDENT });
  }
  composer.gap(body * 0.5);
}

function drawGridEntry(composer: PdfComposer, block: EntryBlock, fonts: FontSet, palette: Palette, style: LayoutStyle): void {
  const { body, small } = style.fontSizes;
  const widths = composer.gridColumnWidths;
  const left: StyledLine[] = [
    ...composer.styledLines(block.heading, fonts.bold, body, palette.text, widths.left),
    ...composer.styledLines(block.period ?? '', fonts.regular, small, palette.muted, widths.left),
  ];
  const right: StyledLine[] = [
    ...composer.styledLines(block.details ?? '', fonts.regular, body, palette.text, widths.right),
    ...composer.styledLines(block.link ?? '', fonts.italic, small, palette.muted, widths.right),
    ...block.achievements.flatMap((achievement) =>
      composer.styledLines(achievement, fonts.regular, body, palette.text, widths.right),
    ),
  ];
  composer.gridRow(left, right);
  composer.gap(body * 0.6);
}

export async function encodePdf(
  blocks: ContentBlock[],
  layout: LayoutDefinition,
  settings: CoreSettings,
): Promise<Uint8Array> {
  const { style } = layout;
  // No producer or creation dates, so identical input gives identical bytes.
  const doc = await PDFDocument.create({ updateMetadata: false });
  const family = FONT_FAMILIES[style.typography];
  const fonts: FontSet = {
    regular: await doc.embedFont(family.regular),
    bold: await doc.embedFont(family.bold),
    italic: await doc.embedFont(family.italic),
  };
  const palette: Palette = {
    accent: hexToRgb(style.accentColor),
    text: hexToRgb(style.textColor),
    muted: hexToRgb(style.mutedColor),
  };
  const composer = new PdfComposer(doc, fonts, palette, style, PAGE_DIMENSIONS[settings.pageSize]);

  for (const block of blocks) {
    switch (block.type) {
      case 'contact':
        drawContact(composer, block, fonts, palette, style);
        if (block.name) {
          doc.setAuthor(block.name);
        }
        doc.setTitle(block.name ? `${block.name} - ${layout.name}` : layout.name);
        break;
      case 'heading':
        drawHeading(composer, block, fonts, palette, style);
        break;
      case 'summary':
        composer.text(block.text);
        break;
      case 'entry':
        if (style.columns === 2) {
          drawGridEntry(composer, block, fonts, palette, style);
        } else {
          drawEntry(composer, block, fonts, palette, style);
        }
        break;
      case 'skills':
        composer.text(block.text);
        break;
    }
  }

  return doc.save();
}
