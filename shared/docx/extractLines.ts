import * as cheerio from 'cheerio';
import mammoth from 'mammoth';
import { CorruptDocumentError } from '../errors';
import type { DocumentLine, ReaderWarning } from '../types';

export interface DocxLinesResult {
  lines: DocumentLine[];
  warnings: ReaderWarning[];
}

const BLOCK_SELECTOR = 'p, h1, h2, h3, h4, h5, h6, li';
const HEADING_TAG = /^h[1-6]$/;

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Flattens mammoth's HTML into lines. Headings and paragraphs made only of bold
 * text carry `headingHint`; list items carry their nesting depth as `indent` and
 * a bullet or number marker; empty paragraphs become blank lines and `<br>`
 * starts a new line.
 */
export function htmlToLines(html: string): DocumentLine[] {
  const $ = cheerio.load(html);
  $('br').replaceWith('\n');
  const lines: DocumentLine[] = [];

  $(BLOCK_SELECTOR).each((_, element) => {
    const $element = $(element);
    const tag = element.tagName.toLowerCase();
    // Nested lists are visited as blocks of their own.
    const own = $element.clone();
    own.find('ul, ol').remove();

    const text = own.text();
    const pieces = text.split('\n').map(collapseWhitespace).filter(Boolean);
    if (pieces.length === 0) {
      if (tag === 'p') {
        lines.push({ text: '' });
      }
      return;
    }

    const boldOnly = collapseWhitespace(own.find('strong, b').text()) === collapseWhitespace(text);
    const headingHint = HEADING_TAG.test(tag) || (tag === 'p' && boldOnly);
    const indent = $element.parents('ul, ol').length;
    let marker: string | undefined;
    if (tag === 'li') {
      marker = $element.parent().is('ol') ? `${$element.prevAll('li').length + 1}.` : '•';
    }

    pieces.forEach((piece, index) => {
      const line: DocumentLine = { text: index === 0 && marker ? `${marker} ${piece}` : piece };
      if (headingHint) {
        line.headingHint = true;
      }
      if (indent > 0) {
        line.indent = indent;
      }
      lines.push(line);
    });
  });

  return lines;
}

export async function extractLinesFromDocx(bytes: Uint8Array): Promise<DocxLinesResult> {
  const result = await mammoth
    .convertToHtml({ buffer: Buffer.from(bytes) }, { ignoreEmptyParagraphs: false })
    .catch((error: unknown) => {
      throw new CorruptDocumentError('docx', error);
    });

  const warnings: ReaderWarning[] = result.messages.map((message): ReaderWarning => ({
    kind: 'docx-conversion',
    message: message.message,
  }));

  return { lines: htmlToLines(result.value), warnings };
}
