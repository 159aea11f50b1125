import { UnsupportedFormatError } from '../errors';
import type { DocumentFormat } from '../types';

export interface FormatHints {
  /** Declared format, e.g. "pdf", "docx" or "word". */
  format?: string;
  fileName?: string;
  mimeType?: string;
}

interface Signature {
  format: DocumentFormat | 'legacy-doc';
  bytes: number[];
}

const SIGNATURES: Signature[] = [
  { format: 'pdf', bytes: [0x25, 0x50, 0x44, 0x46, 0x2d] },
  { format: 'docx', bytes: [0x50, 0x4b, 0x03, 0x04] },
  { format: 'legacy-doc', bytes: [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1] },
];

const DECLARED_FORMATS: Record<string, DocumentFormat | 'legacy-doc'> = {
  pdf: 'pdf',
  docx: 'docx',
  word: 'docx',
  doc: 'legacy-doc',
  'application/pdf': 'pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'docx',
  'application/msword': 'legacy-doc',
};

// PDFs may carry a few junk bytes before the header.
const PDF_HEADER_WINDOW = 1024;

export function sniffFormat(bytes: Uint8Array): DocumentFormat | 'legacy-doc' | undefined {
  for (const signature of SIGNATURES) {
    if (startsWith(bytes, signature.bytes, 0)) {
      return signature.format;
    }
  }
  const window = Math.min(bytes.length, PDF_HEADER_WINDOW);
  for (let offset = 1; offset < window; offset += 1) {
    if (startsWith(bytes, SIGNATURES[0].bytes, offset)) {
      return 'pdf';
    }
  }
  return undefined;
}

/**
 * Resolves the document format from its bytes, falling back to the declared
 * format, the file extension and the MIME type, in that order.
 */
export function detectFormat(bytes: Uint8Array, hints: FormatHints = {}): DocumentFormat {
  const resolved = sniffFormat(bytes) ?? resolveDeclared(hints);
  if (resolved === 'legacy-doc') {
    throw new UnsupportedFormatError('Legacy .doc files are not supported. Save the document as .docx or PDF.', 'doc');
  }
  if (!resolved) {
    const declared = hints.format ?? hints.mimeType ?? hints.fileName;
    throw new UnsupportedFormatError('Unsupported document format. Use PDF or Word (.docx).', declared);
  }
  return resolved;
}

function resolveDeclared(hints: FormatHints): DocumentFormat | 'legacy-doc' | undefined {
  const candidates = [hints.format, extensionOf(hints.fileName), hints.mimeType];
  for (const candidate of candidates) {
    const key = candidate?.trim().toLowerCase();
    if (key && Object.prototype.hasOwnProperty.call(DECLARED_FORMATS, key)) {
      return DECLARED_FORMATS[key];
    }
  }
  return undefined;
}

function extensionOf(fileName: string | undefined): string | undefined {
  const match = fileName?.match(/\.([a-z0-9]+)$/i);
  return match?.[1];
}

function startsWith(bytes: Uint8Array, signature: number[], offset: number): boolean {
  if (bytes.length < offset + signature.length) {
    return false;
  }
  return signature.every((value, index) => bytes[offset + index] === value);
}
