import { describe, expect, it } from 'vitest';
import { detectFormat, sniffFormat } from '../../../shared/document/sniff';
import { UnsupportedFormatError } from '../../../shared/errors';

const encoder = new TextEncoder();

describe('sniffFormat', () => {
  it('recognizes a PDF header', () => {
    expect(sniffFormat(encoder.encode('%PDF-1.7\n...'))).toBe('pdf');
  });

  it('finds a PDF header after leading junk', () => {
    expect(sniffFormat(encoder.encode('\n\n  %PDF-1.4'))).toBe('pdf');
  });

  it('recognizes a ZIP container as docx', () => {
    expect(sniffFormat(new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x14, 0x00]))).toBe('docx');
  });

  it('recognizes a legacy Word binary', () => {
    expect(sniffFormat(new Uint8Array([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1, 0x00]))).toBe('legacy-doc');
  });

  it('returns undefined for unknown bytes', () => {
    expect(sniffFormat(encoder.encode('plain text'))).toBeUndefined();
  });
});

describe('detectFormat', () => {
  it('prefers the byte signature over the declared format', () => {
    expect(detectFormat(encoder.encode('%PDF-1.7'), { format: 'docx', fileName: 'cv.docx' })).toBe('pdf');
  });

  it('falls back to the declared format, extension and MIME type', () => {
    const bytes = encoder.encode('????');
    expect(detectFormat(bytes, { format: 'word' })).toBe('docx');
    expect(detectFormat(bytes, { fileName: 'Curriculo.PDF' })).toBe('pdf');
    expect(
      detectFormat(bytes, { mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document' }),
    ).toBe('docx');
  });

  it('ignores declared values that only look like object keys', () => {
    expect(() => detectFormat(encoder.encode('????'), { format: 'constructor' })).toThrow(UnsupportedFormatError);
  });

  it('rejects legacy .doc files', () => {
    const attempt = () => detectFormat(encoder.encode('????'), { fileName: 'old.doc' });
    expect(attempt).toThrow(UnsupportedFormatError);
    expect(attempt).toThrow('Legacy .doc files are not supported. Save the document as .docx or PDF.');
  });

  it('rejects unknown content without hints', () => {
    try {
      detectFormat(encoder.encode('hello'), { format: 'odt' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedFormatError);
      if (error instanceof UnsupportedFormatError) {
        expect(error.code).toBe('UNSUPPORTED_FORMAT');
        expect(error.format).toBe('odt');
      }
    }
  });
});
