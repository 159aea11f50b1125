export type ResumeForgeErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'CORRUPT_DOCUMENT'
  | 'EMPTY_DOCUMENT'
  | 'UNKNOWN_LAYOUT'
  | 'RENDER_FAILED'
  | 'INVALID_RESUME';

export class ResumeForgeError extends Error {
  readonly code: ResumeForgeErrorCode;

  constructor(code: ResumeForgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResumeForgeError';
    this.code = code;
  }
}

export class UnsupportedFormatError extends ResumeForgeError {
  readonly format?: string;

  constructor(message: string, format?: string) {
    super('UNSUPPORTED_FORMAT', message);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

export class CorruptDocumentError extends ResumeForgeError {
  readonly format: string;

  constructor(format: string, cause: unknown) {
    super('CORRUPT_DOCUMENT', `Unable to open ${format.toUpperCase()} document: ${describeCause(cause)}`, { cause });
    this.name = 'CorruptDocumentError';
    this.format = format;
  }
}

export class EmptyDocumentError extends ResumeForgeError {
  constructor() {
    super('EMPTY_DOCUMENT', 'The document contains no extractable text.');
    this.name = 'EmptyDocumentError';
  }
}

export class UnknownLayoutError extends ResumeForgeError {
  readonly layoutId: string;

  constructor(layoutId: string) {
    super('UNKNOWN_LAYOUT', `Unknown layout "${layoutId}".`);
    this.name = 'UnknownLayoutError';
    this.layoutId = layoutId;
  }
}

export class RenderError extends ResumeForgeError {
  readonly format: string;
  readonly layoutId: string;

  constructor(format: string, layoutId: string, cause: unknown) {
    super('RENDER_FAILED', `Failed to render ${format} with layout "${layoutId}": ${describeCause(cause)}`, { cause });
    this.name = 'RenderError';
    this.format = format;
    this.layoutId = layoutId;
  }
}

export class InvalidResumeError extends ResumeForgeError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('INVALID_RESUME', `Resume payload is invalid: ${errors.join(' ')}`);
    this.name = 'InvalidResumeError';
    this.errors = errors;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
