import { RenderError, UnsupportedFormatError } from '../errors';
import type { LayoutDefinition } from '../layouts/catalog';
import { getLayout } from '../layouts/registry';
import { normalizeSettings, type CoreSettings } from '../settings';
import type { DocumentFormat, Resume } from '../types';
import { buildContentBlocks, type ContentBlock } from './blocks';
import { encodeDocx } from './docx';
import { encodePdf } from './pdf';

type Encoder = (blocks: ContentBlock[], layout: LayoutDefinition, settings: CoreSettings) => Promise<Uint8Array>;

const ENCODERS: Record<DocumentFormat, Encoder> = {
  pdf: encodePdf,
  docx: encodeDocx,
};

export const MIME_TYPES: Record<DocumentFormat, string> = {
  pdf: 'application/pdf',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
};

export function parseRenderFormat(value: string): DocumentFormat {
  const normalized = value.trim().toLowerCase().replace(/^\./, '');
  if (normalized === 'pdf' || normalized === 'docx') {
    return normalized;
  }
  throw new UnsupportedFormatError(`Unsupported output format "${value}". Use pdf or docx.`, value);
}

/**
 * Renders a resume with a layout. Unknown layouts and formats fail before any
 * encoding starts; failures inside an encoder surface as `RenderError`.
 */
export async function renderResume(
  resume: Resume,
  layoutOrId: LayoutDefinition | string,
  format: string,
  settings: Partial<CoreSettings> = {},
): Promise<Uint8Array> {
  const layout = typeof layoutOrId === 'string' ? getLayout(layoutOrId) : layoutOrId;
  const target = parseRenderFormat(format);
  const blocks = buildContentBlocks(resume, layout);
  try {
    return await ENCODERS[target](blocks, layout, normalizeSettings(settings));
  } catch (error) {
    throw new RenderError(target, layout.id, error);
  }
}
