import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS, loadSettings, normalizeSettings } from '../../shared/settings';

describe('settings', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it('reads the environment', () => {
    expect(
      loadSettings({ RESUME_PAGE_SIZE: 'A4', RESUME_HEADING_SCALE: '1.3', RESUME_BLANK_LINE_GAP: '2' }),
    ).toEqual({ pageSize: 'a4', headingScale: 1.3, blankLineGap: 2 });
  });

  it('falls back to defaults for invalid values', () => {
    expect(
      loadSettings({ RESUME_PAGE_SIZE: 'tabloid', RESUME_HEADING_SCALE: 'big', RESUME_BLANK_LINE_GAP: '0.5' }),
    ).toEqual(DEFAULT_SETTINGS);
    expect(normalizeSettings({ headingScale: 1 })).toEqual(DEFAULT_SETTINGS);
  });
});
