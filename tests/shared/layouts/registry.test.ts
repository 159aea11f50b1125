import { describe, expect, it } from 'vitest';
import { UnknownLayoutError } from '../../../shared/errors';
import { getLayout, isLayoutId, listLayouts } from '../../../shared/layouts/registry';

describe('layout registry', () => {
  it('lists the four layouts in a fixed order', () => {
    expect(listLayouts().map((layout) => layout.id)).toEqual([
      'moderno-azul',
      'classico-serifado',
      'minimalista-grade',
      'executivo-dourado',
    ]);
    expect(listLayouts()).toBe(listLayouts());
  });

  it('returns a layout by id', () => {
    const layout = getLayout('classico-serifado');
    expect(layout.name).toBe('Clássico Serifado');
    expect(layout.style.typography).toBe('serif');
    expect(layout.style.achievementMarker).toBe('number');
  });

  it('fails for unknown ids', () => {
    expect(() => getLayout('nonexistent-id')).toThrow(UnknownLayoutError);
    expect(() => getLayout('nonexistent-id')).toThrow('Unknown layout "nonexistent-id".');
  });

  it('narrows layout ids', () => {
    expect(isLayoutId('minimalista-grade')).toBe(true);
    expect(isLayoutId('toString')).toBe(false);
  });

  it('freezes the catalog', () => {
    const layout = getLayout('moderno-azul');
    expect(Object.isFrozen(listLayouts())).toBe(true);
    expect(Object.isFrozen(layout)).toBe(true);
    expect(Object.isFrozen(layout.style.sectionTitles)).toBe(true);
    expect(Object.isFrozen(layout.tags)).toBe(true);
  });

  it('gives every layout a title for each section', () => {
    for (const layout of listLayouts()) {
      expect(Object.values(layout.style.sectionTitles).every((title) => title.length > 0)).toBe(true);
    }
  });
});
