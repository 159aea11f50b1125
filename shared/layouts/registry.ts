import { UnknownLayoutError } from '../errors';
import { LAYOUT_DEFINITIONS, type LayoutDefinition, type LayoutId } from './catalog';

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

const LAYOUTS: readonly LayoutDefinition[] = deepFreeze(LAYOUT_DEFINITIONS);

const LAYOUTS_BY_ID: ReadonlyMap<string, LayoutDefinition> = new Map(LAYOUTS.map((layout) => [layout.id, layout]));

export function isLayoutId(value: string): value is LayoutId {
  return LAYOUTS_BY_ID.has(value);
}

export function getLayout(id: string): LayoutDefinition {
  const layout = LAYOUTS_BY_ID.get(id);
  if (!layout) {
    throw new UnknownLayoutError(id);
  }
  return layout;
}

export function listLayouts(): readonly LayoutDefinition[] {
  return LAYOUTS;
}
