import { InvalidFilterValue } from '../errors';
import {
  ACTIVE_STATES,
  LOAD_STATES,
  UNIT_FILE_PRESETS,
  UNIT_FILE_STATES,
  UNIT_TYPES,
  fieldText,
  type Unit,
} from './types';

export const ALL_TYPES = 'all';

export interface FilterSpec {
  /** `'all'` disables type filtering, same as an absent or empty set. */
  type?: typeof ALL_TYPES | ReadonlySet<string>;
  loadState?: ReadonlySet<string>;
  activeState?: ReadonlySet<string>;
  subState?: ReadonlySet<string>;
  unitFileState?: ReadonlySet<string>;
  unitFilePreset?: ReadonlySet<string>;
}

export type SortKey = 'none' | 'loadState' | 'activeState' | 'subState' | 'unitFileState' | 'unitFilePreset';

export type FilterFlag = 'type' | 'loaded' | 'active' | 'sub-active' | 'file-state' | 'file-preset';

/** Values each CLI filter flag accepts; `null` accepts anything. */
export const FILTER_VALUES: Record<FilterFlag, readonly string[] | null> = {
  type: [ALL_TYPES, ...UNIT_TYPES],
  loaded: LOAD_STATES,
  active: ACTIVE_STATES,
  'sub-active': null,
  'file-state': UNIT_FILE_STATES,
  'file-preset': UNIT_FILE_PRESETS,
};

export const SORT_FLAG_VALUES: Record<string, SortKey> = {
  loaded: 'loadState',
  active: 'activeState',
  'sub-active': 'subState',
  'file-state': 'unitFileState',
  'file-preset': 'unitFilePreset',
};

export function parseFilterList(flag: FilterFlag, value: string): Set<string> {
  const allowed = FILTER_VALUES[flag];
  const items = value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);

  for (const item of items) {
    if (allowed && !allowed.includes(item)) {
      throw new InvalidFilterValue(flag, item, allowed);
    }
  }
  return new Set(items);
}

export function parseTypeFilter(value: string): FilterSpec['type'] {
  const types = parseFilterList('type', value);
  return types.has(ALL_TYPES) ? ALL_TYPES : types;
}

const passes = (allowed: ReadonlySet<string> | undefined, text: string | null): boolean => {
  if (!allowed || allowed.size === 0) return true;
  return text !== null && allowed.has(text);
};

/** Filters that only need ListUnits data, so property reads can be skipped for the rest. */
export function matchesCheapFilters(unit: Unit, filters: FilterSpec): boolean {
  const typeFilter = filters.type === ALL_TYPES ? undefined : filters.type;
  return (
    passes(typeFilter, fieldText(unit.type)) &&
    passes(filters.loadState, fieldText(unit.loadState)) &&
    passes(filters.activeState, fieldText(unit.activeState)) &&
    passes(filters.subState, unit.subState.raw)
  );
}

export function matchesFilters(unit: Unit, filters: FilterSpec): boolean {
  return (
    matchesCheapFilters(unit, filters) &&
    passes(filters.unitFileState, unit.unitFileState && fieldText(unit.unitFileState)) &&
    passes(filters.unitFilePreset, unit.unitFilePreset && fieldText(unit.unitFilePreset))
  );
}

export function sortText(unit: Unit, key: Exclude<SortKey, 'none'>): string {
  switch (key) {
    case 'loadState':
      return fieldText(unit.loadState);
    case 'activeState':
      return fieldText(unit.activeState);
    case 'subState':
      return unit.subState.raw;
    case 'unitFileState':
      return fieldText(unit.unitFileState);
    case 'unitFilePreset':
      return fieldText(unit.unitFilePreset);
  }
}

/**
 * Keeps every unit that passes all active filters, then sorts ascending by the
 * key's text. The sort is stable, so ties keep the manager's order.
 */
export function select(units: readonly Unit[], filters: FilterSpec, sortKey: SortKey): Unit[] {
  const selected = units.filter(unit => matchesFilters(unit, filters));
  if (sortKey === 'none') return selected;

  return selected
    .map((unit, index) => ({ unit, index, text: sortText(unit, sortKey) }))
    .sort((a, b) => (a.text < b.text ? -1 : a.text > b.text ? 1 : a.index - b.index))
    .map(entry => entry.unit);
}
