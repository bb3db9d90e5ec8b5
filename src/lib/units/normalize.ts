import {
  ACTIVE_STATES,
  LOAD_STATES,
  UNIT_FILE_PRESETS,
  UNIT_FILE_STATES,
  UNIT_TYPES,
  type EnumField,
  type RawUnitRecord,
  type Unit,
  type UnitType,
} from './types';

export function toEnumField<T extends string>(allowed: readonly T[], raw: string): EnumField<T> {
  const match = allowed.find(value => value === raw);
  return match !== undefined ? { kind: 'known', value: match } : { kind: 'unknown', raw };
}

const toOptionalEnumField = <T extends string>(
  allowed: readonly T[],
  raw: string | undefined,
): EnumField<T> | null => (raw ? toEnumField(allowed, raw) : null);

export function unitTypeOf(name: string): EnumField<UnitType> {
  const dot = name.lastIndexOf('.');
  const suffix = dot >= 0 ? name.slice(dot + 1) : '';
  return toEnumField(UNIT_TYPES, suffix);
}

export function normalize(raw: RawUnitRecord): Unit {
  return {
    name: raw.name,
    type: unitTypeOf(raw.name),
    loadState: toEnumField(LOAD_STATES, raw.loadState),
    activeState: toEnumField(ACTIVE_STATES, raw.activeState),
    subState: { raw: raw.subState },
    description: raw.description,
    unitFileState: toOptionalEnumField(UNIT_FILE_STATES, raw.unitFileState),
    unitFilePreset: toOptionalEnumField(UNIT_FILE_PRESETS, raw.unitFilePreset),
    filePath: raw.fragmentPath ?? '',
    objectPath: raw.objectPath,
  };
}
