export const UNIT_TYPES = [
  'service',
  'socket',
  'device',
  'mount',
  'automount',
  'swap',
  'target',
  'path',
  'timer',
  'slice',
  'scope',
] as const;

export const LOAD_STATES = ['stub', 'loaded', 'not-found', 'bad-setting', 'error', 'merged', 'masked'] as const;

export const ACTIVE_STATES = [
  'active',
  'reloading',
  'inactive',
  'failed',
  'activating',
  'deactivating',
  'maintenance',
  'refreshing',
] as const;

export const UNIT_FILE_STATES = [
  'enabled',
  'enabled-runtime',
  'linked',
  'linked-runtime',
  'alias',
  'masked',
  'masked-runtime',
  'static',
  'disabled',
  'indirect',
  'generated',
  'transient',
  'bad',
  'invalid',
] as const;

export const UNIT_FILE_PRESETS = ['enabled', 'disabled'] as const;

export type UnitType = (typeof UNIT_TYPES)[number];
export type LoadState = (typeof LOAD_STATES)[number];
export type ActiveState = (typeof ACTIVE_STATES)[number];
export type UnitFileState = (typeof UNIT_FILE_STATES)[number];
export type UnitFilePreset = (typeof UNIT_FILE_PRESETS)[number];

/**
 * A value from one of systemd's enumerations. systemd adds states over time,
 * so anything outside the known set is carried as `unknown` instead of rejected.
 */
export type EnumField<T extends string> =
  | { kind: 'known'; value: T }
  | { kind: 'unknown'; raw: string };

/** Sub-states depend on unit type and grow with systemd; never validated. */
export interface SubState {
  readonly raw: string;
}

/** One tuple of Manager.ListUnits, optionally enriched by property reads. */
export interface RawUnitRecord {
  name: string;
  description: string;
  loadState: string;
  activeState: string;
  subState: string;
  following: string;
  objectPath: string;
  jobId: number;
  jobType: string;
  jobPath: string;
  unitFileState?: string;
  unitFilePreset?: string;
  fragmentPath?: string;
}

export interface Unit {
  name: string;
  type: EnumField<UnitType>;
  loadState: EnumField<LoadState>;
  activeState: EnumField<ActiveState>;
  subState: SubState;
  description: string;
  unitFileState: EnumField<UnitFileState> | null;
  unitFilePreset: EnumField<UnitFilePreset> | null;
  filePath: string;
  objectPath: string;
}

export const fieldText = (field: EnumField<string> | SubState | null): string => {
  if (field === null) return '';
  if ('kind' in field) {
    return field.kind === 'known' ? field.value : field.raw;
  }
  return field.raw;
};
