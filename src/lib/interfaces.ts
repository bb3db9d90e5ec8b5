import type { RawUnitRecord } from './units/types';

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface Executor {
  exec(file: string, args: readonly string[], options?: { timeoutMs?: number }): Promise<ExecResult>;
}

export interface UnitStateReading {
  activeState: string;
  subState: string;
}

/** One PropertiesChanged signal from a unit object, in bus order. */
export interface UnitChangeEvent {
  unit: string;
  objectPath: string;
  /** String-valued properties carried by the signal, e.g. ActiveState. */
  changed: Record<string, string>;
  /** Properties that changed without their new value. */
  invalidated: string[];
}

export interface UnitChangeSubscription extends AsyncIterable<UnitChangeEvent> {
  close(): Promise<void>;
}

export interface UnitBus {
  listUnits(): Promise<RawUnitRecord[]>;
  readUnitFileProperties(records: readonly RawUnitRecord[]): Promise<RawUnitRecord[]>;
  readUnitState(objectPath: string): Promise<UnitStateReading>;
  subscribeUnitChanges(): Promise<UnitChangeSubscription>;
  close(): Promise<void>;
}
