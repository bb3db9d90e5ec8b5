export { createUnitBus, withUnitBus, SystemdBusClient } from './bus/client';
export { getConfig, parseConfig, DEFAULT_CONFIG } from './config';
export type { AppConfig, BusScope } from './config';
export * from './errors';
export type { UnitBus, UnitChangeEvent, UnitChangeSubscription } from './interfaces';
export { createNotifier, CompositeNotifier, DesktopNotifier, EmailNotifier } from './notify';
export type { Notification, Notifier, Urgency } from './notify';
export { parseFilterList, parseTypeFilter, select } from './units/filter';
export type { FilterSpec, SortKey } from './units/filter';
export { queryUnits } from './units/listing';
export { renderSummary, renderTable } from './units/table';
export type { Unit } from './units/types';
export { FailureWatcher } from './watcher/watcher';
export { deriveHealth, transition } from './watcher/state';
