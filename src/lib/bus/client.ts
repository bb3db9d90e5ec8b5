import { mapWithConcurrency } from '../async';
import type { AppConfig } from '../config';
import { BusCallError, UnitscopeError, errorMessage } from '../errors';
import type { UnitBus, UnitChangeEvent, UnitStateReading } from '../interfaces';
import { logger } from '../logger';
import type { RawUnitRecord } from '../units/types';
import { UNIT_PATH_PREFIX, unitNameFromPath } from './escape';
import { UnitChangeStream } from './stream';
import { DbusNextTransport, type BusCall, type BusSignal, type BusTransport } from './transport';

const SYSTEMD = 'org.freedesktop.systemd1';
const MANAGER_PATH = '/org/freedesktop/systemd1';
const MANAGER_IFACE = 'org.freedesktop.systemd1.Manager';
const UNIT_IFACE = 'org.freedesktop.systemd1.Unit';
const PROPERTIES_IFACE = 'org.freedesktop.DBus.Properties';

const UNIT_CHANGES_MATCH = [
  "type='signal'",
  `sender='${SYSTEMD}'`,
  `interface='${PROPERTIES_IFACE}'`,
  "member='PropertiesChanged'",
  `path_namespace='${MANAGER_PATH}/unit'`,
  `arg0='${UNIT_IFACE}'`,
].join(',');

// Unit objects that disappear between ListUnits and a property read
const GONE_ERRORS = new Set([
  'org.freedesktop.DBus.Error.UnknownObject',
  'org.freedesktop.DBus.Error.UnknownInterface',
  'org.freedesktop.DBus.Error.UnknownProperty',
  'org.freedesktop.systemd1.NoSuchUnit',
]);

export interface BusClientOptions {
  propertyReadConcurrency: number;
}

const text = (value: unknown): string => (typeof value === 'string' ? value : value == null ? '' : String(value));

/** Maps one `(ssssssouso)` tuple of ListUnits. */
export function parseListUnitsEntry(entry: unknown): RawUnitRecord | null {
  if (!Array.isArray(entry) || entry.length < 10) return null;
  const fields: unknown[] = entry;
  const [name, description, loadState, activeState, subState, following, objectPath, jobId, jobType, jobPath] = fields;
  if (typeof name !== 'string' || name === '') return null;
  return {
    name,
    description: text(description),
    loadState: text(loadState),
    activeState: text(activeState),
    subState: text(subState),
    following: text(following),
    objectPath: text(objectPath),
    jobId: typeof jobId === 'number' ? jobId : Number(jobId) || 0,
    jobType: text(jobType),
    jobPath: text(jobPath),
  };
}

/** Turns a PropertiesChanged signal from a unit object into a change event. */
export function toUnitChangeEvent(signal: BusSignal): UnitChangeEvent | null {
  if (signal.interface !== PROPERTIES_IFACE || signal.member !== 'PropertiesChanged') return null;
  if (!signal.path.startsWith(UNIT_PATH_PREFIX)) return null;

  const [iface, changed, invalidated] = signal.body;
  if (iface !== UNIT_IFACE) return null;

  const unit = unitNameFromPath(signal.path);
  if (!unit) return null;

  const strings: Record<string, string> = {};
  if (typeof changed === 'object' && changed !== null && !Array.isArray(changed)) {
    for (const [key, value] of Object.entries(changed)) {
      if (typeof value === 'string') strings[key] = value;
    }
  }

  return {
    unit,
    objectPath: signal.path,
    changed: strings,
    invalidated: Array.isArray(invalidated) ? invalidated.filter((item): item is string => typeof item === 'string') : [],
  };
}

export class SystemdBusClient implements UnitBus {
  private subscription: UnitChangeStream | null = null;
  private closed = false;

  constructor(private readonly transport: BusTransport, private readonly options: BusClientOptions) {}

  private async callManager(member: string, body?: unknown[], signature?: string): Promise<unknown[]> {
    return this.transport.call({ destination: SYSTEMD, path: MANAGER_PATH, interface: MANAGER_IFACE, member, body, signature });
  }

  private async callDbus(member: string, rule: string): Promise<void> {
    const request: BusCall = {
      destination: 'org.freedesktop.DBus',
      path: '/org/freedesktop/DBus',
      interface: 'org.freedesktop.DBus',
      member,
      signature: 's',
      body: [rule],
    };
    await this.transport.call(request);
  }

  private async readProperty(objectPath: string, name: string): Promise<string> {
    const [value] = await this.transport.call({
      destination: SYSTEMD,
      path: objectPath,
      interface: PROPERTIES_IFACE,
      member: 'Get',
      signature: 'ss',
      body: [UNIT_IFACE, name],
    });
    return text(value);
  }

  async listUnits(): Promise<RawUnitRecord[]> {
    const [entries] = await this.callManager('ListUnits');
    if (!Array.isArray(entries)) {
      throw new BusCallError('unitscope.BadReply', 'ListUnits returned an unexpected reply');
    }

    const records: RawUnitRecord[] = [];
    const list: unknown[] = entries;
    for (const entry of list) {
      const record = parseListUnitsEntry(entry);
      if (record) {
        records.push(record);
      } else {
        logger.warn('Bus', 'Skipping malformed ListUnits entry', entry);
      }
    }
    logger.debug('Bus', `ListUnits returned ${records.length} units`);
    return records;
  }

  async readUnitFileProperties(records: readonly RawUnitRecord[]): Promise<RawUnitRecord[]> {
    return mapWithConcurrency(records, this.options.propertyReadConcurrency, async record => {
      if (!record.objectPath) {
        return { ...record, unitFileState: '', unitFilePreset: '', fragmentPath: '' };
      }
      try {
        const [unitFileState, unitFilePreset, fragmentPath] = await Promise.all([
          this.readProperty(record.objectPath, 'UnitFileState'),
          this.readProperty(record.objectPath, 'UnitFilePreset'),
          this.readProperty(record.objectPath, 'FragmentPath'),
        ]);
        return { ...record, unitFileState, unitFilePreset, fragmentPath };
      } catch (error) {
        if (error instanceof BusCallError && GONE_ERRORS.has(error.type)) {
          logger.debug('Bus', `${record.name} vanished before its properties were read`);
          return { ...record, unitFileState: '', unitFilePreset: '', fragmentPath: '' };
        }
        throw error;
      }
    });
  }

  async readUnitState(objectPath: string): Promise<UnitStateReading> {
    const [activeState, subState] = await Promise.all([
      this.readProperty(objectPath, 'ActiveState'),
      this.readProperty(objectPath, 'SubState'),
    ]);
    return { activeState, subState };
  }

  async subscribeUnitChanges(): Promise<UnitChangeStream> {
    if (this.closed) throw new UnitscopeError('Bus client is closed');
    if (this.subscription && !this.subscription.isClosed()) {
      throw new UnitscopeError('Already subscribed to unit changes');
    }

    await this.callManager('Subscribe');
    await this.callDbus('AddMatch', UNIT_CHANGES_MATCH);

    let offSignal: () => void = () => undefined;
    let offError: () => void = () => undefined;

    const stream = new UnitChangeStream(async () => {
      offSignal();
      offError();
      if (this.closed) return;
      try {
        await this.callDbus('RemoveMatch', UNIT_CHANGES_MATCH);
        await this.callManager('Unsubscribe');
      } catch (error) {
        logger.debug('Bus', `Releasing the unit subscription failed: ${errorMessage(error)}`);
      }
    });

    offSignal = this.transport.onSignal(signal => {
      const event = toUnitChangeEvent(signal);
      if (event) stream.push(event);
    });
    offError = this.transport.onError(error => stream.fail(error));

    this.subscription = stream;
    logger.debug('Bus', 'Subscribed to unit state changes');
    return stream;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    try {
      await this.subscription?.close();
    } finally {
      this.closed = true;
      this.transport.disconnect();
    }
  }
}

export function createUnitBus(config: AppConfig): UnitBus {
  const transport = new DbusNextTransport(config.scope, config.bus.callTimeoutMs);
  return new SystemdBusClient(transport, { propertyReadConcurrency: config.bus.propertyReadConcurrency });
}

/** Opens a bus for the duration of `body` and always closes it afterwards. */
export async function withUnitBus<T>(open: () => UnitBus, body: (bus: UnitBus) => Promise<T>): Promise<T> {
  const bus = open();
  try {
    return await body(bus);
  } finally {
    await bus.close();
  }
}
