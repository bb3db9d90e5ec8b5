import { EventEmitter } from 'events';
import { Message, Variant, sessionBus, systemBus, type MessageBus } from 'dbus-next';
import { withTimeout } from '../async';
import type { BusScope } from '../config';
import { ConnectionError } from '../errors';
import { logger } from '../logger';
import { classifyBusError } from './errors';

export interface BusCall {
  destination: string;
  path: string;
  interface: string;
  member: string;
  signature?: string;
  body?: unknown[];
}

export interface BusSignal {
  path: string;
  interface: string;
  member: string;
  body: unknown[];
}

/**
 * The slice of D-Bus the systemd client needs. Values crossing it are plain:
 * variants are unwrapped, structs are arrays, dicts are objects.
 */
export interface BusTransport {
  call(request: BusCall): Promise<unknown[]>;
  onSignal(listener: (signal: BusSignal) => void): () => void;
  onError(listener: (error: Error) => void): () => void;
  disconnect(): void;
}

export function plain(value: unknown): unknown {
  if (value instanceof Variant) return plain(value.value);
  if (Array.isArray(value)) return value.map(plain);
  if (Buffer.isBuffer(value)) return value;
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, plain(inner)]));
  }
  return value;
}

// MessageBus forwards the socket's errors but not its end
function connectionOf(bus: MessageBus): EventEmitter | null {
  const connection: unknown = Reflect.get(bus, '_connection');
  return connection instanceof EventEmitter ? connection : null;
}

export class DbusNextTransport implements BusTransport {
  private readonly bus: MessageBus;
  private readonly errorListeners = new Set<(error: Error) => void>();
  private connectionError: Error | null = null;
  private disconnected = false;

  constructor(private readonly scope: BusScope, private readonly callTimeoutMs: number) {
    try {
      this.bus = scope === 'user' ? sessionBus() : systemBus();
    } catch (error) {
      throw classifyBusError(error, `${scope} bus`);
    }
    this.bus.on('error', (error: unknown) => this.fail(classifyBusError(error, `${scope} bus`)));

    const closed = () => {
      if (!this.disconnected) this.fail(new ConnectionError(`The ${scope} bus closed the connection`));
    };
    const connection = connectionOf(this.bus);
    connection?.on('end', closed);
    connection?.on('close', closed);
  }

  private fail(error: Error) {
    if (this.connectionError) return;
    this.connectionError = error;
    logger.debug('Bus', `Connection to the ${this.scope} bus failed: ${error.message}`);
    this.errorListeners.forEach(listener => listener(error));
  }

  async call(request: BusCall): Promise<unknown[]> {
    if (this.connectionError) throw this.connectionError;
    if (this.disconnected) throw new ConnectionError(`The ${this.scope} bus connection is closed`);

    const what = `${request.interface}.${request.member}`;
    let offError: () => void = () => undefined;
    const lost = new Promise<never>((_, reject) => {
      offError = this.onError(reject);
    });

    try {
      const reply = await withTimeout(
        Promise.race([this.bus.call(new Message(request)), lost]),
        this.callTimeoutMs,
        () => new ConnectionError(`${what} timed out after ${this.callTimeoutMs}ms`),
      );
      const body: unknown[] = reply ? reply.body : [];
      return body.map(plain);
    } catch (error) {
      throw classifyBusError(error, what);
    } finally {
      offError();
    }
  }

  onSignal(listener: (signal: BusSignal) => void): () => void {
    const handler = (message: Message) => {
      if (!message.member || !message.path) return;
      listener({
        path: message.path,
        interface: message.interface ?? '',
        member: message.member,
        body: (message.body ?? []).map(plain),
      });
    };
    this.bus.on('message', handler);
    return () => {
      this.bus.off('message', handler);
    };
  }

  onError(listener: (error: Error) => void): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  disconnect(): void {
    if (this.disconnected) return;
    this.disconnected = true;
    this.bus.disconnect();
  }
}
