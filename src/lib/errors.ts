export class UnitscopeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnitscopeError';
  }
}

/** The systemd bus could not be reached, or the connection was lost. */
export class ConnectionError extends UnitscopeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class PermissionError extends UnitscopeError {
  readonly hint: string;

  constructor(message: string, hint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PermissionError';
    this.hint = hint;
  }
}

export class InvalidFilterValue extends UnitscopeError {
  readonly flag: string;
  readonly value: string;

  constructor(flag: string, value: string, allowed?: readonly string[]) {
    const suffix = allowed ? ` (expected one of: ${allowed.join(', ')})` : '';
    super(`Invalid value for --${flag}: '${value}'${suffix}`);
    this.name = 'InvalidFilterValue';
    this.flag = flag;
    this.value = value;
  }
}

export class NotifyError extends UnitscopeError {
  readonly channel: string;
  /** The message without the channel prefix. */
  readonly detail: string;

  constructor(channel: string, detail: string, options?: { cause?: unknown }) {
    super(`[${channel}] ${detail}`, options);
    this.name = 'NotifyError';
    this.channel = channel;
    this.detail = detail;
  }
}

export class ConfigError extends UnitscopeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** A D-Bus method returned an error that is neither a connection nor a permission problem. */
export class BusCallError extends UnitscopeError {
  readonly type: string;

  constructor(type: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BusCallError';
    this.type = type;
  }
}
