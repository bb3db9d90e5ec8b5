import { BusCallError, ConnectionError, PermissionError, UnitscopeError, errorMessage } from '../errors';

const PERMISSION_ERRORS = new Set([
  'org.freedesktop.DBus.Error.AccessDenied',
  'org.freedesktop.DBus.Error.AuthFailed',
  'org.freedesktop.DBus.Error.InteractiveAuthorizationRequired',
]);

const CONNECTION_ERRORS = new Set([
  'org.freedesktop.DBus.Error.ServiceUnknown',
  'org.freedesktop.DBus.Error.NameHasNoOwner',
  'org.freedesktop.DBus.Error.NoReply',
  'org.freedesktop.DBus.Error.NoServer',
  'org.freedesktop.DBus.Error.Disconnected',
  'org.freedesktop.DBus.Error.Timeout',
  'org.freedesktop.DBus.Error.TimedOut',
  'org.freedesktop.DBus.Error.LimitsExceeded',
]);

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);
const CONNECTION_CODES = new Set(['ENOENT', 'ECONNREFUSED', 'ECONNRESET', 'EPIPE', 'ETIMEDOUT', 'ENOTCONN']);

export const PERMISSION_HINT = 'Re-run with sudo for system units, or pass --user to query the session manager.';

const stringField = (error: unknown, key: 'type' | 'code' | 'text'): string | undefined => {
  if (typeof error !== 'object' || error === null || !(key in error)) return undefined;
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
};

/**
 * Sorts a failure from the bus library into the error taxonomy: unreachable bus,
 * missing privileges, or a plain method error.
 */
export function classifyBusError(error: unknown, what: string): UnitscopeError {
  if (error instanceof UnitscopeError) return error;

  const message = stringField(error, 'text') ?? errorMessage(error);
  const type = stringField(error, 'type');
  const code = stringField(error, 'code');

  if ((type && PERMISSION_ERRORS.has(type)) || (code && PERMISSION_CODES.has(code))) {
    return new PermissionError(`Permission denied for ${what}: ${message}`, PERMISSION_HINT, { cause: error });
  }
  if (type && !CONNECTION_ERRORS.has(type)) {
    return new BusCallError(type, `${what} failed: ${message}`, { cause: error });
  }
  if (type || (code && CONNECTION_CODES.has(code))) {
    return new ConnectionError(`Cannot reach systemd (${what}): ${message}`, { cause: error });
  }
  return new ConnectionError(`Bus failure during ${what}: ${message}`, { cause: error });
}
