import { CommanderError } from 'commander';
import { InvalidFilterValue, PermissionError, UnitscopeError, errorMessage } from '../lib/errors';

export interface Output {
  write(chunk: string): unknown;
}

export interface CliIO {
  stdout: Output;
  stderr: Output;
  /** Whether stdout is a terminal. Enables bold text and name truncation. */
  isTTY?: boolean;
  columns?: number;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const processIO = (): CliIO => ({
  stdout: process.stdout,
  stderr: process.stderr,
  isTTY: process.stdout.isTTY,
  columns: process.stdout.columns,
});

/** Reports an error on stderr and returns the exit code for it. */
export function reportError(error: unknown, io: CliIO): number {
  if (error instanceof CommanderError) {
    // commander has already printed its message
    return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
  }
  if (error instanceof InvalidFilterValue) {
    io.stderr.write(`${error.message}\n`);
    return EXIT_USAGE;
  }
  if (error instanceof PermissionError) {
    io.stderr.write(`${error.message}\n${error.hint}\n`);
    return EXIT_FAILURE;
  }
  if (error instanceof UnitscopeError) {
    io.stderr.write(`${error.message}\n`);
    return EXIT_FAILURE;
  }
  io.stderr.write(`Unexpected error: ${errorMessage(error)}\n`);
  return EXIT_FAILURE;
}
