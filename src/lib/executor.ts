import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ExecResult, Executor } from './interfaces';

export type { Executor } from './interfaces';

const execFileAsync = promisify(execFile);

export class LocalExecutor implements Executor {
  async exec(file: string, args: readonly string[], options: { timeoutMs?: number } = {}): Promise<ExecResult> {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
      encoding: 'utf-8',
      timeout: options.timeoutMs ?? 0,
    });
    return { stdout, stderr };
  }
}

let executor: Executor | null = null;

export function getExecutor(): Executor {
  if (!executor) {
    executor = new LocalExecutor();
  }
  return executor;
}
