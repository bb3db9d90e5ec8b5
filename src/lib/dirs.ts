import path from 'path';
import os from 'os';

export function getConfigDir(): string {
  if (process.env.UNITSCOPE_CONFIG_DIR) return process.env.UNITSCOPE_CONFIG_DIR;
  const xdg = process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(xdg, 'unitscope');
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

export function getDefaultIgnoreFile(): string {
  return path.join(getConfigDir(), 'ignore.list');
}
