const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  args?: unknown[];
}

export const isLogLevel = (value: unknown): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

export class Logger {
  private currentLogLevel: LogLevel = 'info';
  private logLevelPriority: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  private onLogCallbacks: Set<(entry: LogEntry) => void> = new Set();
  private readonly colors: boolean;

  constructor() {
    const envLevel = process.env.LOG_LEVEL;
    if (isLogLevel(envLevel)) {
      this.currentLogLevel = envLevel;
    }
    // journald and pipes get plain lines
    this.colors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
  }

  onLog(callback: (entry: LogEntry) => void) {
    this.onLogCallbacks.add(callback);
    return () => this.onLogCallbacks.delete(callback);
  }

  setLogLevel(level: LogLevel): void {
    this.currentLogLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.currentLogLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.logLevelPriority[level] >= this.logLevelPriority[this.currentLogLevel];
  }

  private getTimestamp() {
    return new Date().toISOString().replace('T', ' ').replace('Z', '');
  }

  private format(level: LogLevel, tag: string, message: string, args: unknown[]): LogEntry {
    const entry: LogEntry = {
      timestamp: this.getTimestamp(),
      level,
      tag,
      message,
      args: args.length > 0 ? args : undefined
    };
    this.onLogCallbacks.forEach(cb => cb(entry));
    return entry;
  }

  private formatConsole(level: LogLevel, entry: LogEntry): unknown[] {
    const levelLabel = level.toUpperCase().padEnd(5);
    if (!this.colors) {
      return [`${entry.timestamp} ${levelLabel} [${entry.tag}] ${entry.message}`, ...(entry.args || [])];
    }

    const timestamp = `${COLORS.dim}${entry.timestamp}${COLORS.reset}`;
    let levelColor = COLORS.reset;

    switch(level) {
        case 'debug': levelColor = COLORS.blue; break;
        case 'info': levelColor = COLORS.green; break;
        case 'warn': levelColor = COLORS.yellow; break;
        case 'error': levelColor = COLORS.red; break;
    }

    const coloredLevel = `${levelColor}${levelLabel}${COLORS.reset}`;
    const coloredTag = `${COLORS.magenta}[${entry.tag}]${COLORS.reset}`;

    return [`${timestamp} ${coloredLevel} ${coloredTag} ${entry.message}`, ...(entry.args || [])];
  }

  debug(tag: string, message: string, ...args: unknown[]) {
      if (!this.shouldLog('debug')) return;
      const entry = this.format('debug', tag, message, args);
      console.debug(...this.formatConsole('debug', entry));
  }

  info(tag: string, message: string, ...args: unknown[]) {
      if (!this.shouldLog('info')) return;
      const entry = this.format('info', tag, message, args);
      console.info(...this.formatConsole('info', entry));
  }

  warn(tag: string, message: string, ...args: unknown[]) {
      if (!this.shouldLog('warn')) return;
      const entry = this.format('warn', tag, message, args);
      console.warn(...this.formatConsole('warn', entry));
  }

  error(tag: string, message: string, ...args: unknown[]) {
      // Always log errors
      const entry = this.format('error', tag, message, args);
      console.error(...this.formatConsole('error', entry));
  }
}

export const logger = new Logger();
