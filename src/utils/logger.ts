export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogCategory =
  | 'server'
  | 'registry'
  | 'admission'
  | 'space'
  | 'hub'
  | 'ws'
  | 'client'
  | 'runner'
  | 'worker'
  | 'settings'
  | 'cleanup'
  | 'http';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function defaultLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }

  if (process.env.NODE_ENV === 'test') {
    return 'silent';
  }

  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function format(level: Exclude<LogLevel, 'silent'>, category: LogCategory, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${category.padEnd(9)} ${message}`;
}

class Logger {
  private level: LogLevel = defaultLevel();

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(category: LogCategory, message: string): void {
    this.write('debug', category, message);
  }

  info(category: LogCategory, message: string): void {
    this.write('info', category, message);
  }

  warn(category: LogCategory, message: string): void {
    this.write('warn', category, message);
  }

  error(category: LogCategory, message: string, error?: unknown): void {
    const suffix = error instanceof Error ? `: ${error.stack ?? error.message}` : '';
    this.write('error', category, `${message}${suffix}`);
  }

  private write(level: Exclude<LogLevel, 'silent'>, category: LogCategory, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = format(level, category, message);
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  }
}

export const logger = new Logger();

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;

  while (Math.abs(value) >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }

  return `${value.toFixed(unit === 0 ? 0 : 1)}${units[unit]}`;
}
