export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return RANK[level] >= RANK[threshold];
}

// Same "[Tag] message" shape the console output has always used.
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...details) => { if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details); },
    info: (message, ...details) => { if (enabled('info')) console.log(`${prefix} ${message}`, ...details); },
    warn: (message, ...details) => { if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details); },
    error: (message, ...details) => { if (enabled('error')) console.error(`${prefix} ${message}`, ...details); }
  };
}

export const log = createLogger('FuturePaths');
