import { config, type LogLevel } from '@/lib/config';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

let currentLevel: LogLevel = config.logLevel;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Create a scoped logger. Messages are prefixed with `[scope]` and dropped
 * when below the active level.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.info(prefix, message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}
