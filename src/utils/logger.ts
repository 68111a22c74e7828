/**
 * Scoped console logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const prefix = `[${scope}]`;

  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= threshold;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level);
    }
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  }
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
