/**
 * Scoped console logger.
 *
 * Every line is prefixed with its scope, e.g. "[rack-generator] Created 4 devices".
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
  child: (scope: string) => Logger;
}

let _threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  _threshold = level;
}

export function getLogLevel(): LogLevel {
  return _threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[_threshold];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
    child: (childScope) => createLogger(`${scope}:${childScope}`),
  };
}
