/* eslint-disable no-console */
/**
 * Levelled console logger.
 *
 * The client only reports what a caller cannot see from return values:
 * skipped or resumed downloads and accepted uploads.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(level: LogLevel = 'warn'): Logger {
  const threshold = LOG_LEVELS[level];
  const enabled = (at: LogLevel) => LOG_LEVELS[at] >= threshold;

  return {
    debug: (...args: unknown[]) => {
      if (enabled('debug')) console.debug('[crunchdao]', ...args);
    },
    info: (...args: unknown[]) => {
      if (enabled('info')) console.info('[crunchdao]', ...args);
    },
    warn: (...args: unknown[]) => {
      if (enabled('warn')) console.warn('[crunchdao]', ...args);
    },
    error: (...args: unknown[]) => {
      if (enabled('error')) console.error('[crunchdao]', ...args);
    },
  };
}
