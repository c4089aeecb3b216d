import type { Logger, LogLevel } from './types.ts';

const noop = () => {};

/**
 * Wrap a logger so calls below `level` are dropped
 *
 * - silent: nothing
 * - warn: warn and error
 * - info: everything
 */
export function createLogger(logger: Logger, level: LogLevel = 'info'): Logger {
  if (level === 'info') return logger;
  if (level === 'warn') {
    return {
      log: noop,
      warn: logger.warn.bind(logger),
      error: logger.error.bind(logger),
    };
  }
  return { log: noop, warn: noop, error: noop };
}
